// Config schema loading and value checking
// schema.json is the single source for defaults, env vars, CLI flags and
// allowed ranges.

import { readFileSync } from 'node:fs';
import { ConfigurationError } from '../halftone/errors.ts';

export type ConfigPropertyType = 'string' | 'integer' | 'number' | 'boolean';

/**
 * Schema property definition
 */
export interface ConfigProperty {
  type: ConfigPropertyType;
  default?: ConfigValue;
  env?: string;
  envInverted?: boolean;
  flag?: string;
  flagInverted?: boolean;
  enum?: Array<string | number>;
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: number;
  description?: string;
}

/**
 * Config schema structure
 */
export interface ConfigSchema {
  properties: Record<string, ConfigProperty>;
}

export type ConfigValue = string | number | boolean;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isPropertyType(value: unknown): value is ConfigPropertyType {
  return value === 'string' || value === 'integer' || value === 'number' || value === 'boolean';
}

function isConfigValue(value: unknown): value is ConfigValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function optionalString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  return typeof value === 'string' ? value : undefined;
}

function optionalNumber(raw: Record<string, unknown>, key: string): number | undefined {
  const value = raw[key];
  return typeof value === 'number' ? value : undefined;
}

function parseProperty(path: string, raw: unknown): ConfigProperty {
  if (!isRecord(raw) || !isPropertyType(raw.type)) {
    throw new ConfigurationError('schema property needs a type of string, integer, number or boolean', path);
  }
  const prop: ConfigProperty = { type: raw.type };
  if (isConfigValue(raw.default)) prop.default = raw.default;
  prop.env = optionalString(raw, 'env');
  prop.flag = optionalString(raw, 'flag');
  prop.description = optionalString(raw, 'description');
  prop.envInverted = raw.envInverted === true;
  prop.flagInverted = raw.flagInverted === true;
  prop.minimum = optionalNumber(raw, 'minimum');
  prop.maximum = optionalNumber(raw, 'maximum');
  prop.exclusiveMinimum = optionalNumber(raw, 'exclusiveMinimum');
  if (Array.isArray(raw.enum)) {
    prop.enum = raw.enum.filter((v): v is string | number => typeof v === 'string' || typeof v === 'number');
  }
  return prop;
}

/**
 * Validate a parsed schema document.
 */
export function parseSchema(raw: unknown): ConfigSchema {
  if (!isRecord(raw) || !isRecord(raw.properties)) {
    throw new ConfigurationError('config schema needs a properties object', 'schema');
  }
  const properties: Record<string, ConfigProperty> = {};
  for (const [path, prop] of Object.entries(raw.properties)) {
    properties[path] = parseProperty(path, prop);
  }
  return { properties };
}

let _schema: ConfigSchema | null = null;

/**
 * Get the bundled schema (read once)
 */
export function getSchema(): ConfigSchema {
  if (!_schema) {
    const url = new URL('./schema.json', import.meta.url);
    _schema = parseSchema(JSON.parse(readFileSync(url, 'utf8')));
  }
  return _schema;
}

/**
 * Check a typed value against the property's type, enum and range.
 * Throws ConfigurationError naming the property.
 */
export function checkValue(path: string, prop: ConfigProperty, value: unknown): ConfigValue {
  let checked: string | number;
  switch (prop.type) {
    case 'boolean':
      if (typeof value !== 'boolean') {
        throw new ConfigurationError(`expected a boolean, got ${JSON.stringify(value)}`, path);
      }
      return value;
    case 'string':
      if (typeof value !== 'string') {
        throw new ConfigurationError(`expected a string, got ${JSON.stringify(value)}`, path);
      }
      checked = value;
      break;
    case 'integer':
      if (typeof value !== 'number' || !Number.isInteger(value)) {
        throw new ConfigurationError(`expected an integer, got ${JSON.stringify(value)}`, path);
      }
      checked = value;
      break;
    case 'number':
    default:
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new ConfigurationError(`expected a number, got ${JSON.stringify(value)}`, path);
      }
      checked = value;
      break;
  }

  if (prop.enum && !prop.enum.includes(checked)) {
    throw new ConfigurationError(`expected one of ${prop.enum.join('|')}, got ${JSON.stringify(checked)}`, path);
  }
  if (typeof checked === 'number') {
    if (prop.minimum !== undefined && checked < prop.minimum) {
      throw new ConfigurationError(`must be >= ${prop.minimum}, got ${checked}`, path);
    }
    if (prop.exclusiveMinimum !== undefined && checked <= prop.exclusiveMinimum) {
      throw new ConfigurationError(`must be > ${prop.exclusiveMinimum}, got ${checked}`, path);
    }
    if (prop.maximum !== undefined && checked > prop.maximum) {
      throw new ConfigurationError(`must be <= ${prop.maximum}, got ${checked}`, path);
    }
  }
  return checked;
}

/**
 * Parse a string from an env var or CLI flag into the property's type,
 * then check it.
 */
export function parseValue(path: string, prop: ConfigProperty, raw: string): ConfigValue {
  switch (prop.type) {
    case 'boolean':
      return checkValue(path, prop, raw === 'true' || raw === '1');
    case 'integer': {
      const intVal = Number(raw.trim());
      if (raw.trim() === '' || !Number.isInteger(intVal)) {
        throw new ConfigurationError(`invalid integer value: ${raw}`, path);
      }
      return checkValue(path, prop, intVal);
    }
    case 'number': {
      const numVal = Number(raw.trim());
      if (raw.trim() === '' || !Number.isFinite(numVal)) {
        throw new ConfigurationError(`invalid number value: ${raw}`, path);
      }
      return checkValue(path, prop, numVal);
    }
    default:
      return checkValue(path, prop, raw);
  }
}
