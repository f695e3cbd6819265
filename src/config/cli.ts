// CLI argument parser driven by schema.json

import { ConfigurationError } from '../halftone/errors.ts';
import { getSchema, parseValue, type ConfigProperty, type ConfigValue } from './schema.ts';

export interface ParsedCliFlags {
  flags: Record<string, ConfigValue>;
  remaining: string[];
}

/**
 * Parse CLI arguments based on schema flag definitions.
 * Accepts `--flag value` and `--flag=value`; unknown arguments are passed
 * through in `remaining`. Missing or invalid values throw ConfigurationError.
 */
export function parseCliFlags(args: readonly string[]): ParsedCliFlags {
  const flags: Record<string, ConfigValue> = {};
  const remaining: string[] = [];

  // Build a map of flag -> { path, prop } for quick lookup
  const flagMap = new Map<string, { path: string; prop: ConfigProperty }>();
  for (const [path, prop] of Object.entries(getSchema().properties)) {
    if (prop.flag) {
      flagMap.set(prop.flag, { path, prop });
    }
  }

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    // Check for --flag=value syntax
    const eqIndex = arg.indexOf('=');
    let flagName: string;
    let flagValue: string | undefined;

    if (eqIndex > 0 && arg.startsWith('--')) {
      flagName = arg.substring(0, eqIndex);
      flagValue = arg.substring(eqIndex + 1);
    } else {
      flagName = arg;
      flagValue = undefined;
    }

    const entry = flagMap.get(flagName);
    if (entry) {
      const { path, prop } = entry;

      if (prop.type === 'boolean') {
        // Boolean flags: presence means true (or false if inverted)
        flags[path] = !prop.flagInverted;
      } else {
        // Non-boolean flags need a value
        if (flagValue === undefined) {
          if (i + 1 < args.length && !args[i + 1].startsWith('--')) {
            flagValue = args[i + 1];
            i++;
          } else {
            const enumHint = prop.enum ? ` [${prop.enum.join('|')}]` : '';
            throw new ConfigurationError(`${flagName} requires a value${enumHint}`, path);
          }
        }

        flags[path] = parseValue(path, prop, flagValue);
      }
    } else {
      // Unknown flag or positional argument
      remaining.push(arg);
    }

    i++;
  }

  return { flags, remaining };
}

function describeType(prop: ConfigProperty): string {
  if (prop.enum) return ` [${prop.enum.join('|')}]`;
  if (prop.type === 'boolean') return '';
  return ` (${prop.type})`;
}

/**
 * Generate help text for config options from schema
 */
export function generateConfigHelp(): string {
  const lines: string[] = [];

  lines.push('Configuration Options:');
  lines.push('');

  // Group by category (first part of path)
  const categories = new Map<string, Array<{ path: string; prop: ConfigProperty }>>();
  for (const [path, prop] of Object.entries(getSchema().properties)) {
    const category = path.includes('.') ? path.split('.')[0] : 'general';
    const entries = categories.get(category) ?? [];
    entries.push({ path, prop });
    categories.set(category, entries);
  }

  // 'general' first, then alphabetical
  const sortedCategories = [...categories.entries()].sort(([a], [b]) => {
    if (a === 'general') return -1;
    if (b === 'general') return 1;
    return a.localeCompare(b);
  });

  for (const [category, entries] of sortedCategories) {
    const categoryTitle = category.charAt(0).toUpperCase() + category.slice(1);
    lines.push(`  ${categoryTitle}:`);

    for (const { path, prop } of entries) {
      const parts: string[] = [];
      if (prop.flag) {
        parts.push(prop.type === 'boolean' ? prop.flag : `${prop.flag} <value>`);
      }
      if (prop.env) {
        parts.push(prop.env);
      }

      const desc = prop.description || path;
      const defaultStr = prop.default !== undefined ? ` (default: ${JSON.stringify(prop.default)})` : '';

      lines.push(`    ${parts.length > 0 ? parts.join(' | ') : `[config: ${path}]`}`);
      lines.push(`      ${desc}${describeType(prop)}${defaultStr}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Generate compact help for CLI flags only (for --help)
 */
export function generateFlagHelp(): string {
  const lines: string[] = [];

  lines.push('  Config flags:');

  const flagEntries: Array<{ flag: string; prop: ConfigProperty }> = [];
  for (const prop of Object.values(getSchema().properties)) {
    if (prop.flag) {
      flagEntries.push({ flag: prop.flag, prop });
    }
  }
  flagEntries.sort((a, b) => a.flag.localeCompare(b.flag));

  for (const { flag, prop } of flagEntries) {
    const flagStr = prop.type === 'boolean' ? flag : `${flag} <value>`;
    const envNote = prop.env ? ` (env: ${prop.env})` : '';
    lines.push(`  ${flagStr.padEnd(24)} ${prop.description || ''}${envNote}`);
  }

  return lines.join('\n');
}

/**
 * Generate environment variable reference
 */
export function generateEnvVarHelp(): string {
  const lines: string[] = [];

  lines.push('Environment Variables:');
  lines.push('');

  const envEntries: Array<{ env: string; prop: ConfigProperty }> = [];
  for (const prop of Object.values(getSchema().properties)) {
    if (prop.env) {
      envEntries.push({ env: prop.env, prop });
    }
  }
  envEntries.sort((a, b) => a.env.localeCompare(b.env));

  for (const { env, prop } of envEntries) {
    let typeInfo = '';
    if (prop.enum) {
      typeInfo = ` [${prop.enum.join('|')}]`;
    } else if (prop.type === 'boolean') {
      typeInfo = ' [true|false|1|0]';
    } else if (prop.type !== 'string') {
      typeInfo = ` (${prop.type})`;
    }
    const defaultStr = prop.default !== undefined ? ` (default: ${JSON.stringify(prop.default)})` : '';
    const invertedNote = prop.envInverted ? ' [set to disable]' : '';

    lines.push(`  ${env}`);
    lines.push(`    ${prop.description || ''}${typeInfo}${defaultStr}${invertedNote}`);
  }

  return lines.join('\n');
}
