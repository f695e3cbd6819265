// Unified configuration for the halftone engine
// Schema-driven with layered overrides: default < file < env < cli

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { Env } from '../env.ts';
import { ConfigurationError } from '../halftone/errors.ts';
import { resolveStrategyName } from '../halftone/strategy.ts';
import type { PrepareOptions } from '../halftone/adjust.ts';
import type { DitherOptions, DitherStrategyName } from '../halftone/types.ts';
import { getLogger, isLogLevel, type LoggerOptions, type LogLevel } from '../logging.ts';
import { errorMessage } from '../utils/error.ts';
import { getConfigDir } from '../xdg.ts';
import { checkValue, getSchema, parseValue, type ConfigProperty, type ConfigSchema, type ConfigValue } from './schema.ts';

const logger = getLogger('Config');

/**
 * Initialization options for HalftoneConfig
 */
export interface ConfigInitOptions {
  cliFlags?: Record<string, ConfigValue>;
  /** Config file to read instead of the XDG location. */
  configFile?: string;
}

/**
 * Where a value came from.
 *
 * Priority order (lowest to highest):
 * 1. Schema defaults
 * 2. File config (~/.config/halftone/config.json)
 * 3. Env vars
 * 4. CLI flags (highest - explicit user intent)
 */
export type ConfigSource = 'default' | 'file' | 'env' | 'cli' | 'runtime';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function getDefaultConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

// Module-level singleton
let _instance: HalftoneConfig | null = null;

export class HalftoneConfig {
  protected data: Record<string, ConfigValue> = {};
  protected sources: Record<string, ConfigSource> = {};

  protected constructor(
    readonly configPath: string,
    fileConfig: Record<string, unknown>,
    cliFlags: Record<string, ConfigValue>
  ) {
    const { properties } = getSchema();

    // 1. Schema-defined properties
    for (const [path, prop] of Object.entries(properties)) {
      const resolved = this.resolveValue(path, prop, fileConfig, cliFlags);
      if (resolved) {
        this.data[path] = resolved.value;
        this.sources[path] = resolved.source;
      }
    }

    // 2. Custom keys from file config (not in schema) are kept as-is
    for (const [path, value] of Object.entries(this.flattenObject(fileConfig))) {
      if (!(path in properties)) {
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
          this.data[path] = value;
          this.sources[path] = 'file';
        }
      }
    }
  }

  /**
   * Flatten a nested object into dot-notation keys.
   * e.g., { a: { b: 1 } } => { 'a.b': 1 }
   */
  private flattenObject(obj: Record<string, unknown>, prefix = ''): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const path = prefix ? `${prefix}.${key}` : key;
      if (isRecord(value)) {
        Object.assign(result, this.flattenObject(value, path));
      } else {
        result[path] = value;
      }
    }
    return result;
  }

  private resolveValue(
    path: string,
    prop: ConfigProperty,
    fileConfig: Record<string, unknown>,
    cliFlags: Record<string, ConfigValue>
  ): { value: ConfigValue; source: ConfigSource } | undefined {
    // 1. CLI flag (highest - explicit user intent); inversion already applied by parseCliFlags
    if (prop.flag && cliFlags[path] !== undefined) {
      return { value: checkValue(path, prop, cliFlags[path]), source: 'cli' };
    }

    // 2. Env var
    if (prop.env) {
      const envVal = Env.get(prop.env);
      if (envVal !== undefined) {
        const parsed = parseValue(path, prop, envVal);
        return { value: prop.envInverted && typeof parsed === 'boolean' ? !parsed : parsed, source: 'env' };
      }
    }

    // 3. File config
    const fileVal = this.getPath(fileConfig, path);
    if (fileVal !== undefined) {
      return { value: checkValue(path, prop, fileVal), source: 'file' };
    }

    // 4. Default from schema
    if (prop.default !== undefined) {
      return { value: prop.default, source: 'default' };
    }
    return undefined;
  }

  private getPath(obj: Record<string, unknown>, path: string): unknown {
    // Flat key first ("matrix.order": 8), then nested ({ matrix: { order: 8 } })
    if (path in obj) {
      return obj[path];
    }
    let current: unknown = obj;
    for (const part of path.split('.')) {
      if (!isRecord(current)) return undefined;
      current = current[part];
    }
    return current;
  }

  /**
   * Initialize config (call once at startup)
   */
  static init(options: ConfigInitOptions = {}): HalftoneConfig {
    if (_instance) {
      throw new Error('HalftoneConfig already initialized. Call reset() first if re-initialization is needed.');
    }
    const configPath = options.configFile ?? getDefaultConfigPath();
    const fileConfig = this.loadConfigFile(configPath);
    _instance = new HalftoneConfig(configPath, fileConfig, options.cliFlags ?? {});
    logger.debug('Config initialized', { configPath, keys: Object.keys(_instance.data).length });
    return _instance;
  }

  /**
   * Get initialized config (auto-inits with defaults if not initialized)
   */
  static get(): HalftoneConfig {
    if (!_instance) {
      return this.init();
    }
    return _instance;
  }

  /**
   * Check if config has been initialized
   */
  static isInitialized(): boolean {
    return _instance !== null;
  }

  /**
   * Reset singleton (for testing)
   */
  static reset(): void {
    _instance = null;
  }

  /**
   * Apply CLI flags to existing config (for late initialization)
   * Useful when config auto-initializes before CLI flags are parsed.
   */
  static applyCliFlags(cliFlags: Record<string, ConfigValue>): HalftoneConfig {
    if (!_instance) {
      return this.init({ cliFlags });
    }

    for (const [path, prop] of Object.entries(getSchema().properties)) {
      const flagVal = cliFlags[path];
      if (prop.flag && flagVal !== undefined) {
        _instance.data[path] = checkValue(path, prop, flagVal);
        _instance.sources[path] = 'cli';
      }
    }
    return _instance;
  }

  /**
   * Read the config file. A missing file is an empty config; a file that
   * exists but cannot be read or parsed is an error.
   */
  private static loadConfigFile(configPath: string): Record<string, unknown> {
    if (!existsSync(configPath)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(configPath, 'utf8'));
    } catch (error) {
      throw new ConfigurationError(`cannot read ${configPath}: ${errorMessage(error)}`, 'config');
    }
    if (!isRecord(parsed)) {
      throw new ConfigurationError(`${configPath} must contain a JSON object`, 'config');
    }
    return parsed;
  }

  /**
   * Get the schema for documentation/validation
   */
  static getSchema(): ConfigSchema {
    return getSchema();
  }

  /**
   * Get current config formatted as text
   */
  static getConfigText(): string {
    const instance = this.get();
    const { properties } = getSchema();
    const lines: string[] = [];

    lines.push('Halftone Configuration');
    lines.push('======================');
    lines.push('');

    lines.push(`Config file: ${instance.configPath}`);
    lines.push(existsSync(instance.configPath) ? '  (exists)' : '  (not found)');
    lines.push('');

    lines.push('Priority: default < file < env < cli');
    lines.push('');

    // Group by category
    const categories = new Map<string, Array<{ path: string; prop: ConfigProperty }>>();
    for (const [path, prop] of Object.entries(properties)) {
      const category = path.includes('.') ? path.split('.')[0] : 'general';
      const entries = categories.get(category) ?? [];
      entries.push({ path, prop });
      categories.set(category, entries);
    }

    const sortedCategories = [...categories.entries()].sort(([a], [b]) => {
      if (a === 'general') return -1;
      if (b === 'general') return 1;
      return a.localeCompare(b);
    });

    for (const [category, entries] of sortedCategories) {
      lines.push(`[${category.charAt(0).toUpperCase() + category.slice(1)}]`);

      for (const { path, prop } of entries) {
        const value = instance.data[path];
        const source = instance.sources[path];
        const displayValue = value === undefined ? '(not set)' : JSON.stringify(value);

        let sourceStr = '';
        switch (source) {
          case 'env':
            sourceStr = ` <- ${prop.env}`;
            break;
          case 'cli':
            sourceStr = ` <- ${prop.flag}`;
            break;
          case 'file':
            sourceStr = ' <- config.json';
            break;
          case 'runtime':
            sourceStr = ' <- runtime';
            break;
        }

        lines.push(`  ${path} = ${displayValue}${sourceStr}`);
      }
      lines.push('');
    }

    const customKeys = Object.keys(instance.data).filter(k => !(k in properties)).sort();
    if (customKeys.length > 0) {
      lines.push('[Custom]');
      for (const path of customKeys) {
        lines.push(`  ${path} = ${JSON.stringify(instance.data[path])} <- ${instance.sources[path]}`);
      }
      lines.push('');
    }

    return lines.join('\n');
  }

  // ============================================================================
  // Generic getters for any config property
  // ============================================================================

  /**
   * Get a string config value by key path (e.g., 'dither', 'glyph.ramp')
   */
  getString(key: string, defaultValue: string): string {
    const value = this.data[key];
    if (value === undefined) return defaultValue;
    return String(value);
  }

  /**
   * Get a boolean config value by key path
   */
  getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.data[key];
    if (value === undefined) return defaultValue;
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') return value === 'true' || value === '1';
    return value !== 0;
  }

  /**
   * Get a number config value by key path
   */
  getNumber(key: string, defaultValue: number): number {
    const value = this.data[key];
    if (value === undefined) return defaultValue;
    if (typeof value === 'number') return value;
    const parsed = parseFloat(String(value));
    return isNaN(parsed) ? defaultValue : parsed;
  }

  /**
   * Get any config value by key path (returns undefined if not set)
   */
  getValue(key: string): ConfigValue | undefined {
    return this.data[key];
  }

  getSource(key: string): ConfigSource | undefined {
    return this.sources[key];
  }

  /**
   * Check if a config key exists
   */
  hasKey(key: string): boolean {
    return key in this.data;
  }

  /**
   * Set a config value at runtime. Strings are coerced to the schema type;
   * schema keys are range-checked.
   */
  setValue(key: string, value: ConfigValue): void {
    const oldValue = this.data[key];
    const prop = getSchema().properties[key];
    let newValue = value;
    if (prop) {
      newValue = typeof value === 'string' && prop.type !== 'string'
        ? parseValue(key, prop, value)
        : checkValue(key, prop, value);
    }

    this.data[key] = newValue;
    this.sources[key] = 'runtime';
    logger.debug(`Config updated: ${key} = ${JSON.stringify(newValue)} (was: ${JSON.stringify(oldValue)})`);
  }

  private optionalString(key: string): string | undefined {
    const value = this.data[key];
    return typeof value === 'string' ? value : undefined;
  }

  private optionalNumber(key: string): number | undefined {
    const value = this.data[key];
    return typeof value === 'number' ? value : undefined;
  }

  // ============================================================================
  // Typed getters
  // ============================================================================

  // Halftoning
  get dither(): DitherStrategyName {
    return resolveStrategyName(this.getString('dither', 'floyd'));
  }

  get matrixOrder(): number {
    return this.getNumber('matrix.order', 8);
  }

  get matrixFile(): string | undefined {
    return this.optionalString('matrix.file');
  }

  get historyDepth(): number {
    return this.getNumber('riemersma.historyDepth', 16);
  }

  get decayRatio(): number {
    return this.getNumber('riemersma.decayRatio', 0.1);
  }

  get glyphRamp(): string {
    return this.getString('glyph.ramp', ' .:-=+*#%@');
  }

  get fontSize(): number {
    return this.getNumber('glyph.fontSize', 8);
  }

  get dpi(): number {
    return this.getNumber('glyph.dpi', 203);
  }

  get fontFile(): string | undefined {
    return this.optionalString('glyph.fontFile');
  }

  // Pre-processing
  get brightness(): number {
    return this.getNumber('image.brightness', 1.2);
  }

  get contrast(): number {
    return this.getNumber('image.contrast', 1.0);
  }

  get rotate(): boolean {
    return this.getBoolean('image.rotate', true);
  }

  get labelWidth(): number | undefined {
    return this.optionalNumber('label.width');
  }

  get labelHeight(): number | undefined {
    return this.optionalNumber('label.height');
  }

  // Logging
  get logLevel(): LogLevel {
    const level = this.getString('log.level', 'INFO').toUpperCase();
    return isLogLevel(level) ? level : 'INFO';
  }

  get logFile(): string | undefined {
    return this.optionalString('log.file');
  }

  /**
   * Options for createDitherStrategy() / ditherImage().
   */
  toDitherOptions(): DitherOptions {
    return {
      strategy: this.dither,
      matrixOrder: this.matrixOrder,
      matrixFile: this.matrixFile,
      riemersma: { historyDepth: this.historyDepth, decayRatio: this.decayRatio },
      glyph: {
        ramp: this.glyphRamp,
        metrics: { fontSize: this.fontSize, dpi: this.dpi },
        fontFile: this.fontFile,
      },
    };
  }

  /**
   * Options for prepareImage().
   */
  toPrepareOptions(): PrepareOptions {
    return {
      width: this.labelWidth,
      height: this.labelHeight,
      brightness: this.brightness,
      contrast: this.contrast,
      rotate: this.rotate,
    };
  }

  /**
   * Options for createLogger(). The file is left to the logger's own
   * default when unset.
   */
  toLoggerOptions(): LoggerOptions {
    const options: LoggerOptions = { level: this.logLevel };
    const logFile = this.logFile;
    if (logFile !== undefined) options.logFile = logFile;
    return options;
  }
}
