// File-based logging for the halftone engine
// Provides structured logging with multiple output formats

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { Env } from './env.ts';
import { errorMessage } from './utils/error.ts';
import { getCacheDir } from './xdg.ts';

/**
 * Get default log file path (~/.cache/halftone/logs/halftone.log)
 */
function getDefaultLogFile(): string {
  return join(getCacheDir(), 'logs', 'halftone.log');
}

export type LogLevel = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
  source?: string;
  sessionId?: string;
}

export interface LoggerOptions {
  // Path to log file; empty string disables file output
  logFile?: string;

  // Log level filtering
  level?: LogLevel;

  // Format options
  format?: 'json' | 'text' | 'structured';
  includeTimestamp?: boolean;
  includeLevel?: boolean;
  includeSource?: boolean;

  // Performance options
  bufferSize?: number;
  flushInterval?: number; // in milliseconds, 0 = flush only on demand

  // Console output
  consoleOutput?: boolean;
  consoleLevel?: LogLevel;
}

export interface LoggerStats {
  totalEntries: number;
  entriesByLevel: Record<LogLevel, number>;
  currentFileSize: number;
  bufferSize: number;
  lastFlush: Date;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export class Logger {
  private _options: Required<LoggerOptions>;
  private _buffer: LogEntry[] = [];
  private _stats: LoggerStats;
  private _flushTimer?: ReturnType<typeof setInterval>;
  private _currentLogFile?: string;
  private _disabled = false;
  private _sessionId: string;

  constructor(options: LoggerOptions = {}) {
    this._options = {
      logFile: options.logFile ?? getDefaultLogFile(),
      level: options.level || 'INFO',
      format: options.format || 'structured',
      includeTimestamp: options.includeTimestamp ?? true,
      includeLevel: options.includeLevel ?? true,
      includeSource: options.includeSource ?? true,
      bufferSize: options.bufferSize || 100,
      flushInterval: options.flushInterval ?? 1000,
      consoleOutput: options.consoleOutput ?? false,
      consoleLevel: options.consoleLevel || 'WARN',
    };

    this._sessionId = this._generateSessionId();
    this._stats = {
      totalEntries: 0,
      entriesByLevel: { TRACE: 0, DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, FATAL: 0 },
      currentFileSize: 0,
      bufferSize: 0,
      lastFlush: new Date(),
    };

    // No file work here: the log file is opened by the first entry that
    // passes the level filter
  }

  private _generateSessionId(): string {
    return `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
  }

  get logFile(): string | undefined {
    return this._disabled ? undefined : this._options.logFile;
  }

  get isDisabled(): boolean {
    return this._disabled;
  }

  initialize(): void {
    if (this._currentLogFile || this._disabled) {
      return; // Already initialized
    }

    // Check if logging is disabled (empty log file path)
    if (this._options.logFile.trim() === '') {
      this._disabled = true;
      return;
    }

    const logFile = this._options.logFile;
    try {
      mkdirSync(dirname(logFile), { recursive: true });
    } catch (error) {
      this._disableAfterFailure(`Failed to create log directory for "${logFile}"`, error);
      return;
    }
    this._currentLogFile = logFile;

    // Set up periodic flushing; never keeps the process alive
    if (this._options.flushInterval > 0) {
      this._flushTimer = setInterval(() => {
        this._flushSync();
      }, this._options.flushInterval);
      this._flushTimer.unref();
    }

    // Log session start
    this._writeEntry({
      timestamp: new Date(),
      level: 'INFO',
      message: 'Logging session started',
      context: {
        sessionId: this._sessionId,
        logFile,
      },
      source: 'Logger',
    });
  }

  private _disableAfterFailure(what: string, error: unknown): void {
    console.error(`${what}: ${errorMessage(error)}. File logging disabled.`);
    this._disabled = true;
    this._buffer = [];
    this._stats.bufferSize = 0;
    if (this._flushTimer) {
      clearInterval(this._flushTimer);
      this._flushTimer = undefined;
    }
  }

  private _shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this._options.level];
  }

  private _shouldConsole(level: LogLevel): boolean {
    return this._options.consoleOutput &&
           LOG_LEVELS[level] >= LOG_LEVELS[this._options.consoleLevel];
  }

  formatEntry(entry: LogEntry): string {
    switch (this._options.format) {
      case 'json':
        return JSON.stringify({
          ...entry,
          timestamp: entry.timestamp.toISOString(),
          error: entry.error ? {
            message: entry.error.message,
            stack: entry.error.stack,
            name: entry.error.name,
          } : undefined,
        }) + '\n';

      case 'text': {
        let text = '';
        if (this._options.includeTimestamp) {
          text += `[${entry.timestamp.toISOString()}] `;
        }
        if (this._options.includeLevel) {
          text += `${entry.level.padEnd(5)} `;
        }
        if (this._options.includeSource && entry.source) {
          text += `[${entry.source}] `;
        }
        text += entry.message;
        if (entry.context && Object.keys(entry.context).length > 0) {
          text += ` | ${JSON.stringify(entry.context)}`;
        }
        if (entry.error) {
          text += ` | ERROR: ${entry.error.message}`;
        }
        return text + '\n';
      }

      case 'structured':
      default: {
        let structured = '';
        if (this._options.includeTimestamp) {
          structured += `${entry.timestamp.toISOString()} `;
        }
        if (this._options.includeLevel) {
          structured += `[${entry.level}] `;
        }
        if (this._options.includeSource && entry.source) {
          structured += `${entry.source}: `;
        }
        structured += entry.message;

        if (entry.context && Object.keys(entry.context).length > 0) {
          structured += ' | ' + Object.entries(entry.context)
            .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
            .join(', ');
        }
        if (entry.error) {
          structured += `\n  Error: ${entry.error.message}`;
          if (entry.error.stack) {
            structured += `\n  Stack: ${entry.error.stack}`;
          }
        }
        return structured + '\n';
      }
    }
  }

  private _writeEntry(entry: LogEntry): void {
    // Ensure initialization
    if (!this._currentLogFile && !this._disabled) {
      this.initialize();
    }

    // Update stats
    this._stats.totalEntries++;
    this._stats.entriesByLevel[entry.level]++;

    // Console output if enabled (independent of the file)
    if (this._shouldConsole(entry.level)) {
      const formatted = this.formatEntry(entry).trim();
      if (entry.level === 'ERROR' || entry.level === 'FATAL') {
        console.error(formatted);
      } else if (entry.level === 'WARN') {
        console.warn(formatted);
      } else {
        console.log(formatted);
      }
    }

    if (this._disabled) return;

    // Add to buffer
    this._buffer.push(entry);
    this._stats.bufferSize = this._buffer.length;

    // Flush if buffer is full
    if (this._buffer.length >= this._options.bufferSize) {
      this._flushSync();
    }
  }

  private _flushSync(): void {
    if (this._buffer.length === 0 || this._disabled || !this._currentLogFile) return;

    // Format all buffered entries
    const entries = this._buffer.splice(0);
    const content = entries.map(entry => this.formatEntry(entry)).join('');

    try {
      appendFileSync(this._currentLogFile, content, 'utf8');
    } catch (error) {
      this._disableAfterFailure(`Failed to write to log file "${this._currentLogFile}"`, error);
      return;
    }

    this._stats.currentFileSize += Buffer.byteLength(content, 'utf8');
    this._stats.lastFlush = new Date();
    this._stats.bufferSize = this._buffer.length;
  }

  private _log(level: LogLevel, message: string, context?: Record<string, unknown>, source?: string, error?: Error): void {
    if (!this._shouldLog(level)) return;
    this._writeEntry({
      timestamp: new Date(),
      level,
      message,
      error,
      context,
      source,
      sessionId: this._sessionId,
    });
  }

  // Public logging methods

  trace(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('TRACE', message, context, source);
  }

  debug(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('DEBUG', message, context, source);
  }

  info(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('INFO', message, context, source);
  }

  warn(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('WARN', message, context, source);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>, source?: string): void {
    this._log('ERROR', message, context, source, error);
  }

  fatal(message: string, error?: Error, context?: Record<string, unknown>, source?: string): void {
    this._log('FATAL', message, context, source, error);
  }

  // Utility methods

  flush(): void {
    this._flushSync();
  }

  setLevel(level: LogLevel): void {
    this._options.level = level;
  }

  getLevel(): LogLevel {
    return this._options.level;
  }

  getStats(): LoggerStats {
    return { ...this._stats, entriesByLevel: { ...this._stats.entriesByLevel } };
  }

  close(): void {
    // Clear flush timer first
    if (this._flushTimer) {
      clearInterval(this._flushTimer);
      this._flushTimer = undefined;
    }

    // Nothing was ever written, or file output is off
    if (this._disabled || !this._currentLogFile) {
      return;
    }

    this._buffer.push({
      timestamp: new Date(),
      level: 'INFO',
      message: 'Logging session ended',
      context: {
        sessionId: this._sessionId,
        totalEntries: this._stats.totalEntries,
      },
      source: 'Logger',
      sessionId: this._sessionId,
    });
    this._flushSync();
    this._currentLogFile = undefined;
  }
}

// Environment variable configuration helpers
function getLogLevelFromEnv(): LogLevel | undefined {
  const envLevel = Env.get('HALFTONE_LOG_LEVEL')?.toUpperCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return undefined;
}

function getLogFileFromEnv(): string | undefined {
  return Env.get('HALFTONE_LOG_FILE');
}

function createDefaultLoggerOptions(): LoggerOptions {
  return {
    // Environment variables take precedence over defaults
    level: getLogLevelFromEnv() || 'INFO',
    // An empty HALFTONE_LOG_FILE disables file logging
    logFile: getLogFileFromEnv() ?? getDefaultLogFile(),
    format: 'structured',
    includeTimestamp: true,
    includeLevel: true,
    includeSource: true,
    bufferSize: 100,
    flushInterval: 1000, // 1 second
    consoleOutput: false,
    consoleLevel: 'ERROR',
  };
}

// Global logger instance
let globalLogger: Logger | undefined;

export function createLogger(options?: LoggerOptions): Logger {
  // Merge provided options with defaults from environment
  return new Logger({ ...createDefaultLoggerOptions(), ...options });
}

export function getGlobalLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger(createDefaultLoggerOptions());
  }
  return globalLogger;
}

/**
 * Replace the global logger. The previous one is closed.
 */
export function setGlobalLogger(logger: Logger): void {
  if (globalLogger && globalLogger !== logger) {
    globalLogger.close();
  }
  globalLogger = logger;
}

// Component-specific logger interface that automatically includes source
export interface ComponentLogger {
  trace: (message: string, context?: Record<string, unknown>) => void;
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
  fatal: (message: string, error?: Error, context?: Record<string, unknown>) => void;
  flush: () => void;
}

/**
 * Logger bound to a source name. Resolves the global logger on every call,
 * so module-level instances follow setGlobalLogger().
 */
export function getLogger(name: string): ComponentLogger {
  return {
    trace: (message, context) => getGlobalLogger().trace(message, context, name),
    debug: (message, context) => getGlobalLogger().debug(message, context, name),
    info: (message, context) => getGlobalLogger().info(message, context, name),
    warn: (message, context) => getGlobalLogger().warn(message, context, name),
    error: (message, error, context) => getGlobalLogger().error(message, error, context, name),
    fatal: (message, error, context) => getGlobalLogger().fatal(message, error, context, name),
    flush: () => getGlobalLogger().flush(),
  };
}

// Convenience functions using global logger
export const log = {
  trace: (message: string, context?: Record<string, unknown>, source?: string) =>
    getGlobalLogger().trace(message, context, source),

  debug: (message: string, context?: Record<string, unknown>, source?: string) =>
    getGlobalLogger().debug(message, context, source),

  info: (message: string, context?: Record<string, unknown>, source?: string) =>
    getGlobalLogger().info(message, context, source),

  warn: (message: string, context?: Record<string, unknown>, source?: string) =>
    getGlobalLogger().warn(message, context, source),

  error: (message: string, error?: Error, context?: Record<string, unknown>, source?: string) =>
    getGlobalLogger().error(message, error, context, source),

  fatal: (message: string, error?: Error, context?: Record<string, unknown>, source?: string) =>
    getGlobalLogger().fatal(message, error, context, source),
};
