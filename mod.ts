// Halftone library entry point
// Import this for library usage: import { ... } from './mod.ts'

// Halftoning engine
export * from './src/halftone/mod.ts';

// Configuration
export * from './src/config/mod.ts';

// Logging
export {
  createLogger,
  getGlobalLogger,
  getLogger,
  isLogLevel,
  log,
  Logger,
  setGlobalLogger,
  type ComponentLogger,
  type LogEntry,
  type LoggerOptions,
  type LoggerStats,
  type LogLevel,
} from './src/logging.ts';
