// Config module exports

export {
  HalftoneConfig,
  getDefaultConfigPath,
  type ConfigInitOptions,
  type ConfigSource,
} from './config.ts';
export {
  parseCliFlags,
  generateConfigHelp,
  generateFlagHelp,
  generateEnvVarHelp,
  type ParsedCliFlags,
} from './cli.ts';
export {
  getSchema,
  parseSchema,
  checkValue,
  parseValue,
  type ConfigProperty,
  type ConfigSchema,
  type ConfigValue,
} from './schema.ts';
