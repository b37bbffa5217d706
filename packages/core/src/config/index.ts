/**
 * Configuration loading utilities
 */
export {
  parseConfig,
  formatNodePath,
  DEFAULT_DOCS_DIR,
  DEFAULT_SITE_DIR,
  DEFAULT_THEME,
  DEFAULT_PLUGINS,
  KNOWN_KEYS,
} from './ConfigParser.js';
export type { ConfigParseOptions } from './ConfigParser.js';
export { loadConfig, findConfigFile, CONFIG_FILE_NAMES } from './ConfigLoader.js';
export type { LoadConfigOptions, LoadedConfig } from './ConfigLoader.js';
export { serializeConfig, toDocument } from './ConfigSerializer.js';
export { createEnvTags } from './envTag.js';
export type { Environment } from './envTag.js';
