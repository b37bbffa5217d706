/**
 * @docsite/core - Site configuration loading and validation
 */

// Error types
export {
  DocsiteError,
  ParseError,
  ConfigError,
  MissingFileError,
  UnknownExtensionError,
  UnknownPluginError,
  ValidationError,
} from './errors/DocsiteError.js';
export type {
  ErrorContext,
  ErrorSeverity,
  DocsiteErrorJSON,
  FileReferenceSource,
  MissingFileReference,
} from './errors/DocsiteError.js';

// Logging
export {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  createLogger,
  silentLogger,
  isLogLevel,
  formatMessage,
  LOG_LEVELS,
} from './logging/Logger.js';
export type { Logger, LogLevel } from './logging/Logger.js';

// Diagnostics
export { DiagnosticCollector, DiagnosticReporter, REPORT_FORMATS } from './diagnostics/index.js';
export type {
  Diagnostic,
  DiagnosticInput,
  DiagnosticStage,
  ReportFormat,
  ReportOptions,
  SummaryStats,
} from './diagnostics/index.js';

// Config
export {
  parseConfig,
  loadConfig,
  findConfigFile,
  serializeConfig,
  toDocument,
  createEnvTags,
  formatNodePath,
  CONFIG_FILE_NAMES,
  DEFAULT_DOCS_DIR,
  DEFAULT_SITE_DIR,
  DEFAULT_THEME,
  DEFAULT_PLUGINS,
  KNOWN_KEYS,
} from './config/index.js';
export type { ConfigParseOptions, LoadConfigOptions, LoadedConfig, Environment } from './config/index.js';

// Registries
export { ExtensionRegistry, normalizeExtensionName } from './registry/ExtensionRegistry.js';
export { PluginRegistry, resolvePlugin, resolvePlugins } from './registry/PluginRegistry.js';
export { ThemeRegistry } from './registry/ThemeRegistry.js';

// Validation
export {
  validateConfig,
  collectFileReferences,
  findMissingFiles,
  resolveReference,
  defaultFileExists,
} from './validation/ConfigValidator.js';
export type { FileReference, FileExists, ValidateOptions } from './validation/ConfigValidator.js';
export { checkConfig } from './validation/checkConfig.js';
export type { CheckOptions } from './validation/checkConfig.js';

// Navigation
export { walkNav, collectNavLeaves, countNavPages, navLocation, formatNavTree } from './nav/navigation.js';
export type { NavVisitor, NavLeafEntry } from './nav/navigation.js';

// i18n
export {
  getI18nSettings,
  localizePath,
  translateTitle,
  localizeNav,
  findMissingTranslations,
  I18N_PLUGIN,
} from './i18n/i18n.js';
export type { MissingTranslation, PageExists } from './i18n/i18n.js';

// Re-export types for convenience
export type * from '@docsite/types';
