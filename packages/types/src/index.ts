/**
 * @docsite/types - Type definitions for documentation site configuration
 */

// Configuration model
export * from './config.js';

// Branded types (validated configuration)
export type { ValidatedConfig } from './branded.js';

// Plugin, registry and logger types
export * from './plugins.js';

// i18n plugin settings
export * from './i18n.js';
