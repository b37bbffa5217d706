/**
 * Plugin Types - registry descriptors, resolved handles and logging contract
 */

import type { ConfigMapping } from './config.js';

// === LOG LEVEL ===
/**
 * Log level for controlling verbosity.
 * Levels are ordered by verbosity: silent < errors < warnings < info < debug
 */
export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

// === LOGGER INTERFACE ===
/**
 * Logger interface for structured logging.
 * The loader and validator report through an injected logger instead of console.
 */
export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
}

// === REGISTRY DESCRIPTORS ===

/**
 * A site-generator plugin known to the renderer.
 */
export interface PluginDescriptor {
  name: string;
  /** Package that provides the plugin (the renderer itself for built-ins) */
  package: string;
  description: string;
}

/**
 * A markdown extension known to the renderer.
 */
export interface ExtensionDescriptor {
  name: string;
  package: string;
}

/**
 * A theme and the UI feature tokens it understands.
 * `features: null` means the theme does not publish a feature list.
 */
export interface ThemeDescriptor {
  name: string;
  package: string;
  features: string[] | null;
}

// === RESOLVED PLUGINS ===

/**
 * Result of resolving a declared plugin against the registry.
 * Carries the declared name and options through untouched.
 */
export interface PluginHandle {
  readonly name: string;
  readonly package: string;
  readonly description: string;
  readonly options: ConfigMapping;
  /** Zero-based position in the declared plugin list */
  readonly position: number;
}
