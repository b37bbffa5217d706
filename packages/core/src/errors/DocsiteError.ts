/**
 * DocsiteError - Error hierarchy for configuration loading and validation
 *
 * All errors extend the native JavaScript Error class so callers that only
 * know about Error still get a message and a stack.
 *
 * Error types:
 * - ParseError: malformed YAML or document structure (fatal)
 * - ConfigError: config file missing/unreadable, bad plugin options (fatal)
 * - MissingFileError: referenced files absent under docs_dir (error, batched)
 * - UnknownExtensionError: extension not in the renderer's registry (fatal)
 * - UnknownPluginError: plugin not in the renderer's registry (fatal)
 * - ValidationError: non-blocking findings with configurable severity
 */

/**
 * Where a file reference came from.
 */
export type FileReferenceSource = 'nav' | 'theme.logo' | 'theme.favicon' | 'extra_css' | 'extra_javascript';

/**
 * A referenced path that did not resolve to a file under docs_dir.
 */
export interface MissingFileReference {
  path: string;
  source: FileReferenceSource;
  /** Human-readable position, e.g. `nav > Getting Started > About` */
  location: string;
}

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  lineNumber?: number;
  location?: string;
  [key: string]: unknown;
}

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * JSON representation of DocsiteError
 */
export interface DocsiteErrorJSON {
  code: string;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all errors raised while loading a site config.
 */
export abstract class DocsiteError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for diagnostics output
   */
  toJSON(): DocsiteErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Parse error - YAML syntax or document structure
 *
 * Severity: fatal (always)
 * Codes: ERR_PARSE_SYNTAX, ERR_PARSE_STRUCTURE
 */
export class ParseError extends DocsiteError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Configuration error - config file not found or unreadable, invalid plugin options
 *
 * Severity: fatal (always)
 * Codes: ERR_CONFIG_NOT_FOUND, ERR_CONFIG_UNREADABLE, ERR_I18N_INVALID
 */
export class ConfigError extends DocsiteError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Missing file error - one or more references did not resolve.
 *
 * Carries every unresolved reference so a single run reports all of them.
 *
 * Severity: error
 * Code: ERR_MISSING_FILE
 */
export class MissingFileError extends DocsiteError {
  readonly code = 'ERR_MISSING_FILE';
  readonly severity = 'error' as const;
  readonly missing: readonly MissingFileReference[];

  constructor(missing: readonly MissingFileReference[], context: ErrorContext = {}) {
    const noun = missing.length === 1 ? 'file' : 'files';
    const listed = missing.map(m => m.path).join(', ');
    super(
      `${missing.length} referenced ${noun} not found: ${listed}`,
      { ...context, paths: missing.map(m => m.path) },
      'Create the missing pages or fix the paths (they are relative to docs_dir)'
    );
    this.missing = missing;
  }

  /** Unresolved paths in first-seen order */
  get paths(): string[] {
    return this.missing.map(m => m.path);
  }
}

/**
 * Unknown markdown extension
 *
 * Severity: fatal (always)
 * Code: ERR_UNKNOWN_EXTENSION
 */
export class UnknownExtensionError extends DocsiteError {
  readonly code = 'ERR_UNKNOWN_EXTENSION';
  readonly severity = 'fatal' as const;
  readonly extension: string;

  constructor(extension: string, context: ErrorContext = {}) {
    super(
      `Unknown markdown extension: ${extension}`,
      { ...context, extension },
      'Check the name under markdown_extensions for typos'
    );
    this.extension = extension;
  }
}

/**
 * Unknown plugin
 *
 * Severity: fatal (always)
 * Code: ERR_UNKNOWN_PLUGIN
 */
export class UnknownPluginError extends DocsiteError {
  readonly code = 'ERR_UNKNOWN_PLUGIN';
  readonly severity = 'fatal' as const;
  readonly plugin: string;

  constructor(plugin: string, context: ErrorContext = {}) {
    super(
      `Unknown plugin: ${plugin}`,
      { ...context, plugin },
      'Install the package that provides it or check the name under plugins'
    );
    this.plugin = plugin;
  }
}

/**
 * Validation finding that does not stop loading on its own.
 *
 * Severity is configurable: unknown theme features are warnings,
 * an i18n default language missing from `languages` is an error.
 *
 * Codes:
 * - ERR_UNKNOWN_THEME: theme not in the registry (custom theme)
 * - ERR_UNKNOWN_FEATURE: theme feature token the theme does not list
 * - ERR_I18N_DEFAULT_LANGUAGE: default_language not among languages
 * - ERR_I18N_MISSING_TRANSLATION: page has no file for a language
 */
export class ValidationError extends DocsiteError {
  readonly code: string;
  readonly severity: ErrorSeverity;

  constructor(
    message: string,
    code: string,
    context: ErrorContext = {},
    suggestion?: string,
    severity: ErrorSeverity = 'warning'
  ) {
    super(message, context, suggestion);
    this.code = code;
    this.severity = severity;
  }
}
