/**
 * checkConfig - runs every check against a loaded config and collects the
 * findings instead of stopping at the first one.
 *
 * Stages:
 * - validate: missing files (one diagnostic per path)
 * - plugins: plugins the registry does not know (fatal)
 * - theme: unknown theme, unknown feature tokens (warnings)
 * - i18n: bad plugin options, default language not among languages,
 *   pages without a translated copy
 */

import { resolve } from 'path';
import type { Logger, SiteConfig } from '@docsite/types';
import { DocsiteError, MissingFileError, ValidationError } from '../errors/DocsiteError.js';
import { DiagnosticCollector, type Diagnostic, type DiagnosticStage } from '../diagnostics/DiagnosticCollector.js';
import { silentLogger } from '../logging/Logger.js';
import { PluginRegistry, resolvePlugin } from '../registry/PluginRegistry.js';
import { ThemeRegistry } from '../registry/ThemeRegistry.js';
import { findMissingTranslations, getI18nSettings } from '../i18n/i18n.js';
import { defaultFileExists, findMissingFiles, resolveReference, type FileExists } from './ConfigValidator.js';

export interface CheckOptions {
  /** Directory file references are relative to (normally docs_dir) */
  fileRoot: string;
  collector?: DiagnosticCollector;
  plugins?: PluginRegistry;
  themes?: ThemeRegistry;
  logger?: Logger;
  fileExists?: FileExists;
}

/**
 * Record a DocsiteError thrown by `step`; anything else propagates.
 */
function capture(collector: DiagnosticCollector, stage: DiagnosticStage, step: () => void): void {
  try {
    step();
  } catch (err) {
    if (!(err instanceof DocsiteError)) {
      throw err;
    }
    collector.addFromError(stage, err);
  }
}

/**
 * @returns every diagnostic in the collector after the run
 */
export function checkConfig(config: SiteConfig, options: CheckOptions): Diagnostic[] {
  const collector = options.collector ?? new DiagnosticCollector();
  const logger = options.logger ?? silentLogger;
  const plugins = options.plugins ?? PluginRegistry.builtin();
  const themes = options.themes ?? ThemeRegistry.builtin();
  const fileExists = options.fileExists ?? defaultFileExists;
  const { fileRoot } = options;

  const missing = findMissingFiles(config, fileRoot, fileExists);
  if (missing.length > 0) {
    collector.addFromError('validate', new MissingFileError(missing, { filePath: resolve(fileRoot) }));
  }
  logger.debug('File references checked', { missing: missing.length });

  config.plugins.forEach((plugin, position) => {
    capture(collector, 'plugins', () => {
      resolvePlugin(plugin.name, plugin.options, plugins, position);
    });
  });

  const { theme } = config;
  if (!themes.get(theme.name) && theme.customDir === undefined) {
    collector.addFromError('theme', new ValidationError(
      `Unknown theme: ${theme.name}`,
      'ERR_UNKNOWN_THEME',
      { location: 'theme.name' },
      'Install the theme package or set theme.custom_dir'
    ));
  }
  const unknownFeatures = new Set(themes.unknownFeatures(theme.name, theme.features));
  theme.features.forEach((feature, i) => {
    if (unknownFeatures.has(feature)) {
      collector.addFromError('theme', new ValidationError(
        `Theme "${theme.name}" has no feature "${feature}"`,
        'ERR_UNKNOWN_FEATURE',
        { location: `theme.features[${i}]` }
      ));
    }
  });

  capture(collector, 'i18n', () => {
    const settings = getI18nSettings(config);
    if (!settings) {
      return;
    }
    if (!settings.languages.some(l => l.code === settings.defaultLanguage)) {
      collector.addFromError('i18n', new ValidationError(
        `Default language "${settings.defaultLanguage}" is not among the configured languages`,
        'ERR_I18N_DEFAULT_LANGUAGE',
        { location: 'plugins.i18n.default_language' },
        `Add "${settings.defaultLanguage}" under languages`,
        'error'
      ));
    }
    const pageExists = (path: string): boolean => {
      const absolute = resolveReference(fileRoot, path);
      return absolute !== null && fileExists(absolute);
    };
    for (const gap of findMissingTranslations(config, settings, pageExists)) {
      collector.addFromError('i18n', new ValidationError(
        `No ${gap.language} translation of ${gap.path} (expected ${gap.localizedPath})`,
        'ERR_I18N_MISSING_TRANSLATION',
        { location: gap.location, filePath: gap.localizedPath }
      ));
    }
  });

  const diagnostics = collector.getAll();
  logger.info('Check complete', { diagnostics: diagnostics.length });
  return diagnostics;
}
