import { readFileSync, existsSync, statSync } from 'fs';
import { dirname, isAbsolute, join, resolve } from 'path';
import type { SiteConfig } from '@docsite/types';
import { ConfigError } from '../errors/DocsiteError.js';
import { silentLogger } from '../logging/Logger.js';
import { parseConfig, type ConfigParseOptions } from './ConfigParser.js';

/**
 * File names tried, in order, when no explicit config file is given.
 */
export const CONFIG_FILE_NAMES: readonly string[] = ['mkdocs.yml', 'mkdocs.yaml'];

export interface LoadConfigOptions extends Omit<ConfigParseOptions, 'filePath'> {
  /** Config file path, relative to the project (overrides the default names) */
  configFile?: string;
}

/**
 * A parsed config together with where it came from.
 */
export interface LoadedConfig {
  config: SiteConfig;
  /** Absolute path of the document that was read */
  configPath: string;
  /** docs_dir resolved against the config file's directory */
  docsRoot: string;
  /** site_dir resolved against the config file's directory */
  siteRoot: string;
}

/**
 * Locate the config document for a project.
 *
 * @returns absolute path, or null when none of the candidates exists
 */
export function findConfigFile(projectPath: string, configFile?: string): string | null {
  const candidates = configFile ? [configFile] : CONFIG_FILE_NAMES;
  for (const candidate of candidates) {
    const fullPath = isAbsolute(candidate) ? candidate : join(projectPath, candidate);
    if (existsSync(fullPath) && statSync(fullPath).isFile()) {
      return resolve(fullPath);
    }
  }
  return null;
}

/**
 * Load the site config of a project.
 *
 * Priority:
 * 1. options.configFile (if given)
 * 2. mkdocs.yml
 * 3. mkdocs.yaml
 *
 * Unlike a missing optional setting, a missing or broken document is fatal:
 * there is no default configuration a site can be built from.
 *
 * @param projectPath - Project root
 * @throws ConfigError when no document is found or it cannot be read
 * @throws ParseError / UnknownExtensionError from parseConfig
 */
export function loadConfig(projectPath: string, options: LoadConfigOptions = {}): LoadedConfig {
  const logger = options.logger ?? silentLogger;
  const configPath = findConfigFile(projectPath, options.configFile);

  if (!configPath) {
    const tried = options.configFile ? [options.configFile] : CONFIG_FILE_NAMES;
    throw new ConfigError(
      `No config file found in ${resolve(projectPath)} (tried ${tried.join(', ')})`,
      'ERR_CONFIG_NOT_FOUND',
      { filePath: resolve(projectPath) },
      'Run from the project root or pass --config-file'
    );
  }

  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(
      `Cannot read ${configPath}: ${message}`,
      'ERR_CONFIG_UNREADABLE',
      { filePath: configPath }
    );
  }

  logger.debug('Loading config', { configPath });
  const config = parseConfig(content, { ...options, logger, filePath: configPath });

  const baseDir = dirname(configPath);
  const loaded: LoadedConfig = {
    config,
    configPath,
    docsRoot: resolve(baseDir, config.docsDir),
    siteRoot: resolve(baseDir, config.siteDir),
  };

  logger.info('Config loaded', {
    site: config.site.name,
    docsRoot: loaded.docsRoot,
    navEntries: config.nav === null ? 'auto' : config.nav.length,
  });

  return loaded;
}
