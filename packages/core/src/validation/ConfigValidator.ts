/**
 * ConfigValidator - checks that every file a config refers to exists.
 *
 * References are collected from nav pages, the theme logo and favicon,
 * extra_css and extra_javascript. URLs are skipped. All unresolved paths
 * are reported together in one MissingFileError.
 */

import { existsSync, statSync } from 'fs';
import { isAbsolute, relative, resolve, sep } from 'path';
import type { Logger, SiteConfig, ValidatedConfig } from '@docsite/types';
import {
  MissingFileError,
  type FileReferenceSource,
  type MissingFileReference,
} from '../errors/DocsiteError.js';
import { silentLogger } from '../logging/Logger.js';
import { collectNavLeaves, navLocation } from '../nav/navigation.js';
import { isExternalUrl } from '../utils/guards.js';
import { brandValidated } from './brandValidated.js';

/**
 * A path the config expects to find under docs_dir.
 */
export interface FileReference {
  path: string;
  source: FileReferenceSource;
  location: string;
}

/** Absolute path → whether a regular file exists there */
export type FileExists = (absolutePath: string) => boolean;

export interface ValidateOptions {
  logger?: Logger;
  fileExists?: FileExists;
}

export const defaultFileExists: FileExists = (absolutePath) =>
  existsSync(absolutePath) && statSync(absolutePath).isFile();

/**
 * Every local file reference in document order: nav pages first, then
 * theme assets, stylesheets and scripts.
 */
export function collectFileReferences(config: SiteConfig): FileReference[] {
  const refs: FileReference[] = [];
  const add = (path: string, source: FileReferenceSource, location: string): void => {
    if (!isExternalUrl(path)) {
      refs.push({ path, source, location });
    }
  };

  for (const { leaf, trail } of collectNavLeaves(config.nav)) {
    add(leaf.path, 'nav', navLocation(trail, leaf));
  }
  if (config.theme.logo !== undefined) add(config.theme.logo, 'theme.logo', 'theme.logo');
  if (config.theme.favicon !== undefined) add(config.theme.favicon, 'theme.favicon', 'theme.favicon');
  config.extraCss.forEach((path, i) => add(path, 'extra_css', `extra_css[${i}]`));
  config.extraJavascript.forEach((path, i) => add(path, 'extra_javascript', `extra_javascript[${i}]`));

  return refs;
}

/**
 * Absolute path of a reference, or null when it points outside fileRoot.
 * A leading `/` is taken as relative to fileRoot.
 */
export function resolveReference(fileRoot: string, path: string): string | null {
  const root = resolve(fileRoot);
  const absolute = resolve(root, path.replace(/^\/+/, ''));
  const rel = relative(root, absolute);
  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return null;
  }
  return absolute;
}

/**
 * References that do not resolve to a file, deduplicated by path in
 * first-seen order.
 */
export function findMissingFiles(
  config: SiteConfig,
  fileRoot: string,
  fileExists: FileExists = defaultFileExists
): MissingFileReference[] {
  const missing: MissingFileReference[] = [];
  const reported = new Set<string>();

  for (const ref of collectFileReferences(config)) {
    if (reported.has(ref.path)) {
      continue;
    }
    const absolute = resolveReference(fileRoot, ref.path);
    if (absolute === null || !fileExists(absolute)) {
      reported.add(ref.path);
      missing.push({ path: ref.path, source: ref.source, location: ref.location });
    }
  }
  return missing;
}

/**
 * Confirm every referenced file exists under fileRoot.
 *
 * @param fileRoot - Directory references are relative to (normally docs_dir)
 * @throws MissingFileError listing every unresolved reference
 */
export function validateConfig(
  config: SiteConfig,
  fileRoot: string,
  options: ValidateOptions = {}
): ValidatedConfig {
  const logger = options.logger ?? silentLogger;
  const missing = findMissingFiles(config, fileRoot, options.fileExists);

  if (missing.length > 0) {
    for (const ref of missing) {
      logger.debug('Missing file', { path: ref.path, location: ref.location });
    }
    throw new MissingFileError(missing, { filePath: resolve(fileRoot) });
  }

  logger.debug('All file references resolved', { fileRoot: resolve(fileRoot) });
  return brandValidated(config);
}
