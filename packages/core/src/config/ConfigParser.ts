/**
 * ConfigParser - turns mkdocs.yml text into a typed, frozen SiteConfig.
 *
 * Example document:
 *
 * ```yaml
 * site_name: Example Firmware
 * docs_dir: docs
 * nav:
 *   - Home: index.md
 *   - Getting Started:
 *     - About: getting-started/index.md
 *     - Installing: getting-started/installing.md
 * theme:
 *   name: material
 *   features: [navigation.tabs]
 * markdown_extensions:
 *   - toc:
 *       permalink: true
 * plugins:
 *   - search
 * ```
 *
 * Parsing is recursive descent over the YAML tree. The first structural
 * problem throws a ParseError carrying the line it was found on; unknown
 * markdown extensions throw UnknownExtensionError. Nothing partial is returned.
 */

import { isNode, LineCounter, parseDocument, type Document } from 'yaml';
import type {
  ConfigMapping,
  ConfigValue,
  ExtensionConfig,
  NavigationNode,
  PluginRef,
  SiteConfig,
  SiteMetadata,
  SocialLink,
  ThemeConfig,
  ThemePalette,
} from '@docsite/types';
import { ParseError } from '../errors/DocsiteError.js';
import type { DiagnosticCollector } from '../diagnostics/DiagnosticCollector.js';
import { silentLogger, type Logger } from '../logging/Logger.js';
import { ExtensionRegistry, normalizeExtensionName } from '../registry/ExtensionRegistry.js';
import { isExternalUrl, isRecord, isStringArray } from '../utils/guards.js';
import { deepFreeze } from '../utils/deepFreeze.js';
import { createEnvTags, type Environment } from './envTag.js';

export interface ConfigParseOptions {
  /** Receives warnings (unknown keys, unresolved tags, dropped settings) */
  logger?: Logger;
  /** Also record warnings as diagnostics */
  collector?: DiagnosticCollector;
  /** Variables for `!ENV` tags (default: process.env) */
  env?: Environment;
  /** Known markdown extensions (default: bundled registry) */
  extensions?: ExtensionRegistry;
  /** Path of the document, for error context */
  filePath?: string;
}

export const DEFAULT_DOCS_DIR = 'docs';
export const DEFAULT_SITE_DIR = 'site';
export const DEFAULT_THEME = 'mkdocs';
export const DEFAULT_PLUGINS: readonly string[] = ['search'];

/**
 * Top-level keys understood by the parser. Anything else is warned about and ignored.
 */
export const KNOWN_KEYS: ReadonlySet<string> = new Set([
  'site_name',
  'site_description',
  'site_author',
  'site_url',
  'repo_url',
  'repo_name',
  'edit_uri',
  'copyright',
  'docs_dir',
  'site_dir',
  'nav',
  'theme',
  'markdown_extensions',
  'plugins',
  'extra_css',
  'extra_javascript',
  'extra',
  'use_directory_urls',
  'strict',
]);

type NodePath = readonly (string | number)[];

interface ParseContext {
  doc: Document.Parsed;
  lineCounter: LineCounter;
  logger: Logger;
  collector?: DiagnosticCollector;
  filePath?: string;
}

/**
 * `['theme', 'palette', 0, 'primary']` → `theme.palette[0].primary`
 */
export function formatNodePath(path: NodePath): string {
  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out ? `.${segment}` : segment;
    }
  }
  return out;
}

function lineOf(ctx: ParseContext, path: NodePath): number | undefined {
  const node: unknown = path.length === 0 ? ctx.doc.contents : ctx.doc.getIn(path, true);
  if (isNode(node) && node.range) {
    return ctx.lineCounter.linePos(node.range[0]).line;
  }
  return undefined;
}

function fail(ctx: ParseContext, message: string, path: NodePath, location = formatNodePath(path)): never {
  throw new ParseError(message, 'ERR_PARSE_STRUCTURE', {
    filePath: ctx.filePath,
    lineNumber: lineOf(ctx, path),
    location: location || undefined,
  });
}

function warn(ctx: ParseContext, code: string, message: string, path: NodePath): void {
  const location = formatNodePath(path);
  const line = lineOf(ctx, path);
  ctx.logger.warn(message, { location, line });
  ctx.collector?.add({
    code,
    severity: 'warning',
    message,
    stage: 'load',
    file: ctx.filePath,
    line,
    location: location || undefined,
  });
}

// =============================================================================
// Scalars and free-form values
// =============================================================================

function optionalString(ctx: ParseContext, value: unknown, path: NodePath): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    fail(ctx, `${formatNodePath(path)} must be a string, got ${describeType(value)}`, path);
  }
  return value;
}

function requiredString(ctx: ParseContext, value: unknown, path: NodePath): string {
  const text = optionalString(ctx, value, path);
  if (text === undefined || !text.trim()) {
    fail(ctx, `${formatNodePath(path)} is required and cannot be empty`, path);
  }
  return text;
}

function optionalBoolean(ctx: ParseContext, value: unknown, path: NodePath, fallback: boolean): boolean {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    fail(ctx, `${formatNodePath(path)} must be true or false, got ${describeType(value)}`, path);
  }
  return value;
}

function stringList(ctx: ParseContext, value: unknown, path: NodePath): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!isStringArray(value)) {
    fail(ctx, `${formatNodePath(path)} must be a list of strings`, path);
  }
  return [...value];
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  if (isRecord(value)) return 'mapping';
  return typeof value;
}

function toConfigValue(ctx: ParseContext, value: unknown, path: NodePath): ConfigValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown, i) => toConfigValue(ctx, item, [...path, i]));
  }
  if (isRecord(value)) {
    return toConfigMapping(ctx, value, path);
  }
  fail(ctx, `${formatNodePath(path)} has an unsupported value (${describeType(value)})`, path);
}

function toConfigMapping(ctx: ParseContext, value: Record<string, unknown>, path: NodePath): ConfigMapping {
  const mapping: Record<string, ConfigValue> = {};
  for (const [key, item] of Object.entries(value)) {
    mapping[key] = toConfigValue(ctx, item, [...path, key]);
  }
  return mapping;
}

// =============================================================================
// Navigation
// =============================================================================

function parseNav(ctx: ParseContext, value: unknown): NavigationNode[] | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (!Array.isArray(value)) {
    fail(ctx, 'nav must be a list of entries', ['nav']);
  }
  return value.map((entry: unknown, i) => parseNavEntry(ctx, entry, ['nav', i], ['nav']));
}

function parseNavEntry(ctx: ParseContext, entry: unknown, path: NodePath, trail: string[]): NavigationNode {
  const where = trail.join(' > ');

  if (typeof entry === 'string') {
    if (!entry.trim()) {
      fail(ctx, `Navigation entry under "${where}" is an empty path`, path, where);
    }
    return isExternalUrl(entry)
      ? { kind: 'link', title: null, url: entry }
      : { kind: 'leaf', title: null, path: entry };
  }

  if (!isRecord(entry)) {
    fail(ctx, `Navigation entry under "${where}" must be a path or a "Title: target" mapping, got ${describeType(entry)}`, path, where);
  }

  const titles = Object.keys(entry);
  if (titles.length !== 1) {
    fail(
      ctx,
      `Navigation entry under "${where}" must have exactly one title, found ${titles.length}: ${titles.join(', ')} (check indentation)`,
      path,
      where
    );
  }

  const [title] = titles;
  const target = entry[title];
  const location = `${where} > ${title}`;

  if (!title.trim()) {
    fail(ctx, `Navigation entry under "${where}" has an empty title`, path, where);
  }

  if (typeof target === 'string') {
    if (!target.trim()) {
      fail(ctx, `Navigation entry "${location}" has an empty path`, [...path, title], location);
    }
    return isExternalUrl(target)
      ? { kind: 'link', title, url: target }
      : { kind: 'leaf', title, path: target };
  }

  if (Array.isArray(target)) {
    return {
      kind: 'section',
      title,
      children: target.map((child: unknown, i) =>
        parseNavEntry(ctx, child, [...path, title, i], [...trail, title])
      ),
    };
  }

  if (target === null || target === undefined) {
    fail(ctx, `Navigation entry "${location}" has no target`, [...path, title], location);
  }
  fail(
    ctx,
    `Navigation entry "${location}" must point to a path, a URL or a list of entries, got ${describeType(target)}`,
    [...path, title],
    location
  );
}

// =============================================================================
// Extensions and plugins: `- name`, `- name: {options}` or `{name: options}`
// =============================================================================

interface NamedEntry {
  name: string;
  options: ConfigMapping;
}

function entryOptions(ctx: ParseContext, value: unknown, path: NodePath): ConfigMapping {
  if (value === null || value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    fail(ctx, `Options of ${formatNodePath(path)} must be a mapping, got ${describeType(value)}`, path);
  }
  return toConfigMapping(ctx, value, path);
}

/**
 * `identity` maps a declared name to the name the renderer looks it up by;
 * two entries with the same identity are duplicates.
 */
function parseNamedList(
  ctx: ParseContext,
  key: string,
  value: unknown,
  identity: (name: string) => string = name => name
): NamedEntry[] {
  if (value === null) {
    return [];
  }

  const entries: NamedEntry[] = [];
  const seen = new Map<string, string>();
  const addEntry = (entry: NamedEntry, path: NodePath): void => {
    const id = identity(entry.name);
    const previous = seen.get(id);
    if (previous === entry.name) {
      fail(ctx, `${key} declares "${entry.name}" more than once`, path);
    }
    if (previous !== undefined) {
      fail(ctx, `${key} declares "${entry.name}" and "${previous}", which name the same entry`, path);
    }
    seen.set(id, entry.name);
    entries.push(entry);
  };

  if (isRecord(value)) {
    for (const [name, options] of Object.entries(value)) {
      addEntry({ name, options: entryOptions(ctx, options, [key, name]) }, [key, name]);
    }
    return entries;
  }

  if (!Array.isArray(value)) {
    fail(ctx, `${key} must be a list, got ${describeType(value)}`, [key]);
  }

  value.forEach((item: unknown, i) => {
    const path: NodePath = [key, i];

    if (typeof item === 'string' && item.trim()) {
      addEntry({ name: item, options: {} }, path);
    } else if (isRecord(item) && Object.keys(item).length === 1) {
      const [name] = Object.keys(item);
      addEntry({ name, options: entryOptions(ctx, item[name], [...path, name]) }, path);
    } else {
      fail(ctx, `${formatNodePath(path)} must be a name or a single "name: options" mapping`, path);
    }
  });
  return entries;
}

function parseExtensions(ctx: ParseContext, value: unknown, registry: ExtensionRegistry): ExtensionConfig[] {
  if (value === undefined) {
    return [];
  }
  const extensions = parseNamedList(ctx, 'markdown_extensions', value, normalizeExtensionName);
  extensions.forEach((extension, i) => {
    const path: NodePath = isRecord(value) ? ['markdown_extensions', extension.name] : ['markdown_extensions', i];
    registry.resolve(extension.name, {
      filePath: ctx.filePath,
      lineNumber: lineOf(ctx, path),
      location: formatNodePath(path),
    });
  });
  return extensions;
}

function parsePlugins(ctx: ParseContext, value: unknown): PluginRef[] {
  if (value === undefined) {
    return DEFAULT_PLUGINS.map(name => ({ name, options: {} }));
  }
  return parseNamedList(ctx, 'plugins', value);
}

// =============================================================================
// Theme
// =============================================================================

function parsePaletteEntry(ctx: ParseContext, value: unknown, path: NodePath): ThemePalette {
  if (!isRecord(value)) {
    fail(ctx, `${formatNodePath(path)} must be a mapping, got ${describeType(value)}`, path);
  }
  const { scheme, primary, accent, media, toggle, ...rest } = value;

  for (const key of Object.keys(rest)) {
    warn(ctx, 'ERR_CONFIG_UNKNOWN_KEY', `Ignoring unknown palette setting "${key}"`, [...path, key]);
  }

  const schemeValue = optionalString(ctx, scheme, [...path, 'scheme']);
  const primaryValue = optionalString(ctx, primary, [...path, 'primary']);
  const accentValue = optionalString(ctx, accent, [...path, 'accent']);
  const mediaValue = optionalString(ctx, media, [...path, 'media']);
  if (toggle !== undefined && toggle !== null && !isRecord(toggle)) {
    fail(ctx, `${formatNodePath([...path, 'toggle'])} must be a mapping`, [...path, 'toggle']);
  }

  return {
    ...(schemeValue === undefined ? {} : { scheme: schemeValue }),
    ...(primaryValue === undefined ? {} : { primary: primaryValue }),
    ...(accentValue === undefined ? {} : { accent: accentValue }),
    ...(mediaValue === undefined ? {} : { media: mediaValue }),
    ...(isRecord(toggle) ? { toggle: toConfigMapping(ctx, toggle, [...path, 'toggle']) } : {}),
  };
}

function parsePalette(ctx: ParseContext, value: unknown): ThemePalette[] {
  const path: NodePath = ['theme', 'palette'];
  if (value === undefined || value === null) {
    return [];
  }
  if (Array.isArray(value)) {
    return value.map((entry: unknown, i) => parsePaletteEntry(ctx, entry, [...path, i]));
  }
  return [parsePaletteEntry(ctx, value, path)];
}

function parseTheme(ctx: ParseContext, value: unknown): ThemeConfig {
  if (value === undefined || value === null) {
    return { name: DEFAULT_THEME, palette: [], features: [], options: {} };
  }
  if (typeof value === 'string') {
    if (!value.trim()) {
      fail(ctx, 'theme cannot be empty', ['theme']);
    }
    return { name: value, palette: [], features: [], options: {} };
  }
  if (!isRecord(value)) {
    fail(ctx, `theme must be a name or a mapping, got ${describeType(value)}`, ['theme']);
  }

  const { name, logo, favicon, custom_dir, language, palette, features, ...rest } = value;
  const logoValue = optionalString(ctx, logo, ['theme', 'logo']);
  const faviconValue = optionalString(ctx, favicon, ['theme', 'favicon']);
  const customDirValue = optionalString(ctx, custom_dir, ['theme', 'custom_dir']);
  const languageValue = optionalString(ctx, language, ['theme', 'language']);

  return {
    name: requiredString(ctx, name, ['theme', 'name']),
    ...(logoValue === undefined ? {} : { logo: logoValue }),
    ...(faviconValue === undefined ? {} : { favicon: faviconValue }),
    ...(customDirValue === undefined ? {} : { customDir: customDirValue }),
    ...(languageValue === undefined ? {} : { language: languageValue }),
    palette: parsePalette(ctx, palette),
    features: stringList(ctx, features, ['theme', 'features']),
    options: toConfigMapping(ctx, rest, ['theme']),
  };
}

// =============================================================================
// Site metadata and extra
// =============================================================================

function parseSocial(ctx: ParseContext, value: unknown): SocialLink[] {
  const path: NodePath = ['extra', 'social'];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    fail(ctx, `extra.social must be a list, got ${describeType(value)}`, path);
  }
  return value.map((entry: unknown, i) => {
    const entryPath: NodePath = [...path, i];
    if (!isRecord(entry)) {
      fail(ctx, `${formatNodePath(entryPath)} must be a mapping with icon and link`, entryPath);
    }
    const { icon, link, name, ...rest } = entry;
    for (const key of Object.keys(rest)) {
      warn(ctx, 'ERR_CONFIG_UNKNOWN_KEY', `Ignoring unknown social link setting "${key}"`, [...entryPath, key]);
    }
    const nameValue = optionalString(ctx, name, [...entryPath, 'name']);
    return {
      icon: requiredString(ctx, icon, [...entryPath, 'icon']),
      link: requiredString(ctx, link, [...entryPath, 'link']),
      ...(nameValue === undefined ? {} : { name: nameValue }),
    };
  });
}

function parseSiteMetadata(ctx: ParseContext, raw: Record<string, unknown>): SiteMetadata {
  const extra = raw.extra;
  if (extra !== undefined && extra !== null && !isRecord(extra)) {
    fail(ctx, `extra must be a mapping, got ${describeType(extra)}`, ['extra']);
  }
  const extraMapping: Record<string, unknown> = isRecord(extra) ? extra : {};
  const { social, generator, ...rest } = extraMapping;

  const description = optionalString(ctx, raw.site_description, ['site_description']);
  const author = optionalString(ctx, raw.site_author, ['site_author']);
  const url = optionalString(ctx, raw.site_url, ['site_url']);
  const repoUrl = optionalString(ctx, raw.repo_url, ['repo_url']);
  const repoName = optionalString(ctx, raw.repo_name, ['repo_name']);
  const editUri = optionalString(ctx, raw.edit_uri, ['edit_uri']);
  const copyright = optionalString(ctx, raw.copyright, ['copyright']);

  return {
    name: requiredString(ctx, raw.site_name, ['site_name']),
    ...(description === undefined ? {} : { description }),
    ...(author === undefined ? {} : { author }),
    ...(url === undefined ? {} : { url }),
    ...(repoUrl === undefined ? {} : { repoUrl }),
    ...(repoName === undefined ? {} : { repoName }),
    ...(editUri === undefined ? {} : { editUri }),
    ...(copyright === undefined ? {} : { copyright }),
    generator: optionalBoolean(ctx, generator, ['extra', 'generator'], true),
    social: parseSocial(ctx, social),
    extra: toConfigMapping(ctx, rest, ['extra']),
  };
}

// =============================================================================
// Entry point
// =============================================================================

/**
 * Parse a configuration document.
 *
 * @throws ParseError on malformed YAML or document structure
 * @throws UnknownExtensionError when markdown_extensions names an unknown extension
 */
export function parseConfig(document: string, options: ConfigParseOptions = {}): SiteConfig {
  const lineCounter = new LineCounter();
  const doc = parseDocument(document, {
    customTags: createEnvTags(options.env ?? process.env),
    lineCounter,
    prettyErrors: true,
    uniqueKeys: true,
  });

  const ctx: ParseContext = {
    doc,
    lineCounter,
    logger: options.logger ?? silentLogger,
    collector: options.collector,
    filePath: options.filePath,
  };

  if (doc.errors.length > 0) {
    const [first] = doc.errors;
    throw new ParseError(first.message, 'ERR_PARSE_SYNTAX', {
      filePath: options.filePath,
      lineNumber: first.linePos?.[0].line,
    });
  }

  for (const warning of doc.warnings) {
    ctx.logger.warn(warning.message, { code: warning.code });
    ctx.collector?.add({
      code: 'ERR_YAML_WARNING',
      severity: 'warning',
      message: warning.message,
      stage: 'load',
      file: options.filePath,
      line: warning.linePos?.[0].line,
    });
  }

  const raw: unknown = doc.toJS();
  if (raw === null || raw === undefined) {
    fail(ctx, 'Configuration document is empty', []);
  }
  if (!isRecord(raw)) {
    fail(ctx, `Configuration document must be a mapping of settings, got ${describeType(raw)}`, []);
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      warn(ctx, 'ERR_CONFIG_UNKNOWN_KEY', `Ignoring unrecognised setting "${key}"`, [key]);
    }
  }

  const config: SiteConfig = {
    site: parseSiteMetadata(ctx, raw),
    docsDir: optionalString(ctx, raw.docs_dir, ['docs_dir']) ?? DEFAULT_DOCS_DIR,
    siteDir: optionalString(ctx, raw.site_dir, ['site_dir']) ?? DEFAULT_SITE_DIR,
    nav: parseNav(ctx, raw.nav),
    theme: parseTheme(ctx, raw.theme),
    extensions: parseExtensions(ctx, raw.markdown_extensions, options.extensions ?? ExtensionRegistry.builtin()),
    plugins: parsePlugins(ctx, raw.plugins),
    extraCss: stringList(ctx, raw.extra_css, ['extra_css']),
    extraJavascript: stringList(ctx, raw.extra_javascript, ['extra_javascript']),
    useDirectoryUrls: optionalBoolean(ctx, raw.use_directory_urls, ['use_directory_urls'], true),
    strict: optionalBoolean(ctx, raw.strict, ['strict'], false),
  };

  return deepFreeze(config);
}
