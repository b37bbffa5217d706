/**
 * i18n plugin support - reads the `i18n` plugin options and maps pages
 * and navigation titles to their per-language counterparts.
 *
 * Two option layouts are accepted:
 *
 *   plugins:
 *     - i18n:
 *         default_language: en
 *         languages:
 *           en: English
 *           fr: { name: Français }
 *         nav_translations:
 *           fr: { Home: Accueil }
 *
 *   plugins:
 *     - i18n:
 *         docs_structure: folder
 *         languages:
 *           - locale: en
 *             name: English
 *             default: true
 *           - locale: fr
 *             name: Français
 *             nav_translations: { Home: Accueil }
 */

import { posix } from 'path';
import type {
  DocsStructure,
  I18nLanguage,
  I18nSettings,
  NavigationNode,
  PluginRef,
  SiteConfig,
} from '@docsite/types';
import { ConfigError } from '../errors/DocsiteError.js';
import { isRecord } from '../utils/guards.js';
import { deepFreeze } from '../utils/deepFreeze.js';
import { collectNavLeaves, navLocation } from '../nav/navigation.js';

export const I18N_PLUGIN = 'i18n';

const DOCS_STRUCTURES: readonly DocsStructure[] = ['suffix', 'folder'];

/**
 * Page whose translated file is absent.
 */
export interface MissingTranslation {
  language: string;
  /** Path as written in nav */
  path: string;
  /** Path the language's copy is expected at */
  localizedPath: string;
  location: string;
}

/** Relative path (under docs_dir) → whether that file exists */
export type PageExists = (relativePath: string) => boolean;

function invalid(message: string, location: string): ConfigError {
  return new ConfigError(
    message,
    'ERR_I18N_INVALID',
    { location, plugin: I18N_PLUGIN },
    'See the i18n plugin options: default_language, languages, docs_structure, nav_translations'
  );
}

function readTranslations(value: unknown, location: string): Record<string, string> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw invalid('nav_translations must be a mapping of title to translated title', location);
  }
  const translations: Record<string, string> = {};
  for (const [title, translated] of Object.entries(value)) {
    if (typeof translated !== 'string') {
      throw invalid(`Translation of "${title}" must be a string`, `${location}.${title}`);
    }
    translations[title] = translated;
  }
  return translations;
}

interface DraftLanguage {
  code: string;
  name: string;
  isDefault: boolean;
  navTranslations: Record<string, string>;
}

function languagesFromMapping(value: Record<string, unknown>): DraftLanguage[] {
  return Object.entries(value).map(([code, entry]) => {
    const location = `plugins.i18n.languages.${code}`;
    if (typeof entry === 'string') {
      return { code, name: entry, isDefault: false, navTranslations: {} };
    }
    if (entry === null) {
      return { code, name: code, isDefault: false, navTranslations: {} };
    }
    if (!isRecord(entry)) {
      throw invalid(`Language "${code}" must be a display name or a mapping`, location);
    }
    const name = entry.name ?? code;
    if (typeof name !== 'string') {
      throw invalid(`Name of language "${code}" must be a string`, `${location}.name`);
    }
    return {
      code,
      name,
      isDefault: entry.default === true,
      navTranslations: readTranslations(entry.nav_translations, `${location}.nav_translations`),
    };
  });
}

function languagesFromList(value: readonly unknown[]): DraftLanguage[] {
  return value.map((entry, index) => {
    const location = `plugins.i18n.languages[${index}]`;
    if (!isRecord(entry)) {
      throw invalid('Language entries must be mappings with a locale', location);
    }
    const { locale, name, nav_translations } = entry;
    if (typeof locale !== 'string' || locale.length === 0) {
      throw invalid('Language entry is missing "locale"', location);
    }
    if (name !== undefined && typeof name !== 'string') {
      throw invalid(`Name of language "${locale}" must be a string`, `${location}.name`);
    }
    return {
      code: locale,
      name: name ?? locale,
      isDefault: entry.default === true,
      navTranslations: readTranslations(nav_translations, `${location}.nav_translations`),
    };
  });
}

/**
 * Settings of the i18n plugin, or null when it is not enabled.
 *
 * The default language is `default_language` when given, otherwise the
 * language flagged `default: true`, otherwise the first one listed.
 * It is not required to be among `languages`; checkConfig reports that.
 *
 * @throws ConfigError (ERR_I18N_INVALID) for malformed options
 */
export function getI18nSettings(config: Pick<SiteConfig, 'plugins'>): I18nSettings | null {
  const plugin: PluginRef | undefined = config.plugins.find(p => p.name === I18N_PLUGIN);
  if (!plugin) {
    return null;
  }
  const options: Record<string, unknown> = { ...plugin.options };

  const structure = options.docs_structure ?? 'suffix';
  const docsStructure = DOCS_STRUCTURES.find(s => s === structure);
  if (!docsStructure) {
    throw invalid(
      `docs_structure must be one of ${DOCS_STRUCTURES.join(', ')}, got ${JSON.stringify(structure)}`,
      'plugins.i18n.docs_structure'
    );
  }

  let languages: DraftLanguage[];
  if (Array.isArray(options.languages)) {
    languages = languagesFromList(options.languages);
  } else if (isRecord(options.languages)) {
    languages = languagesFromMapping(options.languages);
  } else {
    throw invalid('languages must be a mapping or a list', 'plugins.i18n.languages');
  }
  if (languages.length === 0) {
    throw invalid('At least one language is required', 'plugins.i18n.languages');
  }

  const seen = new Set<string>();
  for (const language of languages) {
    if (seen.has(language.code)) {
      throw invalid(`Language "${language.code}" is listed more than once`, 'plugins.i18n.languages');
    }
    seen.add(language.code);
  }

  // Top-level nav_translations keyed by language code
  const shared = options.nav_translations;
  if (shared !== undefined && shared !== null) {
    if (!isRecord(shared)) {
      throw invalid('nav_translations must be a mapping keyed by language', 'plugins.i18n.nav_translations');
    }
    for (const [code, table] of Object.entries(shared)) {
      const language = languages.find(l => l.code === code);
      const translations = readTranslations(table, `plugins.i18n.nav_translations.${code}`);
      if (language) {
        language.navTranslations = { ...translations, ...language.navTranslations };
      }
    }
  }

  const declaredDefault = options.default_language;
  if (declaredDefault !== undefined && typeof declaredDefault !== 'string') {
    throw invalid('default_language must be a string', 'plugins.i18n.default_language');
  }
  const defaultLanguage = declaredDefault
    ?? languages.find(l => l.isDefault)?.code
    ?? languages[0].code;

  return deepFreeze({
    defaultLanguage,
    docsStructure,
    languages: languages.map((l): I18nLanguage => ({ ...l, isDefault: l.code === defaultLanguage })),
  });
}

function languageCodes(settings: I18nSettings): string[] {
  return [settings.defaultLanguage, ...settings.languages.map(l => l.code)];
}

/**
 * Path of a page's copy in `language`.
 *
 * - suffix: `about/index.en.md` → `about/index.fr.md`, `index.md` → `index.fr.md`
 * - folder: `en/about.md` → `fr/about.md`, `about.md` → `fr/about.md`
 */
export function localizePath(path: string, language: string, settings: I18nSettings): string {
  const codes = languageCodes(settings);

  if (settings.docsStructure === 'folder') {
    const [first, ...rest] = path.split('/');
    const remainder = codes.includes(first) && rest.length > 0 ? rest : [first, ...rest];
    return [language, ...remainder].join('/');
  }

  const ext = posix.extname(path);
  const stem = ext ? path.slice(0, -ext.length) : path;
  const current = codes.find(code => stem.endsWith(`.${code}`));
  const base = current ? stem.slice(0, -(current.length + 1)) : stem;
  return `${base}.${language}${ext}`;
}

/**
 * Navigation title in `language`; the title itself when no translation exists.
 */
export function translateTitle(title: string, language: string, settings: I18nSettings): string {
  const entry = settings.languages.find(l => l.code === language);
  return entry?.navTranslations[title] ?? title;
}

/**
 * Navigation tree for one language: titles translated, page paths pointed at
 * the language's copy where that file exists, left as written otherwise.
 */
export function localizeNav(
  nav: readonly NavigationNode[],
  language: string,
  settings: I18nSettings,
  exists: PageExists
): NavigationNode[] {
  const translate = (title: string | null): string | null =>
    title === null ? null : translateTitle(title, language, settings);

  const localize = (node: NavigationNode): NavigationNode => {
    switch (node.kind) {
      case 'leaf': {
        const candidate = localizePath(node.path, language, settings);
        return { kind: 'leaf', title: translate(node.title), path: exists(candidate) ? candidate : node.path };
      }
      case 'link':
        return { kind: 'link', title: translate(node.title), url: node.url };
      case 'section':
        return {
          kind: 'section',
          title: translateTitle(node.title, language, settings),
          children: node.children.map(localize),
        };
    }
  };

  return deepFreeze(nav.map(localize));
}

/**
 * Pages listed in nav that have no file for some non-default language.
 */
export function findMissingTranslations(
  config: Pick<SiteConfig, 'nav'>,
  settings: I18nSettings,
  exists: PageExists
): MissingTranslation[] {
  const missing: MissingTranslation[] = [];
  const leaves = collectNavLeaves(config.nav);

  for (const language of settings.languages) {
    if (language.code === settings.defaultLanguage) {
      continue;
    }
    for (const { leaf, trail } of leaves) {
      const localizedPath = localizePath(leaf.path, language.code, settings);
      if (localizedPath !== leaf.path && !exists(localizedPath)) {
        missing.push({
          language: language.code,
          path: leaf.path,
          localizedPath,
          location: navLocation(trail, leaf),
        });
      }
    }
  }
  return missing;
}
