/**
 * ConfigSerializer - writes a SiteConfig back out as an mkdocs.yml document.
 *
 * Output uses a fixed key order and the shortest form of each entry
 * (`- search` rather than `- search: {}`), so serializing a parsed config and
 * parsing it again yields a structure deep-equal to the first parse.
 */

import { stringify } from 'yaml';
import type {
  ExtensionConfig,
  NavigationNode,
  PluginRef,
  SiteConfig,
  ThemeConfig,
  ThemePalette,
} from '@docsite/types';

type DocumentValue = unknown;

function navToDocument(node: NavigationNode): DocumentValue {
  switch (node.kind) {
    case 'leaf':
      return node.title === null ? node.path : { [node.title]: node.path };
    case 'link':
      return node.title === null ? node.url : { [node.title]: node.url };
    case 'section':
      return { [node.title]: node.children.map(navToDocument) };
  }
}

function namedEntryToDocument(entry: ExtensionConfig | PluginRef): DocumentValue {
  return Object.keys(entry.options).length === 0 ? entry.name : { [entry.name]: entry.options };
}

function paletteToDocument(palette: ThemePalette): Record<string, DocumentValue> {
  const out: Record<string, DocumentValue> = {};
  if (palette.scheme !== undefined) out.scheme = palette.scheme;
  if (palette.primary !== undefined) out.primary = palette.primary;
  if (palette.accent !== undefined) out.accent = palette.accent;
  if (palette.media !== undefined) out.media = palette.media;
  if (palette.toggle !== undefined) out.toggle = palette.toggle;
  return out;
}

function themeToDocument(theme: ThemeConfig): Record<string, DocumentValue> {
  const out: Record<string, DocumentValue> = { name: theme.name };
  if (theme.logo !== undefined) out.logo = theme.logo;
  if (theme.favicon !== undefined) out.favicon = theme.favicon;
  if (theme.customDir !== undefined) out.custom_dir = theme.customDir;
  if (theme.language !== undefined) out.language = theme.language;
  if (theme.palette.length > 0) out.palette = theme.palette.map(paletteToDocument);
  if (theme.features.length > 0) out.features = [...theme.features];
  return { ...out, ...theme.options };
}

function extraToDocument(config: SiteConfig): Record<string, DocumentValue> {
  const out: Record<string, DocumentValue> = { ...config.site.extra };
  if (config.site.social.length > 0) {
    out.social = config.site.social.map(link => ({ ...link }));
  }
  if (!config.site.generator) {
    out.generator = false;
  }
  return out;
}

/**
 * Plain object in document shape (snake_case keys, canonical order).
 */
export function toDocument(config: SiteConfig): Record<string, DocumentValue> {
  const { site } = config;
  const doc: Record<string, DocumentValue> = { site_name: site.name };

  if (site.description !== undefined) doc.site_description = site.description;
  if (site.author !== undefined) doc.site_author = site.author;
  if (site.url !== undefined) doc.site_url = site.url;
  if (site.repoUrl !== undefined) doc.repo_url = site.repoUrl;
  if (site.repoName !== undefined) doc.repo_name = site.repoName;
  if (site.editUri !== undefined) doc.edit_uri = site.editUri;
  if (site.copyright !== undefined) doc.copyright = site.copyright;

  doc.docs_dir = config.docsDir;
  doc.site_dir = config.siteDir;
  doc.use_directory_urls = config.useDirectoryUrls;
  doc.strict = config.strict;
  doc.theme = themeToDocument(config.theme);

  if (config.extensions.length > 0) {
    doc.markdown_extensions = config.extensions.map(namedEntryToDocument);
  }
  // Always written: an absent key would bring back the default plugins
  doc.plugins = config.plugins.map(namedEntryToDocument);

  if (config.extraCss.length > 0) doc.extra_css = [...config.extraCss];
  if (config.extraJavascript.length > 0) doc.extra_javascript = [...config.extraJavascript];

  const extra = extraToDocument(config);
  if (Object.keys(extra).length > 0) doc.extra = extra;

  if (config.nav !== null) {
    doc.nav = config.nav.map(navToDocument);
  }

  return doc;
}

/**
 * Serialize a config to YAML text.
 */
export function serializeConfig(config: SiteConfig): string {
  return stringify(toDocument(config), { lineWidth: 0, aliasDuplicateObjects: false });
}
