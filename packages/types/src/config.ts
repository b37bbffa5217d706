/**
 * Site configuration types - the in-memory form of mkdocs.yml
 *
 * Everything here is readonly: a configuration is loaded once per build,
 * frozen, and handed to the site generator unchanged.
 */

// === FREE-FORM VALUES ===

/**
 * Any value that can appear in an option mapping (extension/plugin options,
 * theme settings, `extra`).
 */
export type ConfigValue =
  | string
  | number
  | boolean
  | null
  | readonly ConfigValue[]
  | ConfigMapping;

export interface ConfigMapping {
  readonly [key: string]: ConfigValue;
}

// === NAVIGATION ===

/**
 * Page entry. `title` is null for bare entries (`- index.md`),
 * the renderer then uses the page's own heading.
 */
export interface NavLeaf {
  readonly kind: 'leaf';
  readonly title: string | null;
  /** Relative to docs_dir */
  readonly path: string;
}

/**
 * Nested menu group. Children order defines rendered menu order.
 */
export interface NavSection {
  readonly kind: 'section';
  readonly title: string;
  readonly children: readonly NavigationNode[];
}

/**
 * External link (absolute URL). Never checked against the filesystem.
 */
export interface NavLink {
  readonly kind: 'link';
  readonly title: string | null;
  readonly url: string;
}

export type NavigationNode = NavLeaf | NavSection | NavLink;

export type NavigationNodeKind = NavigationNode['kind'];

// === MARKDOWN EXTENSIONS ===

export interface ExtensionConfig {
  readonly name: string;
  readonly options: ConfigMapping;
}

// === THEME ===

export interface ThemePalette {
  readonly scheme?: string;
  readonly primary?: string;
  readonly accent?: string;
  readonly media?: string;
  readonly toggle?: ConfigMapping;
}

export interface ThemeConfig {
  readonly name: string;
  /** Asset path relative to docs_dir, or a URL */
  readonly logo?: string;
  /** Asset path relative to docs_dir, or a URL */
  readonly favicon?: string;
  readonly customDir?: string;
  readonly language?: string;
  readonly palette: readonly ThemePalette[];
  /** Enabled UI feature tokens, e.g. `navigation.tabs` */
  readonly features: readonly string[];
  /** Remaining theme keys (font, icon, ...) passed through untouched */
  readonly options: ConfigMapping;
}

// === SITE METADATA ===

export interface SocialLink {
  /** Icon token, e.g. `fontawesome/brands/github` */
  readonly icon: string;
  readonly link: string;
  readonly name?: string;
}

export interface SiteMetadata {
  readonly name: string;
  readonly description?: string;
  readonly author?: string;
  /** Canonical site URL */
  readonly url?: string;
  readonly repoUrl?: string;
  readonly repoName?: string;
  /** Edit-link template, appended to repoUrl */
  readonly editUri?: string;
  readonly copyright?: string;
  /** Show the "made with" generator notice */
  readonly generator: boolean;
  readonly social: readonly SocialLink[];
  /** Keys of `extra` other than social/generator */
  readonly extra: ConfigMapping;
}

// === PLUGINS ===

export interface PluginRef {
  readonly name: string;
  readonly options: ConfigMapping;
}

export type PluginList = readonly PluginRef[];

// === ROOT ===

export interface SiteConfig {
  readonly site: SiteMetadata;
  /** Documentation source directory, relative to the config file */
  readonly docsDir: string;
  /** Output directory, relative to the config file */
  readonly siteDir: string;
  /** null when the document has no `nav` (renderer derives one) */
  readonly nav: readonly NavigationNode[] | null;
  readonly theme: ThemeConfig;
  readonly extensions: readonly ExtensionConfig[];
  readonly plugins: PluginList;
  readonly extraCss: readonly string[];
  readonly extraJavascript: readonly string[];
  readonly useDirectoryUrls: boolean;
  readonly strict: boolean;
}
