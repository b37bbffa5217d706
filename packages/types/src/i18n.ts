/**
 * Internationalization plugin settings
 */

/**
 * How translated pages are laid out under docs_dir:
 * - suffix: `about.en.md`, `about.fr.md`
 * - folder: `en/about.md`, `fr/about.md`
 */
export type DocsStructure = 'suffix' | 'folder';

export interface I18nLanguage {
  /** Language code, e.g. `en`, `pt_BR` */
  readonly code: string;
  /** Display name */
  readonly name: string;
  readonly isDefault: boolean;
  /** Navigation title → translated title */
  readonly navTranslations: Readonly<Record<string, string>>;
}

export interface I18nSettings {
  readonly defaultLanguage: string;
  readonly languages: readonly I18nLanguage[];
  readonly docsStructure: DocsStructure;
}
