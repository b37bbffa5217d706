/**
 * i18n Tests
 *
 * Tests:
 * - getI18nSettings: mapping and list layouts, defaults, invalid options
 * - localizePath for suffix and folder layouts
 * - translateTitle falls back to the title itself
 * - localizeNav / findMissingTranslations against a fake file set
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  ConfigError,
  findMissingTranslations,
  getI18nSettings,
  localizeNav,
  localizePath,
  parseConfig,
  translateTitle,
  type ConfigMapping,
  type I18nSettings,
} from '@docsite/core';

const SUFFIX: I18nSettings = {
  defaultLanguage: 'en',
  docsStructure: 'suffix',
  languages: [
    { code: 'en', name: 'English', isDefault: true, navTranslations: {} },
    { code: 'fr', name: 'Français', isDefault: false, navTranslations: { Home: 'Accueil', 'Getting Started': 'Premiers pas' } },
  ],
};

const FOLDER: I18nSettings = { ...SUFFIX, docsStructure: 'folder' };

// =============================================================================
// TESTS: getI18nSettings
// =============================================================================

describe('getI18nSettings', () => {
  it('should return null without the i18n plugin', () => {
    assert.strictEqual(getI18nSettings({ plugins: [{ name: 'search', options: {} }] }), null);
  });

  it('should read the mapping layout', () => {
    const settings = getI18nSettings({
      plugins: [{
        name: 'i18n',
        options: {
          default_language: 'en',
          languages: { en: 'English', fr: 'Français' },
          nav_translations: { fr: { Home: 'Accueil' } },
        },
      }],
    });

    assert.deepStrictEqual(settings, {
      defaultLanguage: 'en',
      docsStructure: 'suffix',
      languages: [
        { code: 'en', name: 'English', isDefault: true, navTranslations: {} },
        { code: 'fr', name: 'Français', isDefault: false, navTranslations: { Home: 'Accueil' } },
      ],
    });
  });

  it('should read the list layout', () => {
    const config = parseConfig(`site_name: I18n
plugins:
  - i18n:
      docs_structure: folder
      languages:
        - locale: de
          name: Deutsch
          nav_translations:
            Getting Started: Erste Schritte
        - locale: en
          name: English
          default: true
`);
    const settings = getI18nSettings(config);

    assert.ok(settings);
    assert.strictEqual(settings.defaultLanguage, 'en');
    assert.strictEqual(settings.docsStructure, 'folder');
    assert.deepStrictEqual(settings.languages.map(l => [l.code, l.isDefault]), [['de', false], ['en', true]]);
    assert.deepStrictEqual(settings.languages[0].navTranslations, { 'Getting Started': 'Erste Schritte' });
  });

  it('should default to the first language', () => {
    const settings = getI18nSettings({ plugins: [{ name: 'i18n', options: { languages: { pt_BR: null, en: null } } }] });
    assert.strictEqual(settings?.defaultLanguage, 'pt_BR');
    assert.strictEqual(settings?.languages[0].name, 'pt_BR');
  });

  it('should reject malformed options', () => {
    const cases: [ConfigMapping, string][] = [
      [{}, 'languages must be a mapping or a list'],
      [{ languages: {} }, 'At least one language is required'],
      [{ languages: [{ name: 'English' }] }, 'Language entry is missing "locale"'],
      [{ languages: [{ locale: 'en' }, { locale: 'en' }] }, 'Language "en" is listed more than once'],
      [{ languages: { en: 'English' }, default_language: 1 }, 'default_language must be a string'],
    ];
    for (const [options, message] of cases) {
      assert.throws(
        () => getI18nSettings({ plugins: [{ name: 'i18n', options }] }),
        (err: unknown) => {
          assert.ok(err instanceof ConfigError);
          assert.strictEqual(err.code, 'ERR_I18N_INVALID');
          assert.strictEqual(err.message, message);
          return true;
        }
      );
    }
  });
});

// =============================================================================
// TESTS: paths and titles
// =============================================================================

describe('localizePath', () => {
  it('should swap or add the language suffix', () => {
    assert.strictEqual(localizePath('getting-started/index.en.md', 'fr', SUFFIX), 'getting-started/index.fr.md');
    assert.strictEqual(localizePath('development.md', 'fr', SUFFIX), 'development.fr.md');
    assert.strictEqual(localizePath('index.fr.md', 'en', SUFFIX), 'index.en.md');
  });

  it('should swap or add the language folder', () => {
    assert.strictEqual(localizePath('en/about.md', 'fr', FOLDER), 'fr/about.md');
    assert.strictEqual(localizePath('about.md', 'fr', FOLDER), 'fr/about.md');
    assert.strictEqual(localizePath('guides/setup.md', 'fr', FOLDER), 'fr/guides/setup.md');
  });
});

describe('translateTitle', () => {
  it('should translate known titles and keep the rest', () => {
    assert.strictEqual(translateTitle('Home', 'fr', SUFFIX), 'Accueil');
    assert.strictEqual(translateTitle('Settings', 'fr', SUFFIX), 'Settings');
    assert.strictEqual(translateTitle('Home', 'en', SUFFIX), 'Home');
    assert.strictEqual(translateTitle('Home', 'de', SUFFIX), 'Home');
  });
});

// =============================================================================
// TESTS: navigation
// =============================================================================

describe('localized navigation', () => {
  const config = parseConfig(`site_name: I18n
nav:
  - Home: index.en.md
  - Getting Started:
    - About: getting-started/index.en.md
  - Chat: https://chat.example.org
`);
  const exists = (path: string): boolean => path === 'index.fr.md';

  it('should translate titles and use translated pages that exist', () => {
    assert.ok(config.nav);
    assert.deepStrictEqual(localizeNav(config.nav, 'fr', SUFFIX, exists), [
      { kind: 'leaf', title: 'Accueil', path: 'index.fr.md' },
      {
        kind: 'section',
        title: 'Premiers pas',
        children: [{ kind: 'leaf', title: 'About', path: 'getting-started/index.en.md' }],
      },
      { kind: 'link', title: 'Chat', url: 'https://chat.example.org' },
    ]);
  });

  it('should list pages without a translated copy', () => {
    assert.deepStrictEqual(findMissingTranslations(config, SUFFIX, exists), [
      {
        language: 'fr',
        path: 'getting-started/index.en.md',
        localizedPath: 'getting-started/index.fr.md',
        location: 'nav > Getting Started > About',
      },
    ]);
  });
});
