/**
 * checkConfig Tests
 *
 * Tests:
 * - The sample project is clean
 * - Missing files become one diagnostic per path
 * - Unknown plugins are fatal, unknown themes/features are warnings
 * - i18n: default language not configured, missing translations, bad options
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { checkConfig, loadConfig, parseConfig, DiagnosticCollector, type FileExists } from '@docsite/core';

const fixtureDir = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'fixtures', 'firmware-docs');
const DOCS = '/srv/site/docs';

function filesAt(...paths: string[]): FileExists {
  const present = new Set(paths.map(p => join(DOCS, p)));
  return path => present.has(path);
}

describe('checkConfig', () => {
  it('should find nothing wrong with the sample project', () => {
    const loaded = loadConfig(fixtureDir);
    assert.deepStrictEqual(checkConfig(loaded.config, { fileRoot: loaded.docsRoot }), []);
  });

  it('should add one diagnostic per missing file', () => {
    const config = parseConfig('site_name: C\nnav:\n  - Home: index.md\n  - About: about.md\n  - FAQ: faq.md\n');

    const diagnostics = checkConfig(config, { fileRoot: DOCS, fileExists: filesAt('about.md') });

    assert.deepStrictEqual(
      diagnostics.map(d => [d.code, d.stage, d.file, d.location, d.message]),
      [
        ['ERR_MISSING_FILE', 'validate', 'index.md', 'nav > Home', 'File not found: index.md'],
        ['ERR_MISSING_FILE', 'validate', 'faq.md', 'nav > FAQ', 'File not found: faq.md'],
      ]
    );
  });

  it('should report unknown plugins as fatal, with their position', () => {
    const config = parseConfig('site_name: C\nplugins:\n  - search\n  - not-a-plugin\n');
    const collector = new DiagnosticCollector();

    checkConfig(config, { fileRoot: DOCS, fileExists: filesAt(), collector });

    const [diag] = collector.getByCode('ERR_UNKNOWN_PLUGIN');
    assert.strictEqual(diag.severity, 'fatal');
    assert.strictEqual(diag.stage, 'plugins');
    assert.strictEqual(diag.location, 'plugins[1]');
    assert.strictEqual(diag.message, 'Unknown plugin: not-a-plugin');
    assert.ok(collector.hasFatal());
  });

  it('should warn about an unknown theme unless custom_dir is set', () => {
    const unknown = parseConfig('site_name: C\ntheme:\n  name: my-theme\n');
    const custom = parseConfig('site_name: C\ntheme:\n  name: my-theme\n  custom_dir: theme\n');

    const diagnostics = checkConfig(unknown, { fileRoot: DOCS, fileExists: filesAt() });
    assert.deepStrictEqual(
      diagnostics.map(d => [d.code, d.severity, d.message]),
      [['ERR_UNKNOWN_THEME', 'warning', 'Unknown theme: my-theme']]
    );
    assert.deepStrictEqual(checkConfig(custom, { fileRoot: DOCS, fileExists: filesAt() }), []);
  });

  it('should warn about feature tokens the theme does not list', () => {
    const config = parseConfig('site_name: C\ntheme:\n  name: material\n  features: [navigation.tabs, navigation.bogus]\n');

    const diagnostics = checkConfig(config, { fileRoot: DOCS, fileExists: filesAt() });

    assert.strictEqual(diagnostics.length, 1);
    assert.strictEqual(diagnostics[0].code, 'ERR_UNKNOWN_FEATURE');
    assert.strictEqual(diagnostics[0].message, 'Theme "material" has no feature "navigation.bogus"');
    assert.strictEqual(diagnostics[0].location, 'theme.features[1]');
  });

  it('should point each repeated unknown feature at its own position', () => {
    const config = parseConfig(
      'site_name: C\ntheme:\n  name: material\n  features: [navigation.bogus, navigation.tabs, navigation.bogus]\n'
    );

    const diagnostics = checkConfig(config, { fileRoot: DOCS, fileExists: filesAt() });

    assert.deepStrictEqual(diagnostics.map(d => d.location), ['theme.features[0]', 'theme.features[2]']);
  });

  describe('i18n', () => {
    it('should flag a default language that is not configured', () => {
      const config = parseConfig(`site_name: C
plugins:
  - i18n:
      default_language: de
      languages:
        en: English
`);
      const diagnostics = checkConfig(config, { fileRoot: DOCS, fileExists: filesAt() });

      assert.deepStrictEqual(
        diagnostics.map(d => [d.code, d.severity, d.message]),
        [['ERR_I18N_DEFAULT_LANGUAGE', 'error', 'Default language "de" is not among the configured languages']]
      );
    });

    it('should warn about pages without a translation', () => {
      const config = parseConfig(`site_name: C
nav:
  - Home: index.en.md
  - About: about.en.md
plugins:
  - i18n:
      default_language: en
      languages:
        en: English
        fr: Français
`);
      const diagnostics = checkConfig(config, {
        fileRoot: DOCS,
        fileExists: filesAt('index.en.md', 'about.en.md', 'index.fr.md'),
      });

      assert.deepStrictEqual(
        diagnostics.map(d => [d.code, d.severity, d.file, d.location, d.message]),
        [[
          'ERR_I18N_MISSING_TRANSLATION',
          'warning',
          'about.fr.md',
          'nav > About',
          'No fr translation of about.en.md (expected about.fr.md)',
        ]]
      );
    });

    it('should record invalid plugin options', () => {
      const config = parseConfig(`site_name: C
plugins:
  - i18n:
      docs_structure: nested
      languages:
        en: English
`);
      const diagnostics = checkConfig(config, { fileRoot: DOCS, fileExists: filesAt() });

      assert.strictEqual(diagnostics.length, 1);
      assert.strictEqual(diagnostics[0].code, 'ERR_I18N_INVALID');
      assert.strictEqual(diagnostics[0].severity, 'fatal');
      assert.strictEqual(diagnostics[0].stage, 'i18n');
      assert.strictEqual(diagnostics[0].message, 'docs_structure must be one of suffix, folder, got "nested"');
    });
  });
});
