/**
 * ConfigValidator Tests
 *
 * Tests:
 * - collectFileReferences: nav pages, theme assets, extra_css/javascript; URLs skipped
 * - validateConfig passes when every file exists
 * - MissingFileError lists exactly the absent files, in document order
 * - Directories and paths outside docs_dir count as missing
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import {
  parseConfig,
  collectFileReferences,
  findMissingFiles,
  resolveReference,
  validateConfig,
  MissingFileError,
} from '@docsite/core';

const DOCUMENT = `site_name: Validate
theme:
  name: material
  logo: img/logo.png
nav:
  - Home: index.md
  - Getting Started:
    - About: getting-started/index.en.md
    - Install: install.md
  - Chat: https://chat.example.org
extra_css:
  - css/extra.css
extra_javascript:
  - https://cdn.example.org/extra.js
`;

const ALL_FILES = ['index.md', 'getting-started/index.en.md', 'install.md', 'img/logo.png', 'css/extra.css'];

function writeDocs(root: string, files: string[]): void {
  for (const file of files) {
    mkdirSync(dirname(join(root, file)), { recursive: true });
    writeFileSync(join(root, file), '# page\n');
  }
}

function missingPaths(run: () => unknown): string[] {
  try {
    run();
  } catch (err) {
    assert.ok(err instanceof MissingFileError);
    return err.paths;
  }
  return [];
}

describe('ConfigValidator', () => {
  const config = parseConfig(DOCUMENT);
  let projectDir: string;
  let docsRoot: string;

  beforeEach(() => {
    projectDir = mkdtempSync(join(tmpdir(), 'docsite-validate-'));
    docsRoot = join(projectDir, 'docs');
    mkdirSync(docsRoot);
  });

  afterEach(() => {
    rmSync(projectDir, { recursive: true, force: true });
  });

  // ===========================================================================
  // TESTS: collectFileReferences
  // ===========================================================================

  describe('collectFileReferences', () => {
    it('should list local references in document order', () => {
      assert.deepStrictEqual(collectFileReferences(config), [
        { path: 'index.md', source: 'nav', location: 'nav > Home' },
        { path: 'getting-started/index.en.md', source: 'nav', location: 'nav > Getting Started > About' },
        { path: 'install.md', source: 'nav', location: 'nav > Getting Started > Install' },
        { path: 'img/logo.png', source: 'theme.logo', location: 'theme.logo' },
        { path: 'css/extra.css', source: 'extra_css', location: 'extra_css[0]' },
      ]);
    });

    it('should skip links with a scheme other than http', () => {
      const contact = parseConfig(`site_name: Contact
nav:
  - Mail: mailto:team@example.org
  - Phone: tel:+10000000000
extra_javascript:
  - //cdn.example.org/extra.js
`);
      assert.deepStrictEqual(collectFileReferences(contact), []);
      assert.strictEqual(validateConfig(contact, docsRoot), contact);
    });

    it('should return nothing for an automatic nav and no assets', () => {
      assert.deepStrictEqual(collectFileReferences(parseConfig('site_name: Auto\n')), []);
    });
  });

  // ===========================================================================
  // TESTS: validateConfig
  // ===========================================================================

  describe('validateConfig', () => {
    it('should return the same config when every file exists', () => {
      writeDocs(docsRoot, ALL_FILES);
      assert.strictEqual(validateConfig(config, docsRoot), config);
    });

    it('should report About when getting-started/index.en.md is absent', () => {
      writeDocs(docsRoot, ALL_FILES.filter(f => f !== 'getting-started/index.en.md'));

      assert.throws(
        () => validateConfig(config, docsRoot),
        (err: unknown) => {
          assert.ok(err instanceof MissingFileError);
          assert.deepStrictEqual(err.missing, [
            { path: 'getting-started/index.en.md', source: 'nav', location: 'nav > Getting Started > About' },
          ]);
          assert.strictEqual(err.message, '1 referenced file not found: getting-started/index.en.md');
          assert.strictEqual(err.code, 'ERR_MISSING_FILE');
          return true;
        }
      );
    });

    it('should report every absent file in one error', () => {
      writeDocs(docsRoot, ['getting-started/index.en.md', 'img/logo.png']);

      assert.throws(() => validateConfig(config, docsRoot), {
        message: '3 referenced files not found: index.md, install.md, css/extra.css',
      });
    });

    it('should report exactly the absent set for every combination', () => {
      const pages = ['index.md', 'getting-started/index.en.md', 'install.md'];
      const assets = ['img/logo.png', 'css/extra.css'];

      for (let mask = 0; mask < 1 << pages.length; mask++) {
        const present = new Set(pages.filter((_, i) => (mask & (1 << i)) !== 0).map(p => join(docsRoot, p)));
        for (const asset of assets) present.add(join(docsRoot, asset));

        const missing = missingPaths(() =>
          validateConfig(config, docsRoot, { fileExists: path => present.has(path) })
        );
        const expected = pages.filter((_, i) => (mask & (1 << i)) === 0);
        assert.deepStrictEqual(missing, expected, `mask ${mask}`);
      }
    });

    it('should treat a directory as missing', () => {
      writeDocs(docsRoot, ALL_FILES.filter(f => f !== 'install.md'));
      mkdirSync(join(docsRoot, 'install.md'));
      assert.deepStrictEqual(missingPaths(() => validateConfig(config, docsRoot)), ['install.md']);
    });

    it('should treat paths outside docs_dir as missing', () => {
      writeFileSync(join(projectDir, 'outside.md'), '# outside\n');
      const escaping = parseConfig('site_name: Escape\nnav:\n  - Outside: ../outside.md\n');
      assert.deepStrictEqual(missingPaths(() => validateConfig(escaping, docsRoot)), ['../outside.md']);
    });

    it('should report a path referenced twice once', () => {
      const twice = parseConfig('site_name: Twice\nnav:\n  - A: page.md\n  - B: page.md\n');
      assert.deepStrictEqual(findMissingFiles(twice, docsRoot), [
        { path: 'page.md', source: 'nav', location: 'nav > A' },
      ]);
    });
  });

  describe('resolveReference', () => {
    it('should keep paths under the root and reject the rest', () => {
      assert.strictEqual(resolveReference('/srv/docs', 'a/b.md'), join('/srv/docs', 'a', 'b.md'));
      assert.strictEqual(resolveReference('/srv/docs', '/a.md'), join('/srv/docs', 'a.md'));
      assert.strictEqual(resolveReference('/srv/docs', '../a.md'), null);
      assert.strictEqual(resolveReference('/srv/docs', '.'), null);
    });
  });
});
