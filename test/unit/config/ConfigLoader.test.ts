/**
 * ConfigLoader Tests
 *
 * Tests:
 * - mkdocs.yml, then mkdocs.yaml, or an explicit config file
 * - docs_dir / site_dir resolved against the config file's directory
 * - Missing config file is a ConfigError
 * - The sample project loads and validates
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  loadConfig,
  findConfigFile,
  validateConfig,
  ConfigError,
  ParseError,
} from '@docsite/core';

const fixtureDir = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'fixtures', 'firmware-docs');

describe('ConfigLoader', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'docsite-loader-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  // ===========================================================================
  // TESTS: locating the document
  // ===========================================================================

  describe('findConfigFile', () => {
    it('should prefer mkdocs.yml over mkdocs.yaml', () => {
      writeFileSync(join(testDir, 'mkdocs.yml'), 'site_name: yml\n');
      writeFileSync(join(testDir, 'mkdocs.yaml'), 'site_name: yaml\n');
      assert.strictEqual(findConfigFile(testDir), join(testDir, 'mkdocs.yml'));
    });

    it('should fall back to mkdocs.yaml', () => {
      writeFileSync(join(testDir, 'mkdocs.yaml'), 'site_name: yaml\n');
      assert.strictEqual(findConfigFile(testDir), join(testDir, 'mkdocs.yaml'));
    });

    it('should return null when nothing is found', () => {
      assert.strictEqual(findConfigFile(testDir), null);
    });

    it('should ignore a directory named like the config file', () => {
      mkdirSync(join(testDir, 'mkdocs.yml'));
      assert.strictEqual(findConfigFile(testDir), null);
    });
  });

  // ===========================================================================
  // TESTS: loadConfig
  // ===========================================================================

  describe('loadConfig', () => {
    it('should resolve directories against the config file', () => {
      writeFileSync(join(testDir, 'mkdocs.yml'), 'site_name: Roots\ndocs_dir: content\n');

      const loaded = loadConfig(testDir);

      assert.strictEqual(loaded.config.site.name, 'Roots');
      assert.strictEqual(loaded.configPath, join(testDir, 'mkdocs.yml'));
      assert.strictEqual(loaded.docsRoot, join(testDir, 'content'));
      assert.strictEqual(loaded.siteRoot, join(testDir, 'site'));
    });

    it('should load an explicit config file from a subdirectory', () => {
      mkdirSync(join(testDir, 'site-config'));
      writeFileSync(join(testDir, 'site-config', 'docs.yml'), 'site_name: Nested\n');

      const loaded = loadConfig(testDir, { configFile: 'site-config/docs.yml' });

      assert.strictEqual(loaded.config.site.name, 'Nested');
      assert.strictEqual(loaded.docsRoot, join(testDir, 'site-config', 'docs'));
    });

    it('should throw ConfigError when no document exists', () => {
      assert.throws(
        () => loadConfig(testDir),
        (err: unknown) => {
          assert.ok(err instanceof ConfigError);
          assert.strictEqual(err.code, 'ERR_CONFIG_NOT_FOUND');
          assert.strictEqual(
            err.message,
            `No config file found in ${resolve(testDir)} (tried mkdocs.yml, mkdocs.yaml)`
          );
          assert.strictEqual(err.suggestion, 'Run from the project root or pass --config-file');
          return true;
        }
      );
    });

    it('should name the explicit file when it is missing', () => {
      assert.throws(() => loadConfig(testDir, { configFile: 'other.yml' }), {
        message: `No config file found in ${resolve(testDir)} (tried other.yml)`,
      });
    });

    it('should attach the file path to parse errors', () => {
      writeFileSync(join(testDir, 'mkdocs.yml'), 'site_name: Broken\nstrict: sometimes\n');
      assert.throws(
        () => loadConfig(testDir),
        (err: unknown) => {
          assert.ok(err instanceof ParseError);
          assert.strictEqual(err.context.filePath, join(testDir, 'mkdocs.yml'));
          assert.strictEqual(err.context.lineNumber, 2);
          return true;
        }
      );
    });
  });

  // ===========================================================================
  // TESTS: sample project
  // ===========================================================================

  describe('sample project', () => {
    it('should load and validate', () => {
      const loaded = loadConfig(fixtureDir);

      assert.strictEqual(loaded.docsRoot, join(resolve(fixtureDir), 'docs'));
      assert.strictEqual(loaded.siteRoot, join(resolve(fixtureDir), 'public'));

      const validated = validateConfig(loaded.config, loaded.docsRoot);
      assert.strictEqual(validated, loaded.config);
    });
  });
});
