/**
 * ConfigSerializer Tests
 *
 * Tests:
 * - load → serialize → load gives an equal config
 * - Canonical output for a minimal config
 * - Entries without options use the short form
 * - An empty plugin list survives (absent would mean the defaults)
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseConfig, serializeConfig, toDocument } from '@docsite/core';

const fixtureDir = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'fixtures', 'firmware-docs');

describe('ConfigSerializer', () => {
  it('should round-trip the sample project', () => {
    const first = parseConfig(readFileSync(join(fixtureDir, 'mkdocs.yml'), 'utf-8'));
    const second = parseConfig(serializeConfig(first));
    assert.deepStrictEqual(second, first);
  });

  it('should round-trip links, bare pages and a single palette', () => {
    const first = parseConfig(`site_name: Links
use_directory_urls: false
theme:
  name: material
  palette:
    scheme: slate
nav:
  - index.md
  - Chat: https://chat.example.org
  - Reference:
    - API: reference/api.md
extra:
  generator: false
  version: 2
`);
    const second = parseConfig(serializeConfig(first));
    assert.deepStrictEqual(second, first);
    assert.strictEqual(second.site.generator, false);
    assert.deepStrictEqual(second.site.extra, { version: 2 });
  });

  it('should write a minimal config in canonical order', () => {
    const text = serializeConfig(parseConfig('site_name: Minimal\n'));
    assert.strictEqual(
      text,
      [
        'site_name: Minimal',
        'docs_dir: docs',
        'site_dir: site',
        'use_directory_urls: true',
        'strict: false',
        'theme:',
        '  name: mkdocs',
        'plugins:',
        '  - search',
        '',
      ].join('\n')
    );
  });

  it('should use the short form for entries without options', () => {
    const doc = toDocument(parseConfig(`site_name: Short
markdown_extensions:
  - admonition
  - toc:
      permalink: true
`));
    assert.deepStrictEqual(doc.markdown_extensions, ['admonition', { toc: { permalink: true } }]);
  });

  it('should keep an empty plugin list', () => {
    const first = parseConfig('site_name: Bare\nplugins: []\n');
    assert.deepStrictEqual(toDocument(first).plugins, []);
    assert.deepStrictEqual(parseConfig(serializeConfig(first)).plugins, []);
  });
});
