/**
 * Reads the bundled registry data files (packages/core/data/*.json).
 *
 * The files describe what the external site generator knows about:
 * markdown extensions, plugins and themes. Each is read once per process.
 */
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { ExtensionDescriptor, PluginDescriptor, ThemeDescriptor } from '@docsite/types';
import { isRecord, isStringArray } from '../utils/guards.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const DATA_DIR = join(__dirname, '..', '..', 'data');

function readEntries(fileName: string, key: string): Record<string, unknown>[] {
  const parsed: unknown = JSON.parse(readFileSync(join(DATA_DIR, fileName), 'utf-8'));
  const entries = isRecord(parsed) ? parsed[key] : undefined;
  if (!Array.isArray(entries)) {
    throw new Error(`Registry data ${fileName}: "${key}" must be an array`);
  }
  return entries.map((entry: unknown, i) => {
    if (!isRecord(entry)) {
      throw new Error(`Registry data ${fileName}[${i}] must be an object`);
    }
    return entry;
  });
}

function stringField(entry: Record<string, unknown>, field: string, where: string): string {
  const value = entry[field];
  if (typeof value !== 'string' || !value.trim()) {
    throw new Error(`Registry data ${where}.${field} must be a non-empty string`);
  }
  return value;
}

let extensionCache: ExtensionDescriptor[] | undefined;
let pluginCache: PluginDescriptor[] | undefined;
let themeCache: ThemeDescriptor[] | undefined;

export function readExtensionData(): ExtensionDescriptor[] {
  extensionCache ??= readEntries('extensions.json', 'extensions').map((entry, i) => ({
    name: stringField(entry, 'name', `extensions.json[${i}]`),
    package: stringField(entry, 'package', `extensions.json[${i}]`),
  }));
  return extensionCache;
}

export function readPluginData(): PluginDescriptor[] {
  pluginCache ??= readEntries('plugins.json', 'plugins').map((entry, i) => ({
    name: stringField(entry, 'name', `plugins.json[${i}]`),
    package: stringField(entry, 'package', `plugins.json[${i}]`),
    description: stringField(entry, 'description', `plugins.json[${i}]`),
  }));
  return pluginCache;
}

export function readThemeData(): ThemeDescriptor[] {
  themeCache ??= readEntries('themes.json', 'themes').map((entry, i) => {
    const features = entry.features;
    if (features !== null && !isStringArray(features)) {
      throw new Error(`Registry data themes.json[${i}].features must be a string array or null`);
    }
    return {
      name: stringField(entry, 'name', `themes.json[${i}]`),
      package: stringField(entry, 'package', `themes.json[${i}]`),
      features,
    };
  });
  return themeCache;
}
