/**
 * Markdown extension registry - the extension names the renderer recognises.
 *
 * Names are matched as written in markdown_extensions. The core Python-Markdown
 * extensions may also be written fully qualified (`markdown.extensions.toc`).
 */

import type { ExtensionDescriptor } from '@docsite/types';
import { UnknownExtensionError, type ErrorContext } from '../errors/DocsiteError.js';
import { readExtensionData } from './registryData.js';

const QUALIFIED_PREFIX = 'markdown.extensions.';

/**
 * `markdown.extensions.toc` → `toc`; anything else unchanged.
 */
export function normalizeExtensionName(name: string): string {
  return name.startsWith(QUALIFIED_PREFIX) ? name.slice(QUALIFIED_PREFIX.length) : name;
}

export class ExtensionRegistry {
  private readonly extensions = new Map<string, ExtensionDescriptor>();

  constructor(descriptors: Iterable<ExtensionDescriptor> = []) {
    for (const descriptor of descriptors) {
      this.register(descriptor);
    }
  }

  /**
   * Registry preloaded with the bundled extension list.
   */
  static builtin(): ExtensionRegistry {
    return new ExtensionRegistry(readExtensionData());
  }

  /**
   * Add (or replace) an extension, e.g. a project-local one.
   */
  register(descriptor: ExtensionDescriptor): void {
    this.extensions.set(normalizeExtensionName(descriptor.name), descriptor);
  }

  has(name: string): boolean {
    return this.extensions.has(normalizeExtensionName(name));
  }

  get(name: string): ExtensionDescriptor | undefined {
    return this.extensions.get(normalizeExtensionName(name));
  }

  /**
   * Look up an extension; throws UnknownExtensionError if absent.
   */
  resolve(name: string, context: ErrorContext = {}): ExtensionDescriptor {
    const descriptor = this.get(name);
    if (!descriptor) {
      throw new UnknownExtensionError(name, context);
    }
    return descriptor;
  }

  names(): string[] {
    return [...this.extensions.values()].map(d => d.name);
  }
}
