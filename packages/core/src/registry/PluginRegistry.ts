/**
 * Plugin registry - maps plugin names to what the renderer knows about them.
 *
 * Resolution only forwards the declared name and options; plugins themselves
 * run inside the external site generator.
 */

import type { ConfigMapping, PluginDescriptor, PluginHandle, SiteConfig } from '@docsite/types';
import { UnknownPluginError } from '../errors/DocsiteError.js';
import { readPluginData } from './registryData.js';

export class PluginRegistry {
  private readonly plugins = new Map<string, PluginDescriptor>();

  constructor(descriptors: Iterable<PluginDescriptor> = []) {
    for (const descriptor of descriptors) {
      this.register(descriptor);
    }
  }

  /**
   * Registry preloaded with the bundled plugin list.
   */
  static builtin(): PluginRegistry {
    return new PluginRegistry(readPluginData());
  }

  register(descriptor: PluginDescriptor): void {
    this.plugins.set(descriptor.name, descriptor);
  }

  has(name: string): boolean {
    return this.plugins.has(name);
  }

  get(name: string): PluginDescriptor | undefined {
    return this.plugins.get(name);
  }

  names(): string[] {
    return [...this.plugins.keys()];
  }
}

/**
 * Resolve a plugin by name.
 *
 * @throws UnknownPluginError if the registry has no such plugin
 */
export function resolvePlugin(
  name: string,
  options: ConfigMapping = {},
  registry: PluginRegistry = PluginRegistry.builtin(),
  position = 0
): PluginHandle {
  const descriptor = registry.get(name);
  if (!descriptor) {
    throw new UnknownPluginError(name, { location: `plugins[${position}]` });
  }
  return Object.freeze({
    name,
    package: descriptor.package,
    description: descriptor.description,
    options,
    position,
  });
}

/**
 * Resolve every declared plugin, in declaration order.
 * Stops at the first unknown plugin.
 */
export function resolvePlugins(
  config: Pick<SiteConfig, 'plugins'>,
  registry: PluginRegistry = PluginRegistry.builtin()
): PluginHandle[] {
  return config.plugins.map((plugin, index) =>
    resolvePlugin(plugin.name, plugin.options, registry, index)
  );
}
