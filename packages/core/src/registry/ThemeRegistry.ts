/**
 * Theme registry - known themes and the feature tokens they publish.
 */

import type { ThemeDescriptor } from '@docsite/types';
import { readThemeData } from './registryData.js';

export class ThemeRegistry {
  private readonly themes = new Map<string, ThemeDescriptor>();

  constructor(descriptors: Iterable<ThemeDescriptor> = []) {
    for (const descriptor of descriptors) {
      this.themes.set(descriptor.name, descriptor);
    }
  }

  static builtin(): ThemeRegistry {
    return new ThemeRegistry(readThemeData());
  }

  get(name: string): ThemeDescriptor | undefined {
    return this.themes.get(name);
  }

  /**
   * Feature tokens of `features` the theme does not list.
   * Empty when the theme is unknown or publishes no feature list.
   */
  unknownFeatures(themeName: string, features: readonly string[]): string[] {
    const known = this.themes.get(themeName)?.features;
    if (!known) {
      return [];
    }
    return features.filter(feature => !known.includes(feature));
  }
}
