/**
 * Internal branding helper. Only validateConfig may call this, after every
 * file reference has been checked.
 *
 * @internal
 */
import type { SiteConfig, ValidatedConfig } from '@docsite/types';

export function brandValidated(config: SiteConfig): ValidatedConfig {
  return config as ValidatedConfig;
}
