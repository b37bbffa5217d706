/**
 * Branded Types - a validated configuration can only come out of the validator
 *
 * @example
 * // This compiles:
 * const config = validateConfig(parseConfig(source), docsRoot);
 * build(config); // OK - config is ValidatedConfig
 *
 * // This fails to compile:
 * build(parseConfig(source)); // ERROR - not validated
 */

import type { SiteConfig } from './config.js';

/**
 * Declared but never exists at runtime - purely for type checking.
 */
declare const VALIDATED_BRAND: unique symbol;

/**
 * A configuration whose file references were all found on disk.
 *
 * The brand is a phantom type with no runtime representation.
 */
export type ValidatedConfig = SiteConfig & {
  readonly [VALIDATED_BRAND]: true;
};
