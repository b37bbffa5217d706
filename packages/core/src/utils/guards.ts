/**
 * Type guards for values coming out of YAML/JSON parsing.
 */

/**
 * Plain object: not null, not an array, not a Date/Map/Set/Uint8Array.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * URL with a scheme (`https://…`, `mailto:…`) or protocol-relative (`//cdn…`).
 * The scheme needs two characters or more so `C:\docs` stays a path.
 */
export function isExternalUrl(value: string): boolean {
  return /^[a-z][a-z0-9+.-]+:/i.test(value) || value.startsWith('//');
}
