/**
 * `!ENV` YAML tag - substitutes environment variables while parsing.
 *
 * ```yaml
 * site_url: !ENV SITE_URL                       # null when unset
 * site_url: !ENV [SITE_URL, 'http://localhost']  # literal default
 * strict: !ENV [CI_STRICT, STRICT, false]        # first defined variable wins
 * ```
 *
 * Values read from the environment are resolved like plain YAML scalars,
 * so `STRICT=true` becomes a boolean and `PORT=8000` a number.
 */

import { isScalar, isSeq, parseDocument, type CollectionTag, type ScalarTag } from 'yaml';

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Resolve an environment value the way an unquoted YAML scalar would be.
 * Anything that would parse to a collection stays a string.
 */
function resolveEnvValue(raw: string): unknown {
  const doc = parseDocument(raw);
  if (doc.errors.length > 0) {
    return raw;
  }
  const value: unknown = doc.toJS();
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return raw;
}

export function createEnvTags(env: Environment): [ScalarTag, CollectionTag] {
  const lookup = (name: string): unknown => {
    const raw = env[name.trim()];
    return raw === undefined ? undefined : resolveEnvValue(raw);
  };

  const scalarTag: ScalarTag = {
    tag: '!ENV',
    resolve(value) {
      return lookup(value) ?? null;
    },
  };

  const sequenceTag: CollectionTag = {
    tag: '!ENV',
    collection: 'seq',
    resolve(value, onError) {
      if (!isSeq(value)) {
        onError('!ENV expects a variable name or a list of names');
        return null;
      }
      const items = value.items.map(item => (isScalar(item) ? item.value : null));
      const names = items.length > 1 ? items.slice(0, -1) : items;
      const fallback = items.length > 1 ? items[items.length - 1] : null;

      for (const name of names) {
        if (typeof name !== 'string') {
          onError('!ENV variable names must be strings');
          return null;
        }
        const found = lookup(name);
        if (found !== undefined) {
          return found;
        }
      }
      return fallback;
    },
  };

  return [scalarTag, sequenceTag];
}
