/**
 * Canonical encoding and digests
 *
 * Serializes nested key/value structures to compact JSON with keys sorted at
 * every level, then hashes that text.
 *
 * INVARIANT: Key insertion order never changes the encoding.
 * INVARIANT: Only string, finite number, boolean, null, arrays and mappings encode.
 */

import { createHash } from 'crypto';
import { EncodingError } from './errors';

/** Bumped whenever the canonical text for an existing value would change */
export const CANONICAL_HASH_VERSION = 1;
export const HASH_ALGORITHM = 'sha256';

export type CanonicalScalar = string | number | boolean | null;

export type CanonicalValue =
  | CanonicalScalar
  | readonly CanonicalValue[]
  | { readonly [key: string]: CanonicalValue | undefined };

/**
 * Plain object check: literal objects and Object.create(null) only
 */
export function isMapping(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function encodeEntries(entries: Array<[string, unknown]>, path: string, seen: Set<object>): string {
  const parts: string[] = [];
  const sorted = entries
    .filter(([, item]) => item !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [key, item] of sorted) {
    parts.push(`${JSON.stringify(key)}:${encodeValue(item, `${path}.${key}`, seen)}`);
  }
  return `{${parts.join(',')}}`;
}

function encodeValue(value: unknown, path: string, seen: Set<object>): string {
  if (value === null) return 'null';

  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      if (!Number.isFinite(value)) {
        throw new EncodingError(`Non-finite number ${value} has no canonical form`, path);
      }
      // JSON.stringify yields the shortest round-trip form and maps -0 to 0
      return JSON.stringify(value);
    case 'object':
      break;
    default:
      throw new EncodingError(`Cannot encode value of type ${typeof value}`, path);
  }

  if (seen.has(value)) {
    throw new EncodingError('Circular reference', path);
  }
  seen.add(value);

  try {
    if (Array.isArray(value)) {
      const items: string[] = [];
      for (let i = 0; i < value.length; i++) {
        items.push(encodeValue(value[i], `${path}[${i}]`, seen));
      }
      return `[${items.join(',')}]`;
    }

    if (value instanceof Map) {
      const entries: Array<[string, unknown]> = [];
      for (const [key, item] of value) {
        if (typeof key !== 'string') {
          throw new EncodingError(`Mapping key must be a string, got ${typeof key}`, path);
        }
        entries.push([key, item]);
      }
      return encodeEntries(entries, path, seen);
    }

    if (isMapping(value)) {
      return encodeEntries(Object.entries(value), path, seen);
    }

    const ctor = value.constructor?.name ?? 'unknown';
    throw new EncodingError(`Cannot encode instance of ${ctor}`, path);
  } finally {
    seen.delete(value);
  }
}

/**
 * Canonical text for a value
 */
export function encode(value: unknown): string {
  return encodeValue(value, '$', new Set());
}

/**
 * SHA-256 of a UTF-8 string, lowercase hex
 */
export function sha256(input: string): string {
  const hash = createHash(HASH_ALGORITHM);
  hash.update(input, 'utf8');
  return hash.digest('hex');
}

/**
 * digest(value) = sha256(encode(value))
 */
export function digest(value: unknown): string {
  return sha256(encode(value));
}
