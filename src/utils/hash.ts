import { createHash } from 'node:crypto';
import { BundleParameters } from '../apis/v1/bundle.js';
import { SerializationError } from '../types/index.js';

/**
 * Canonical JSON serialization used for fingerprinting.
 * - Object keys are sorted, array order is kept.
 * - `undefined` members are dropped the way `JSON.stringify` drops them.
 * - Anything JSON cannot represent throws a `SerializationError`.
 */
export function canonicalize(value: unknown): string {
  return serialize(value, new WeakSet(), '$');
}

/**
 * SHA-1 hex digest of the canonical form of a resource spec. Only the spec is
 * hashed, so status written by the controller never changes the digest.
 */
export function fingerprint(spec: BundleParameters): string {
  return createHash('sha1').update(canonicalize(spec)).digest('hex');
}

function serialize(value: unknown, seen: WeakSet<object>, path: string): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
      if (!Number.isFinite(value)) {
        throw new SerializationError(`Cannot serialize non-finite number at ${path}`);
      }
      return JSON.stringify(value);
    case 'boolean':
      return value ? 'true' : 'false';
    case 'object':
      if (value === null) return 'null';
      if (seen.has(value)) {
        throw new SerializationError(`Cannot serialize circular reference at ${path}`);
      }
      seen.add(value);
      try {
        return Array.isArray(value) ? serializeArray(value, seen, path) : serializeObject(value, seen, path);
      } finally {
        seen.delete(value);
      }
    default:
      throw new SerializationError(`Cannot serialize ${typeof value} at ${path}`);
  }
}

function serializeArray(arr: unknown[], seen: WeakSet<object>, path: string): string {
  const parts: string[] = [];
  for (let i = 0; i < arr.length; i++) {
    // JSON writes holes and undefined entries as null
    const entry = arr[i];
    parts.push(entry === undefined ? 'null' : serialize(entry, seen, `${path}[${i}]`));
  }
  return `[${parts.join(',')}]`;
}

function serializeObject(obj: object, seen: WeakSet<object>, path: string): string {
  const entries = Object.entries(obj)
    .filter(([, entry]) => entry !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const parts = entries.map(([key, entry]) => `${JSON.stringify(key)}:${serialize(entry, seen, `${path}.${key}`)}`);
  return `{${parts.join(',')}}`;
}
