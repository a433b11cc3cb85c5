import { isArchivedMapping, isBytes, isSequence, toUint8Array } from './guards';
import { Uid } from './models/uid';
import type { ArchivedMapping, ArchivedValue } from './types/archive-types';
import type { DecodedValue } from './types/decoded-value';

/** The string NSKeyedArchiver stores at `$objects[0]` and points nil references at. */
export const nullMarker = '$null';

export type NormalizeResult =
  | { readonly kind: 'terminal', readonly value: DecodedValue }
  | { readonly kind: 'sequence', readonly value: readonly ArchivedValue[] }
  | { readonly kind: 'mapping', readonly value: ArchivedMapping }
  | { readonly kind: 'reference', readonly value: Uid }
  | { readonly kind: 'unsupported', readonly value: ArchivedValue }
  ;

/** URL-safe base64 without padding. */
export function encodeBytes(value: ArrayBuffer | ArrayBufferView): string {
  const bytes = toUint8Array(value);
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64url');
}

/**
 * Maps leaf values to their decoded form. Containers and references are reported back
 * untouched so the caller can dispatch on them.
 *
 * Note that `{ "CF$UID": n }` is reported as a mapping; reference detection happens
 * before normalization.
 */
export function normalize(value: ArchivedValue): NormalizeResult {
  if (value === null || value === undefined || value === nullMarker) {
    return { kind: 'terminal', value: null };
  }

  switch (typeof value) {
    case 'boolean':
    case 'number':
    case 'bigint':
    case 'string':
      return { kind: 'terminal', value };
  }

  if (value instanceof Uid) {
    return { kind: 'reference', value };
  }
  if (isBytes(value)) {
    return { kind: 'terminal', value: encodeBytes(value) };
  }
  if (isSequence(value)) {
    return { kind: 'sequence', value };
  }
  if (isArchivedMapping(value)) {
    return { kind: 'mapping', value };
  }

  return { kind: 'unsupported', value };
}
