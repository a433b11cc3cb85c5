import { Uid } from './models/uid';
import type { ArchivedMapping, ArchivedValue, IArchivedInstance } from './types/archive-types';

export function isSequence(value: ArchivedValue): value is readonly ArchivedValue[] {
  return Array.isArray(value);
}

export function isBytes(value: ArchivedValue): value is ArrayBuffer | ArrayBufferView {
  return value instanceof ArrayBuffer || ArrayBuffer.isView(value);
}

/** Plain key-value mapping; excludes every object-shaped leaf a parser may produce. */
export function isArchivedMapping(value: ArchivedValue): value is ArchivedMapping {
  return typeof value === 'object'
    && value !== null
    && !Array.isArray(value)
    && !(value instanceof Uid)
    && !(value instanceof Date)
    && !(value instanceof Set)
    && !isBytes(value);
}

export function isArchivedInstance(value: ArchivedMapping): value is IArchivedInstance {
  return isPresent(value.$class);
}

export function toUint8Array(value: ArrayBuffer | ArrayBufferView): Uint8Array {
  if (value instanceof ArrayBuffer) {
    return new Uint8Array(value);
  }
  return new Uint8Array(value.buffer, value.byteOffset, value.byteLength);
}

/**
 * Whether a member is worth decoding in a composite object.
 * Mirrors truthiness: `null`, `false`, zero, empty text and empty containers are absent.
 * References are always present.
 */
export function isPresent(value: ArchivedValue): boolean {
  if (value === undefined || value === null || value === false || value === 0 || value === 0n || value === '') {
    return false;
  }
  if (typeof value !== 'object' || value instanceof Uid || value instanceof Date) {
    return true;
  }
  if (isSequence(value)) {
    return value.length > 0;
  }
  if (value instanceof Set) {
    return value.size > 0;
  }
  if (isBytes(value)) {
    return value.byteLength > 0;
  }
  return Object.keys(value).length > 0;
}
