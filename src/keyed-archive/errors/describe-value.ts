import { isArchivedMapping, isBytes, isSequence } from '../guards';
import { Uid } from '../models/uid';
import type { ArchivedValue } from '../types/archive-types';

/** Short, single-line rendering of an encoded value for error messages. */
export function describeValue(value: ArchivedValue): string {
  if (value === undefined) {
    return 'undefined';
  }
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'bigint') {
    return `${value}n`;
  }
  if (typeof value !== 'object') {
    return String(value);
  }
  if (value instanceof Uid) {
    return value.toString();
  }
  if (value instanceof Date) {
    return `Date<${value.toISOString()}>`;
  }
  if (value instanceof Set) {
    return `Set(${value.size})`;
  }
  if (isBytes(value)) {
    return `<${value.byteLength} bytes>`;
  }
  if (isSequence(value)) {
    return `Array(${value.length})`;
  }
  if (isArchivedMapping(value)) {
    return `{${Object.keys(value).join(', ')}}`;
  }
  return typeof value;
}
