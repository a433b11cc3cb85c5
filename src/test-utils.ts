import { Uid } from './keyed-archive/models/uid';
import type { ArchivedMapping, ArchivedValue, IArchivedClass, IArchivedPList } from './keyed-archive/types/archive-types';

export const uid = (value: number) => new Uid(value);

export function classNamed($classname: string): IArchivedClass {
  return { $classname, $classes: [$classname, 'NSObject'] };
}

/** A well-formed archive around `$objects`; `$top.root` points at index 1 unless told otherwise. */
export function archiveOf($objects: readonly ArchivedValue[], $top: ArchivedMapping = { root: uid(1) }): IArchivedPList {
  return {
    $archiver: 'NSKeyedArchiver',
    $version: 100000,
    $top,
    $objects,
  };
}

export function bytesOf(hex: string) {
  return Uint8Array.from(Buffer.from(hex, 'hex'));
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}
