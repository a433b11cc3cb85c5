import type { Uid } from '../models/uid';

/** Leaf values a property-list parser can hand over. */
export type ArchivedScalar =
  | null
  | undefined
  | boolean
  | number
  | bigint
  | string
  | ArrayBuffer
  | ArrayBufferView
  | Date
  | Uid
  ;

export type ArchivedValue =
  | ArchivedScalar
  | readonly ArchivedValue[]
  | ReadonlySet<ArchivedValue>
  | ArchivedMapping
  ;

export type ArchivedMapping = { readonly [key: string]: ArchivedValue };

/** An object-table entry that names its class through `$class`. */
export type IArchivedInstance = ArchivedMapping & { readonly $class: ArchivedValue };

/** A class descriptor, the target of an instance's `$class` reference. */
export type IArchivedClass = { readonly $classname: string, readonly $classes?: readonly string[] };

/**
 * The expected structure of a parsed plist made by NSKeyedArchiver.
 */
export type IArchivedPList = {
  readonly $version: number | bigint;
  readonly $archiver: string;
  readonly $top: ArchivedMapping;
  readonly $objects: readonly ArchivedValue[];
};
