export * from './builtin-coders';
export * from './errors';
export type { ArchivedMapping, ArchivedScalar, ArchivedValue, IArchivedClass, IArchivedInstance, IArchivedPList } from './types/archive-types';
export type { DecodedMapping, DecodedValue, UnarchivedRoots } from './types/decoded-value';

export { Uid } from './models/uid';
export { $ObjectsMap, getUid, cfUidKey } from './$objects-map';
export { normalize, encodeBytes, nullMarker, type NormalizeResult } from './normalize';
export { KeyedUnarchiver, type CoderType, type CoderContext, type IObjectDecoder } from './keyed-unarchiver';
export { CoderRegistry } from './coder-registry';
export { ArchiveDecoder, containerSkippedKeys } from './archive-decoder';
export { defaultMaxDepth, resolveUnarchiveOptions, type UnarchiveOptions, type ResolvedUnarchiveOptions } from './options';
export { unarchive, supportedArchiver, supportedVersion } from './unarchive';
