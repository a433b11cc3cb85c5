import type { CoderType } from '../keyed-unarchiver';
import { CompositeCoder } from './composite';
import { NSArrayCoder } from './ns-array';
import { NSDataCoder } from './ns-data';
import { NSDateCoder } from './ns-date';
import { NSDictionaryCoder } from './ns-dictionary';
import { NSHashTableCoder } from './ns-hash-table';
import { NSSetCoder } from './ns-set';
import { NSStringCoder } from './ns-string';
import { NSURLCoder } from './ns-url';
import { NSUUIDCoder } from './ns-uuid';

export { CompositeCoder, compositeSkippedKeys, defaultCompositeClassNames } from './composite';
export { NSArrayCoder } from './ns-array';
export { NSDataCoder } from './ns-data';
export { NSDateCoder } from './ns-date';
export { NSDictionaryCoder } from './ns-dictionary';
export { NSHashTableCoder } from './ns-hash-table';
export { NSSetCoder, type SetDecoding } from './ns-set';
export { NSStringCoder } from './ns-string';
export { NSURLCoder } from './ns-url';
export { NSUUIDCoder, toFormattedHex } from './ns-uuid';

export const builtinCoders: readonly CoderType[] = [
  NSArrayCoder,
  NSDictionaryCoder,
  NSSetCoder,
  NSHashTableCoder,
  NSURLCoder,
  NSUUIDCoder,
  NSDateCoder,
  NSDataCoder,
  NSStringCoder,
  CompositeCoder,
];
