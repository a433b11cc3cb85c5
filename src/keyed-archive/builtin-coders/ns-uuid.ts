import { InvalidLengthError } from '../errors/invalid-length';
import { toUint8Array } from '../guards';
import { KeyedUnarchiver, type CoderContext } from '../keyed-unarchiver';

const uuidByteLength = 16;

/** Lower-case `8-4-4-4-12` form of 16 raw bytes. */
export function toFormattedHex(bytes: Uint8Array) {
  const hex = Array.from(bytes, byte => byte.toString(16).padStart(2, '0')).join('');

  // 12 3e 45 67 - e8 9b - 12 d3 - a4 56 - 42 66 14 17 40 00
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

export class NSUUIDCoder extends KeyedUnarchiver<string> {
  static readonly $classnames = ['NSUUID'];

  constructor(context: CoderContext) {
    super(context);
  }

  static initForReadingDataFrom(context: CoderContext) {
    return new NSUUIDCoder(context);
  }

  decode(): string {
    const uuidbytes = toUint8Array(this.decodeBytes('NS.uuidbytes'));
    if (uuidbytes.byteLength !== uuidByteLength) {
      throw new InvalidLengthError('NS.uuidbytes', uuidByteLength, uuidbytes.byteLength, this.index);
    }

    return toFormattedHex(uuidbytes);
  }
}
