import { LengthMismatchError } from '../errors/length-mismatch';
import { MalformedError } from '../errors/malformed';
import { KeyedUnarchiver, type CoderContext } from '../keyed-unarchiver';
import type { ArchivedValue } from '../types/archive-types';
import type { DecodedMapping, DecodedValue } from '../types/decoded-value';

export class NSDictionaryCoder extends KeyedUnarchiver<DecodedMapping> {
  static readonly $classnames = ['NSDictionary', 'NSMutableDictionary'];

  constructor(context: CoderContext) {
    super(context);
  }

  static initForReadingDataFrom(context: CoderContext) {
    return new NSDictionaryCoder(context);
  }

  decode(): DecodedMapping {
    const keys = this.decodeSequence('NS.keys');
    const objects = this.decodeSequence('NS.objects');

    if (keys.length !== objects.length) {
      throw new LengthMismatchError(this.$classname, keys.length, objects.length, this.index);
    }

    // fromEntries keeps the last value for a repeated key
    return Object.fromEntries(
      keys.map((encodedKey, idx) => {
        const key = this.keyToText(this.decoder.decodeValue(encodedKey, this.index), encodedKey);
        const value = this.decoder.decodeValue(objects[idx], this.index);
        return [key, value] as const;
      }),
    );
  }

  private keyToText(key: DecodedValue, encodedKey: ArchivedValue): string {
    if (typeof key === 'string') {
      return key;
    }
    if (key === null || typeof key !== 'object') {
      return String(key);
    }
    throw new MalformedError('NS.keys', 'scalar key', encodedKey, this.index);
  }
}
