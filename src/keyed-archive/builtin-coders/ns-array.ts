import { KeyedUnarchiver, type CoderContext } from '../keyed-unarchiver';
import type { DecodedValue } from '../types/decoded-value';

export class NSArrayCoder extends KeyedUnarchiver<readonly DecodedValue[]> {
  static readonly $classnames = ['NSArray', 'NSMutableArray'];

  constructor(context: CoderContext) {
    super(context);
  }

  static initForReadingDataFrom(context: CoderContext) {
    return new NSArrayCoder(context);
  }

  decode(): DecodedValue[] {
    return this.decodeSequence('NS.objects')
      .map(element => this.decoder.decodeValue(element, this.index));
  }
}
