import { KeyedUnarchiver, type CoderContext } from '../keyed-unarchiver';
import { encodeBytes } from '../normalize';

export class NSDataCoder extends KeyedUnarchiver<string> {
  static readonly $classnames = ['NSData', 'NSMutableData'];

  constructor(context: CoderContext) {
    super(context);
  }

  static initForReadingDataFrom(context: CoderContext) {
    return new NSDataCoder(context);
  }

  decode(): string {
    return encodeBytes(this.decodeBytes('NS.bytes'));
  }
}
