import { KeyedUnarchiver, type CoderContext } from '../keyed-unarchiver';

export class NSStringCoder extends KeyedUnarchiver<string> {
  static readonly $classnames = ['NSString', 'NSMutableString'];

  constructor(context: CoderContext) {
    super(context);
  }

  static initForReadingDataFrom(context: CoderContext) {
    return new NSStringCoder(context);
  }

  decode(): string {
    return this.decodeString('NS.string');
  }
}
