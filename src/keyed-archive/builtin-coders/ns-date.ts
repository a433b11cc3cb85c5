import { cfAbsoluteTimeEpochMilliseconds } from '../../constants/epoch';
import { MalformedError } from '../errors/malformed';
import { KeyedUnarchiver, type CoderContext } from '../keyed-unarchiver';

/** `NS.time` is seconds since the CoreFoundation epoch; rendered as ISO-8601 text. */
export class NSDateCoder extends KeyedUnarchiver<string> {
  static readonly $classnames = ['NSDate'];

  constructor(context: CoderContext) {
    super(context);
  }

  static initForReadingDataFrom(context: CoderContext) {
    return new NSDateCoder(context);
  }

  decode(): string {
    const time = this.requireValue('NS.time');
    const seconds = typeof time === 'bigint' ? Number(time) : time;
    if (typeof seconds !== 'number' || !Number.isFinite(seconds)) {
      throw new MalformedError('NS.time', 'number', time, this.index);
    }

    const date = new Date(cfAbsoluteTimeEpochMilliseconds + seconds * 1000);
    if (Number.isNaN(date.getTime())) {
      throw new MalformedError('NS.time', 'representable date', time, this.index);
    }
    return date.toISOString();
  }
}
