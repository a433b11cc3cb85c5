import { MalformedError } from '../errors/malformed';
import { KeyedUnarchiver, type CoderContext } from '../keyed-unarchiver';

export class NSURLCoder extends KeyedUnarchiver<string | null> {
  static readonly $classnames = ['NSURL'];

  constructor(context: CoderContext) {
    super(context);
  }

  static initForReadingDataFrom(context: CoderContext) {
    return new NSURLCoder(context);
  }

  decode(): string | null {
    const base = this.decodeObject('NS.base');
    const relative = this.decodeObject('NS.relative');

    if (relative !== null && typeof relative !== 'string') {
      throw new MalformedError('NS.relative', 'string', this.data['NS.relative'], this.index);
    }
    if (base === null || base === '') {
      return relative;
    }
    if (typeof base !== 'string') {
      throw new MalformedError('NS.base', 'string', this.data['NS.base'], this.index);
    }
    if (relative === null) {
      throw new MalformedError('NS.relative', 'string', this.data['NS.relative'], this.index);
    }

    return `${base}/${relative}`;
  }
}
