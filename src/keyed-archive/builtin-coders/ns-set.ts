import { KeyedUnarchiver, type CoderContext } from '../keyed-unarchiver';
import type { DecodedMapping } from '../types/decoded-value';

/**
 * How `NSSet` members are returned.
 *
 * - `members`: every decoded member, in archive order.
 * - `last`: only the final decoded member (`null` for an empty set), as older
 *   tooling did.
 */
export type SetDecoding = 'members' | 'last';

export class NSSetCoder extends KeyedUnarchiver<readonly DecodedMapping[] | DecodedMapping | null> {
  static readonly $classnames = ['NSSet', 'NSMutableSet'];

  constructor(context: CoderContext) {
    super(context);
  }

  static initForReadingDataFrom(context: CoderContext) {
    return new NSSetCoder(context);
  }

  decode(): DecodedMapping[] | DecodedMapping | null {
    const members = this.decodeSequence('NS.objects')
      .map((reference, idx) => this.decoder.decodeReferencedMembers(reference, `NS.objects[${idx}]`, this.index));

    if (this.decoder.options.setDecoding === 'members') {
      return members;
    }

    if (members.length > 1) {
      this.decoder.logger.warn('WARN: %s keeps only the last of %s members', this.$classname, members.length);
    }
    return members.at(-1) ?? null;
  }
}
