import { KeyedUnarchiver, type CoderContext } from '../keyed-unarchiver';
import type { DecodedMapping } from '../types/decoded-value';

/**
 * `$1` points at the container holding the entries. `$0` looks like the element count
 * and `$2` is unknown; neither is needed to rebuild the values.
 */
export class NSHashTableCoder extends KeyedUnarchiver<DecodedMapping> {
  static readonly $classnames = ['NSHashTable'];

  constructor(context: CoderContext) {
    super(context);
  }

  static initForReadingDataFrom(context: CoderContext) {
    return new NSHashTableCoder(context);
  }

  decode(): DecodedMapping {
    const container = this.requireValue('$1');

    for (const ignored of ['$0', '$2']) {
      if (this.data[ignored] !== undefined) {
        this.decoder.logger.debug('DBG: %s ignoring %s', this.$classname, ignored);
      }
    }

    return this.decoder.decodeReferencedMembers(container, '$1', this.index);
  }
}
