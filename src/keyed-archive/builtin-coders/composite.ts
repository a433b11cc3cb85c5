import { KeyedUnarchiver, type CoderContext } from '../keyed-unarchiver';
import type { DecodedMapping } from '../types/decoded-value';

/** Record types written by Background Task Management and bookmark archives. */
export const defaultCompositeClassNames: readonly string[] = [
  'BackgroundItemContainer',
  'BackgroundItems',
  'BackgroundLoginItem',
  'Bookmark',
  'BTMUserSettings',
  'ItemRecord',
  'Storage',
];

export const compositeSkippedKeys: ReadonlySet<string> = new Set(['$class']);

/** Decodes an archive-defined record member by member, leaving out empty members. */
export class CompositeCoder extends KeyedUnarchiver<DecodedMapping> {
  static readonly $classnames = defaultCompositeClassNames;

  constructor(context: CoderContext) {
    super(context);
  }

  static initForReadingDataFrom(context: CoderContext) {
    return new CompositeCoder(context);
  }

  decode(): DecodedMapping {
    return this.decoder.decodeMembers(this.data, this.index, compositeSkippedKeys);
  }
}
