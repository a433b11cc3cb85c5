
/**
 * Base class for every failure raised while unarchiving.
 * `index` is the `$objects` position of the object being decoded, when there is one.
 */
export class UnarchiveError extends Error {
  readonly name: string = 'UnarchiveError';

  constructor(message: string, readonly index?: number) {
    super(index === undefined ? message : `${message} (at $objects[${index}])`);
  }
}
