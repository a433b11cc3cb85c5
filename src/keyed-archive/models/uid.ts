
/**
 * A reference into the `$objects` table, as emitted by a binary plist parser.
 *
 * XML plists spell the same thing as `{ "CF$UID": n }`; see `getUid()` for the lookup
 * that treats both forms alike.
 */
export class Uid {
  readonly value: bigint;

  constructor(value: number | bigint) {
    this.value = BigInt(value);
  }

  get index(): number {
    return Number(this.value);
  }

  toString() {
    return `Uid<${this.value}>`;
  }
}
