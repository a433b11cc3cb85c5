
export type DecodedValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | readonly DecodedValue[]
  | DecodedMapping
  ;

export type DecodedMapping = { readonly [key: string]: DecodedValue };

/** Result of unarchiving: one decoded value per `$top` entry. */
export type UnarchivedRoots = DecodedMapping;
