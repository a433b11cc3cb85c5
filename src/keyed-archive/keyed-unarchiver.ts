import type { ILogger } from '../shared/logger';
import { getUid, type $ObjectsMap } from './$objects-map';
import { MalformedError } from './errors/malformed';
import { MissingFieldError } from './errors/missing-field';
import { isBytes, isSequence } from './guards';
import type { ResolvedUnarchiveOptions } from './options';
import type { ArchivedMapping, ArchivedValue, IArchivedInstance } from './types/archive-types';
import type { DecodedMapping, DecodedValue } from './types/decoded-value';

// $class:Uid means a link to a class name

/**
 * What a coder can call back into while decoding its members.
 * Implemented by `ArchiveDecoder`, which owns the memo cache and cycle detection.
 */
export interface IObjectDecoder {
  readonly $objects: $ObjectsMap;
  readonly logger: ILogger;
  readonly options: ResolvedUnarchiveOptions;

  decodeValue(value: ArchivedValue, index: number | undefined): DecodedValue;
  decodeMembers(value: ArchivedMapping, index: number | undefined, skippedKeys: ReadonlySet<string>): DecodedMapping;
  decodeReferencedMembers(reference: ArchivedValue, forKey: string, index: number | undefined): DecodedMapping;
}

export interface CoderContext {
  readonly decoder: IObjectDecoder;
  readonly data: IArchivedInstance;
  /** The class name that selected this coder; aliases such as `NSMutableArray` show up here. */
  readonly $classname: string;
  /** `$objects` position of `data`, or `undefined` for an inline instance. */
  readonly index: number | undefined;
}

export interface CoderType<T extends DecodedValue = DecodedValue> {
  /** Every class name this coder decodes by default. */
  readonly $classnames: readonly string[];
  initForReadingDataFrom(context: CoderContext): KeyedUnarchiver<T>;
}

export abstract class KeyedUnarchiver<TClass extends DecodedValue> {

  constructor(protected readonly context: CoderContext) { }

  abstract decode(): TClass;

  get data(): IArchivedInstance {
    return this.context.data;
  }

  get $classname(): string {
    return this.context.$classname;
  }

  get index(): number | undefined {
    return this.context.index;
  }

  protected get decoder(): IObjectDecoder {
    return this.context.decoder;
  }

  // de/coding

  containsValue(forKey: string): boolean {
    return forKey[0] !== '$' && this.data[forKey] !== undefined;
  }

  /** The raw member, still encoded; throws when the member is absent. */
  requireValue(forKey: string): ArchivedValue {
    const value = this.data[forKey];
    if (value === undefined) {
      throw new MissingFieldError(forKey, this.$classname, this.index);
    }
    return value;
  }

  decodeObject(forKey: string): DecodedValue {
    return this.decoder.decodeValue(this.requireValue(forKey), this.index);
  }

  decodeSequence(forKey: string): readonly ArchivedValue[] {
    const value = this.requireValue(forKey);
    if (!isSequence(value)) {
      throw new MalformedError(forKey, 'array', value, this.index);
    }
    return value;
  }

  decodeBytes(forKey: string): ArrayBuffer | ArrayBufferView {
    const value = this.getRawValueFromDataOrUid(forKey);
    if (!isBytes(value)) {
      throw new MalformedError(forKey, 'bytes', value, this.index);
    }
    return value;
  }

  decodeString(forKey: string): string {
    const value = this.decodeObject(forKey);
    if (typeof value !== 'string') {
      throw new MalformedError(forKey, 'string', this.data[forKey], this.index);
    }
    return value;
  }

  /** Follows at most one reference, without decoding what it lands on. */
  protected getRawValueFromDataOrUid(forKey: string): ArchivedValue {
    const value = this.requireValue(forKey);
    const uid = getUid(value, this.index);
    if (uid !== undefined) {
      return this.decoder.$objects.getByUid(uid, this.index);
    }
    return value;
  }
}
