import type { ILogger } from '../shared/logger';
import { getUid, type $ObjectsMap } from './$objects-map';
import { CyclicReferenceError } from './errors/cyclic-reference';
import { DepthLimitError } from './errors/depth-limit';
import { MalformedError } from './errors/malformed';
import { UnsupportedClassError } from './errors/unsupported-class';
import { isArchivedInstance, isArchivedMapping, isPresent } from './guards';
import type { IObjectDecoder } from './keyed-unarchiver';
import type { Uid } from './models/uid';
import { normalize } from './normalize';
import type { ResolvedUnarchiveOptions } from './options';
import type { ArchivedMapping, ArchivedValue, IArchivedInstance } from './types/archive-types';
import type { DecodedMapping, DecodedValue } from './types/decoded-value';

/** Members of a set or hash-table entry that are never decoded; `container` points back at the parent. */
export const containerSkippedKeys: ReadonlySet<string> = new Set(['$class', 'container']);

/**
 * Walks one archive's object graph. Holds the per-call state: decoded table entries
 * and the entries currently being decoded, which is how cycles are caught and how
 * deep the current reference chain runs.
 */
export class ArchiveDecoder implements IObjectDecoder {
  readonly logger: ILogger;

  private readonly _decoded = new Map<number, DecodedValue>();
  private readonly _inProgress = new Set<number>();

  constructor(
    readonly $objects: $ObjectsMap,
    readonly options: ResolvedUnarchiveOptions,
  ) {
    this.logger = options.logger;
  }

  /**
   * Decodes any encoded value. `index` is the table position of the enclosing object,
   * used only to locate errors.
   */
  decodeValue(value: ArchivedValue, index: number | undefined): DecodedValue {
    const uid = getUid(value, index);
    if (uid !== undefined) {
      return this.decodeReference(uid, index);
    }

    const normalized = normalize(value);
    switch (normalized.kind) {
      case 'terminal':
        return normalized.value;
      case 'reference':
        return this.decodeReference(normalized.value, index);
      case 'sequence':
        return normalized.value.map(element => this.decodeValue(element, index));
      case 'mapping':
        return this._decodeMapping(normalized.value, index);
      case 'unsupported':
        throw new MalformedError(`$objects[${index ?? '-'}]`, 'plist value', normalized.value, index);
    }
  }

  /** `from` is the position of the object holding `uid`, or `undefined` for a root. */
  decodeReference(uid: Uid, from: number | undefined): DecodedValue {
    const index = uid.index;

    if (this._decoded.has(index)) {
      this.logger.debug('DBG: reusing decoded $objects[%s]', index);
      return this._decoded.get(index) ?? null;
    }

    const entry = this.$objects.getByUid(uid, from);
    const result = this._whileDecoding(index, from, () => this.decodeValue(entry, index));

    if (this.options.memoize) {
      this._decoded.set(index, result);
    }
    return result;
  }

  decodeMembers(value: ArchivedMapping, index: number | undefined, skippedKeys: ReadonlySet<string>): DecodedMapping {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([key, member]) => !skippedKeys.has(key) && isPresent(member))
        .map(([key, member]) => [key, this.decodeValue(member, index)] as const),
    );
  }

  /**
   * Resolves `reference` and decodes the mapping it lands on member by member,
   * without dispatching on its `$class`.
   */
  decodeReferencedMembers(reference: ArchivedValue, forKey: string, index: number | undefined): DecodedMapping {
    const { uid, entry } = this.$objects.resolve(reference, forKey, index);
    if (!isArchivedMapping(entry)) {
      throw new MalformedError(forKey, 'container object', entry, uid.index);
    }

    return this._whileDecoding(uid.index, index, () => this.decodeMembers(entry, uid.index, containerSkippedKeys));
  }

  private _whileDecoding<T>(index: number, from: number | undefined, decode: () => T): T {
    if (this._inProgress.has(index)) {
      throw new CyclicReferenceError(index);
    }
    // every entry in progress is one level of the current chain
    if (this._inProgress.size >= this.options.maxDepth) {
      throw new DepthLimitError(index, this.options.maxDepth, from);
    }

    this._inProgress.add(index);
    try {
      return decode();
    } finally {
      this._inProgress.delete(index);
    }
  }

  private _decodeMapping(value: ArchivedMapping, index: number | undefined): DecodedValue {
    if (!isArchivedInstance(value)) {
      return this._decodeGenericMapping(value, index);
    }

    const $classname = this._getClassName(value, index);
    if ($classname === undefined) {
      return this._decodeGenericMapping(value, index);
    }

    const coderClass = this.options.registry.getClass($classname);
    if (!coderClass) {
      throw new UnsupportedClassError($classname, index);
    }

    this.logger.debug('DBG: decoding %s at $objects[%s]', $classname, index ?? '-');
    return coderClass
      .initForReadingDataFrom({ decoder: this, data: value, $classname, index })
      .decode();
  }

  /** Mappings that name no class, such as class descriptors, keep every member. */
  private _decodeGenericMapping(value: ArchivedMapping, index: number | undefined): DecodedMapping {
    return Object.fromEntries(
      Object.entries(value).map(([key, member]) => [key, this.decodeValue(member, index)] as const),
    );
  }

  /** `undefined` when the class descriptor carries no `$classname`. */
  private _getClassName(instance: IArchivedInstance, index: number | undefined): string | undefined {
    const classUid = getUid(instance.$class, index);
    const cls = classUid === undefined ? instance.$class : this.$objects.getByUid(classUid, index);

    if (!isArchivedMapping(cls)) {
      throw new MalformedError('$class', 'class-object', cls, classUid?.index ?? index);
    }

    const $classname = cls.$classname;
    if ($classname === undefined) {
      return undefined;
    }
    if (typeof $classname !== 'string') {
      throw new MalformedError('$classname', 'string', $classname, classUid?.index ?? index);
    }
    return $classname;
  }
}
