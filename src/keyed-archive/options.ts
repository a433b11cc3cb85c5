import { assert } from '../assert';
import { buildLeveledLogger, defaultLogConfig, type ILogConfig, type ILogger } from '../shared/logger';
import { CompositeCoder, type SetDecoding } from './builtin-coders';
import { CoderRegistry } from './coder-registry';
import type { CoderType } from './keyed-unarchiver';

export interface UnarchiveOptions {
  /** Where log lines go and from which level. Warnings to `console` by default. */
  readonly log?: ILogConfig;
  /** Defaults to `'members'`. */
  readonly setDecoding?: SetDecoding;
  /** Extra archive-defined record classes to decode member by member. */
  readonly compositeClassNames?: readonly string[];
  /** Extra coders, registered under each of their `$classnames`. */
  readonly coders?: readonly CoderType[];
  /** Reuse the decoded value of a table entry that is referenced more than once. Defaults to `true`. */
  readonly memoize?: boolean;
  /** How many references may be followed inside one another. Defaults to {@link defaultMaxDepth}. */
  readonly maxDepth?: number;
}

export interface ResolvedUnarchiveOptions {
  readonly logger: ILogger;
  readonly setDecoding: SetDecoding;
  readonly registry: CoderRegistry;
  readonly memoize: boolean;
  readonly maxDepth: number;
}

/** Well below the nesting at which the call stack runs out on a default Node.js stack. */
export const defaultMaxDepth = 256;

export function resolveUnarchiveOptions(options: UnarchiveOptions = {}): ResolvedUnarchiveOptions {
  const registry = CoderRegistry.withBuiltins();
  for (const className of options.compositeClassNames ?? []) {
    registry.setClass(CompositeCoder, className);
  }
  for (const coder of options.coders ?? []) {
    registry.register(coder);
  }

  const maxDepth = options.maxDepth ?? defaultMaxDepth;
  assert(() => Number.isSafeInteger(maxDepth) && maxDepth > 0, () => `maxDepth must be a positive integer, got ${maxDepth}`);

  return {
    logger: buildLeveledLogger(options.log ?? defaultLogConfig),
    setDecoding: options.setDecoding ?? 'members',
    registry,
    memoize: options.memoize ?? true,
    maxDepth,
  };
}
