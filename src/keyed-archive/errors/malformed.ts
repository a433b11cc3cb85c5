import type { ArchivedValue } from '../types/archive-types';
import { describeValue } from './describe-value';
import { UnarchiveError } from './unarchive-error';

export class MalformedError extends UnarchiveError {
  readonly name = 'MalformedError';

  constructor(readonly key: string, readonly expectedType: string, readonly actual: ArchivedValue, index?: number) {
    super(`For key ${key}: expected ${expectedType} but found ${describeValue(actual)}`, index);
  }
}
