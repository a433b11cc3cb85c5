import type { ArchivedValue } from '../types/archive-types';
import { describeValue } from './describe-value';
import { UnarchiveError } from './unarchive-error';

export class UnsupportedArchiveError extends UnarchiveError {
  readonly name = 'UnsupportedArchiveError';

  constructor(readonly archiver: ArchivedValue, readonly version: ArchivedValue) {
    super(`Unsupported archive: $archiver=${describeValue(archiver)} $version=${describeValue(version)}`);
  }
}
