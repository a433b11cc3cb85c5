import { UnarchiveError } from './unarchive-error';

export class LengthMismatchError extends UnarchiveError {
  readonly name = 'LengthMismatchError';

  constructor(
    readonly $classname: string,
    readonly keyCount: number,
    readonly objectCount: number,
    index?: number,
  ) {
    super(`Mismatch between number of NS.keys (${keyCount}) and NS.objects (${objectCount}) in ${$classname}`, index);
  }
}
