import { UnarchiveError } from './unarchive-error';

export class UnsupportedClassError extends UnarchiveError {
  readonly name = 'UnsupportedClassError';

  constructor(readonly $classname: string, index?: number) {
    super(`No coder registered for $classname=${$classname}`, index);
  }
}
