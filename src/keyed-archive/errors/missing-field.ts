import { UnarchiveError } from './unarchive-error';

export class MissingFieldError extends UnarchiveError {
  readonly name = 'MissingFieldError';

  constructor(readonly field: string, readonly $classname: string, index?: number) {
    super(`Missing ${field} in ${$classname} instance`, index);
  }
}
