import { UnarchiveError } from './unarchive-error';

export class InvalidLengthError extends UnarchiveError {
  readonly name = 'InvalidLengthError';

  constructor(readonly field: string, readonly expected: number, readonly actual: number, index?: number) {
    super(`Unsupported ${field} size: expected ${expected} bytes but found ${actual}`, index);
  }
}
