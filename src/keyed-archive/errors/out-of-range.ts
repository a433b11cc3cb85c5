import { UnarchiveError } from './unarchive-error';

export class OutOfRangeError extends UnarchiveError {
  readonly name = 'OutOfRangeError';

  constructor(readonly reference: number, readonly tableLength: number, index?: number) {
    super(`Reference Uid<${reference}> is outside $objects (length ${tableLength})`, index);
  }
}
