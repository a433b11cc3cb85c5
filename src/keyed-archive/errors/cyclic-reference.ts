import { UnarchiveError } from './unarchive-error';

export class CyclicReferenceError extends UnarchiveError {
  readonly name = 'CyclicReferenceError';

  constructor(readonly reference: number) {
    super(`Reference Uid<${reference}> points back to an object that is still being decoded`);
  }
}
