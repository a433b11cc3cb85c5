import { UnarchiveError } from './unarchive-error';

export class DepthLimitError extends UnarchiveError {
  readonly name = 'DepthLimitError';

  constructor(readonly reference: number, readonly maxDepth: number, index?: number) {
    super(`Reference Uid<${reference}> nests deeper than ${maxDepth} objects`, index);
  }
}
