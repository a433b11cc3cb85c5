
export class AssertError extends Error {
  readonly name = 'AssertError';

  constructor(message: string, readonly assertion?: () => boolean) {
    super(message);
  }
}

/**
 * Throw an {@link AssertError} when `assertion` does not hold.
 * The message is built lazily so callers can describe the offending value.
 */
export function assert(assertion: () => boolean, message: string | (() => string)) {
  if (!assertion()) {
    throw new AssertError(typeof message === 'string' ? message : message(), assertion);
  }
}
