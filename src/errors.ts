/**
 * Thrown when an encoder or filter is called with an invalid argument,
 * e.g. a missing writer for present input or an unknown context name.
 */
export class ArgumentError extends TypeError {
  constructor (message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

/**
 * Thrown when the writer of a streaming encode/filter call fails.
 *
 * The transformation itself cannot fail, so the original error is kept as `cause`
 * and any retry has to happen at the writer level.
 */
export class SinkWriteError extends Error {
  constructor (message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'SinkWriteError';
  }
}
