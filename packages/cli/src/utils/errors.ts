/**
 * @module utils/errors
 * CLI-level error types. Core errors pass through unchanged.
 */

/**
 * Bad command-line usage: a missing argument or an unreadable input file.
 * The entry point prints the message and sets exit code 2.
 */
export class UsageError extends Error {
  /** The flag or argument at fault. */
  readonly field: string;

  constructor(message: string, field: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'UsageError';
    this.field = field;
  }
}
