export const USAGE = 'usage: corpus-indexer <directory>';

/**
 * Raised when the command line does not name exactly one directory.
 */
export class CliUsageError extends Error {
  constructor(message = USAGE) {
    super(message);
    this.name = 'CliUsageError';
    Object.setPrototypeOf(this, CliUsageError.prototype);
  }
}
