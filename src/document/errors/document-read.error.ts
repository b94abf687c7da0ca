import { describeError } from '../../common/utils/error.utils';

/**
 * A single document could not be opened or read to the end.
 * The reducer logs it and skips the document; indexing carries on.
 */
export class DocumentReadError extends Error {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(`${path}: ${describeError(cause)}`, { cause });
    this.name = 'DocumentReadError';
    Object.setPrototypeOf(this, DocumentReadError.prototype);
  }
}
