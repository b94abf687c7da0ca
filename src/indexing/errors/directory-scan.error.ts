import { describeError } from '../../common/utils/error.utils';

/**
 * Walking the document tree failed. This aborts the run before indexing.
 */
export class DirectoryScanError extends Error {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(`error while scanning ${path}: ${describeError(cause)}`, { cause });
    this.name = 'DirectoryScanError';
    Object.setPrototypeOf(this, DirectoryScanError.prototype);
  }
}
