/**
 * Extract a printable message from anything a promise can reject with.
 * Errors are recognised by shape: fs errors created in another realm fail
 * `instanceof Error`.
 */
export function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
