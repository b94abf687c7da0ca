/**
 * The directory given on the command line is missing, unreadable or not a
 * directory. Nothing is indexed when this is raised.
 */
export class InvalidRootError extends Error {
  constructor(
    public readonly root: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'InvalidRootError';
    Object.setPrototypeOf(this, InvalidRootError.prototype);
  }
}
