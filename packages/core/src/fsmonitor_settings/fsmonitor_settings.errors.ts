/**
 * Error raised on an internal inconsistency of the settings resolver.
 * Seeing one means a defect in this package, not misuse by the caller.
 */
export class FsmonitorInternalError extends Error {
  constructor(message: string) {
    super(`BUG: ${message}`);
    this.name = 'FsmonitorInternalError';
    Object.setPrototypeOf(this, FsmonitorInternalError.prototype);
  }
}
