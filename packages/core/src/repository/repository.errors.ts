/**
 * Error thrown when a path is not inside a git repository
 */
export class RepositoryError extends Error {
  public readonly path: string;
  public readonly stderr: string;

  constructor(message: string, path: string, stderr: string = '') {
    super(message);
    this.name = 'RepositoryError';
    this.path = path;
    this.stderr = stderr;
    Object.setPrototypeOf(this, RepositoryError.prototype);
  }
}
