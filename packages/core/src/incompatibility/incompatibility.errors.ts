/**
 * Error thrown when the filesystem type table cannot be loaded or is invalid
 */
export class FilesystemTableError extends Error {
  public readonly tablePath: string;
  public readonly details: string[];

  constructor(message: string, tablePath: string, details: string[] = []) {
    super(message);
    this.name = 'FilesystemTableError';
    this.tablePath = tablePath;
    this.details = details;
    Object.setPrototypeOf(this, FilesystemTableError.prototype);
  }
}
