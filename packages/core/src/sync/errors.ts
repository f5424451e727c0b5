/**
 * Error thrown when the mirror root directory cannot be created.
 * Fatal: the run loop stops and the process exits with a failure code.
 */
export class DirectoryError extends Error {
  public readonly directory: string;

  constructor(directory: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`failed to create repos directory ${directory}: ${reason}`, { cause });
    this.name = "DirectoryError";
    this.directory = directory;
    Object.setPrototypeOf(this, DirectoryError.prototype);
  }
}
