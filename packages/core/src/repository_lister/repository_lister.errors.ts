/**
 * Error thrown when a page of the repository list cannot be fetched.
 * Aborts the rest of the cycle's pagination; work already queued still runs.
 */
export class ListError extends Error {
  public readonly page: number;
  public readonly status?: number | undefined;

  constructor(page: number, message: string, status?: number, cause?: unknown) {
    super(`failed to get repositories list (page ${page}): ${message}`, { cause });
    this.name = 'ListError';
    this.page = page;
    this.status = status;
    Object.setPrototypeOf(this, ListError.prototype);
  }
}
