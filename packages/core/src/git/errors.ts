/**
 * Custom Error Classes for repository mirroring
 *
 * Clone and pull failures are per-task errors: the worker logs them and
 * moves on to the next repository.
 */

/**
 * Base error class for all Git-related errors
 */
export class GitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GitError';
    Object.setPrototypeOf(this, GitError.prototype);
  }
}

/**
 * Error thrown when a Git command fails
 */
export class GitCommandError extends GitError {
  public readonly stderr: string;
  public readonly command?: string | undefined;

  constructor(message: string, stderr: string = '', command?: string) {
    super(message);
    this.name = 'GitCommandError';
    this.stderr = stderr;
    this.command = command;
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}

/**
 * Last non-empty line of git's stderr, which is where it puts the `fatal:` reason.
 */
export function summarizeStderr(stderr: string): string {
  const lines = stderr.split('\n').map((line) => line.trim()).filter((line) => line !== '');
  return lines[lines.length - 1] ?? 'unknown error';
}

/**
 * Error thrown when a repository cannot be cloned.
 * The mirror path stays absent, so the next cycle retries the clone.
 */
export class CloneError extends GitCommandError {
  public readonly repository: string;

  constructor(repository: string, stderr: string, command?: string) {
    super(`failed to clone repository ${repository}: ${summarizeStderr(stderr)}`, stderr, command);
    this.name = 'CloneError';
    this.repository = repository;
    Object.setPrototypeOf(this, CloneError.prototype);
  }
}

/**
 * Error thrown when an existing mirror cannot be opened or updated.
 * Non-fast-forward pulls are not errors.
 */
export class PullError extends GitCommandError {
  public readonly repository: string;

  constructor(repository: string, reason: string, stderr: string = '', command?: string) {
    super(`failed to pull repository ${repository}: ${reason}`, stderr, command);
    this.name = 'PullError';
    this.repository = repository;
    Object.setPrototypeOf(this, PullError.prototype);
  }
}
