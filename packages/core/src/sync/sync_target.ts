import * as path from "path";
import type { RepositoryDescriptor } from "../repository_lister/repository_lister.types";

/**
 * Whether `name` can be used as a single directory directly under the root.
 */
export function isSafeRepositoryName(name: string): boolean {
  return name !== "" && name !== "." && name !== ".." && !/[\\/\0]/.test(name);
}

/**
 * Owner login taken from `owner/name`.
 */
export function repositoryOwner(repository: Pick<RepositoryDescriptor, "fullName">): string {
  const separator = repository.fullName.indexOf("/");
  return separator < 0 ? "" : repository.fullName.slice(0, separator);
}

/**
 * Mirror location for a repository: `<reposDir>/<name>`, or
 * `<reposDir>/<owner>/<name>` when `owner` is given.
 *
 * @throws Error if a segment would escape the root directory
 */
export function resolveRepoPath(reposDir: string, name: string, owner?: string): string {
  for (const segment of owner === undefined ? [name] : [owner, name]) {
    if (!isSafeRepositoryName(segment)) {
      throw new Error(`Repository name cannot be used as a directory: ${JSON.stringify(segment)}`);
    }
  }
  return owner === undefined ? path.join(reposDir, name) : path.join(reposDir, owner, name);
}
