import { ValidationError } from "./errors";
import type { RepoId } from "./types";

export interface RepoParts {
  owner: string;
  name: string;
}

export function parseRepoId(repo: string): RepoParts {
  const parts = repo.split("/");
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new ValidationError(
      `Invalid repository '${repo}'. Expected the format 'owner/repo'.`,
      repo
    );
  }
  return { owner: parts[0], name: parts[1] };
}

export function isValidRepoId(repo: string): boolean {
  try {
    parseRepoId(repo);
    return true;
  } catch {
    return false;
  }
}

// "owner/name" -> "owner_name", used in file and column names
export function toFileStem(repo: RepoId): string {
  return repo.replace("/", "_");
}
