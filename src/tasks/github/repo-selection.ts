import { isValidRepoId } from "../../github-client/repo-id";
import type { RepoId } from "../../github-client/types";
import type { Logger } from "../../types";

export interface RepoSelection {
  owned: RepoId[];
  include?: string[];
  exclude?: string[];
}

/**
 * Drops malformed identifiers, reporting each one.
 */
export function validRepoIds(
  repos: string[],
  logger: Logger,
  label = "repository"
): RepoId[] {
  return repos.filter((repo) => {
    if (isValidRepoId(repo)) return true;
    logger.error(
      `❌ Invalid ${label} '${repo}'. Expected the format 'owner/repo'; skipping.`
    );
    return false;
  });
}

/**
 * Owned repositories plus the included ones, minus the excluded ones.
 * Matching ignores case, as GitHub does; the first spelling seen is kept.
 */
export function selectRepos(
  { owned, include = [], exclude = [] }: RepoSelection,
  logger: Logger
): RepoId[] {
  const excluded = new Set(
    validRepoIds(exclude, logger, "excluded repository").map((repo) =>
      repo.toLowerCase()
    )
  );
  const selected = new Map<string, RepoId>();

  for (const repo of [
    ...owned,
    ...validRepoIds(include, logger, "included repository"),
  ]) {
    const key = repo.toLowerCase();
    if (excluded.has(key)) {
      logger.debug(`Excluding ${repo}`);
      continue;
    }
    if (!selected.has(key)) selected.set(key, repo);
  }

  return [...selected.values()];
}
