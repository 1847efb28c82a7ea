/**
 * Base class for every failure this tool reports to the user. `target` names
 * the repository, user or file the failure is about.
 */
export class GitHubStatsError extends Error {
  readonly target: string;

  constructor(message: string, target: string) {
    super(message);
    this.name = new.target.name;
    this.target = target;
  }
}

/** The repository or user does not exist (HTTP 404). Fatal for the run. */
export class NotFoundError extends GitHubStatsError {
  constructor(target: string, kind: "Repository" | "User" = "Repository") {
    super(
      `${kind} '${target}' not found. Please check the name and try again.`,
      target
    );
  }
}

/** Rate limit still in place after the caller's retry budget was spent. */
export class RateLimitedError extends GitHubStatsError {
  readonly attempts: number;

  constructor(target: string, attempts: number) {
    super(
      `Rate limit still exceeded for ${target} after ${attempts} attempts`,
      target
    );
    this.attempts = attempts;
  }
}

/** Any other unsuccessful response or transport failure. */
export class FetchError extends GitHubStatsError {
  readonly status?: number;

  constructor(message: string, target: string, status?: number) {
    super(message, target);
    this.status = status;
  }
}

/** Malformed user input: a repository identifier or a CSV file. */
export class ValidationError extends GitHubStatsError {}
