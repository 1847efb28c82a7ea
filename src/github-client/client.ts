import { Octokit } from "@octokit/rest";
import { RequestError } from "@octokit/request-error";
import type { RequestParameters } from "@octokit/types";
import { z } from "zod";
import type { Delay, Logger } from "../types";
import { delay } from "../utils";
import { FetchError, NotFoundError, RateLimitedError } from "./errors";
import {
  decideRetry,
  secondsUntilReset,
  type ResponseSnapshot,
} from "./rate-limit";
import { parseRepoId } from "./repo-id";
import {
  forkSchema,
  ownerRepoSchema,
  stargazerSchema,
  toActorProfile,
  toActorRef,
  userProfileSchema,
  type ActorEvent,
  type ActorProfile,
  type EventKind,
  type RepoId,
} from "./types";

export const PER_PAGE = 100;
export const DEFAULT_PAGE_DELAY_MS = 200;
export const PROFILE_MAX_ATTEMPTS = 5;
export const PROFILE_INITIAL_BACKOFF_MS = 60_000;

const STAR_MEDIA_TYPE = "application/vnd.github.v3.star+json";

export interface GitHubClientOptions {
  token?: string;
  baseUrl?: string;
  logger?: Logger;
  // Replaces the global fetch; tests hand in an in-process fake
  fetch?: typeof fetch;
  delay?: Delay;
  pageDelayMs?: number;
  now?: () => number;
}

export interface ProfileLookupOptions {
  maxAttempts?: number;
  initialBackoffMs?: number;
}

type ResponseHeaders = ResponseSnapshot["headers"];

type RequestOutcome =
  | { ok: true; data: unknown; headers: ResponseHeaders }
  | { ok: false; snapshot: ResponseSnapshot | null; error: unknown };

interface PageContext {
  target: string;
  kind: "Repository" | "User";
  headers?: Record<string, string>;
}

export function snapshotFromError(error: unknown): ResponseSnapshot | null {
  if (!(error instanceof RequestError)) return null;
  const data = error.response?.data;
  return {
    status: error.status,
    headers: error.response?.headers ?? {},
    body:
      typeof data === "string"
        ? data
        : data === undefined
          ? error.message
          : JSON.stringify(data),
  };
}

// Without a Link header the API gives no hint, so keep going until an empty page
export function hasNextPage(link: string | number | undefined): boolean {
  if (link === undefined) return true;
  return String(link).includes('rel="next"');
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class GitHubClient {
  private octokit: Octokit;
  private logger: Logger;
  private delay: Delay;
  private pageDelayMs: number;
  private now: () => number;

  constructor(options: GitHubClientOptions = {}) {
    this.logger = options.logger ?? console;
    this.delay = options.delay ?? delay;
    this.pageDelayMs = options.pageDelayMs ?? DEFAULT_PAGE_DELAY_MS;
    this.now = options.now ?? Date.now;
    this.octokit = new Octokit({
      auth: options.token || undefined,
      baseUrl: options.baseUrl,
      userAgent: "stargazer-stats v0.1.0",
      log: this.logger,
      request: options.fetch ? { fetch: options.fetch } : undefined,
    });
  }

  /**
   * Every star or fork event of a repository, oldest page first.
   */
  async fetchEvents(kind: EventKind, repo: RepoId): Promise<ActorEvent[]> {
    const { owner, name } = parseRepoId(repo);

    if (kind === "stargazers") {
      this.logger.info(`⭐ Fetching stargazers for: ${repo}`);
      const items = await this.paginate(
        "GET /repos/{owner}/{repo}/stargazers",
        { owner, repo: name },
        stargazerSchema,
        {
          target: repo,
          kind: "Repository",
          headers: { accept: STAR_MEDIA_TYPE },
        }
      );
      const events = items.flatMap((item): ActorEvent[] => {
        // Deleted accounts come back as a null user
        if (!item.user) return [];
        return [
          { actor: toActorRef(item.user), timestamp: item.starred_at, repo },
        ];
      });
      this.logger.info(`Total stargazers fetched: ${events.length}`);
      return events;
    }

    this.logger.info(`🍴 Fetching forkers for: ${repo}`);
    const items = await this.paginate(
      "GET /repos/{owner}/{repo}/forks",
      { owner, repo: name },
      forkSchema,
      { target: repo, kind: "Repository" }
    );
    const events = items.map(
      (item): ActorEvent => ({
        actor: toActorRef(item.owner),
        timestamp: item.created_at,
        repo,
      })
    );
    this.logger.info(`Total forkers fetched: ${events.length}`);
    return events;
  }

  /**
   * Full names of the repositories `username` owns.
   */
  async fetchOwnerRepos(username: string): Promise<RepoId[]> {
    this.logger.info(`📦 Fetching repositories owned by: ${username}`);
    const items = await this.paginate(
      "GET /users/{username}/repos",
      { username, type: "owner", sort: "full_name" },
      ownerRepoSchema,
      { target: username, kind: "User" }
    );
    this.logger.info(`Found ${items.length} repositories for ${username}`);
    return items.map((item) => item.full_name);
  }

  /**
   * Profile lookup with a bounded rate-limit budget. Throws
   * `RateLimitedError` once the budget is spent, `NotFoundError` for unknown
   * users and `FetchError` for anything else.
   */
  async fetchProfile(
    login: string,
    options: ProfileLookupOptions = {}
  ): Promise<ActorProfile> {
    const maxAttempts = options.maxAttempts ?? PROFILE_MAX_ATTEMPTS;
    let backoffMs = options.initialBackoffMs ?? PROFILE_INITIAL_BACKOFF_MS;

    for (let attempt = 1; ; attempt++) {
      const outcome = await this.send("GET /users/{username}", {
        username: login,
      });

      if (outcome.ok) {
        const parsed = userProfileSchema.safeParse(outcome.data);
        if (!parsed.success) {
          throw new FetchError(
            `Unexpected profile payload for ${login}: ${parsed.error.message}`,
            login
          );
        }
        return toActorProfile(parsed.data);
      }

      const { snapshot } = outcome;
      if (!snapshot) {
        throw new FetchError(
          `Profile request for ${login} failed: ${describe(outcome.error)}`,
          login
        );
      }
      if (snapshot.status === 404) {
        throw new NotFoundError(login, "User");
      }

      const decision = decideRetry(snapshot, this.now());
      if (decision.action !== "retry") {
        throw new FetchError(
          `Error fetching profile for ${login}: ${snapshot.status} - ${snapshot.body}`,
          login,
          snapshot.status
        );
      }
      if (attempt >= maxAttempts) {
        throw new RateLimitedError(login, attempt);
      }

      const waitMs =
        secondsUntilReset(snapshot.headers, this.now()) === null
          ? backoffMs
          : decision.waitMs;
      this.logger.warn(
        `⏳ Rate limit hit for user ${login}. Waiting ${waitMs / 1000} seconds before retrying (attempt ${attempt}/${maxAttempts})...`
      );
      await this.delay(waitMs);
      backoffMs *= 2;
    }
  }

  private async send(
    route: string,
    params: RequestParameters
  ): Promise<RequestOutcome> {
    try {
      const response = await this.octokit.request(route, params);
      return { ok: true, data: response.data, headers: response.headers };
    } catch (error) {
      return { ok: false, snapshot: snapshotFromError(error), error };
    }
  }

  /**
   * One page, retried for as long as the API reports a rate limit.
   */
  private async requestPage(
    route: string,
    params: RequestParameters,
    context: PageContext
  ): Promise<{ data: unknown; headers: ResponseHeaders }> {
    for (;;) {
      const outcome = await this.send(route, params);
      if (outcome.ok) return outcome;

      const { snapshot } = outcome;
      if (!snapshot) {
        throw new FetchError(
          `Request for ${context.target} failed: ${describe(outcome.error)}`,
          context.target
        );
      }
      if (snapshot.status === 404) {
        throw new NotFoundError(context.target, context.kind);
      }

      const decision = decideRetry(snapshot, this.now());
      if (decision.action !== "retry") {
        throw new FetchError(
          `Error fetching ${context.target}: ${snapshot.status} - ${snapshot.body}`,
          context.target,
          snapshot.status
        );
      }

      this.logger.warn(
        `⏳ Rate limit hit for ${context.target}, waiting ${decision.waitMs / 1000} seconds before retrying...`
      );
      await this.delay(decision.waitMs);
    }
  }

  private async paginate<T>(
    route: string,
    params: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    context: PageContext
  ): Promise<T[]> {
    const items: T[] = [];
    const pageSchema = z.array(schema);

    for (let page = 1; ; page++) {
      this.logger.debug(`Requesting: ${route} page ${page}`);
      const response = await this.requestPage(
        route,
        { ...params, per_page: PER_PAGE, page, headers: context.headers },
        context
      );

      const batch = pageSchema.safeParse(response.data);
      if (!batch.success) {
        throw new FetchError(
          `Unexpected payload from ${route} for ${context.target}: ${batch.error.message}`,
          context.target
        );
      }

      this.logger.debug(`Fetched ${batch.data.length} items in this batch.`);
      if (batch.data.length === 0) break;
      items.push(...batch.data);

      if (!hasNextPage(response.headers.link)) break;
      await this.delay(this.pageDelayMs);
    }

    return items;
  }
}
