import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { vi } from "vitest";
import { GitHubClient } from "../src/github-client/client";

export interface FakeResponse {
  status?: number;
  body: unknown;
  headers?: Record<string, string>;
}

type PageKey = number | "any";

/**
 * In-process stand-in for the GitHub REST API, handed to Octokit as its
 * `fetch`. Responses are queued per path and page; the last queued response
 * repeats. A registered path answers unknown pages with an empty list, an
 * unknown path with 404.
 */
export class FakeGitHub {
  readonly requests: Array<{ url: URL; headers: Record<string, string> }> = [];
  private routes = new Map<string, Map<PageKey, FakeResponse[]>>();

  on(pathname: string, responses: FakeResponse | FakeResponse[], page: PageKey = "any"): this {
    const pages = this.routes.get(pathname) ?? new Map<PageKey, FakeResponse[]>();
    pages.set(page, Array.isArray(responses) ? [...responses] : [responses]);
    this.routes.set(pathname, pages);
    return this;
  }

  stargazers(repo: string, stars: Array<{ login: string; starredAt: string }>): this {
    return this.on(
      `/repos/${repo}/stargazers`,
      {
        body: stars.map(({ login, starredAt }, i) => ({
          starred_at: starredAt,
          user: { login, id: 1000 + i },
        })),
      },
      1
    );
  }

  forks(repo: string, forks: Array<{ login: string; createdAt: string }>): this {
    return this.on(
      `/repos/${repo}/forks`,
      {
        body: forks.map(({ login, createdAt }, i) => ({
          full_name: `${login}/${repo.split("/")[1]}`,
          created_at: createdAt,
          owner: { login, id: 2000 + i },
        })),
      },
      1
    );
  }

  ownerRepos(username: string, repos: string[]): this {
    return this.on(
      `/users/${username}/repos`,
      { body: repos.map((full_name) => ({ full_name, owner: { login: username } })) },
      1
    );
  }

  user(login: string, profile: Record<string, unknown> = {}): this {
    return this.on(`/users/${login}`, {
      body: {
        login,
        name: null,
        company: null,
        location: null,
        email: null,
        bio: null,
        followers: 0,
        public_repos: 0,
        ...profile,
      },
    });
  }

  requested(pathname: string): URL[] {
    return this.requests.map(({ url }) => url).filter((url) => url.pathname === pathname);
  }

  readonly fetch: typeof fetch = async (input, init) => {
    const url = new URL(
      typeof input === "string" ? input : input instanceof URL ? input.href : input.url
    );
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    this.requests.push({ url, headers });

    const pages = this.routes.get(url.pathname);
    if (!pages) {
      return respond({ status: 404, body: { message: "Not Found" } });
    }

    const page = Number(url.searchParams.get("page") ?? "1");
    const queue = pages.get(page) ?? pages.get("any");
    if (!queue) return respond({ body: [] });

    const next = queue.length > 1 ? queue.shift() : queue[0];
    return respond(next ?? { body: [] });
  };
}

function respond({ status = 200, body, headers = {} }: FakeResponse): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json; charset=utf-8", ...headers },
  });
}

export function rateLimited(headers: Record<string, string> = {}): FakeResponse {
  return {
    status: 403,
    body: { message: "API rate limit exceeded for 127.0.0.1." },
    headers,
  };
}

export function createLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function createDelay() {
  return vi.fn(async (_ms: number) => undefined);
}

export function createClient(
  github: FakeGitHub,
  options: { logger?: ReturnType<typeof createLogger>; delay?: ReturnType<typeof createDelay>; now?: () => number } = {}
): GitHubClient {
  return new GitHubClient({
    fetch: github.fetch,
    logger: options.logger ?? createLogger(),
    delay: options.delay ?? createDelay(),
    now: options.now,
  });
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "stargazer-stats-"));
}
