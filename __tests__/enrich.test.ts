import { describe, expect, it, vi } from "vitest";
import { NotFoundError, RateLimitedError } from "../src/github-client/errors";
import type { ActorEvent, ActorProfile } from "../src/github-client/types";
import { enrich } from "../src/tasks/github/enrich";
import {
  createClient,
  createDelay,
  createLogger,
  FakeGitHub,
  rateLimited,
} from "./helpers";

function profile(login: string, location: string | null = null): ActorProfile {
  return {
    login,
    name: null,
    company: null,
    location,
    email: null,
    bio: null,
    followers: 1,
    publicRepos: 2,
  };
}

function starredBy(login: string, timestamp = "2023-01-01T00:00:00Z"): ActorEvent {
  return { actor: { kind: "login", login }, timestamp, repo: "me/app" };
}

describe("enrich", () => {
  it("should join each event with the actor profile in input order", async () => {
    const client = { fetchProfile: vi.fn(async (login: string) => profile(login)) };
    const delay = createDelay();

    const records = await enrich(
      [starredBy("alice", "2023-01-02T00:00:00Z"), starredBy("bob")],
      "starred_at",
      { client, delay, logger: createLogger() }
    );

    expect(records).toEqual([
      {
        profile: profile("alice"),
        timestampField: "starred_at",
        timestamp: "2023-01-02T00:00:00Z",
        repo: "me/app",
      },
      {
        profile: profile("bob"),
        timestampField: "starred_at",
        timestamp: "2023-01-01T00:00:00Z",
        repo: "me/app",
      },
    ]);
    expect(delay.mock.calls.map(([ms]) => ms)).toEqual([200, 200]);
  });

  it("should not look up actors whose profile came with the event", async () => {
    const client = { fetchProfile: vi.fn(async (login: string) => profile(login)) };
    const delay = createDelay();
    const logger = createLogger();
    const embedded = profile("carol", "Lisbon");

    const records = await enrich(
      [
        {
          actor: { kind: "profile", login: "carol", profile: embedded },
          timestamp: "2023-01-01T00:00:00Z",
          repo: "me/app",
        },
      ],
      "forked_at",
      { client, delay, logger }
    );

    expect(records.map((record) => record.profile)).toEqual([embedded]);
    expect(client.fetchProfile).not.toHaveBeenCalled();
    expect(delay).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith(
      "Fetched metadata for 1 users (1 reused from the event payload, 0 skipped)."
    );
  });

  it("should skip actors whose lookup fails and keep going", async () => {
    const client = {
      fetchProfile: vi.fn(async (login: string) => {
        if (login === "gone") throw new NotFoundError(login, "User");
        if (login === "busy") throw new RateLimitedError(login, 5);
        return profile(login);
      }),
    };
    const logger = createLogger();

    const records = await enrich(
      [starredBy("alice"), starredBy("gone"), starredBy("busy"), starredBy("bob")],
      "starred_at",
      { client, delay: createDelay(), logger }
    );

    expect(records.map((record) => record.profile.login)).toEqual(["alice", "bob"]);
    expect(logger.warn).toHaveBeenCalledWith(
      "⚠️  Skipping user gone: User 'gone' not found. Please check the name and try again."
    );
    expect(logger.warn).toHaveBeenCalledWith(
      "⚠️  Skipping user busy: Rate limit still exceeded for busy after 5 attempts"
    );
  });

  it("should skip an actor on any other lookup failure", async () => {
    const client = {
      fetchProfile: vi.fn(async (login: string) => {
        if (login === "alice") throw new TypeError("boom");
        return profile(login);
      }),
    };
    const delay = createDelay();
    const logger = createLogger();

    const records = await enrich([starredBy("alice"), starredBy("bob")], "starred_at", {
      client,
      delay,
      logger,
    });

    expect(records.map((record) => record.profile.login)).toEqual(["bob"]);
    expect(logger.warn).toHaveBeenCalledWith("⚠️  Skipping user alice: boom");
    expect(delay.mock.calls.map(([ms]) => ms)).toEqual([200, 200]);
  });

  it("should drop an actor that stays rate-limited against the API", async () => {
    const github = new FakeGitHub()
      .user("alice", { location: "Berlin" })
      .on("/users/ghost", rateLimited())
      .user("bob");
    const client = createClient(github);

    const records = await enrich(
      [starredBy("alice"), starredBy("ghost"), starredBy("bob")],
      "starred_at",
      { client, delay: createDelay(), logger: createLogger() }
    );

    expect(records.map((record) => record.profile.login)).toEqual(["alice", "bob"]);
    expect(records[0].profile.location).toBe("Berlin");
    expect(github.requested("/users/ghost")).toHaveLength(5);
  });
});
