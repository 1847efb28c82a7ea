import type { GitHubClient } from "../../github-client/client";
import type {
  ActorEvent,
  ActorProfile,
  ActorRef,
  RepoId,
} from "../../github-client/types";
import type { Delay, Logger } from "../../types";
import { delay } from "../../utils";
import { LOOKUP_DELAY_MS, type TimestampField } from "./data-config";

export interface EnrichedRecord {
  profile: ActorProfile;
  timestampField: TimestampField;
  timestamp: string;
  repo: RepoId;
}

export type ProfileSource = Pick<GitHubClient, "fetchProfile">;

export interface EnrichOptions {
  client: ProfileSource;
  logger?: Logger;
  delay?: Delay;
  lookupDelayMs?: number;
}

async function resolveProfile(
  actor: ActorRef,
  options: Required<EnrichOptions>
): Promise<ActorProfile | null> {
  if (actor.kind === "profile") return actor.profile;

  try {
    return await options.client.fetchProfile(actor.login);
  } catch (error) {
    // A failed lookup costs this one record, never the run
    options.logger.warn(
      `⚠️  Skipping user ${actor.login}: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
    return null;
  } finally {
    await options.delay(options.lookupDelayMs);
  }
}

/**
 * Joins every event with its actor's profile. Actors whose lookup fails are
 * dropped; the remaining records keep the input order.
 */
export async function enrich(
  events: ActorEvent[],
  timestampField: TimestampField,
  options: EnrichOptions
): Promise<EnrichedRecord[]> {
  const resolved: Required<EnrichOptions> = {
    client: options.client,
    logger: options.logger ?? console,
    delay: options.delay ?? delay,
    lookupDelayMs: options.lookupDelayMs ?? LOOKUP_DELAY_MS,
  };
  const { logger } = resolved;
  const records: EnrichedRecord[] = [];
  let reused = 0;

  for (const [index, event] of events.entries()) {
    logger.debug(
      `[${index + 1}/${events.length}] Fetching metadata for user: ${event.actor.login}`
    );
    if (event.actor.kind === "profile") reused++;

    const profile = await resolveProfile(event.actor, resolved);
    if (!profile) continue;

    records.push({
      profile,
      timestampField,
      timestamp: event.timestamp,
      repo: event.repo,
    });
  }

  logger.info(
    `Fetched metadata for ${records.length} users (${reused} reused from the event payload, ${
      events.length - records.length
    } skipped).`
  );
  return records;
}
