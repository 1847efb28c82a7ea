import { toFileStem } from "../../github-client/repo-id";
import type { EventKind, RepoId } from "../../github-client/types";

export type TimestampField = "starred_at" | "forked_at";

export interface ActorExportConfig {
  eventKind: EventKind;
  timestampField: TimestampField;
  suffix: string;
  label: string;
}

export const actorExports = {
  stargazers: {
    eventKind: "stargazers",
    timestampField: "starred_at",
    suffix: "stargazers",
    label: "stargazers",
  },
  forkers: {
    eventKind: "forks",
    timestampField: "forked_at",
    suffix: "forkers",
    label: "forkers",
  },
} satisfies Record<string, ActorExportConfig>;

export const PROFILE_COLUMNS = [
  "login",
  "name",
  "company",
  "location",
  "email",
  "bio",
  "followers",
  "public_repos",
] as const;

export const TREND_SUFFIX = "account_stars_by_day";
export const TREND_DATE_COLUMN = "star_date";
export const TREND_NEW_COLUMN = "total_new_stars_on_day";
export const TREND_CUMULATIVE_COLUMN = "total_cumulative_stars_up_to_day";
export const TREND_REQUIRED_COLUMNS = [
  TREND_DATE_COLUMN,
  TREND_NEW_COLUMN,
  TREND_CUMULATIVE_COLUMN,
];

export const TOP_LOCATIONS_LIMIT = 10;
export const LOOKUP_DELAY_MS = 200;

export function repoNewColumn(repo: RepoId): string {
  return `${toFileStem(repo)}_new_stars`;
}

export function repoCumulativeColumn(repo: RepoId): string {
  return `${toFileStem(repo)}_cumulative_stars`;
}

export function trendTitle(username: string): string {
  return `Cumulative Stars Over Time for ${username}`;
}
