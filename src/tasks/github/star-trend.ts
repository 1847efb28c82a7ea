import type { RepoId } from "../../github-client/types";
import type { DateString } from "../../types";
import { listDateRange, toUtcDate } from "../../utils";
import {
  repoCumulativeColumn,
  repoNewColumn,
  TREND_CUMULATIVE_COLUMN,
  TREND_DATE_COLUMN,
  TREND_NEW_COLUMN,
} from "./data-config";

export interface RepoEvents {
  repo: RepoId;
  events: ReadonlyArray<{ timestamp: string }>;
}

export interface DailyBucket {
  date: DateString;
  newCount: number;
  cumulativeCount: number;
}

export interface RepoTrend {
  repo: RepoId;
  buckets: DailyBucket[];
}

/**
 * Daily star counts on one contiguous date axis. `total` and every entry of
 * `repos[].buckets` have exactly one bucket per date in `dates`.
 */
export interface AccountTrend {
  dates: DateString[];
  total: DailyBucket[];
  repos: RepoTrend[];
}

export type TrendRow = Record<string, string | number>;

type DailyCounts = Map<DateString, number>;

function increment(counts: DailyCounts, date: DateString): void {
  counts.set(date, (counts.get(date) ?? 0) + 1);
}

/**
 * Merges the star events of several repositories into one gap-filled daily
 * series, with global and per-repository new and cumulative counts.
 *
 * Returns null when there is nothing to count. Repositories without events
 * are left out of the result. Events are counted as delivered, duplicates
 * included.
 */
export function buildAccountTrend(input: RepoEvents[]): AccountTrend | null {
  const perRepo = new Map<RepoId, DailyCounts>();
  const global: DailyCounts = new Map();

  for (const { repo, events } of input) {
    if (events.length === 0) continue;

    let counts = perRepo.get(repo);
    if (!counts) {
      counts = new Map();
      perRepo.set(repo, counts);
    }

    for (const event of events) {
      const date = toUtcDate(event.timestamp);
      increment(counts, date);
      increment(global, date);
    }
  }

  if (global.size === 0) return null;

  const observed = [...global.keys()].sort();
  const dates = listDateRange(observed[0], observed[observed.length - 1]);

  const total: DailyBucket[] = [];
  const repos: RepoTrend[] = [...perRepo.keys()].map((repo) => ({
    repo,
    buckets: [],
  }));
  const running = new Map<RepoId, number>();
  let runningTotal = 0;

  // Single forward pass; a repository's cumulative value carries over days
  // without events and stays 0 before its first star.
  for (const date of dates) {
    const newCount = global.get(date) ?? 0;
    runningTotal += newCount;
    total.push({ date, newCount, cumulativeCount: runningTotal });

    for (const series of repos) {
      const repoNew = perRepo.get(series.repo)?.get(date) ?? 0;
      const cumulativeCount = (running.get(series.repo) ?? 0) + repoNew;
      running.set(series.repo, cumulativeCount);
      series.buckets.push({ date, newCount: repoNew, cumulativeCount });
    }
  }

  return { dates, total, repos };
}

export function trendColumns(trend: AccountTrend): string[] {
  return [
    TREND_DATE_COLUMN,
    TREND_NEW_COLUMN,
    TREND_CUMULATIVE_COLUMN,
    ...trend.repos.flatMap(({ repo }) => [
      repoNewColumn(repo),
      repoCumulativeColumn(repo),
    ]),
  ];
}

/**
 * One flat row per axis date, oldest first.
 */
export function toTrendRows(trend: AccountTrend): TrendRow[] {
  return trend.dates.map((date, index) => {
    const row: TrendRow = {
      [TREND_DATE_COLUMN]: date,
      [TREND_NEW_COLUMN]: trend.total[index].newCount,
      [TREND_CUMULATIVE_COLUMN]: trend.total[index].cumulativeCount,
    };
    for (const { repo, buckets } of trend.repos) {
      row[repoNewColumn(repo)] = buckets[index].newCount;
      row[repoCumulativeColumn(repo)] = buckets[index].cumulativeCount;
    }
    return row;
  });
}
