import * as path from "path";
import * as asciichart from "asciichart";
import Table from "cli-table3";
import type { Logger } from "../../types";
import { daysBetween } from "../../utils";
import {
  TOP_LOCATIONS_LIMIT,
  TREND_SUFFIX,
  trendTitle,
} from "./data-config";
import type { EnrichedRecord } from "./enrich";
import type { AccountTrend, DailyBucket } from "./star-trend";

export interface LocationCount {
  location: string;
  count: number;
}

export interface TrendSummary {
  firstDate: string;
  lastDate: string;
  totalNew: number;
  finalCumulative: number;
  repos: Array<{ repo: string; finalCumulative: number }>;
}

export interface ChartOptions {
  title: string;
  height?: number;
  maxWidth?: number;
}

/**
 * Most frequent non-null locations; ties keep first-seen order.
 */
export function topLocations(
  records: EnrichedRecord[],
  limit = TOP_LOCATIONS_LIMIT
): LocationCount[] {
  const counts = new Map<string, number>();
  for (const { profile } of records) {
    if (profile.location === null) continue;
    counts.set(profile.location, (counts.get(profile.location) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([location, count]) => ({ location, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

export function printRecordSummary(
  records: EnrichedRecord[],
  filePath: string,
  logger: Logger
): void {
  logger.info(`✅ Saved ${records.length} users to ${filePath}`);

  const locations = topLocations(records);
  if (locations.length === 0) {
    logger.info("No locations reported by these users.");
    return;
  }

  const table = new Table({ head: ["Location", "Users"] });
  for (const { location, count } of locations) {
    table.push([location, count]);
  }
  logger.info(`\nTop Locations:\n${table.toString()}`);
}

function summarizeSeries(series: DailyBucket[]): Omit<TrendSummary, "repos"> {
  return {
    firstDate: series[0].date,
    lastDate: series[series.length - 1].date,
    totalNew: series.reduce((sum, bucket) => sum + bucket.newCount, 0),
    finalCumulative: series[series.length - 1].cumulativeCount,
  };
}

export function summarizeTrend(trend: AccountTrend): TrendSummary {
  return {
    ...summarizeSeries(trend.total),
    repos: trend.repos.map(({ repo, buckets }) => ({
      repo,
      finalCumulative: buckets[buckets.length - 1].cumulativeCount,
    })),
  };
}

/**
 * Summary of a series read back from disk, ascending by date.
 */
export function summarizePoints(points: DailyBucket[]): TrendSummary {
  return { ...summarizeSeries(points), repos: [] };
}

export function formatTrendSummary(summary: TrendSummary): string[] {
  return [
    `Date range: ${summary.firstDate} to ${summary.lastDate}`,
    `New stars in range: ${summary.totalNew}`,
    `Total stars: ${summary.finalCumulative}`,
    ...summary.repos.map(
      ({ repo, finalCumulative }) => `  ${repo}: ${finalCumulative}`
    ),
  ];
}

export function printTrendSummary(summary: TrendSummary, logger: Logger): void {
  for (const line of formatTrendSummary(summary)) {
    logger.info(line);
  }
}

/**
 * Title for a replotted file: `<user>_account_stars_by_day.csv` gives the
 * user, anything else its file name without extension.
 */
export function defaultTrendTitle(filePath: string): string {
  const stem = path.basename(filePath, path.extname(filePath));
  const suffix = `_${TREND_SUFFIX}`;
  const username =
    stem.endsWith(suffix) && stem.length > suffix.length
      ? stem.slice(0, -suffix.length)
      : stem;
  return trendTitle(username);
}

/**
 * Cumulative value for every day since the first point; days missing from
 * `points` repeat the previous value.
 */
export function cumulativeByDay(points: DailyBucket[]): number[] {
  const first = points[0].date;
  const length = daysBetween(first, points[points.length - 1].date) + 1;
  const values = new Array<number>(length).fill(0);
  const byDay = new Map(
    points.map((point) => [daysBetween(first, point.date), point.cumulativeCount])
  );

  let last = 0;
  for (let day = 0; day < length; day++) {
    last = byDay.get(day) ?? last;
    values[day] = last;
  }
  return values;
}

function sample(values: number[], width: number): number[] {
  if (values.length <= width) return values;
  return Array.from(
    { length: width },
    (_, i) => values[Math.round((i * (values.length - 1)) / (width - 1))]
  );
}

export function renderTrendChart(
  points: DailyBucket[],
  { title, height = 12, maxWidth = 100 }: ChartOptions
): string {
  const values = cumulativeByDay(points);
  const plot = asciichart.plot(sample(values, maxWidth), {
    height,
    format: (value: number) => value.toFixed(0).padStart(8),
  });
  return [
    title,
    "Cumulative Stars",
    plot,
    `Days since first star (0 to ${values.length - 1})`,
  ].join("\n");
}
