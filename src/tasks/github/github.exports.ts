import * as fs from "fs";
import * as path from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { isValid, parseISO } from "date-fns";
import { z } from "zod";
import { ValidationError } from "../../github-client/errors";
import { toFileStem } from "../../github-client/repo-id";
import {
  PROFILE_COLUMNS,
  TREND_CUMULATIVE_COLUMN,
  TREND_DATE_COLUMN,
  TREND_NEW_COLUMN,
  TREND_REQUIRED_COLUMNS,
  type TimestampField,
} from "./data-config";
import type { EnrichedRecord } from "./enrich";
import {
  toTrendRows,
  trendColumns,
  type AccountTrend,
  type DailyBucket,
} from "./star-trend";

export type CsvValue = string | number | null;
export type CsvRow = Record<string, CsvValue>;

export function outputFileName(base: string, suffix: string): string {
  return `${toFileStem(base)}_${suffix}.csv`;
}

function sortKey(value: CsvValue | undefined): number {
  if (value === null || value === undefined) return Number.NEGATIVE_INFINITY;
  const time = Date.parse(String(value));
  return Number.isNaN(time) ? Number.NEGATIVE_INFINITY : time;
}

/**
 * Most recent first by a timestamp or date column. Rows without a usable
 * value go last; ties keep their input order.
 */
export function sortByTimestampDesc<T extends CsvRow>(
  rows: T[],
  column: string
): T[] {
  return [...rows].sort((a, b) => sortKey(b[column]) - sortKey(a[column]));
}

/**
 * Writes `rows` under a header of `columns`; null cells stay empty.
 */
export function writeCsv(
  rows: CsvRow[],
  columns: string[],
  filePath: string
): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, stringify(rows, { header: true, columns }));
  return filePath;
}

export function toRecordRow(record: EnrichedRecord): CsvRow {
  const { profile } = record;
  return {
    login: profile.login,
    name: profile.name,
    company: profile.company,
    location: profile.location,
    email: profile.email,
    bio: profile.bio,
    followers: profile.followers,
    public_repos: profile.publicRepos,
    [record.timestampField]: record.timestamp,
    repo: record.repo,
  };
}

export function recordColumns(timestampField: TimestampField): string[] {
  return [...PROFILE_COLUMNS, timestampField, "repo"];
}

/**
 * Actor-level export, newest event first. Returns the written path.
 */
export function saveRecords(
  records: EnrichedRecord[],
  timestampField: TimestampField,
  filePath: string
): string {
  const rows = sortByTimestampDesc(records.map(toRecordRow), timestampField);
  return writeCsv(rows, recordColumns(timestampField), filePath);
}

/**
 * Trend export, most recent date first.
 */
export function writeTrendCsv(trend: AccountTrend, filePath: string): string {
  const rows = toTrendRows(trend).reverse();
  return writeCsv(rows, trendColumns(trend), filePath);
}

const csvTableSchema = z.array(z.array(z.string()));

const countSchema = z
  .string()
  .regex(/^\d+$/, "expected a non-negative integer")
  .transform(Number);

const POINT_FIELD_COLUMNS: Record<string, string> = {
  date: TREND_DATE_COLUMN,
  newCount: TREND_NEW_COLUMN,
  cumulativeCount: TREND_CUMULATIVE_COLUMN,
};

const trendPointSchema = z.object({
  date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
    .refine((value) => isValid(parseISO(value)), "not a calendar date"),
  newCount: countSchema,
  cumulativeCount: countSchema,
});

function readCsvTable(filePath: string): string[][] {
  let parsed: unknown;
  try {
    parsed = parse(fs.readFileSync(filePath, "utf8"), {
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new ValidationError(
      `Could not read CSV file '${filePath}': ${
        error instanceof Error ? error.message : String(error)
      }`,
      filePath
    );
  }
  const table = csvTableSchema.safeParse(parsed);
  if (!table.success) {
    throw new ValidationError(`Malformed CSV file '${filePath}'`, filePath);
  }
  return table.data;
}

/**
 * Loads the global series of a trend export, oldest date first. Per-repository
 * columns are ignored.
 */
export function readTrendCsv(filePath: string): DailyBucket[] {
  const [header = [], ...rows] = readCsvTable(filePath);
  const indexes = TREND_REQUIRED_COLUMNS.map((column) => header.indexOf(column));

  if (indexes.some((index) => index === -1)) {
    throw new ValidationError(
      `CSV file must contain columns: ${TREND_REQUIRED_COLUMNS.join(", ")}`,
      filePath
    );
  }
  if (rows.length === 0) {
    throw new ValidationError(`CSV file '${filePath}' has no data rows`, filePath);
  }

  const [dateIndex, newIndex, cumulativeIndex] = indexes;
  const points = rows.map((row, rowIndex) => {
    const point = trendPointSchema.safeParse({
      date: row[dateIndex],
      newCount: row[newIndex],
      cumulativeCount: row[cumulativeIndex],
    });
    if (!point.success) {
      const issue = point.error.issues[0];
      const column = POINT_FIELD_COLUMNS[String(issue.path[0])];
      throw new ValidationError(
        `Invalid ${column} in '${filePath}' at line ${rowIndex + 2}: ${issue.message}`,
        filePath
      );
    }
    return point.data;
  });

  return points.sort((a, b) => a.date.localeCompare(b.date));
}
