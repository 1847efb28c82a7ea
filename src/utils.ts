import {
  differenceInCalendarDays,
  eachDayOfInterval,
  format,
  parseISO,
} from "date-fns";
import type { DateString } from "./types";

export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function formatDate(date: Date): DateString {
  return date.toISOString().split("T")[0]; // Converts the date to "YYYY-MM-DD" format (UTC)
}

/**
 * Truncates an ISO-8601 instant to its UTC calendar date.
 */
export function toUtcDate(timestamp: string): DateString {
  return formatDate(new Date(timestamp));
}

/**
 * Every calendar date from `start` to `end`, both inclusive.
 */
export function listDateRange(start: DateString, end: DateString): DateString[] {
  return eachDayOfInterval({ start: parseISO(start), end: parseISO(end) }).map(
    (day) => format(day, "yyyy-MM-dd")
  );
}

export function daysBetween(from: DateString, to: DateString): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from));
}

export function redactToken(token: string | undefined): string | null {
  if (!token) return null;
  return `${token.slice(0, 4)}...${token.slice(-4)}`;
}
