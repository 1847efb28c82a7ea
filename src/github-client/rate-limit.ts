/**
 * What the retry policy needs to know about a response.
 */
export interface ResponseSnapshot {
  status: number;
  headers: Record<string, string | number | undefined>;
  body: string;
}

export type RetryDecision =
  | { action: "proceed" }
  | { action: "retry"; waitMs: number }
  | { action: "fail"; reason: string };

export const DEFAULT_RATE_LIMIT_WAIT_MS = 60_000;

export function isRateLimited(snapshot: ResponseSnapshot): boolean {
  return (
    (snapshot.status === 403 || snapshot.status === 429) &&
    snapshot.body.toLowerCase().includes("rate limit")
  );
}

/**
 * Seconds until `x-ratelimit-reset` (epoch seconds), never less than one.
 * Returns null when the header is missing or not numeric.
 */
export function secondsUntilReset(
  headers: ResponseSnapshot["headers"],
  nowMs: number
): number | null {
  const raw = headers["x-ratelimit-reset"];
  if (raw === undefined || raw === "") return null;
  const reset = Number(raw);
  if (!Number.isFinite(reset)) return null;
  return Math.max(1, Math.ceil(reset - nowMs / 1000));
}

/**
 * Stateless decision for one response: carry on, wait and retry the same
 * request, or give up. The caller owns the retry budget.
 */
export function decideRetry(
  snapshot: ResponseSnapshot,
  nowMs: number = Date.now()
): RetryDecision {
  if (snapshot.status >= 200 && snapshot.status < 300) {
    return { action: "proceed" };
  }

  if (isRateLimited(snapshot)) {
    const seconds = secondsUntilReset(snapshot.headers, nowMs);
    return {
      action: "retry",
      waitMs: seconds === null ? DEFAULT_RATE_LIMIT_WAIT_MS : seconds * 1000,
    };
  }

  return {
    action: "fail",
    reason: `${snapshot.status} - ${snapshot.body}`,
  };
}
