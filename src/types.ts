/**
 * Minimal logging capability handed to every component.
 *
 * Shaped like Octokit's `log` option so the same object can be passed to the
 * REST client; `console` satisfies it.
 */
export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

// "YYYY-MM-DD"
export type DateString = string;

export type Delay = (ms: number) => Promise<void>;
