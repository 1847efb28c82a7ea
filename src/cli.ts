#!/usr/bin/env node
import env from "./env";
import { GitHubClient } from "./github-client/client";
import { runCommand, type TaskContext } from "./tasks/github/github.tasks";
import { redactToken } from "./utils";

const logger = console;

const context: TaskContext = {
  logger,
  cwd: process.cwd(),
  createClient: () =>
    new GitHubClient({
      token: env.GITHUB_TOKEN,
      baseUrl: env.GITHUB_API_URL,
      pageDelayMs: env.PAGE_DELAY_MS,
      logger,
    }),
};

logger.debug(`GITHUB_TOKEN=${redactToken(env.GITHUB_TOKEN) ?? "(not set)"}`);

runCommand(process.argv.slice(2), context)
  .then((code) => {
    process.exit(code);
  })
  .catch((error) => {
    logger.error("Command failed:", error);
    process.exit(1);
  });
