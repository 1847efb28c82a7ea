import * as fs from "fs";
import * as path from "path";
import { Command, CommanderError, Option } from "commander";
import type { GitHubClient } from "../../github-client/client";
import {
  GitHubStatsError,
  ValidationError,
} from "../../github-client/errors";
import type { Delay, Logger } from "../../types";
import {
  actorExports,
  TREND_SUFFIX,
  trendTitle,
  type ActorExportConfig,
} from "./data-config";
import { enrich, type EnrichedRecord } from "./enrich";
import {
  outputFileName,
  readTrendCsv,
  saveRecords,
  writeTrendCsv,
} from "./github.exports";
import {
  defaultTrendTitle,
  printRecordSummary,
  printTrendSummary,
  renderTrendChart,
  summarizePoints,
  summarizeTrend,
} from "./github.reports";
import { selectRepos, validRepoIds } from "./repo-selection";
import { buildAccountTrend, type RepoEvents } from "./star-trend";

export interface TaskContext {
  logger: Logger;
  createClient: () => GitHubClient;
  delay?: Delay;
  cwd: string;
}

interface ExportOptions {
  outDir: string;
}

interface AccountTrendOptions extends ExportOptions {
  includeRepo: string[];
  excludeRepo: string[];
  lineChart: boolean;
}

interface PlotOptions {
  file: string;
  type: "account-trend";
  title?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

async function exportActors(
  config: ActorExportConfig,
  repos: string[],
  options: ExportOptions,
  context: TaskContext
): Promise<void> {
  const { logger } = context;
  const targets = validRepoIds(repos, logger);
  if (targets.length === 0) {
    throw new ValidationError(
      `No valid repository given. Expected the format 'owner/repo'.`,
      repos.join(", ")
    );
  }

  const client = context.createClient();
  const records: EnrichedRecord[] = [];
  for (const repo of targets) {
    const events = await client.fetchEvents(config.eventKind, repo);
    records.push(
      ...(await enrich(events, config.timestampField, {
        client,
        logger,
        delay: context.delay,
      }))
    );
  }

  if (records.length === 0) {
    logger.warn(`⚠️  No user data to summarize.`);
    return;
  }

  const fileName =
    targets.length === 1
      ? outputFileName(targets[0], config.suffix)
      : outputFileName("all", config.suffix);
  const filePath = saveRecords(
    records,
    config.timestampField,
    path.resolve(context.cwd, options.outDir, fileName)
  );
  printRecordSummary(records, filePath, logger);
}

async function accountTrend(
  username: string,
  options: AccountTrendOptions,
  context: TaskContext
): Promise<void> {
  const { logger } = context;
  const client = context.createClient();

  const owned = await client.fetchOwnerRepos(username);
  const repos = selectRepos(
    { owned, include: options.includeRepo, exclude: options.excludeRepo },
    logger
  );
  if (repos.length === 0) {
    logger.warn(`⚠️  No repositories to process for ${username}.`);
    return;
  }

  logger.info(`🎯 Processing ${repos.length} repositories for ${username}`);
  const input: RepoEvents[] = [];
  for (const repo of repos) {
    input.push({ repo, events: await client.fetchEvents("stargazers", repo) });
  }

  const trend = buildAccountTrend(input);
  if (!trend) {
    logger.warn(`⚠️  No star data found for ${username}. Nothing to write.`);
    return;
  }

  const filePath = writeTrendCsv(
    trend,
    path.resolve(
      context.cwd,
      options.outDir,
      outputFileName(username, TREND_SUFFIX)
    )
  );
  logger.info(`✅ Saved ${trend.dates.length} days of star history to ${filePath}`);
  printTrendSummary(summarizeTrend(trend), logger);

  if (options.lineChart) {
    logger.info(renderTrendChart(trend.total, { title: trendTitle(username) }));
  }
}

async function replot(options: PlotOptions, context: TaskContext): Promise<void> {
  const filePath = path.resolve(context.cwd, options.file);
  if (!fs.existsSync(filePath)) {
    throw new ValidationError(`File '${options.file}' does not exist.`, options.file);
  }

  const points = readTrendCsv(filePath);
  printTrendSummary(summarizePoints(points), context.logger);
  context.logger.info(
    renderTrendChart(points, {
      title: options.title ?? defaultTrendTitle(filePath),
    })
  );
}

export function createProgram(context: TaskContext): Command {
  const { logger } = context;
  const program = new Command();

  program
    .name("stargazer-stats")
    .description("GitHub stargazer & forker analyzer")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => logger.info(text.trimEnd()),
      writeErr: (text) => logger.error(text.trimEnd()),
    });

  for (const [name, config] of Object.entries(actorExports)) {
    const command = program
      .command(name)
      .description(`Analyze ${config.label} for one or more repositories`)
      .argument("<repos...>", "repositories in the format 'owner/repo'")
      .option("--out-dir <dir>", "directory for the CSV file", ".")
      .action((repos: string[], options: ExportOptions) =>
        exportActors(config, repos, options, context)
      );
    if (name === "stargazers") command.alias("repos");
  }

  program
    .command("account-trend")
    .description("Daily star history across the repositories of a user")
    .argument("<username>", "GitHub user whose repositories are analyzed")
    .option(
      "--include-repo <repo>",
      "also include this repository (repeatable)",
      collect,
      []
    )
    .option(
      "--exclude-repo <repo>",
      "leave out this repository (repeatable)",
      collect,
      []
    )
    .option("--line-chart", "draw the cumulative star chart", false)
    .option("--out-dir <dir>", "directory for the CSV file", ".")
    .action((username: string, options: AccountTrendOptions) =>
      accountTrend(username, options, context)
    );

  program
    .command("plot")
    .alias("replot")
    .description("Chart a previously exported CSV file")
    .requiredOption("--file <path>", "CSV file to plot")
    .addOption(
      new Option("--type <type>", "kind of chart")
        .choices(["account-trend"])
        .default("account-trend")
    )
    .option("--title <title>", "chart title (defaults to one derived from the file name)")
    .action((options: PlotOptions) => replot(options, context));

  return program;
}

/**
 * Parses `argv` (without the node and script entries) and runs the command.
 * Resolves to the process exit code.
 */
export async function runCommand(
  argv: string[],
  context: TaskContext
): Promise<number> {
  const { logger } = context;
  const program = createProgram(context);

  if (argv.length === 0) {
    program.outputHelp();
    return 0;
  }

  logger.debug(`Script started with arguments: ${argv.join(" ")}`);
  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof GitHubStatsError) {
      logger.error(`❌ ${error.message}`);
      return 1;
    }
    logger.error("❌ Command failed:", error);
    return 1;
  }
}
