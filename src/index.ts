export * from "./types";
export * from "./github-client";
export * from "./tasks/github/data-config";
export { enrich, type EnrichedRecord, type EnrichOptions } from "./tasks/github/enrich";
export * from "./tasks/github/star-trend";
export * from "./tasks/github/repo-selection";
export * from "./tasks/github/github.exports";
export * from "./tasks/github/github.reports";
export { createProgram, runCommand, type TaskContext } from "./tasks/github/github.tasks";
