export * from "./client";
export * from "./errors";
export * from "./rate-limit";
export * from "./repo-id";
export * from "./types";
