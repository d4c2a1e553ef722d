export * from "./domain/index";
export * from "./errors";
export * from "./timeout";
export * from "./retry";
export * from "./logger";
export * from "./env";
export * from "./log-dir";
export * from "./process-logging";
