export { createLogger, logger, CollectingLogger } from "./logger";
export type { Logger, LogLevel, LogEntry } from "./logger";
