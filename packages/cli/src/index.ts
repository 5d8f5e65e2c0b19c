export { run, EXIT_EVALUATION_FAILED, EXIT_OK, EXIT_USAGE } from "./cli";
export type { CliIo } from "./cli";
export { parseCliArgs, USAGE } from "./args";
export type { CliArgs } from "./args";
export { readConfig } from "./config";
export type { CliConfig } from "./config";
export { createLogger, toSeriesLogger } from "./logger";
export { UsageError } from "./errors";
