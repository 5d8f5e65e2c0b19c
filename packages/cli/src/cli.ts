import type { Logger } from "pino";
import { evaluateSeriesDetailed, finite, SeriesError, streaming } from "@powerseries/engine";
import type { Coefficients } from "@powerseries/engine";
import { parseCliArgs, USAGE } from "./args";
import { readConfig } from "./config";
import { UsageError } from "./errors";
import { createLogger, toSeriesLogger } from "./logger";

export type CliIo = {
  env: NodeJS.ProcessEnv;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  logger?: Logger;
};

export const EXIT_OK = 0;
export const EXIT_EVALUATION_FAILED = 1;
export const EXIT_USAGE = 2;

function* cycle(values: readonly number[]): Generator<number> {
  while (true) yield* values;
}

function toCoefficients(values: readonly number[], repeat: boolean): Coefficients {
  return repeat ? streaming(cycle(values)) : finite(values);
}

export function run(argv: readonly string[], io: CliIo): number {
  try {
    const config = readConfig(io.env);
    const args = parseCliArgs(argv);
    if (args.help) {
      io.stdout(USAGE);
      return EXIT_OK;
    }

    const logger = io.logger ?? createLogger(config.logLevel);
    if (args.verbose) logger.level = "debug";

    const result = evaluateSeriesDetailed(toCoefficients(args.coefficients, args.cycle), args.x, {
      sampleCount: args.sampleCount ?? config.sampleCount,
      convergenceThreshold: args.convergenceThreshold ?? config.convergenceThreshold,
      maxIterations: args.maxIterations ?? config.maxIterations,
      logger: toSeriesLogger(logger),
    });

    logger.info({ ...result, x: args.x }, "evaluation finished");
    io.stdout(String(result.value));
    return EXIT_OK;
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(`powerseries: ${err.message}`);
      io.stderr(USAGE);
      return EXIT_USAGE;
    }
    if (err instanceof SeriesError) {
      io.stderr(`powerseries: ${err.name}: ${err.message}`);
      return EXIT_EVALUATION_FAILED;
    }
    throw err;
  }
}
