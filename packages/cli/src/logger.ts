import pino from "pino";
import type { DestinationStream, LevelWithSilent, Logger } from "pino";
import type { SeriesLogger } from "@powerseries/shared";

export function createLogger(level: LevelWithSilent, destination: DestinationStream = pino.destination(2)): Logger {
  return pino({ name: "powerseries", level, base: undefined }, destination);
}

export function toSeriesLogger(logger: Logger): SeriesLogger {
  return {
    debug: (fields, message) => logger.debug(fields, message),
  };
}
