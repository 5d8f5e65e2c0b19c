import type { ResolvedSeriesOptions, SeriesOptions } from "@powerseries/shared";
import { InvalidInputError } from "../errors";

export const DEFAULT_SERIES_OPTIONS = {
  sampleCount: 10,
  convergenceThreshold: 1e-7,
  maxIterations: 1000,
} as const;

// Two ratio points are the least a line can be fitted through.
export const MIN_SAMPLE_COUNT = 3;

export function resolveSeriesOptions(options: SeriesOptions = {}): ResolvedSeriesOptions {
  const sampleCount = options.sampleCount ?? DEFAULT_SERIES_OPTIONS.sampleCount;
  const convergenceThreshold =
    options.convergenceThreshold ?? DEFAULT_SERIES_OPTIONS.convergenceThreshold;
  const maxIterations = options.maxIterations ?? DEFAULT_SERIES_OPTIONS.maxIterations;

  if (!Number.isInteger(sampleCount) || sampleCount < MIN_SAMPLE_COUNT) {
    throw new InvalidInputError(`sampleCount must be an integer >= ${MIN_SAMPLE_COUNT}, got ${sampleCount}`);
  }
  if (!Number.isFinite(convergenceThreshold) || convergenceThreshold <= 0) {
    throw new InvalidInputError(`convergenceThreshold must be a positive number, got ${convergenceThreshold}`);
  }
  if (!Number.isInteger(maxIterations) || maxIterations < 0) {
    throw new InvalidInputError(`maxIterations must be a non-negative integer, got ${maxIterations}`);
  }

  return { sampleCount, convergenceThreshold, maxIterations, logger: options.logger };
}
