export type FiniteCoefficients = {
  kind: "finite";
  values: readonly number[];
};

// One-shot, forward-only. Values pulled from `source` are gone for good.
export type StreamingCoefficients = {
  kind: "streaming";
  source: Iterator<number>;
};

export type Coefficients = FiniteCoefficients | StreamingCoefficients;

export type FittedLine = {
  intercept: number;
  slope: number;
};

export type RadiusEstimate = {
  radius: number;
  line: FittedLine; // Domb–Sykes line, ratio against 1/(n+1)
};

/**
 * Minimal logging surface the engine writes to. A pino logger satisfies it.
 */
export type SeriesLogger = {
  debug: (fields: Record<string, unknown>, message: string) => void;
};

export type SeriesOptions = {
  sampleCount?: number;
  convergenceThreshold?: number;
  maxIterations?: number;
  logger?: SeriesLogger;
};

export type ResolvedSeriesOptions = Required<Omit<SeriesOptions, "logger">> & {
  logger?: SeriesLogger;
};

export type SumResult = {
  value: number;
  terms: number; // total coefficients consumed, cache included
};

export type SeriesEvaluation = {
  value: number;
  kind: Coefficients["kind"];
  terms: number;
  radius?: number;
};
