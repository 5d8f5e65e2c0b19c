export { evaluateSeries, evaluateSeriesDetailed } from "./series/evaluate";
export { sumSeries } from "./series/sum";
export { estimateRadius, takeSamples } from "./series/radius";
export { DEFAULT_SERIES_OPTIONS, MIN_SAMPLE_COUNT, resolveSeriesOptions } from "./series/options";
export { evalLine, fitLine } from "./math/fit";
export { evalPoly } from "./math/poly";
export {
  ConvergenceTimeoutError,
  DivisionByZeroError,
  InvalidInputError,
  OutOfRadiusError,
  SeriesError,
} from "./errors";
export { finite, streaming } from "@powerseries/shared";
export type {
  Coefficients,
  FiniteCoefficients,
  FittedLine,
  RadiusEstimate,
  ResolvedSeriesOptions,
  SeriesEvaluation,
  SeriesLogger,
  SeriesOptions,
  StreamingCoefficients,
  SumResult,
} from "@powerseries/shared";
