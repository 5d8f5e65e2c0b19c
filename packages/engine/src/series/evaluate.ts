import type { Coefficients, SeriesEvaluation, SeriesOptions } from "@powerseries/shared";
import { InvalidInputError, OutOfRadiusError } from "../errors";
import { evalPoly } from "../math/poly";
import { resolveSeriesOptions } from "./options";
import { estimateRadius, takeSamples } from "./radius";
import { sumSeries } from "./sum";

export function evaluateSeriesDetailed(
  coefficients: Coefficients,
  x: number,
  options: SeriesOptions = {}
): SeriesEvaluation {
  if (!Number.isFinite(x)) throw new InvalidInputError(`x must be a finite number, got ${x}`);

  const resolved = resolveSeriesOptions(options);
  const { logger } = resolved;

  if (coefficients.kind === "finite") {
    logger?.debug({ kind: "finite", terms: coefficients.values.length, x }, "evaluating finite series");
    const value = evalPoly(coefficients.values, x);
    return { value, kind: "finite", terms: coefficients.values.length };
  }

  logger?.debug({ kind: "streaming", sampleCount: resolved.sampleCount, x }, "evaluating infinite series");

  const cache = takeSamples(coefficients.source, resolved.sampleCount);
  const { radius, line } = estimateRadius(cache);
  logger?.debug({ radius, intercept: line.intercept, slope: line.slope }, "estimated radius of convergence");

  if (radius > 0 && !(-radius < x && x < radius)) {
    logger?.debug({ radius, x }, "x rejected: outside estimated radius");
    throw new OutOfRadiusError(x, radius);
  }

  const { value, terms } = sumSeries(cache, coefficients.source, x, resolved);
  return { value, kind: "streaming", terms, radius };
}

/**
 * Evaluate c0 + c1*x + c2*x^2 + ... at x.
 *
 * Finite coefficient lists are summed exactly. Streaming coefficients are
 * checked against a Domb–Sykes radius estimate and then summed until
 * successive partial sums agree to within `convergenceThreshold`.
 *
 * @throws {InvalidInputError} malformed coefficients, x or options
 * @throws {OutOfRadiusError} x outside the estimated interval of convergence
 * @throws {ConvergenceTimeoutError} no convergence within `maxIterations` extra terms
 */
export function evaluateSeries(coefficients: Coefficients, x: number, options: SeriesOptions = {}): number {
  return evaluateSeriesDetailed(coefficients, x, options).value;
}
