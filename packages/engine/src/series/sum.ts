import type { SeriesOptions, SumResult } from "@powerseries/shared";
import { ConvergenceTimeoutError } from "../errors";
import { requireCoefficient } from "../math/poly";
import { resolveSeriesOptions } from "./options";

/**
 * Sum c_i * x^i for an infinite series.
 *
 * `cached` holds the leading coefficients already pulled off `rest`; they are
 * added first, then `rest` is pulled one value at a time until two
 * successive partial sums differ by less than the threshold. Convergence is
 * tested before the iteration cap on every step.
 */
export function sumSeries(
  cached: readonly number[],
  rest: Iterator<number>,
  x: number,
  options: SeriesOptions = {}
): SumResult {
  const { convergenceThreshold, maxIterations, logger } = resolveSeriesOptions(options);

  let sum = 0;
  let previous = 0;
  let i = 0;
  for (const c of cached) {
    previous = sum;
    sum += requireCoefficient(c, i) * x ** i;
    i++;
  }

  let pulled = 0;
  // NaN never compares below the threshold, so a blown-up sum runs into the cap.
  while (i === 0 || !(Math.abs(sum - previous) < convergenceThreshold)) {
    if (pulled >= maxIterations) throw new ConvergenceTimeoutError(sum, i, maxIterations);

    const next = rest.next();
    if (next.done) {
      logger?.debug({ terms: i }, "coefficient source exhausted; returning exact sum");
      return { value: sum, terms: i };
    }

    previous = sum;
    sum += requireCoefficient(next.value, i) * x ** i;
    i++;
    pulled++;
  }

  logger?.debug({ terms: i, pulled, value: sum }, "series converged");
  return { value: sum, terms: i };
}
