import type { RadiusEstimate } from "@powerseries/shared";
import { DivisionByZeroError, InvalidInputError } from "../errors";
import { fitLine } from "../math/fit";
import { requireCoefficient } from "../math/poly";
import { MIN_SAMPLE_COUNT } from "./options";

/**
 * Pull exactly `count` values off a one-shot source. The caller owns the
 * returned array; those coefficients cannot be read from `source` again.
 */
export function takeSamples(source: Iterator<number>, count: number): number[] {
  const samples: number[] = [];
  while (samples.length < count) {
    const next = source.next();
    if (next.done) {
      throw new InvalidInputError(
        `coefficient source ended after ${samples.length} values; ${count} are needed to estimate the radius`
      );
    }
    samples.push(requireCoefficient(next.value, samples.length));
  }
  return samples;
}

/**
 * Domb–Sykes estimate of the radius of convergence.
 *
 * Fits c_n / c_{n-1} against 1/(n+1) for n = 1..N-1 and extrapolates to
 * n → ∞; the intercept approximates 1/r. A negative radius means the
 * ratio test is inconclusive.
 */
export function estimateRadius(samples: readonly number[]): RadiusEstimate {
  if (samples.length < MIN_SAMPLE_COUNT) {
    throw new InvalidInputError(
      `at least ${MIN_SAMPLE_COUNT} coefficients are needed to estimate the radius, got ${samples.length}`
    );
  }

  const xs: number[] = [];
  const ys: number[] = [];
  for (let n = 1; n < samples.length; n++) {
    const prev = samples[n - 1]!;
    if (prev === 0) throw new DivisionByZeroError(`coefficient c${n - 1} is zero; ratio c${n}/c${n - 1} is undefined`);
    xs.push(1 / (n + 1));
    ys.push(samples[n]! / prev);
  }

  const line = fitLine(xs, ys);
  if (line.intercept === 0) {
    throw new DivisionByZeroError("Domb–Sykes intercept is zero; radius is unbounded");
  }

  return { radius: 1 / line.intercept, line };
}
