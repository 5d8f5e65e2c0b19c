import type { FittedLine } from "@powerseries/shared";
import { InvalidInputError } from "../errors";

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Ordinary least-squares line through (xs[i], ys[i]).
 */
export function fitLine(xs: readonly number[], ys: readonly number[]): FittedLine {
  if (xs.length === 0) throw new InvalidInputError("cannot fit a line to an empty sample");
  if (xs.length !== ys.length) {
    throw new InvalidInputError(`sample length mismatch: ${xs.length} x values, ${ys.length} y values`);
  }
  for (let i = 0; i < xs.length; i++) {
    if (!Number.isFinite(xs[i]) || !Number.isFinite(ys[i])) {
      throw new InvalidInputError(`sample ${i} is not finite: (${xs[i]}, ${ys[i]})`);
    }
  }

  const meanX = mean(xs);
  const meanY = mean(ys);

  let sxy = 0;
  let sxx = 0;
  for (let i = 0; i < xs.length; i++) {
    const dx = xs[i]! - meanX;
    sxy += dx * (ys[i]! - meanY);
    sxx += dx * dx;
  }
  if (sxx === 0) throw new InvalidInputError("all x values are equal; slope is undefined");

  const slope = sxy / sxx;
  return { intercept: meanY - slope * meanX, slope };
}

export function evalLine(line: FittedLine, x: number): number {
  return line.intercept + line.slope * x;
}
