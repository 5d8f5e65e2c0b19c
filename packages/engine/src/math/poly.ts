import { InvalidInputError } from "../errors";

/**
 * Evaluate polynomial c0 + c1*x + c2*x^2 + ... term by term, in index order.
 * Plain accumulation (not Horner) so the result matches the direct sum.
 */
export function evalPoly(coeffs: readonly number[], x: number): number {
  if (coeffs.length === 0) return 0;

  let acc = requireCoefficient(coeffs[0], 0);
  for (let i = 1; i < coeffs.length; i++) {
    acc += requireCoefficient(coeffs[i], i) * x ** i;
  }
  return acc;
}

export function requireCoefficient(c: unknown, index: number): number {
  if (typeof c !== "number" || Number.isNaN(c)) {
    throw new InvalidInputError(`coefficient c${index} is not a number: ${String(c)}`);
  }
  return c;
}
