import { describe, expect, it } from "vitest";
import { estimateRadius, takeSamples } from "../src/series/radius";
import { DivisionByZeroError, InvalidInputError } from "../src/errors";

function* sequence(term: (n: number) => number): Generator<number> {
  for (let n = 0; ; n++) yield term(n);
}

function factorial(n: number): number {
  let out = 1;
  for (let k = 2; k <= n; k++) out *= k;
  return out;
}

describe("takeSamples", () => {
  it("pulls exactly the requested number of values", () => {
    const source = sequence((n) => n * 10);
    expect(takeSamples(source, 4)).toEqual([0, 10, 20, 30]);
    expect(source.next()).toEqual({ done: false, value: 40 });
  });

  it("fails when the source runs dry first", () => {
    const source = [1, 2][Symbol.iterator]();
    expect(() => takeSamples(source, 3)).toThrow(
      "coefficient source ended after 2 values; 3 are needed to estimate the radius"
    );
  });
});

describe("estimateRadius", () => {
  it("estimates radius 1 for the constant-one series 1/(1-x)", () => {
    const { radius, line } = estimateRadius(Array.from({ length: 10 }, () => 1));
    expect(line).toEqual({ intercept: 1, slope: 0 });
    expect(radius).toBe(1);
  });

  it("estimates radius 1/2 for c_n = 2^n", () => {
    expect(estimateRadius(Array.from({ length: 10 }, (_, n) => 2 ** n)).radius).toBe(0.5);
  });

  it("reports a negative radius for an alternating series", () => {
    expect(estimateRadius(Array.from({ length: 10 }, (_, n) => (n % 2 === 0 ? 1 : -1))).radius).toBe(-1);
  });

  it("extrapolates c_n = n + 1 towards radius 1 from above", () => {
    const { radius, line } = estimateRadius(Array.from({ length: 10 }, (_, n) => n + 1));
    expect(line.intercept).toBeCloseTo(0.852650947, 8);
    expect(radius).toBeCloseTo(1.172812865, 8);
  });

  it("returns an inconclusive negative radius for the exponential series", () => {
    const { radius } = estimateRadius(Array.from({ length: 10 }, (_, n) => 1 / factorial(n)));
    expect(radius).toBeLessThan(0);
    expect(radius).toBeCloseTo(-6.786606225, 6);
  });

  it("needs at least three coefficients", () => {
    expect(() => estimateRadius([1, 1])).toThrow(InvalidInputError);
    expect(() => estimateRadius([])).toThrow(
      "at least 3 coefficients are needed to estimate the radius, got 0"
    );
    expect(estimateRadius([1, 2, 4]).radius).toBe(0.5);
  });

  it("fails with DivisionByZeroError on a zero coefficient before the last", () => {
    expect(() => estimateRadius([1, 0, 1, 1])).toThrow(DivisionByZeroError);
    expect(() => estimateRadius([1, 0, 1, 1])).toThrow("coefficient c1 is zero; ratio c2/c1 is undefined");
  });

  it("fails with DivisionByZeroError when the extrapolated ratio is zero", () => {
    const throughOrigin = [1, 1 / 2, 1 / 6, 1 / 24]; // ratios 1/2, 1/3, 1/4 equal X exactly
    expect(() => estimateRadius(throughOrigin)).toThrow("Domb–Sykes intercept is zero; radius is unbounded");
  });

  it("propagates fitter errors as InvalidInputError", () => {
    expect(() => estimateRadius([1, Number.POSITIVE_INFINITY, 1])).toThrow(InvalidInputError);
  });
});
