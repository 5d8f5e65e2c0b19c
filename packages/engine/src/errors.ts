export class SeriesError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends SeriesError {}

export class DivisionByZeroError extends InvalidInputError {}

export class OutOfRadiusError extends SeriesError {
  readonly x: number;
  readonly radius: number;

  constructor(x: number, radius: number) {
    super(`x = ${x} lies outside the estimated interval of convergence (-${radius}, ${radius})`);
    this.x = x;
    this.radius = radius;
  }
}

export class ConvergenceTimeoutError extends SeriesError {
  readonly partialSum: number;
  readonly terms: number;
  readonly maxIterations: number;

  constructor(partialSum: number, terms: number, maxIterations: number) {
    super(`series did not converge within ${maxIterations} additional terms (${terms} terms summed)`);
    this.partialSum = partialSum;
    this.terms = terms;
    this.maxIterations = maxIterations;
  }
}
