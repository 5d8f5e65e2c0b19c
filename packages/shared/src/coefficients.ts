import type { FiniteCoefficients, StreamingCoefficients } from "./types";

export function finite(values: readonly number[]): FiniteCoefficients {
  return { kind: "finite", values };
}

function isIterable(input: Iterable<number> | Iterator<number>): input is Iterable<number> {
  return Symbol.iterator in input;
}

export function streaming(input: Iterable<number> | Iterator<number>): StreamingCoefficients {
  const source = isIterable(input) ? input[Symbol.iterator]() : input;
  return { kind: "streaming", source };
}
