import { parseArgs } from "node:util";
import { parseNumber } from "./config";
import { UsageError } from "./errors";

export type CliArgs = {
  x: number;
  coefficients: number[];
  cycle: boolean;
  verbose: boolean;
  help: boolean;
  sampleCount?: number;
  convergenceThreshold?: number;
  maxIterations?: number;
};

export const USAGE = `Usage: powerseries [options] <x> <c0> [c1 ...]

Evaluates c0 + c1*x + c2*x^2 + ... at x.

Options:
  --cycle                  repeat the coefficients forever (infinite series)
  --samples <n>            coefficients used to estimate the radius (default 10)
  --threshold <eps>        stop once successive partial sums differ by less (default 1e-7)
  --max-iterations <n>     extra terms allowed before giving up (default 1000)
  -v, --verbose            debug logging and a summary of the evaluation
  -h, --help               show this message`;

const NUMBER = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;
const VALUE_OPTIONS = new Set(["--samples", "--threshold", "--max-iterations"]);

// parseArgs would read "-1" as a short option; move numeric operands behind "--".
function separateOperands(argv: readonly string[]): string[] {
  const options: string[] = [];
  const operands: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]!;
    if (arg === "--") {
      operands.push(...argv.slice(i + 1));
      break;
    }
    if (VALUE_OPTIONS.has(arg) && i + 1 < argv.length) {
      options.push(arg, argv[++i]!);
    } else if (arg.startsWith("-") && !NUMBER.test(arg)) {
      options.push(arg);
    } else {
      operands.push(arg);
    }
  }

  return [...options, "--", ...operands];
}

function parse(args: string[]) {
  try {
    return parseArgs({
      args,
      allowPositionals: true,
      strict: true,
      options: {
        cycle: { type: "boolean", default: false },
        samples: { type: "string" },
        threshold: { type: "string" },
        "max-iterations": { type: "string" },
        verbose: { type: "boolean", short: "v", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values, positionals } = parse(separateOperands(argv));
  const help = values.help ?? false;
  if (help) return { x: 0, coefficients: [], cycle: false, verbose: false, help };

  const [rawX, ...rawCoefficients] = positionals;
  if (rawX == null) throw new UsageError("missing <x>");
  if (rawCoefficients.length === 0) throw new UsageError("at least one coefficient is required");

  return {
    x: parseNumber(rawX, "x"),
    coefficients: rawCoefficients.map((raw, i) => parseNumber(raw, `c${i}`)),
    cycle: values.cycle ?? false,
    verbose: values.verbose ?? false,
    help,
    sampleCount: values.samples == null ? undefined : parseNumber(values.samples, "--samples"),
    convergenceThreshold: values.threshold == null ? undefined : parseNumber(values.threshold, "--threshold"),
    maxIterations:
      values["max-iterations"] == null ? undefined : parseNumber(values["max-iterations"], "--max-iterations"),
  };
}
