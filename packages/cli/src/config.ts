import type { LevelWithSilent } from "pino";
import { UsageError } from "./errors";

export type CliConfig = {
  sampleCount?: number;
  convergenceThreshold?: number;
  maxIterations?: number;
  logLevel: LevelWithSilent;
};

const LOG_LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseNumber(raw: string, label: string): number {
  const n = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(n)) throw new UsageError(`${label} must be a number, got "${raw}"`);
  return n;
}

function envNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw == null || raw === "") return undefined;
  return parseNumber(raw, key);
}

export function readConfig(env: NodeJS.ProcessEnv): CliConfig {
  const logLevel = env.LOG_LEVEL ?? "warn";
  if (!isLogLevel(logLevel)) {
    throw new UsageError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${logLevel}"`);
  }

  return {
    sampleCount: envNumber(env, "SERIES_SAMPLE_COUNT"),
    convergenceThreshold: envNumber(env, "SERIES_CONVERGENCE_THRESHOLD"),
    maxIterations: envNumber(env, "SERIES_MAX_ITERATIONS"),
    logLevel,
  };
}
