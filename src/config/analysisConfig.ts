import { config as loadEnv } from "dotenv";

loadEnv({ path: ".env.local" });

export type AnalysisConfig = {
  dataDir: string;
  outDir: string;
  lookbackMonths: number;
  topN: number;
  windowMonths: number;
  forecastHorizon: number;
  currency: string;
};

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  dataDir: "data",
  outDir: "out",
  lookbackMonths: 12,
  topN: 5,
  windowMonths: 6,
  forecastHorizon: 12,
  currency: "Rp",
};

type EnvSource = Record<string, string | undefined>;

export function parsePositiveInt(value: string, name: string): number {
  const trimmed = value.trim();
  const num = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(num) || num <= 0) {
    throw new Error(`Invalid ${name}: ${value}`);
  }
  return num;
}

function readInt(env: EnvSource, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  return parsePositiveInt(raw, name);
}

function readString(env: EnvSource, name: string, fallback: string): string {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  return raw.trim();
}

export function loadAnalysisConfig(env: EnvSource = process.env): AnalysisConfig {
  const defaults = DEFAULT_ANALYSIS_CONFIG;
  return {
    dataDir: readString(env, "ANALYSIS_DATA_DIR", defaults.dataDir),
    outDir: readString(env, "ANALYSIS_OUT_DIR", defaults.outDir),
    lookbackMonths: readInt(env, "LAUNCH_LOOKBACK_MONTHS", defaults.lookbackMonths),
    topN: readInt(env, "LAUNCH_TOP_N", defaults.topN),
    windowMonths: readInt(env, "SOV_WINDOW_MONTHS", defaults.windowMonths),
    forecastHorizon: readInt(env, "FORECAST_HORIZON_MONTHS", defaults.forecastHorizon),
    currency: readString(env, "REPORT_CURRENCY", defaults.currency),
  };
}
