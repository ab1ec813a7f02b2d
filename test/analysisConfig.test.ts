import { describe, it, expect } from "vitest";
import { getArg, getIntArg, getPositionalArgs, getSourceArg } from "../src/cli/_args";
import { DEFAULT_ANALYSIS_CONFIG, loadAnalysisConfig, parsePositiveInt } from "../src/config/analysisConfig";

describe("loadAnalysisConfig", () => {
  it("falls back to defaults", () => {
    expect(loadAnalysisConfig({})).toEqual(DEFAULT_ANALYSIS_CONFIG);
  });

  it("reads overrides from the environment", () => {
    const config = loadAnalysisConfig({
      ANALYSIS_DATA_DIR: "fixtures/retail",
      ANALYSIS_OUT_DIR: " reports ",
      LAUNCH_LOOKBACK_MONTHS: "18",
      LAUNCH_TOP_N: "3",
      SOV_WINDOW_MONTHS: "",
      FORECAST_HORIZON_MONTHS: "6",
      REPORT_CURRENCY: "IDR",
    });
    expect(config).toEqual({
      dataDir: "fixtures/retail",
      outDir: "reports",
      lookbackMonths: 18,
      topN: 3,
      windowMonths: 6,
      forecastHorizon: 6,
      currency: "IDR",
    });
  });

  it("rejects invalid integers", () => {
    expect(() => loadAnalysisConfig({ LAUNCH_TOP_N: "abc" })).toThrow("Invalid LAUNCH_TOP_N: abc");
    expect(() => parsePositiveInt("0", "SOV_WINDOW_MONTHS")).toThrow("Invalid SOV_WINDOW_MONTHS: 0");
    expect(() => parsePositiveInt("2.5", "FORECAST_HORIZON_MONTHS")).toThrow(
      "Invalid FORECAST_HORIZON_MONTHS: 2.5"
    );
  });
});

describe("cli args", () => {
  const argv = ["node", "analyze.ts", "data/retail", "--top", "3", "--category", "Serum", "extra"];

  it("reads flags and positionals", () => {
    expect(getArg("--top", argv)).toBe("3");
    expect(getArg("--out", argv)).toBeUndefined();
    expect(getPositionalArgs(argv)).toEqual(["data/retail", "extra"]);
  });

  it("parses integer flags with fallbacks", () => {
    expect(getIntArg("--top", 5, argv)).toBe(3);
    expect(getIntArg("--window", 6, argv)).toBe(6);
    expect(() => getIntArg("--top", 5, ["node", "analyze.ts", "--top", "0"])).toThrow("Invalid --top: 0");
  });

  it("validates the data source", () => {
    expect(getSourceArg(argv)).toBe("csv");
    expect(getSourceArg(["node", "analyze.ts", "--source", "supabase"])).toBe("supabase");
    expect(() => getSourceArg(["node", "analyze.ts", "--source", "db"])).toThrow(
      "Invalid --source: db (expected csv or supabase)"
    );
  });
});
