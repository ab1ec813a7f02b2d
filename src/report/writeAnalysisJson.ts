import fs from "node:fs";
import path from "node:path";
import type { AnalysisResult } from "../pipeline/runAnalysis";

/** JSON.stringify replacer: Maps become objects and non-finite numbers become strings. */
export function analysisReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  if (typeof value === "number" && !Number.isFinite(value)) {
    if (Number.isNaN(value)) return null;
    return value > 0 ? "inf" : "-inf";
  }
  return value;
}

export function serializeAnalysis(result: AnalysisResult): string {
  return JSON.stringify(result, analysisReplacer, 2);
}

export function writeAnalysisJson(outDir: string, result: AnalysisResult): string {
  fs.mkdirSync(outDir, { recursive: true });
  const outPath = path.join(outDir, "launch_analysis.json");
  fs.writeFileSync(outPath, serializeAnalysis(result));
  return outPath;
}
