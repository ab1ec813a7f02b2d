import path from "node:path";
import { loadAnalysisConfig } from "../config/analysisConfig";
import { fetchDatasetFromSupabase } from "../dataset/fetchDatasetFromSupabase";
import { loadDatasetFromFolder } from "../dataset/loadDataset";
import { runAnalysis } from "../pipeline/runAnalysis";
import {
  summarizeExecutive,
  summarizeForecast,
  summarizeGrowth,
  summarizeLaunches,
  summarizePortfolioImpact,
  summarizeSentiment,
  summarizeSov,
} from "../report/summaries";
import { writeAnalysisJson } from "../report/writeAnalysisJson";
import { writeAnalysisWorkbook } from "../report/writeAnalysisWorkbook";
import { getArg, getIntArg, getPositionalArgs, getSourceArg } from "./_args";

function usage() {
  console.log(
    "Usage: npm run analyze -- <data-folder> [--months N] [--top N] [--window N] [--horizon N]\n" +
      "  [--category TYPE] [--out DIR] [--source csv|supabase]\n" +
      "Data folder must contain sales and products tables (.csv or .xlsx); marketing and reviews are optional."
  );
}

function printSection(title: string, lines: string[]) {
  console.log("");
  console.log("=".repeat(60));
  console.log(title);
  console.log("=".repeat(60));
  for (const line of lines) console.log(line);
}

async function main() {
  if (process.argv.includes("--help")) {
    usage();
    return;
  }
  const config = loadAnalysisConfig();
  const source = getSourceArg();
  const folder = getPositionalArgs()[0] ?? config.dataDir;
  const outDir = path.resolve(process.cwd(), getArg("--out") ?? config.outDir);

  const dataset = source === "supabase" ? await fetchDatasetFromSupabase() : loadDatasetFromFolder(folder);
  console.log(
    `Loaded ${dataset.sales.length} sales, ${dataset.products.length} products, ` +
      `${dataset.marketing.length} marketing rows, ${dataset.reviews.length} reviews (${source}).`
  );

  const result = runAnalysis(dataset, {
    lookbackMonths: getIntArg("--months", config.lookbackMonths),
    topN: getIntArg("--top", config.topN),
    windowMonths: getIntArg("--window", config.windowMonths),
    forecastHorizon: getIntArg("--horizon", config.forecastHorizon),
    category: getArg("--category") ?? null,
  });

  for (const warning of result.warnings) console.warn(`Warning: ${warning}`);

  const currency = config.currency;
  printSection("Growth outliers", summarizeGrowth(result.growth, currency));
  printSection("Consumer sentiment", summarizeSentiment(result.sentiment));
  printSection("New launch identification", summarizeLaunches(result.launches, result.options.lookbackMonths, currency));
  if (result.sov) printSection("Source of volume", summarizeSov(result.sov, currency));
  if (result.portfolio) printSection("Portfolio impact", summarizePortfolioImpact(result.portfolio, currency));
  printSection("Sales forecast", summarizeForecast(result.forecast, currency));
  printSection("Executive summary", summarizeExecutive(result, currency));

  const workbookPath = writeAnalysisWorkbook(outDir, result);
  const jsonPath = writeAnalysisJson(outDir, result);
  console.log("");
  console.log(`Wrote ${workbookPath}`);
  console.log(`Wrote ${jsonPath}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
