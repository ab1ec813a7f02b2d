import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import type { ForecastRun } from "../forecast/types";
import type { AnalysisResult } from "../pipeline/runAnalysis";
import { exportNumber } from "./format";

type SheetCell = string | number | boolean;
type SheetRecord = Record<string, string | number | boolean | null>;

export const WORKBOOK_SHEETS = [
  "growth_metrics",
  "growth_outliers",
  "rising_stars",
  "growth_momentum",
  "sentiment_by_product",
  "sentiment_trends",
  "top_launches",
  "sov_breakdown",
  "significance",
  "portfolio_impact",
  "category_impact",
  "brand_impact",
  "classification",
  "forecast_metrics",
  "future_forecast",
] as const;

export type WorkbookSheetName = (typeof WORKBOOK_SHEETS)[number];

function toCell(value: string | number | boolean | null): SheetCell {
  if (value === null) return "";
  if (typeof value === "number") return exportNumber(value);
  return value;
}

/** Header row from the first record; an empty sheet still gets its headers. */
function recordsToRows(records: readonly SheetRecord[], headers: readonly string[]): SheetCell[][] {
  const rows: SheetCell[][] = [[...headers]];
  for (const record of records) {
    rows.push(headers.map((header) => toCell(record[header] ?? null)));
  }
  return rows;
}

function forecastMetricRecords(run: ForecastRun): SheetRecord[] {
  const records: SheetRecord[] = [];
  if (run.seasonalArima.ok) records.push({ model: "seasonal_arima", ...run.seasonalArima.value.metrics });
  if (run.trendSeasonal.ok) records.push({ model: "trend_seasonal", ...run.trendSeasonal.value.metrics });
  if (run.ensemble) {
    records.push({ model: "simple_ensemble", ...run.ensemble.metrics.simple });
    records.push({ model: "weighted_ensemble", ...run.ensemble.metrics.weighted });
  }
  return records;
}

function futureForecastRecords(run: ForecastRun): SheetRecord[] {
  const arima = run.seasonalArima.ok ? run.seasonalArima.value : null;
  const trend = run.trendSeasonal.ok ? run.trendSeasonal.value : null;
  const months = arima?.futureMonths ?? trend?.futureMonths ?? [];
  return months.map((month, i) => ({
    month,
    seasonal_arima: arima ? arima.futureForecast[i] : null,
    trend_seasonal: trend ? trend.futureForecast[i] : null,
    trend_seasonal_lower: trend ? trend.futureLower[i] : null,
    trend_seasonal_upper: trend ? trend.futureUpper[i] : null,
  }));
}

export function buildWorkbookSheets(result: AnalysisResult): Record<WorkbookSheetName, SheetCell[][]> {
  const sov = result.sov;
  const portfolio = result.portfolio;

  const significance: SheetRecord[] = [];
  if (sov) {
    for (const [productId, tests] of sov.significanceTests) {
      for (const test of tests) significance.push({ new_product_id: productId, ...test });
    }
  }
  const groupHeaders = ["key", "num_launches", "total_new_revenue", "total_lost_revenue", "net_impact", "net_impact_pct"];
  const metricHeaders = [
    "product_id",
    "product_name",
    "brand",
    "type",
    "total_revenue",
    "total_units",
    "total_transactions",
    "revenue_growth_3m_pct",
    "market_share_pct",
    "lifecycle_stage",
  ];

  return {
    growth_metrics: recordsToRows(result.growth.productMetrics, metricHeaders),
    growth_outliers: recordsToRows(result.growth.categoryOutliers, [
      ...metricHeaders,
      "category_avg_growth",
      "growth_deviation",
    ]),
    rising_stars: recordsToRows(result.growth.risingStars, [...metricHeaders, "growth_score"]),
    growth_momentum: recordsToRows(result.growth.momentum, [
      "product_id",
      "product_name",
      "recent_growth_pct",
      "historical_growth_pct",
      "momentum",
    ]),
    sentiment_by_product: recordsToRows(result.sentiment.byProduct, [
      "product_id",
      "product_name",
      "total_reviews",
      "positive_count",
      "negative_count",
      "neutral_count",
      "positive_pct",
      "negative_pct",
      "avg_rating",
      "rating_volatility",
    ]),
    sentiment_trends: recordsToRows(result.sentiment.monthlyTrends, [
      "month",
      "reviews",
      "avg_rating",
      "positive_pct",
      "negative_pct",
      "neutral_pct",
    ]),
    top_launches: recordsToRows(result.launches.topLaunches, [
      "product_id",
      "product_name",
      "brand",
      "type",
      "launch_date",
      "total_revenue",
      "total_units",
      "total_transactions",
      "growth_rate_pct",
      "market_share_pct",
      "performance_score",
    ]),
    sov_breakdown: recordsToRows(sov?.sovBreakdown ?? [], [
      "product_id",
      "product_name",
      "total_revenue",
      "cannibalization_pct",
      "competitor_pct",
      "expansion_pct",
      "cannibalization_revenue",
      "competitor_revenue",
      "expansion_revenue",
    ]),
    significance: recordsToRows(significance, [
      "new_product_id",
      "target_product_id",
      "revenue_loss",
      "pct_change",
      "t_statistic",
      "p_value",
      "is_significant",
    ]),
    portfolio_impact: recordsToRows(portfolio?.portfolioImpact ?? [], [
      "product_id",
      "product_name",
      "brand",
      "type",
      "launch_date",
      "new_product_revenue",
      "cannibalized_revenue",
      "net_impact",
      "net_impact_pct",
      "portfolio_growth_pct",
      "launch_type",
      "roi",
    ]),
    category_impact: recordsToRows(portfolio?.categoryImpact ?? [], groupHeaders),
    brand_impact: recordsToRows(portfolio?.brandImpact ?? [], groupHeaders),
    classification: recordsToRows(portfolio?.launchClassification ?? [], [
      "product_id",
      "product_name",
      "launch_date",
      "new_product_revenue",
      "cannibalized_revenue",
      "net_impact",
      "launch_type",
      "roi",
      "performance_rating",
    ]),
    forecast_metrics: recordsToRows(forecastMetricRecords(result.forecast), ["model", "mse", "rmse", "mae", "mape"]),
    future_forecast: recordsToRows(futureForecastRecords(result.forecast), [
      "month",
      "seasonal_arima",
      "trend_seasonal",
      "trend_seasonal_lower",
      "trend_seasonal_upper",
    ]),
  };
}

export function writeAnalysisWorkbook(outDir: string, result: AnalysisResult): string {
  if (!fs.existsSync(outDir)) {
    fs.mkdirSync(outDir, { recursive: true });
  }
  const sheets = buildWorkbookSheets(result);
  const workbook = XLSX.utils.book_new();
  for (const name of WORKBOOK_SHEETS) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(sheets[name]), name);
  }
  const outPath = path.join(outDir, "launch_analysis.xlsx");
  XLSX.writeFile(workbook, outPath);
  return outPath;
}
