import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import * as XLSX from "xlsx";
import { describe, it, expect } from "vitest";
import { buildDataset } from "../src/dataset/loadDataset";
import { runAnalysis } from "../src/pipeline/runAnalysis";
import type { AnalysisOptions } from "../src/pipeline/runAnalysis";
import { exportNumber, formatCurrency, formatPct } from "../src/report/format";
import {
  summarizeExecutive,
  summarizeLaunches,
  summarizePortfolioImpact,
  summarizeSov,
} from "../src/report/summaries";
import { serializeAnalysis, writeAnalysisJson } from "../src/report/writeAnalysisJson";
import { buildWorkbookSheets, WORKBOOK_SHEETS, writeAnalysisWorkbook } from "../src/report/writeAnalysisWorkbook";
import { makeProduct, makeSale } from "./utils/fixtures";

const options: AnalysisOptions = {
  lookbackMonths: 12,
  topN: 5,
  windowMonths: 6,
  forecastHorizon: 3,
  category: null,
};

const dataset = buildDataset({
  products: [
    makeProduct("N", "Glow", "Serum", "2024-07-01"),
    makeProduct("A", "Glow", "Serum", "2022-01-01"),
    makeProduct("B", "Glow", "Serum", "2022-06-01"),
    makeProduct("Y", "Rival", "Serum", "2021-01-01"),
    makeProduct("M", "Pure", "Toner", "2024-06-01"),
  ],
  sales: [
    makeSale("N", "2024-08-15", 200, 4),
    makeSale("A", "2024-03-10", 100),
    makeSale("A", "2024-09-10", 50),
    makeSale("B", "2024-10-01", 80),
    makeSale("Y", "2024-02-01", 300),
    makeSale("Y", "2024-11-01", 250),
    makeSale("M", "2024-06-10", 400),
  ],
  marketing: [],
  reviews: [],
});

const result = runAnalysis(dataset, options);

describe("formatting", () => {
  it("formats currency and percentages", () => {
    expect(formatCurrency(1234.4)).toBe("Rp 1,234");
    expect(formatCurrency(-1500, "IDR")).toBe("IDR -1,500");
    expect(formatCurrency(Number.POSITIVE_INFINITY)).toBe("inf");
    expect(formatPct(12.34)).toBe("12.3%");
    expect(formatPct(Number.NaN)).toBe("n/a");
    expect(exportNumber(Number.POSITIVE_INFINITY)).toBe("inf");
    expect(exportNumber(2.5)).toBe(2.5);
  });
});

describe("runAnalysis", () => {
  it("runs every phase over the top launches", () => {
    expect(result.launches.topLaunches.map((row) => row.product_id)).toEqual(["M", "N"]);
    expect(result.sov?.sovByLaunch.get("N")?.cannibalized_revenue).toBe(50);
    expect(result.portfolio?.portfolioImpact.map((row) => [row.product_id, row.net_impact, row.roi])).toEqual([
      ["M", 400, Number.POSITIVE_INFINITY],
      ["N", 150, 300],
    ]);
    expect(result.portfolio?.categoryImpact.map((row) => row.key)).toEqual(["Toner", "Serum"]);
    expect(result.forecast.series.months).toHaveLength(7);
  });

  it("skips attribution when no product launched recently", () => {
    const old = runAnalysis(dataset, { ...options, lookbackMonths: 1 });
    expect(old.launches.topLaunches).toEqual([]);
    expect(old.sov).toBeNull();
    expect(old.portfolio).toBeNull();
    expect(old.warnings).toContain("No new launches found for cannibalization analysis.");
    expect(old.warnings).toContain("No reviews available for sentiment analysis.");
  });
});

describe("summaries", () => {
  it("describes the launch registry", () => {
    expect(summarizeLaunches(result.launches, 12)).toEqual([
      "New launches (last 12 months): 2",
      "Top 2 launches selected for analysis:",
      "  1. Product M",
      "     Launch date: 2024-06-01",
      "     Total revenue: Rp 400",
      "     Market share: 40.82%",
      "     Growth rate: -100.0%",
      "  2. Product N",
      "     Launch date: 2024-07-01",
      "     Total revenue: Rp 200",
      "     Market share: 34.48%",
      "     Growth rate: -100.0%",
      "Potential cannibalization targets:",
      "  Product N:",
      "    - Product A (launched 2022-01-01)",
      "    - Product B (launched 2022-06-01)",
    ]);
  });

  it("describes source of volume and portfolio impact", () => {
    const sov = result.sov;
    const portfolio = result.portfolio;
    if (!sov || !portfolio) throw new Error("expected attribution results");

    const sovLines = summarizeSov(sov);
    expect(sovLines).toContain("    From cannibalization: 25.0% (Rp 50)");
    expect(sovLines).toContain("    From market expansion: -10.0% (Rp -20)");
    expect(sovLines[sovLines.length - 1]).toBe("Statistically significant cannibalization effects: 0");

    expect(summarizePortfolioImpact(portfolio).slice(0, 7)).toEqual([
      "Net portfolio impact by launch:",
      "  Product M:",
      "    New product revenue: Rp 400",
      "    Lost revenue (cannibalization): Rp 0",
      "    Net impact: Rp 400 (100.0%)",
      "    Launch type: Additive",
      "    Portfolio growth: 0.0%",
    ]);
  });

  it("summarizes the whole run", () => {
    const lines = summarizeExecutive(result);
    expect(lines.slice(0, 3)).toEqual([
      "Key findings:",
      "1. Launches: 2 new, 2 analyzed",
      "   Top launch: Product M (Rp 400)",
    ]);
    expect(lines.slice(-6)).toEqual([
      "3. Cannibalization:",
      "   Additive launches: 2",
      "   Substitutive launches: 0",
      "   Average net impact (additive): Rp 275",
      "4. Growth: 0 outliers, 0 rising stars",
      "5. Sentiment: no reviews",
    ]);
  });
});

describe("exports", () => {
  it("lays out workbook sheets with infinity written as text", () => {
    const sheets = buildWorkbookSheets(result);
    expect(sheets.portfolio_impact[0]).toEqual([
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
    ]);
    expect(sheets.portfolio_impact[1][11]).toBe("inf");
    expect(sheets.category_impact.slice(1).map((row) => row[0])).toEqual(["Toner", "Serum"]);
    expect(sheets.growth_metrics).toHaveLength(6);
    expect(sheets.growth_metrics[3][0]).toBe("M");
    expect(sheets.growth_metrics[3][9]).toBe("Introduction");
    expect(sheets.sentiment_trends).toEqual([
      ["month", "reviews", "avg_rating", "positive_pct", "negative_pct", "neutral_pct"],
    ]);
    expect(sheets.significance).toEqual([
      ["new_product_id", "target_product_id", "revenue_loss", "pct_change", "t_statistic", "p_value", "is_significant"],
    ]);
  });

  it("writes the workbook and JSON files", () => {
    const outDir = fs.mkdtempSync(path.join(os.tmpdir(), "launch-report-"));
    try {
      const workbookPath = writeAnalysisWorkbook(outDir, result);
      expect(XLSX.readFile(workbookPath).SheetNames).toEqual([...WORKBOOK_SHEETS]);

      const jsonPath = writeAnalysisJson(outDir, result);
      expect(fs.readFileSync(jsonPath, "utf8")).toBe(serializeAnalysis(result));
    } finally {
      fs.rmSync(outDir, { recursive: true, force: true });
    }
  });

  it("serializes maps and infinite values", () => {
    const parsed: unknown = JSON.parse(serializeAnalysis(result));
    expect(parsed).toMatchObject({
      sov: { sovByLaunch: { N: { cannibalized_revenue: 50 } } },
      portfolio: { portfolioImpact: [{ product_id: "M", roi: "inf" }, { product_id: "N", roi: 300 }] },
    });
  });
});
