import type { Dataset } from "../dataset/types";
import { runSalesForecast } from "../forecast/runSalesForecast";
import type { ForecastRun } from "../forecast/types";
import { analyzeGrowth } from "../growth/growthOutliers";
import type { GrowthResult } from "../growth/growthOutliers";
import { identifyLaunches } from "../launch/identifyLaunches";
import { analyzePortfolioImpact } from "../launch/portfolioImpact";
import { analyzeSourceOfVolume } from "../launch/sourceOfVolume";
import type { LaunchRegistryResult, PortfolioImpactResult, SovResult } from "../launch/types";
import { analyzeSentiment } from "../reviews/sentimentTrends";
import type { SentimentResult } from "../reviews/sentimentTrends";

export type AnalysisOptions = {
  lookbackMonths: number;
  topN: number;
  windowMonths: number;
  forecastHorizon: number;
  category: string | null;
};

export type AnalysisResult = {
  options: AnalysisOptions;
  quality: Dataset["quality"];
  growth: GrowthResult;
  sentiment: SentimentResult;
  launches: LaunchRegistryResult;
  /** null when no launch qualified for the attribution phases. */
  sov: SovResult | null;
  portfolio: PortfolioImpactResult | null;
  forecast: ForecastRun;
  warnings: string[];
};

export function runAnalysis(dataset: Dataset, options: AnalysisOptions): AnalysisResult {
  const warnings = [...dataset.warnings];

  const growth = analyzeGrowth(dataset.integrated);
  const sentiment = analyzeSentiment(dataset.reviews, dataset.products);
  warnings.push(...sentiment.warnings);

  const launches = identifyLaunches(dataset.products, dataset.sales, {
    months: options.lookbackMonths,
    topN: options.topN,
  });

  let sov: SovResult | null = null;
  let portfolio: PortfolioImpactResult | null = null;
  if (launches.topLaunches.length) {
    sov = analyzeSourceOfVolume(dataset.integrated, launches.topLaunches, {
      windowMonths: options.windowMonths,
    });
    warnings.push(...sov.warnings);
    portfolio = analyzePortfolioImpact(dataset.integrated, launches.topLaunches, sov, {
      windowMonths: options.windowMonths,
    });
  } else {
    warnings.push("No new launches found for cannibalization analysis.");
  }

  const forecast = runSalesForecast(dataset.integrated, {
    horizon: options.forecastHorizon,
    category: options.category,
  });
  warnings.push(...forecast.warnings);

  return {
    options,
    quality: dataset.quality,
    growth,
    sentiment,
    launches,
    sov,
    portfolio,
    forecast,
    warnings,
  };
}
