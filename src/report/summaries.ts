import { MODEL_LABELS } from "../forecast/ensemble";
import type { ForecastRun } from "../forecast/types";
import type { GrowthResult } from "../growth/growthOutliers";
import type { LaunchRegistryResult, PortfolioImpactResult, SovResult } from "../launch/types";
import type { AnalysisResult } from "../pipeline/runAnalysis";
import type { SentimentResult } from "../reviews/sentimentTrends";
import { formatCurrency, formatPct } from "./format";

export function summarizeGrowth(result: GrowthResult, currency = "Rp"): string[] {
  const lines = [`Products analyzed: ${result.productMetrics.length}`];
  if (result.categoryOutliers.length) {
    lines.push(`Growth outliers: ${result.categoryOutliers.length}`);
    const top = [...result.categoryOutliers]
      .sort((a, b) => b.revenue_growth_3m_pct - a.revenue_growth_3m_pct)
      .slice(0, 5);
    for (const row of top) {
      lines.push(
        `  - ${row.product_name}: ${formatPct(row.revenue_growth_3m_pct)} growth (${row.type} avg ${formatPct(row.category_avg_growth)})`
      );
    }
  } else {
    lines.push("No significant growth outliers detected");
  }
  if (result.risingStars.length) {
    lines.push(`Rising stars: ${result.risingStars.length}`);
    for (const row of result.risingStars.slice(0, 3)) {
      lines.push(
        `  - ${row.product_name}: ${formatPct(row.revenue_growth_3m_pct)} growth, revenue ${formatCurrency(row.total_revenue, currency)}`
      );
    }
  }
  if (result.momentum.length) {
    lines.push("Top momentum products:");
    for (const row of result.momentum.slice(0, 5)) {
      lines.push(
        `  - ${row.product_name}: momentum ${formatPct(row.momentum)} ` +
          `(recent ${formatPct(row.recent_growth_pct)}, historical ${formatPct(row.historical_growth_pct)})`
      );
    }
  }
  lines.push("Lifecycle stages:");
  for (const [stage, count] of Object.entries(result.lifecycleCounts)) {
    if (count) lines.push(`  ${stage}: ${count}`);
  }
  return lines;
}

export function summarizeSentiment(result: SentimentResult): string[] {
  if (!result.byProduct.length) return ["No reviews available for sentiment analysis."];
  const totalReviews = result.byProduct.reduce((acc, row) => acc + row.total_reviews, 0);
  const lines = [`Reviews analyzed: ${totalReviews} across ${result.byProduct.length} products`];

  const rated = result.byProduct
    .filter((row) => row.avg_rating !== null)
    .sort((a, b) => (b.avg_rating ?? 0) - (a.avg_rating ?? 0) || a.product_id.localeCompare(b.product_id));
  if (rated.length) {
    lines.push("Top rated products:");
    for (const row of rated.slice(0, 5)) {
      lines.push(
        `  - ${row.product_name ?? row.product_id}: ${(row.avg_rating ?? 0).toFixed(2)} avg rating ` +
          `(${row.total_reviews} reviews, ${formatPct(row.positive_pct)} positive)`
      );
    }
  }

  lines.push("Monthly sentiment:");
  for (const row of result.monthlyTrends) {
    const rating = row.avg_rating === null ? "n/a" : row.avg_rating.toFixed(2);
    lines.push(
      `  ${row.month}: rating ${rating}, positive ${formatPct(row.positive_pct)}, negative ${formatPct(row.negative_pct)}`
    );
  }
  lines.push(`Rating trend: ${formatRatingTrend(result.ratingTrend)}`);
  return lines;
}

function formatRatingTrend(slope: number | null): string {
  if (slope === null) return "n/a";
  const sign = slope > 0 ? "+" : "";
  return `${sign}${slope.toFixed(2)} per month`;
}

export function summarizeLaunches(result: LaunchRegistryResult, lookbackMonths: number, currency = "Rp"): string[] {
  const lines = [`New launches (last ${lookbackMonths} months): ${result.newLaunches.length}`];
  if (result.topLaunches.length) {
    lines.push(`Top ${result.topLaunches.length} launches selected for analysis:`);
    result.topLaunches.forEach((launch, idx) => {
      lines.push(`  ${idx + 1}. ${launch.product_name}`);
      lines.push(`     Launch date: ${launch.launch_date}`);
      lines.push(`     Total revenue: ${formatCurrency(launch.total_revenue, currency)}`);
      lines.push(`     Market share: ${formatPct(launch.market_share_pct, 2)}`);
      lines.push(`     Growth rate: ${formatPct(launch.growth_rate_pct)}`);
    });
  }
  if (result.cannibalizationTargets.length) {
    lines.push("Potential cannibalization targets:");
    for (const entry of result.cannibalizationTargets) {
      lines.push(`  ${entry.new_product_name}:`);
      for (const target of entry.targets.slice(0, 3)) {
        lines.push(`    - ${target.product_name} (launched ${target.launch_date})`);
      }
    }
  }
  return lines;
}

export function summarizeSov(result: SovResult, currency = "Rp"): string[] {
  if (!result.sovBreakdown.length) return ["No source-of-volume data calculated."];
  const lines = ["Source of volume breakdown:"];
  for (const row of result.sovBreakdown) {
    lines.push(`  ${row.product_name}:`);
    lines.push(`    Total revenue: ${formatCurrency(row.total_revenue, currency)}`);
    lines.push(
      `    From cannibalization: ${formatPct(row.cannibalization_pct)} (${formatCurrency(row.cannibalization_revenue, currency)})`
    );
    lines.push(
      `    From competitors: ${formatPct(row.competitor_pct)} (${formatCurrency(row.competitor_revenue, currency)})`
    );
    lines.push(
      `    From market expansion: ${formatPct(row.expansion_pct)} (${formatCurrency(row.expansion_revenue, currency)})`
    );
  }
  const significant = Array.from(result.significanceTests.values())
    .flat()
    .filter((test) => test.is_significant).length;
  lines.push(`Statistically significant cannibalization effects: ${significant}`);
  return lines;
}

export function summarizePortfolioImpact(result: PortfolioImpactResult, currency = "Rp"): string[] {
  const lines: string[] = [];
  if (result.portfolioImpact.length) {
    lines.push("Net portfolio impact by launch:");
    for (const row of result.portfolioImpact) {
      lines.push(`  ${row.product_name}:`);
      lines.push(`    New product revenue: ${formatCurrency(row.new_product_revenue, currency)}`);
      lines.push(`    Lost revenue (cannibalization): ${formatCurrency(row.cannibalized_revenue, currency)}`);
      lines.push(`    Net impact: ${formatCurrency(row.net_impact, currency)} (${formatPct(row.net_impact_pct)})`);
      lines.push(`    Launch type: ${row.launch_type}`);
      lines.push(`    Portfolio growth: ${formatPct(row.portfolio_growth_pct)}`);
    }
  }
  if (result.categoryImpact.length) {
    lines.push("Category-level impact:");
    for (const row of result.categoryImpact) {
      lines.push(`  ${row.key}: net impact ${formatCurrency(row.net_impact, currency)} (${formatPct(row.net_impact_pct)})`);
    }
  }
  const counts = result.classificationCounts;
  lines.push("Launch classification:");
  lines.push(`  Additive: ${counts.Additive}`);
  lines.push(`  Substitutive: ${counts.Substitutive}`);
  lines.push(`  Neutral: ${counts.Neutral}`);
  return lines;
}

export function summarizeForecast(run: ForecastRun, currency = "Rp"): string[] {
  const scope = run.category ? `category ${run.category}` : "all categories";
  const lines = [
    `Monthly series (${scope}): ${run.series.months.length} months, train ${run.train.months.length}, test ${run.test.months.length}`,
  ];
  if (run.decomposition.ok) {
    const d = run.decomposition.value;
    lines.push(`Decomposition: ${d.model}, period ${d.period}, trend slope ${formatCurrency(d.trendSlope, currency)}/month`);
  }
  if (run.seasonalArima.ok) {
    const { metrics, isStationary } = run.seasonalArima.value;
    lines.push("Seasonal ARIMA:");
    lines.push(`  MAPE: ${formatPct(metrics.mape, 2)}`);
    lines.push(`  RMSE: ${formatCurrency(metrics.rmse, currency)}`);
    lines.push(`  Stationary (ADF 5%): ${isStationary === null ? "n/a" : isStationary ? "yes" : "no"}`);
  } else {
    lines.push(`Seasonal ARIMA skipped: ${run.seasonalArima.reason}`);
  }
  if (run.trendSeasonal.ok) {
    const { metrics } = run.trendSeasonal.value;
    lines.push("Trend-seasonal:");
    lines.push(`  MAPE: ${formatPct(metrics.mape, 2)}`);
    lines.push(`  RMSE: ${formatCurrency(metrics.rmse, currency)}`);
  } else {
    lines.push(`Trend-seasonal skipped: ${run.trendSeasonal.reason}`);
  }
  if (run.ensemble) {
    const { metrics, weights } = run.ensemble;
    lines.push("Weighted ensemble:");
    lines.push(`  MAPE: ${formatPct(metrics.weighted.mape, 2)}`);
    lines.push(`  RMSE: ${formatCurrency(metrics.weighted.rmse, currency)}`);
    lines.push(
      `  Weights: seasonal ARIMA ${weights.seasonalArima.toFixed(3)}, trend-seasonal ${weights.trendSeasonal.toFixed(3)}`
    );
  }
  if (run.bestModel) {
    lines.push(`Best model: ${MODEL_LABELS[run.bestModel.model]} (MAPE ${formatPct(run.bestModel.mape, 2)})`);
  }
  return lines;
}

export function summarizeExecutive(result: AnalysisResult, currency = "Rp"): string[] {
  const lines = ["Key findings:"];
  const { launches, portfolio, forecast } = result;

  lines.push(`1. Launches: ${launches.newLaunches.length} new, ${launches.topLaunches.length} analyzed`);
  const top = launches.topLaunches[0];
  if (top) {
    lines.push(`   Top launch: ${top.product_name} (${formatCurrency(top.total_revenue, currency)})`);
  }

  if (forecast.bestModel) {
    lines.push(`2. Forecasting: best model ${MODEL_LABELS[forecast.bestModel.model]}`);
    lines.push(`   Accuracy (MAPE): ${formatPct(forecast.bestModel.mape, 2)}`);
  } else {
    lines.push("2. Forecasting: no model produced a usable forecast");
  }

  if (portfolio) {
    const additive = portfolio.portfolioImpact.filter((row) => row.launch_type === "Additive");
    lines.push("3. Cannibalization:");
    lines.push(`   Additive launches: ${portfolio.classificationCounts.Additive}`);
    lines.push(`   Substitutive launches: ${portfolio.classificationCounts.Substitutive}`);
    if (additive.length) {
      const avg = additive.reduce((acc, row) => acc + row.net_impact, 0) / additive.length;
      lines.push(`   Average net impact (additive): ${formatCurrency(avg, currency)}`);
    }
  } else {
    lines.push("3. Cannibalization: skipped (no new launches)");
  }

  const { growth, sentiment } = result;
  lines.push(
    `4. Growth: ${growth.categoryOutliers.length} outliers, ${growth.risingStars.length} rising stars`
  );
  if (sentiment.byProduct.length) {
    const reviews = sentiment.byProduct.reduce((acc, row) => acc + row.total_reviews, 0);
    lines.push(`5. Sentiment: ${reviews} reviews, rating trend ${formatRatingTrend(sentiment.ratingTrend)}`);
  } else {
    lines.push("5. Sentiment: no reviews");
  }
  return lines;
}
