import { computeForecastMetrics } from "./metrics";
import type {
  BestModel,
  EnsembleResult,
  ForecastMetrics,
  ModelName,
  Outcome,
  SeasonalArimaFit,
  TrendSeasonalFit,
} from "./types";

/** Keeps a perfect (0% MAPE) model from producing an infinite weight. */
export const MAPE_EPSILON = 0.001;

export function inverseMapeWeights(mapeA: number, mapeB: number): [number, number] {
  const a = 1 / (mapeA + MAPE_EPSILON);
  const b = 1 / (mapeB + MAPE_EPSILON);
  const total = a + b;
  return [a / total, b / total];
}

export function buildEnsemble(
  seasonalArima: Pick<SeasonalArimaFit, "forecast" | "metrics">,
  trendSeasonal: Pick<TrendSeasonalFit, "forecast" | "metrics">,
  actual: readonly number[]
): EnsembleResult {
  const a = seasonalArima.forecast;
  const b = trendSeasonal.forecast;
  if (a.length !== b.length) {
    throw new Error(`Cannot ensemble forecasts of length ${a.length} and ${b.length}`);
  }
  const [weightA, weightB] = inverseMapeWeights(seasonalArima.metrics.mape, trendSeasonal.metrics.mape);
  const simple = a.map((value, i) => (value + b[i]) / 2);
  const weighted = a.map((value, i) => value * weightA + b[i] * weightB);

  return {
    simple,
    weighted,
    weights: { seasonalArima: weightA, trendSeasonal: weightB },
    metrics: {
      simple: computeForecastMetrics(actual, simple),
      weighted: computeForecastMetrics(actual, weighted),
    },
  };
}

/** Lowest MAPE among the models that produced a result. */
export function pickBestModel(candidates: {
  seasonalArima: Outcome<{ metrics: ForecastMetrics }>;
  trendSeasonal: Outcome<{ metrics: ForecastMetrics }>;
  ensemble: EnsembleResult | null;
}): BestModel | null {
  const scored: BestModel[] = [];
  if (candidates.seasonalArima.ok) {
    scored.push({ model: "seasonal_arima", mape: candidates.seasonalArima.value.metrics.mape });
  }
  if (candidates.trendSeasonal.ok) {
    scored.push({ model: "trend_seasonal", mape: candidates.trendSeasonal.value.metrics.mape });
  }
  if (candidates.ensemble) {
    scored.push({ model: "weighted_ensemble", mape: candidates.ensemble.metrics.weighted.mape });
  }
  let best: BestModel | null = null;
  for (const entry of scored) {
    if (Number.isNaN(entry.mape)) continue;
    if (!best || entry.mape < best.mape) best = entry;
  }
  return best;
}

export const MODEL_LABELS: Record<ModelName, string> = {
  seasonal_arima: "Seasonal ARIMA",
  trend_seasonal: "Trend-Seasonal",
  weighted_ensemble: "Weighted Ensemble",
};
