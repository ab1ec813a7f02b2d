import type { IntegratedSale } from "../dataset/types";
import { decomposeSeries } from "./decompose";
import { buildEnsemble, pickBestModel } from "./ensemble";
import { buildMonthlySeries, splitTrainTest } from "./monthlySeries";
import { fitSeasonalArima } from "./seasonalArima";
import { fitTrendSeasonalModel } from "./trendSeasonal";
import type { ForecastRun, Outcome } from "./types";

export const DEFAULT_FORECAST_HORIZON = 12;

function capture<T>(label: string, fit: () => T, warnings: string[]): Outcome<T> {
  try {
    return { ok: true, value: fit() };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    warnings.push(`${label} forecast failed: ${reason}`);
    return { ok: false, reason };
  }
}

/**
 * Monthly revenue forecast with two models fitted on the first 80% of the
 * series. A model that throws is reported as a failed outcome; the ensemble
 * is built only when both models succeed.
 */
export function runSalesForecast(
  sales: readonly IntegratedSale[],
  options: { horizon?: number; category?: string | null } = {}
): ForecastRun {
  const horizon = options.horizon ?? DEFAULT_FORECAST_HORIZON;
  const category = options.category ?? null;
  const warnings: string[] = [];

  const series = buildMonthlySeries(sales, category);
  const decomposition = decomposeSeries(series);
  if (!decomposition.ok) warnings.push(`Decomposition skipped: ${decomposition.reason}`);

  const { train, test } = splitTrainTest(series);
  const seasonalArima = capture(
    "Seasonal ARIMA",
    () => fitSeasonalArima(train, test, horizon, series),
    warnings
  );
  const trendSeasonal = capture(
    "Trend-seasonal",
    () => fitTrendSeasonalModel(train, test, horizon, series),
    warnings
  );

  const ensemble =
    seasonalArima.ok && trendSeasonal.ok
      ? buildEnsemble(seasonalArima.value, trendSeasonal.value, test.values)
      : null;

  return {
    category,
    series,
    train,
    test,
    decomposition,
    seasonalArima,
    trendSeasonal,
    ensemble,
    bestModel: pickBestModel({ seasonalArima, trendSeasonal, ensemble }),
    warnings,
  };
}
