import type { ForecastMetrics } from "./types";

/**
 * MSE, RMSE, MAE and MAPE over aligned arrays. MAPE divides by the actual
 * value, so a zero actual makes it non-finite.
 */
export function computeForecastMetrics(
  actual: readonly number[],
  forecast: readonly number[]
): ForecastMetrics {
  if (actual.length !== forecast.length) {
    throw new Error(
      `Forecast length ${forecast.length} does not match actual length ${actual.length}`
    );
  }
  const n = actual.length;
  if (!n) {
    return { mse: Number.NaN, rmse: Number.NaN, mae: Number.NaN, mape: Number.NaN };
  }
  let squared = 0;
  let absolute = 0;
  let percentage = 0;
  for (let i = 0; i < n; i += 1) {
    const error = actual[i] - forecast[i];
    squared += error * error;
    absolute += Math.abs(error);
    percentage += Math.abs(error / actual[i]);
  }
  const mse = squared / n;
  return {
    mse,
    rmse: Math.sqrt(mse),
    mae: absolute / n,
    mape: (percentage / n) * 100,
  };
}
