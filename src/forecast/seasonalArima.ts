import { minimizeNelderMead } from "../lib/nelderMead";
import { computeForecastMetrics } from "./metrics";
import { monthsAfter } from "./monthlySeries";
import { checkStationarity } from "./stationarity";
import type { SeasonalArimaFit, SeasonalArimaParams, TimeSeries } from "./types";

export const SEASONAL_LAG = 12;
export const MAX_ITERATIONS = 200;

/** One regular plus one seasonal difference; the first 13 points are consumed. */
export function differenceSeries(values: readonly number[], season = SEASONAL_LAG): number[] {
  const out: number[] = [];
  for (let t = season + 1; t < values.length; t += 1) {
    out.push(values[t] - values[t - 1] - values[t - season] + values[t - season - 1]);
  }
  return out;
}

// tanh keeps every coefficient inside (-1, 1) while the optimizer searches freely.
function toParams(x: number[]): SeasonalArimaParams {
  return {
    ar: Math.tanh(x[0] ?? 0),
    ma: Math.tanh(x[1] ?? 0),
    seasonalAr: Math.tanh(x[2] ?? 0),
    seasonalMa: Math.tanh(x[3] ?? 0),
  };
}

function lagged(series: readonly number[], t: number): number {
  return t >= 0 ? series[t] : 0;
}

/**
 * Residuals of (1 - aB)(1 - AB^s) w_t = (1 + mB)(1 + MB^s) e_t with zero
 * pre-sample values.
 */
export function computeResiduals(
  w: readonly number[],
  params: SeasonalArimaParams,
  season = SEASONAL_LAG
): number[] {
  const { ar, ma, seasonalAr, seasonalMa } = params;
  const e: number[] = [];
  for (let t = 0; t < w.length; t += 1) {
    const arPart =
      ar * lagged(w, t - 1) + seasonalAr * lagged(w, t - season) - ar * seasonalAr * lagged(w, t - season - 1);
    const maPart =
      ma * lagged(e, t - 1) + seasonalMa * lagged(e, t - season) + ma * seasonalMa * lagged(e, t - season - 1);
    e.push(w[t] - arPart - maPart);
  }
  return e;
}

function conditionalSumOfSquares(w: readonly number[], params: SeasonalArimaParams): number {
  return computeResiduals(w, params).reduce((acc, value) => acc + value * value, 0);
}

/**
 * Filters the whole history through fixed coefficients, then extends it
 * `steps` months with future shocks set to zero and integrates back.
 */
export function forecastSeasonalArima(
  history: readonly number[],
  params: SeasonalArimaParams,
  steps: number,
  season = SEASONAL_LAG
): number[] {
  const w = differenceSeries(history, season);
  const e = computeResiduals(w, params, season);
  const y = [...history];
  const { ar, ma, seasonalAr, seasonalMa } = params;
  const out: number[] = [];

  for (let h = 0; h < steps; h += 1) {
    const t = w.length;
    const nextW =
      ar * lagged(w, t - 1) +
      seasonalAr * lagged(w, t - season) -
      ar * seasonalAr * lagged(w, t - season - 1) +
      ma * lagged(e, t - 1) +
      seasonalMa * lagged(e, t - season) +
      ma * seasonalMa * lagged(e, t - season - 1);
    w.push(nextW);
    e.push(0);
    const n = y.length;
    const nextY = nextW + y[n - 1] + y[n - season] - y[n - season - 1];
    y.push(nextY);
    out.push(nextY);
  }

  return out;
}

export const MIN_DIFFERENCED_POINTS = 5;

/** Differencing consumes season + 1 points; the sum of squares needs a few more. */
export function minimumTrainingMonths(season = SEASONAL_LAG): number {
  return season + 1 + MIN_DIFFERENCED_POINTS;
}

/**
 * SARIMA(1,1,1)(1,1,1,12) fitted on `train` by conditional sum of squares.
 * Test predictions start after the training data; the future horizon starts
 * after `full` (train plus test) using the same coefficients.
 */
export function fitSeasonalArima(
  train: TimeSeries,
  test: TimeSeries,
  horizon: number,
  full: TimeSeries
): SeasonalArimaFit {
  const minimum = minimumTrainingMonths();
  if (train.values.length < minimum) {
    throw new Error(
      `Seasonal ARIMA needs at least ${minimum} training months, got ${train.values.length}`
    );
  }

  const stationarity = checkStationarity(train.values);
  const w = differenceSeries(train.values);
  const result = minimizeNelderMead((x) => conditionalSumOfSquares(w, toParams(x)), [0, 0, 0, 0], {
    maxIterations: MAX_ITERATIONS,
  });
  const params = toParams(result.x);
  if (!Number.isFinite(result.value)) {
    throw new Error("Seasonal ARIMA objective did not produce a finite value");
  }

  const forecast = forecastSeasonalArima(train.values, params, test.values.length);
  const lastMonth = full.months[full.months.length - 1];
  const futureMonths = lastMonth ? monthsAfter(lastMonth, horizon) : [];
  const futureForecast = forecastSeasonalArima(full.values, params, horizon);

  return {
    kind: "seasonal_arima",
    params,
    sigma2: w.length ? result.value / w.length : 0,
    iterations: result.iterations,
    converged: result.converged,
    isStationary: stationarity ? stationarity.isStationary : null,
    stationarity,
    forecast,
    futureMonths,
    futureForecast,
    metrics: computeForecastMetrics(test.values, forecast),
  };
}
