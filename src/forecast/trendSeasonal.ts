import { calendarMonthsBetween, monthKeyToDate } from "../lib/dates";
import { dot, leastSquares } from "../lib/linearAlgebra";
import { computeForecastMetrics } from "./metrics";
import { monthsAfter } from "./monthlySeries";
import type { TimeSeries, TrendSeasonalFit } from "./types";

export type TrendSeasonalOptions = {
  yearlyFourierOrder?: number;
  maxChangepoints?: number;
  changepointRange?: number;
  changepointPriorScale?: number;
  seasonalityPriorScale?: number;
  iterations?: number;
};

const DEFAULTS: Required<TrendSeasonalOptions> = {
  yearlyFourierOrder: 10,
  maxChangepoints: 25,
  changepointRange: 0.8,
  changepointPriorScale: 0.05,
  seasonalityPriorScale: 10,
  iterations: 10,
};

const DAY_MS = 86_400_000;
const YEAR_DAYS = 365.25;
// Two-sided 80% normal interval.
const Z_80 = 1.2815515655446004;
const MIN_PENALTY = 1e-6;

function monthToDays(month: string): number {
  const [year, mon] = monthKeyToDate(month).split("-").map((part) => Number.parseInt(part, 10));
  return Date.UTC(year, mon - 1, 1) / DAY_MS;
}

export function fourierFeatures(days: number, order: number): number[] {
  const features: number[] = [];
  for (let k = 1; k <= order; k += 1) {
    const angle = (2 * Math.PI * k * days) / YEAR_DAYS;
    features.push(Math.sin(angle), Math.cos(angle));
  }
  return features;
}

function trendFeatures(t: number, changepoints: readonly number[]): number[] {
  return [1, t, ...changepoints.map((c) => Math.max(0, t - c))];
}

/** Evenly spaced changepoint indices within the first `range` share of history. */
export function changepointIndices(length: number, maxChangepoints: number, range: number): number[] {
  const histSize = Math.floor(length * range);
  const count = Math.min(maxChangepoints, histSize - 1);
  if (count <= 0) return [];
  const indices = new Set<number>();
  for (let i = 1; i <= count; i += 1) {
    indices.add(Math.round((i * (histSize - 1)) / count));
  }
  return Array.from(indices).sort((a, b) => a - b);
}

type FittedModel = {
  predict: (month: string) => number;
  changepointMonths: string[];
  residualStd: number;
  lastTrainMonth: string;
  trainLength: number;
};

function fitModel(train: TimeSeries, options: Required<TrendSeasonalOptions>): FittedModel {
  const n = train.values.length;
  if (n < 4) {
    throw new Error(`Trend-seasonal model needs at least 4 training months, got ${n}`);
  }
  const yScale = Math.max(...train.values.map((value) => Math.abs(value)));
  if (!(yScale > 0)) {
    throw new Error("Trend-seasonal model cannot fit an all-zero series");
  }

  const days = train.months.map(monthToDays);
  const start = days[0];
  const span = days[n - 1] - start;
  const toT = (d: number) => (d - start) / span;
  const t = days.map(toT);
  const y = train.values.map((value) => value / yScale);

  const cpIndices = changepointIndices(n, options.maxChangepoints, options.changepointRange);
  const changepoints = cpIndices.map((i) => t[i]);

  // Noise level from a plain linear fit turns the priors into ridge penalties.
  const linear = leastSquares(t.map((ti) => [1, ti]), y);
  const linearSse = y.reduce((acc, yi, i) => acc + (yi - (linear[0] + linear[1] * t[i])) ** 2, 0);
  const noise = linearSse / Math.max(1, n - 2);
  const changepointPenalty = Math.max(noise / options.changepointPriorScale ** 2, MIN_PENALTY);
  const seasonalPenalty = Math.max(noise / options.seasonalityPriorScale ** 2, MIN_PENALTY);

  const trendX = t.map((ti) => trendFeatures(ti, changepoints));
  const trendPenalties = [MIN_PENALTY, MIN_PENALTY, ...changepoints.map(() => changepointPenalty)];
  const seasonX = days.map((d) => fourierFeatures(d, options.yearlyFourierOrder));
  const seasonPenalties = seasonX[0].map(() => seasonalPenalty);

  let seasonal = new Array<number>(n).fill(0);
  let trendBeta = new Array<number>(trendX[0].length).fill(0);
  let seasonBeta = new Array<number>(seasonX[0].length).fill(0);

  for (let iter = 0; iter < options.iterations; iter += 1) {
    const trendTarget = y.map((yi, i) => (Math.abs(1 + seasonal[i]) > 1e-9 ? yi / (1 + seasonal[i]) : yi));
    trendBeta = leastSquares(trendX, trendTarget, trendPenalties);
    const trend = trendX.map((row) => dot(row, trendBeta));
    const seasonTarget = y.map((yi, i) => (Math.abs(trend[i]) > 1e-9 ? yi / trend[i] - 1 : 0));
    seasonBeta = leastSquares(seasonX, seasonTarget, seasonPenalties);
    seasonal = seasonX.map((row) => dot(row, seasonBeta));
  }

  const finalTrend = [...trendBeta];
  const finalSeason = [...seasonBeta];
  const predict = (month: string): number => {
    const d = monthToDays(month);
    const g = dot(trendFeatures(toT(d), changepoints), finalTrend);
    const s = dot(fourierFeatures(d, options.yearlyFourierOrder), finalSeason);
    return g * (1 + s) * yScale;
  };

  const sse = train.values.reduce((acc, value, i) => acc + (value - predict(train.months[i])) ** 2, 0);

  return {
    predict,
    changepointMonths: cpIndices.map((i) => train.months[i]),
    residualStd: Math.sqrt(sse / n),
    lastTrainMonth: train.months[n - 1],
    trainLength: n,
  };
}

function predictWithInterval(model: FittedModel, months: readonly string[]) {
  const point: number[] = [];
  const lower: number[] = [];
  const upper: number[] = [];
  for (const month of months) {
    const yhat = model.predict(month);
    const ahead = Math.max(0, calendarMonthsBetween(monthKeyToDate(model.lastTrainMonth), monthKeyToDate(month)));
    const width = Z_80 * model.residualStd * Math.sqrt(1 + ahead / model.trainLength);
    point.push(yhat);
    lower.push(yhat - width);
    upper.push(yhat + width);
  }
  return { point, lower, upper };
}

/**
 * Multiplicative trend x (1 + yearly seasonality) model: piecewise-linear
 * trend with ridge-penalized changepoints, Fourier yearly terms, and an 80%
 * interval widening with distance from the training data.
 */
export function fitTrendSeasonalModel(
  train: TimeSeries,
  test: TimeSeries,
  horizon: number,
  full: TimeSeries,
  options: TrendSeasonalOptions = {}
): TrendSeasonalFit {
  const model = fitModel(train, { ...DEFAULTS, ...options });
  const testPrediction = predictWithInterval(model, test.months);
  const lastMonth = full.months[full.months.length - 1];
  const futureMonths = lastMonth ? monthsAfter(lastMonth, horizon) : [];
  const futurePrediction = predictWithInterval(model, futureMonths);

  return {
    kind: "trend_seasonal",
    changepoints: model.changepointMonths,
    residualStd: model.residualStd,
    forecast: testPrediction.point,
    lower: testPrediction.lower,
    upper: testPrediction.upper,
    futureMonths,
    futureForecast: futurePrediction.point,
    futureLower: futurePrediction.lower,
    futureUpper: futurePrediction.upper,
    metrics: computeForecastMetrics(test.values, testPrediction.point),
  };
}
