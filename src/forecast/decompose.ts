import { linearSlope, sampleStd } from "../lib/stats";
import type { Decomposition, DecompositionModel, Outcome, TimeSeries } from "./types";

export const SEASONAL_PERIOD = 12;
/** Series longer than this use the multiplicative model. */
export const MULTIPLICATIVE_MIN_POINTS = 52;

/**
 * Centered moving average. Even periods use the 2 x period filter with
 * half weights at both ends.
 */
export function centeredMovingAverage(values: readonly number[], period: number): Array<number | null> {
  const weights =
    period % 2 === 0
      ? [0.5, ...new Array<number>(period - 1).fill(1), 0.5].map((w) => w / period)
      : new Array<number>(period).fill(1 / period);
  const half = Math.floor(weights.length / 2);
  return values.map((_, i) => {
    if (i - half < 0 || i + half >= values.length) return null;
    let acc = 0;
    for (let k = 0; k < weights.length; k += 1) acc += weights[k] * values[i - half + k];
    return acc;
  });
}

function chooseModel(length: number): { model: DecompositionModel; period: number } {
  if (length > MULTIPLICATIVE_MIN_POINTS) {
    return { model: "multiplicative", period: SEASONAL_PERIOD };
  }
  return { model: "additive", period: Math.min(SEASONAL_PERIOD, Math.floor(length / 2)) };
}

export function decomposeSeries(series: TimeSeries): Outcome<Decomposition> {
  const values = series.values;
  const { model, period } = chooseModel(values.length);
  if (period < 2) {
    return { ok: false, reason: `Need at least 4 months to decompose, got ${values.length}` };
  }
  if (values.length < 2 * period) {
    return {
      ok: false,
      reason: `Need two complete cycles of ${period} months, got ${values.length}`,
    };
  }
  if (model === "multiplicative" && values.some((value) => value <= 0)) {
    return { ok: false, reason: "Multiplicative decomposition requires strictly positive values" };
  }

  const trend = centeredMovingAverage(values, period);
  const detrended = values.map((value, i) => {
    const level = trend[i];
    if (level === null) return null;
    return model === "multiplicative" ? value / level : value - level;
  });

  const averages: number[] = [];
  for (let phase = 0; phase < period; phase += 1) {
    let total = 0;
    let count = 0;
    for (let i = phase; i < detrended.length; i += period) {
      const value = detrended[i];
      if (value === null) continue;
      total += value;
      count += 1;
    }
    averages.push(count ? total / count : model === "multiplicative" ? 1 : 0);
  }
  const centre = averages.reduce((acc, value) => acc + value, 0) / period;
  const indices = averages.map((value) => (model === "multiplicative" ? value / centre : value - centre));

  const seasonal = values.map((_, i) => indices[i % period]);
  const residual = detrended.map((value, i) => {
    if (value === null) return null;
    return model === "multiplicative" ? value / seasonal[i] : value - seasonal[i];
  });

  const definedTrend = trend.filter((value): value is number => value !== null);
  return {
    ok: true,
    value: {
      model,
      period,
      trend,
      seasonal,
      residual,
      trendSlope: definedTrend.length > 1 ? linearSlope(definedTrend) : 0,
      seasonalityStrength: sampleStd(seasonal),
    },
  };
}
