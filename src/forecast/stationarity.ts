import { dot, gramMatrix, invertMatrix, leastSquares } from "../lib/linearAlgebra";
import type { StationarityCheck } from "./types";

/** MacKinnon response-surface approximation, constant-only model, 5% level. */
export function adfCriticalValue5pct(nobs: number): number {
  return -2.8621 - 2.738 / nobs - 8.36 / (nobs * nobs);
}

/**
 * Augmented Dickey-Fuller regression with a constant and floor(cbrt(n - 1))
 * lagged differences. Returns null when there are too few observations or
 * the regression is singular.
 */
export function checkStationarity(values: readonly number[]): StationarityCheck | null {
  const n = values.length;
  if (n < 6) return null;
  const lags = Math.floor(Math.cbrt(n - 1));
  const diffs = values.slice(1).map((value, i) => value - values[i]);

  const design: number[][] = [];
  const target: number[] = [];
  for (let t = lags; t < diffs.length; t += 1) {
    const row = [1, values[t]];
    for (let lag = 1; lag <= lags; lag += 1) row.push(diffs[t - lag]);
    design.push(row);
    target.push(diffs[t]);
  }

  const k = lags + 2;
  const nobs = design.length;
  if (nobs <= k + 1) return null;

  let coefficients: number[];
  let inverse: number[][];
  try {
    coefficients = leastSquares(design, target);
    inverse = invertMatrix(gramMatrix(design));
  } catch (err) {
    if (err instanceof Error && err.message === "Singular matrix") return null;
    throw err;
  }

  let ssr = 0;
  design.forEach((row, i) => {
    ssr += (target[i] - dot(row, coefficients)) ** 2;
  });
  const sigma2 = ssr / (nobs - k);
  const standardError = Math.sqrt(sigma2 * inverse[1][1]);
  if (!Number.isFinite(standardError) || standardError === 0) return null;

  const statistic = coefficients[1] / standardError;
  const criticalValue5pct = adfCriticalValue5pct(nobs);
  return { statistic, criticalValue5pct, lags, isStationary: statistic < criticalValue5pct };
}
