export function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}

export function mean(values: readonly number[]): number {
  if (!values.length) return Number.NaN;
  return sum(values) / values.length;
}

/** Sample standard deviation (n - 1 denominator). */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return Number.NaN;
  const avg = mean(values);
  let squared = 0;
  for (const value of values) squared += (value - avg) ** 2;
  return Math.sqrt(squared / (values.length - 1));
}

/** Quantile with linear interpolation between order statistics; q in [0, 1]. */
export function percentile(values: readonly number[], q: number): number {
  if (!values.length) return Number.NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

/** Slope of a degree-1 least-squares fit against x = 0..n-1. */
export function linearSlope(values: readonly number[]): number {
  const n = values.length;
  if (n < 2) return 0;
  const xMean = (n - 1) / 2;
  const yMean = mean(values);
  let numerator = 0;
  let denominator = 0;
  for (let i = 0; i < n; i += 1) {
    numerator += (i - xMean) * (values[i] - yMean);
    denominator += (i - xMean) ** 2;
  }
  return denominator === 0 ? 0 : numerator / denominator;
}

const LANCZOS = [
  676.5203681218851, -1259.1392167224028, 771.32342877765313, -176.61502916214059,
  12.507343278686905, -0.13857109526572012, 9.9843695780195716e-6, 1.5056327351493116e-7,
];

export function logGamma(x: number): number {
  if (x < 0.5) {
    return Math.log(Math.PI / Math.abs(Math.sin(Math.PI * x))) - logGamma(1 - x);
  }
  const z = x - 1;
  let acc = 0.99999999999980993;
  for (let i = 0; i < LANCZOS.length; i += 1) {
    acc += LANCZOS[i] / (z + i + 1);
  }
  const t = z + LANCZOS.length - 0.5;
  return 0.5 * Math.log(2 * Math.PI) + (z + 0.5) * Math.log(t) - t + Math.log(acc);
}

function betaContinuedFraction(a: number, b: number, x: number): number {
  const maxIterations = 300;
  const epsilon = 3e-14;
  const tiny = 1e-300;
  const qab = a + b;
  const qap = a + 1;
  const qam = a - 1;
  let c = 1;
  let d = 1 - (qab * x) / qap;
  if (Math.abs(d) < tiny) d = tiny;
  d = 1 / d;
  let h = d;
  for (let m = 1; m <= maxIterations; m += 1) {
    const m2 = 2 * m;
    let aa = (m * (b - m) * x) / ((qam + m2) * (a + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < tiny) d = tiny;
    c = 1 + aa / c;
    if (Math.abs(c) < tiny) c = tiny;
    d = 1 / d;
    h *= d * c;
    aa = (-(a + m) * (qab + m) * x) / ((a + m2) * (qap + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < tiny) d = tiny;
    c = 1 + aa / c;
    if (Math.abs(c) < tiny) c = tiny;
    d = 1 / d;
    const delta = d * c;
    h *= delta;
    if (Math.abs(delta - 1) < epsilon) break;
  }
  return h;
}

export function regularizedIncompleteBeta(x: number, a: number, b: number): number {
  if (x <= 0) return 0;
  if (x >= 1) return 1;
  const logFront =
    logGamma(a + b) - logGamma(a) - logGamma(b) + a * Math.log(x) + b * Math.log(1 - x);
  const front = Math.exp(logFront);
  if (x < (a + 1) / (a + b + 2)) {
    return (front * betaContinuedFraction(a, b, x)) / a;
  }
  return 1 - (front * betaContinuedFraction(b, a, 1 - x)) / b;
}

/** P(|T| >= |t|) for Student's t with `df` degrees of freedom. */
export function studentTwoSidedPValue(t: number, df: number): number {
  if (Number.isNaN(t) || df <= 0) return Number.NaN;
  if (!Number.isFinite(t)) return 0;
  return regularizedIncompleteBeta(df / (df + t * t), df / 2, 0.5);
}

export type TTestResult = {
  tStatistic: number;
  pValue: number;
  degreesOfFreedom: number;
};

/**
 * Independent two-sample t-test with pooled variance. Identical constant
 * samples yield NaN; distinct constant samples yield an infinite statistic.
 */
export function independentTTest(a: readonly number[], b: readonly number[]): TTestResult {
  const n1 = a.length;
  const n2 = b.length;
  const degreesOfFreedom = n1 + n2 - 2;
  if (n1 < 2 || n2 < 2) {
    return { tStatistic: Number.NaN, pValue: Number.NaN, degreesOfFreedom };
  }
  const mean1 = mean(a);
  const mean2 = mean(b);
  const var1 = sampleStd(a) ** 2;
  const var2 = sampleStd(b) ** 2;
  const pooled = ((n1 - 1) * var1 + (n2 - 1) * var2) / degreesOfFreedom;
  const standardError = Math.sqrt(pooled * (1 / n1 + 1 / n2));
  const diff = mean1 - mean2;
  let tStatistic: number;
  if (standardError === 0) {
    tStatistic = diff === 0 ? Number.NaN : diff > 0 ? Number.POSITIVE_INFINITY : Number.NEGATIVE_INFINITY;
  } else {
    tStatistic = diff / standardError;
  }
  return {
    tStatistic,
    pValue: studentTwoSidedPValue(tStatistic, degreesOfFreedom),
    degreesOfFreedom,
  };
}
