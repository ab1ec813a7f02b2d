/** Monthly revenue series; `months` are YYYY-MM keys in chronological order. */
export type TimeSeries = {
  months: string[];
  values: number[];
};

export type ForecastMetrics = {
  mse: number;
  rmse: number;
  mae: number;
  mape: number;
};

export type Outcome<T> = { ok: true; value: T } | { ok: false; reason: string };

export type DecompositionModel = "additive" | "multiplicative";

export type Decomposition = {
  model: DecompositionModel;
  period: number;
  /** null at the edges the centered moving average cannot reach. */
  trend: Array<number | null>;
  seasonal: number[];
  residual: Array<number | null>;
  trendSlope: number;
  seasonalityStrength: number;
};

export type StationarityCheck = {
  statistic: number;
  criticalValue5pct: number;
  lags: number;
  isStationary: boolean;
};

export type SeasonalArimaParams = {
  ar: number;
  ma: number;
  seasonalAr: number;
  seasonalMa: number;
};

export type SeasonalArimaFit = {
  kind: "seasonal_arima";
  params: SeasonalArimaParams;
  sigma2: number;
  iterations: number;
  converged: boolean;
  /** null when the training series is too short for the check. */
  isStationary: boolean | null;
  stationarity: StationarityCheck | null;
  forecast: number[];
  futureMonths: string[];
  futureForecast: number[];
  metrics: ForecastMetrics;
};

export type TrendSeasonalFit = {
  kind: "trend_seasonal";
  changepoints: string[];
  residualStd: number;
  forecast: number[];
  lower: number[];
  upper: number[];
  futureMonths: string[];
  futureForecast: number[];
  futureLower: number[];
  futureUpper: number[];
  metrics: ForecastMetrics;
};

export type EnsembleResult = {
  simple: number[];
  weighted: number[];
  weights: { seasonalArima: number; trendSeasonal: number };
  metrics: { simple: ForecastMetrics; weighted: ForecastMetrics };
};

export type ModelName = "seasonal_arima" | "trend_seasonal" | "weighted_ensemble";

export type BestModel = { model: ModelName; mape: number };

export type ForecastRun = {
  category: string | null;
  series: TimeSeries;
  train: TimeSeries;
  test: TimeSeries;
  decomposition: Outcome<Decomposition>;
  seasonalArima: Outcome<SeasonalArimaFit>;
  trendSeasonal: Outcome<TrendSeasonalFit>;
  ensemble: EnsembleResult | null;
  bestModel: BestModel | null;
  warnings: string[];
};
