import type { IntegratedSale } from "../dataset/types";
import { addMonthsToKey } from "../lib/dates";
import type { TimeSeries } from "./types";

export const TRAIN_FRACTION = 0.8;

/** Revenue summed per month that has sales, optionally restricted to one type. */
export function buildMonthlySeries(
  sales: readonly IntegratedSale[],
  category?: string | null
): TimeSeries {
  const byMonth = new Map<string, number>();
  for (const sale of sales) {
    if (category && sale.type !== category) continue;
    byMonth.set(sale.month, (byMonth.get(sale.month) ?? 0) + sale.revenue);
  }
  const months = Array.from(byMonth.keys()).sort((a, b) => a.localeCompare(b));
  return { months, values: months.map((month) => byMonth.get(month) ?? 0) };
}

/** Chronological split; the first floor(n * fraction) points train. */
export function splitTrainTest(
  series: TimeSeries,
  fraction = TRAIN_FRACTION
): { train: TimeSeries; test: TimeSeries } {
  const trainSize = Math.floor(series.values.length * fraction);
  return {
    train: { months: series.months.slice(0, trainSize), values: series.values.slice(0, trainSize) },
    test: { months: series.months.slice(trainSize), values: series.values.slice(trainSize) },
  };
}

export function monthsAfter(lastMonth: string, horizon: number): string[] {
  return Array.from({ length: horizon }, (_, i) => addMonthsToKey(lastMonth, i + 1));
}
