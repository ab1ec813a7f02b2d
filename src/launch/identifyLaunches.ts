import type { ProductRow, SaleRow } from "../dataset/types";
import { addMonths, inRange, maxDate } from "../lib/dates";
import type {
  CannibalizationTarget,
  LaunchCandidate,
  LaunchPerformance,
  LaunchRegistryResult,
} from "./types";

export const DEFAULT_LOOKBACK_MONTHS = 12;
export const DEFAULT_TOP_N = 5;

/** Products launched on or after (latest transaction date - months), newest first. */
export function findNewLaunches(
  products: readonly ProductRow[],
  sales: readonly SaleRow[],
  months = DEFAULT_LOOKBACK_MONTHS
): LaunchCandidate[] {
  const latest = maxDate(sales.map((sale) => sale.date));
  if (!latest) return [];
  const cutoff = addMonths(latest, -months);

  const launches: LaunchCandidate[] = [];
  for (const product of products) {
    if (!product.launch_date || product.launch_date < cutoff) continue;
    launches.push({
      product_id: product.product_id,
      product_name: product.product_name,
      brand: product.brand,
      type: product.type,
      launch_date: product.launch_date,
      base_price: product.base_price,
    });
  }

  return launches.sort((a, b) => {
    if (a.launch_date !== b.launch_date) return b.launch_date.localeCompare(a.launch_date);
    return a.product_id.localeCompare(b.product_id);
  });
}

export function compareByPerformance(a: LaunchPerformance, b: LaunchPerformance): number {
  if (a.performance_score !== b.performance_score) {
    return b.performance_score - a.performance_score;
  }
  return a.product_id.localeCompare(b.product_id);
}

/**
 * Post-launch performance per candidate. Candidates without any post-launch
 * sale are dropped. Growth compares months 0-3 to months 3-6 after launch.
 */
export function scoreLaunches(
  candidates: readonly LaunchCandidate[],
  sales: readonly SaleRow[]
): LaunchPerformance[] {
  const salesByProduct = new Map<string, SaleRow[]>();
  for (const sale of sales) {
    const list = salesByProduct.get(sale.product_id) ?? [];
    list.push(sale);
    salesByProduct.set(sale.product_id, list);
  }

  const performance: LaunchPerformance[] = [];
  for (const candidate of candidates) {
    const launchDate = candidate.launch_date;
    const postLaunch = (salesByProduct.get(candidate.product_id) ?? []).filter(
      (sale) => sale.date >= launchDate
    );
    if (!postLaunch.length) continue;

    let totalRevenue = 0;
    let totalUnits = 0;
    const transactions = new Set<string>();
    for (const sale of postLaunch) {
      totalRevenue += sale.revenue;
      totalUnits += sale.units_sold;
      transactions.add(sale.transaction_id);
    }

    const firstEnd = addMonths(launchDate, 3);
    const nextEnd = addMonths(launchDate, 6);
    let firstRevenue = 0;
    let nextRevenue = 0;
    for (const sale of postLaunch) {
      if (inRange(sale.date, launchDate, firstEnd)) firstRevenue += sale.revenue;
      else if (inRange(sale.date, firstEnd, nextEnd)) nextRevenue += sale.revenue;
    }
    const growthRatePct = firstRevenue > 0 ? ((nextRevenue - firstRevenue) / firstRevenue) * 100 : 0;

    let marketRevenue = 0;
    for (const sale of sales) {
      if (sale.date >= launchDate) marketRevenue += sale.revenue;
    }
    const marketSharePct = marketRevenue > 0 ? (totalRevenue / marketRevenue) * 100 : 0;

    performance.push({
      product_id: candidate.product_id,
      product_name: candidate.product_name,
      brand: candidate.brand,
      type: candidate.type,
      launch_date: launchDate,
      total_revenue: totalRevenue,
      total_units: totalUnits,
      total_transactions: transactions.size,
      growth_rate_pct: growthRatePct,
      market_share_pct: marketSharePct,
      performance_score: totalRevenue * (1 + growthRatePct / 100),
    });
  }

  return performance.sort(compareByPerformance);
}

export function selectTopLaunches(
  performance: readonly LaunchPerformance[],
  n = DEFAULT_TOP_N
): LaunchPerformance[] {
  return [...performance].sort(compareByPerformance).slice(0, Math.max(0, n));
}

/** Existing same-brand, same-type products launched before each top launch. */
export function identifyCannibalizationTargets(
  topLaunches: readonly LaunchPerformance[],
  products: readonly ProductRow[]
): CannibalizationTarget[] {
  const targets: CannibalizationTarget[] = [];
  for (const launch of topLaunches) {
    const existing: CannibalizationTarget["targets"] = [];
    for (const product of products) {
      if (product.product_id === launch.product_id) continue;
      if (product.type !== launch.type || product.brand !== launch.brand) continue;
      if (!product.launch_date || product.launch_date >= launch.launch_date) continue;
      existing.push({
        product_id: product.product_id,
        product_name: product.product_name,
        launch_date: product.launch_date,
      });
    }
    if (!existing.length) continue;
    targets.push({
      new_product_id: launch.product_id,
      new_product_name: launch.product_name,
      targets: existing,
    });
  }
  return targets;
}

export function identifyLaunches(
  products: readonly ProductRow[],
  sales: readonly SaleRow[],
  options: { months?: number; topN?: number } = {}
): LaunchRegistryResult {
  const newLaunches = findNewLaunches(products, sales, options.months ?? DEFAULT_LOOKBACK_MONTHS);
  const launchPerformance = scoreLaunches(newLaunches, sales);
  const topLaunches = selectTopLaunches(launchPerformance, options.topN ?? DEFAULT_TOP_N);
  const cannibalizationTargets = identifyCannibalizationTargets(topLaunches, products);
  return { newLaunches, launchPerformance, topLaunches, cannibalizationTargets };
}
