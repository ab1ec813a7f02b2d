import type { IntegratedSale } from "../dataset/types";
import { independentTTest } from "../lib/stats";
import { buildLaunchWindows, inWindow } from "./launchWindows";
import type { LaunchWindows } from "./launchWindows";
import type {
  CannibalizedProduct,
  LaunchPerformance,
  SignificanceTest,
  SovBreakdownRow,
  SovRecord,
  SovResult,
} from "./types";

export const DEFAULT_SOV_WINDOW_MONTHS = 6;
export const SIGNIFICANCE_LEVEL = 0.05;

export type LaunchRef = Pick<
  LaunchPerformance,
  "product_id" | "product_name" | "brand" | "type" | "launch_date"
>;

function shareOf(part: number, total: number): number {
  return total > 0 ? (part / total) * 100 : 0;
}

function revenueByProduct(
  sales: readonly IntegratedSale[],
  window: { start: string; end: string }
): Map<string, number> {
  const totals = new Map<string, number>();
  for (const sale of sales) {
    if (!inWindow(sale.date, window)) continue;
    totals.set(sale.product_id, (totals.get(sale.product_id) ?? 0) + sale.revenue);
  }
  return totals;
}

function windowRevenue(
  sales: readonly IntegratedSale[],
  window: { start: string; end: string }
): number {
  let total = 0;
  for (const sale of sales) {
    if (inWindow(sale.date, window)) total += sale.revenue;
  }
  return total;
}

/**
 * Siblings (same brand and type) present in both windows whose revenue fell.
 * Losses are floored per product; sibling gains never offset them.
 */
function findCannibalizedProducts(
  siblings: readonly IntegratedSale[],
  windows: LaunchWindows
): CannibalizedProduct[] {
  const pre = revenueByProduct(siblings, windows.pre);
  const post = revenueByProduct(siblings, windows.post);
  const cannibalized: CannibalizedProduct[] = [];

  for (const [productId, preRevenue] of pre) {
    const postRevenue = post.get(productId);
    if (postRevenue === undefined) continue;
    const change = postRevenue - preRevenue;
    if (change >= 0) continue;
    cannibalized.push({
      product_id: productId,
      revenue_loss: Math.abs(change),
      pct_change: preRevenue > 0 ? (change / preRevenue) * 100 : 0,
    });
  }

  return cannibalized.sort((a, b) => a.product_id.localeCompare(b.product_id));
}

export function analyzeLaunchSov(
  sales: readonly IntegratedSale[],
  launch: LaunchRef,
  windowMonths = DEFAULT_SOV_WINDOW_MONTHS
): SovRecord {
  const windows = buildLaunchWindows(launch.launch_date, windowMonths);
  const categorySales = sales.filter((sale) => sale.type === launch.type);

  let newProductRevenue = 0;
  let newProductUnits = 0;
  for (const sale of sales) {
    if (sale.product_id !== launch.product_id || !inWindow(sale.date, windows.post)) continue;
    newProductRevenue += sale.revenue;
    newProductUnits += sale.units_sold;
  }

  const siblings = categorySales.filter(
    (sale) => sale.brand === launch.brand && sale.product_id !== launch.product_id
  );
  const cannibalizedProducts = findCannibalizedProducts(siblings, windows);
  const cannibalizedRevenue = cannibalizedProducts.reduce((acc, item) => acc + item.revenue_loss, 0);

  // Competitor loss is measured on the aggregate of other brands, not per product.
  const competitorSales = categorySales.filter((sale) => sale.brand !== launch.brand);
  const preCompetitor = windowRevenue(competitorSales, windows.pre);
  const postCompetitor = windowRevenue(competitorSales, windows.post);
  const competitorLoss = preCompetitor > postCompetitor ? preCompetitor - postCompetitor : 0;

  const preMarket = windowRevenue(categorySales, windows.pre);
  const postMarket = windowRevenue(categorySales, windows.post);
  const marketExpansion = postMarket - preMarket - newProductRevenue;

  return {
    new_product_id: launch.product_id,
    new_product_name: launch.product_name,
    launch_date: launch.launch_date,
    new_product_revenue: newProductRevenue,
    new_product_units: newProductUnits,
    cannibalized_revenue: cannibalizedRevenue,
    cannibalized_products: cannibalizedProducts,
    competitor_loss: competitorLoss,
    market_expansion: marketExpansion,
    sov_breakdown: {
      cannibalization_pct: shareOf(cannibalizedRevenue, newProductRevenue),
      competitor_pct: shareOf(competitorLoss, newProductRevenue),
      expansion_pct: shareOf(marketExpansion, newProductRevenue),
    },
  };
}

export function buildSovBreakdown(sovByLaunch: ReadonlyMap<string, SovRecord>): SovBreakdownRow[] {
  return Array.from(sovByLaunch.values()).map((record) => ({
    product_id: record.new_product_id,
    product_name: record.new_product_name,
    total_revenue: record.new_product_revenue,
    cannibalization_pct: record.sov_breakdown.cannibalization_pct,
    competitor_pct: record.sov_breakdown.competitor_pct,
    expansion_pct: record.sov_breakdown.expansion_pct,
    cannibalization_revenue: record.cannibalized_revenue,
    competitor_revenue: record.competitor_loss,
    expansion_revenue: record.market_expansion,
  }));
}

function monthlyRevenue(
  sales: readonly IntegratedSale[],
  productId: string,
  window: { start: string; end: string }
): number[] {
  const byMonth = new Map<string, number>();
  for (const sale of sales) {
    if (sale.product_id !== productId || !inWindow(sale.date, window)) continue;
    byMonth.set(sale.month, (byMonth.get(sale.month) ?? 0) + sale.revenue);
  }
  return Array.from(byMonth.entries())
    .sort((a, b) => a[0].localeCompare(b[0]))
    .map(([, revenue]) => revenue);
}

/**
 * Two-sample t-test of monthly revenue before vs after launch for every
 * cannibalized sibling. Siblings with fewer than two months on either side
 * are skipped.
 */
export function testCannibalizationSignificance(
  sales: readonly IntegratedSale[],
  record: SovRecord,
  windowMonths = DEFAULT_SOV_WINDOW_MONTHS
): SignificanceTest[] {
  const windows = buildLaunchWindows(record.launch_date, windowMonths);
  const tests: SignificanceTest[] = [];

  for (const target of record.cannibalized_products) {
    const pre = monthlyRevenue(sales, target.product_id, windows.pre);
    const post = monthlyRevenue(sales, target.product_id, windows.post);
    if (pre.length < 2 || post.length < 2) continue;

    const { tStatistic, pValue } = independentTTest(pre, post);
    tests.push({
      target_product_id: target.product_id,
      revenue_loss: target.revenue_loss,
      pct_change: target.pct_change,
      t_statistic: tStatistic,
      p_value: pValue,
      is_significant: pValue < SIGNIFICANCE_LEVEL,
    });
  }

  return tests;
}

export function analyzeSourceOfVolume(
  sales: readonly IntegratedSale[],
  launches: readonly LaunchRef[],
  options: { windowMonths?: number } = {}
): SovResult {
  const windowMonths = options.windowMonths ?? DEFAULT_SOV_WINDOW_MONTHS;
  const sovByLaunch = new Map<string, SovRecord>();
  const significanceTests = new Map<string, SignificanceTest[]>();

  if (!launches.length) {
    return {
      sovByLaunch,
      sovBreakdown: [],
      significanceTests,
      warnings: ["No new launches available for source-of-volume analysis."],
    };
  }

  for (const launch of launches) {
    sovByLaunch.set(launch.product_id, analyzeLaunchSov(sales, launch, windowMonths));
  }
  for (const [productId, record] of sovByLaunch) {
    significanceTests.set(productId, testCannibalizationSignificance(sales, record, windowMonths));
  }

  return {
    sovByLaunch,
    sovBreakdown: buildSovBreakdown(sovByLaunch),
    significanceTests,
    warnings: [],
  };
}
