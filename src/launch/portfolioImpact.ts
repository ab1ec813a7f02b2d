import type { IntegratedSale } from "../dataset/types";
import { buildLaunchWindows, inWindow } from "./launchWindows";
import { DEFAULT_SOV_WINDOW_MONTHS } from "./sourceOfVolume";
import type { LaunchRef } from "./sourceOfVolume";
import type {
  GroupImpactRow,
  LaunchClassificationRow,
  LaunchType,
  PerformanceRating,
  PortfolioImpactResult,
  PortfolioImpactRow,
  SovRecord,
} from "./types";

/** Net loss beyond this share of the new product's own revenue is substitutive. */
export const SUBSTITUTION_THRESHOLD = 0.1;
export const POOR_NET_IMPACT = -1_000_000;

type SovLookup = { sovByLaunch: ReadonlyMap<string, SovRecord> };

export function classifyLaunch(netImpact: number, newProductRevenue: number): LaunchType {
  if (netImpact > 0) return "Additive";
  if (netImpact < -newProductRevenue * SUBSTITUTION_THRESHOLD) return "Substitutive";
  return "Neutral";
}

export function rateLaunchPerformance(netImpact: number): PerformanceRating {
  if (netImpact > 0) return "Excellent";
  if (netImpact < POOR_NET_IMPACT) return "Poor";
  return "Moderate";
}

export function computeRoi(netImpact: number, cannibalizedRevenue: number): number {
  return cannibalizedRevenue > 0
    ? (netImpact / cannibalizedRevenue) * 100
    : Number.POSITIVE_INFINITY;
}

function portfolioGrowthPct(
  sales: readonly IntegratedSale[],
  launch: LaunchRef,
  windowMonths: number
): number {
  const windows = buildLaunchWindows(launch.launch_date, windowMonths);
  let pre = 0;
  let post = 0;
  for (const sale of sales) {
    if (sale.type !== launch.type || sale.brand !== launch.brand) continue;
    if (inWindow(sale.date, windows.pre)) pre += sale.revenue;
    else if (inWindow(sale.date, windows.post)) post += sale.revenue;
  }
  return pre > 0 ? ((post - pre) / pre) * 100 : 0;
}

function byNetImpact<T extends { net_impact: number }>(key: (row: T) => string) {
  return (a: T, b: T): number => {
    if (a.net_impact !== b.net_impact) return b.net_impact - a.net_impact;
    return key(a).localeCompare(key(b));
  };
}

export function computePortfolioImpactRows(
  sales: readonly IntegratedSale[],
  launches: readonly LaunchRef[],
  sov: SovLookup,
  windowMonths = DEFAULT_SOV_WINDOW_MONTHS
): PortfolioImpactRow[] {
  const rows: PortfolioImpactRow[] = [];
  for (const launch of launches) {
    const record = sov.sovByLaunch.get(launch.product_id);
    if (!record) continue;

    const newProductRevenue = record.new_product_revenue;
    const cannibalizedRevenue = record.cannibalized_revenue;
    const netImpact = newProductRevenue - cannibalizedRevenue;

    rows.push({
      product_id: launch.product_id,
      product_name: launch.product_name,
      brand: launch.brand,
      type: launch.type,
      launch_date: launch.launch_date,
      new_product_revenue: newProductRevenue,
      cannibalized_revenue: cannibalizedRevenue,
      net_impact: netImpact,
      net_impact_pct: newProductRevenue > 0 ? (netImpact / newProductRevenue) * 100 : 0,
      portfolio_growth_pct: portfolioGrowthPct(sales, launch, windowMonths),
      launch_type: classifyLaunch(netImpact, newProductRevenue),
      roi: computeRoi(netImpact, cannibalizedRevenue),
    });
  }
  return rows.sort(byNetImpact((row) => row.product_id));
}

/**
 * Sums new and cannibalized revenue over every launch in a group, then
 * derives net impact and its percentage from the sums.
 */
export function aggregateImpact(
  launches: readonly LaunchRef[],
  sov: SovLookup,
  groupOf: (launch: LaunchRef) => string
): GroupImpactRow[] {
  const groups = new Map<string, { launches: number; newRevenue: number; lostRevenue: number }>();
  for (const launch of launches) {
    const key = groupOf(launch);
    const group = groups.get(key) ?? { launches: 0, newRevenue: 0, lostRevenue: 0 };
    group.launches += 1;
    const record = sov.sovByLaunch.get(launch.product_id);
    if (record) {
      group.newRevenue += record.new_product_revenue;
      group.lostRevenue += record.cannibalized_revenue;
    }
    groups.set(key, group);
  }

  return Array.from(groups.entries())
    .map(([key, group]) => {
      const netImpact = group.newRevenue - group.lostRevenue;
      return {
        key,
        num_launches: group.launches,
        total_new_revenue: group.newRevenue,
        total_lost_revenue: group.lostRevenue,
        net_impact: netImpact,
        net_impact_pct: group.newRevenue > 0 ? (netImpact / group.newRevenue) * 100 : 0,
      };
    })
    .sort(byNetImpact((row) => row.key));
}

export function classifyLaunches(rows: readonly PortfolioImpactRow[]): LaunchClassificationRow[] {
  return rows.map((row) => ({
    product_id: row.product_id,
    product_name: row.product_name,
    launch_date: row.launch_date,
    new_product_revenue: row.new_product_revenue,
    cannibalized_revenue: row.cannibalized_revenue,
    net_impact: row.net_impact,
    launch_type: row.launch_type,
    roi: row.roi,
    performance_rating: rateLaunchPerformance(row.net_impact),
  }));
}

export function countLaunchTypes(rows: readonly PortfolioImpactRow[]): Record<LaunchType, number> {
  const counts: Record<LaunchType, number> = { Additive: 0, Substitutive: 0, Neutral: 0 };
  for (const row of rows) counts[row.launch_type] += 1;
  return counts;
}

export function analyzePortfolioImpact(
  sales: readonly IntegratedSale[],
  launches: readonly LaunchRef[],
  sov: SovLookup,
  options: { windowMonths?: number } = {}
): PortfolioImpactResult {
  const windowMonths = options.windowMonths ?? DEFAULT_SOV_WINDOW_MONTHS;
  const portfolioImpact = computePortfolioImpactRows(sales, launches, sov, windowMonths);
  return {
    portfolioImpact,
    categoryImpact: aggregateImpact(launches, sov, (launch) => launch.type),
    brandImpact: aggregateImpact(launches, sov, (launch) => launch.brand),
    launchClassification: classifyLaunches(portfolioImpact),
    classificationCounts: countLaunchTypes(portfolioImpact),
  };
}
