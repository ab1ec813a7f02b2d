import type { IntegratedSale, LifecycleStage } from "../dataset/types";
import { addDays, maxDate } from "../lib/dates";
import { mean, percentile } from "../lib/stats";

export const GROWTH_WINDOW_DAYS = 90;
export const IQR_MULTIPLIER = 1.5;

export type ProductGrowthMetric = {
  product_id: string;
  product_name: string;
  brand: string | null;
  type: string | null;
  total_revenue: number;
  total_units: number;
  total_transactions: number;
  /** Last 90 days against the 90 days before; 0 unless both windows have revenue. */
  revenue_growth_3m_pct: number;
  market_share_pct: number;
  /** Stage at the product's most recent sale. */
  lifecycle_stage: LifecycleStage;
};

export type CategoryOutlier = ProductGrowthMetric & {
  category_avg_growth: number;
  growth_deviation: number;
};

export type RisingStar = ProductGrowthMetric & {
  growth_score: number;
};

export type GrowthMomentum = {
  product_id: string;
  product_name: string;
  recent_growth_pct: number;
  historical_growth_pct: number;
  momentum: number;
};

export type GrowthResult = {
  productMetrics: ProductGrowthMetric[];
  categoryOutliers: CategoryOutlier[];
  risingStars: RisingStar[];
  momentum: GrowthMomentum[];
  lifecycleCounts: Record<LifecycleStage, number>;
};

type RevenueWindows = {
  recent: Map<string, number>;
  previous: Map<string, number>;
  older: Map<string, number>;
};

/** Revenue per product in the three consecutive 90-day windows ending at the latest sale. */
function revenueWindows(sales: readonly IntegratedSale[], latest: string): RevenueWindows {
  const recentStart = addDays(latest, -GROWTH_WINDOW_DAYS);
  const previousStart = addDays(latest, -2 * GROWTH_WINDOW_DAYS);
  const olderStart = addDays(latest, -3 * GROWTH_WINDOW_DAYS);
  const windows: RevenueWindows = { recent: new Map(), previous: new Map(), older: new Map() };

  for (const sale of sales) {
    let bucket: Map<string, number> | null = null;
    if (sale.date >= recentStart) bucket = windows.recent;
    else if (sale.date >= previousStart) bucket = windows.previous;
    else if (sale.date >= olderStart) bucket = windows.older;
    if (!bucket) continue;
    bucket.set(sale.product_id, (bucket.get(sale.product_id) ?? 0) + sale.revenue);
  }
  return windows;
}

function growthPct(current: number | undefined, base: number | undefined): number {
  if (current === undefined || base === undefined || base <= 0) return 0;
  return ((current - base) / base) * 100;
}

export function buildProductGrowthMetrics(sales: readonly IntegratedSale[]): ProductGrowthMetric[] {
  const latest = maxDate(sales.map((sale) => sale.date));
  if (!latest) return [];
  const windows = revenueWindows(sales, latest);

  const byProduct = new Map<string, ProductGrowthMetric>();
  let marketRevenue = 0;
  for (const sale of sales) {
    marketRevenue += sale.revenue;
    const metric = byProduct.get(sale.product_id) ?? {
      product_id: sale.product_id,
      product_name: sale.product_name ?? sale.product_id,
      brand: sale.brand,
      type: sale.type,
      total_revenue: 0,
      total_units: 0,
      total_transactions: 0,
      revenue_growth_3m_pct: 0,
      market_share_pct: 0,
      lifecycle_stage: sale.lifecycle_stage,
    };
    metric.total_revenue += sale.revenue;
    metric.total_units += sale.units_sold;
    metric.total_transactions += 1;
    // integrated sales are date-ordered, so the last row wins
    metric.lifecycle_stage = sale.lifecycle_stage;
    byProduct.set(sale.product_id, metric);
  }

  return Array.from(byProduct.values())
    .map((metric) => ({
      ...metric,
      revenue_growth_3m_pct: growthPct(windows.recent.get(metric.product_id), windows.previous.get(metric.product_id)),
      market_share_pct: marketRevenue > 0 ? (metric.total_revenue / marketRevenue) * 100 : 0,
    }))
    .sort((a, b) => a.product_id.localeCompare(b.product_id));
}

/**
 * Products whose growth lies above Q3 + 1.5 * IQR of their category. Categories
 * with fewer than two products are skipped; products without a type never
 * belong to one.
 */
export function detectCategoryOutliers(metrics: readonly ProductGrowthMetric[]): CategoryOutlier[] {
  const byCategory = new Map<string, ProductGrowthMetric[]>();
  for (const metric of metrics) {
    if (metric.type === null) continue;
    const list = byCategory.get(metric.type) ?? [];
    list.push(metric);
    byCategory.set(metric.type, list);
  }

  const outliers: CategoryOutlier[] = [];
  const categories = Array.from(byCategory.keys()).sort((a, b) => a.localeCompare(b));
  for (const category of categories) {
    const products = byCategory.get(category) ?? [];
    if (products.length < 2) continue;
    const growth = products.map((metric) => metric.revenue_growth_3m_pct);
    const q1 = percentile(growth, 0.25);
    const q3 = percentile(growth, 0.75);
    const upperBound = q3 + IQR_MULTIPLIER * (q3 - q1);
    const average = mean(growth);
    for (const metric of products) {
      if (metric.revenue_growth_3m_pct <= upperBound) continue;
      outliers.push({
        ...metric,
        category_avg_growth: average,
        growth_deviation: metric.revenue_growth_3m_pct - average,
      });
    }
  }
  return outliers;
}

/** Below-median revenue with growth in the top quartile, best score first. */
export function detectRisingStars(metrics: readonly ProductGrowthMetric[]): RisingStar[] {
  if (!metrics.length) return [];
  const revenues = metrics.map((metric) => metric.total_revenue);
  const medianRevenue = percentile(revenues, 0.5);
  const growthThreshold = percentile(
    metrics.map((metric) => metric.revenue_growth_3m_pct),
    0.75
  );
  const maxRevenue = Math.max(...revenues);

  return metrics
    .filter((metric) => metric.total_revenue < medianRevenue && metric.revenue_growth_3m_pct > growthThreshold)
    .map((metric) => ({
      ...metric,
      growth_score:
        metric.revenue_growth_3m_pct * 0.7 + (1 - (maxRevenue > 0 ? metric.total_revenue / maxRevenue : 0)) * 30,
    }))
    .sort((a, b) => b.growth_score - a.growth_score || a.product_id.localeCompare(b.product_id));
}

/** Recent 90-day growth minus the growth of the 90 days before it. */
export function calculateGrowthMomentum(
  sales: readonly IntegratedSale[],
  metrics: readonly ProductGrowthMetric[]
): GrowthMomentum[] {
  const latest = maxDate(sales.map((sale) => sale.date));
  if (!latest) return [];
  const windows = revenueWindows(sales, latest);
  const names = new Map(metrics.map((metric) => [metric.product_id, metric.product_name]));

  const productIds = new Set([...windows.recent.keys(), ...windows.previous.keys(), ...windows.older.keys()]);
  const rows: GrowthMomentum[] = [];
  for (const productId of productIds) {
    const recent = growthPct(windows.recent.get(productId), windows.previous.get(productId));
    const historical = growthPct(windows.previous.get(productId), windows.older.get(productId));
    rows.push({
      product_id: productId,
      product_name: names.get(productId) ?? productId,
      recent_growth_pct: recent,
      historical_growth_pct: historical,
      momentum: recent - historical,
    });
  }
  return rows.sort((a, b) => b.momentum - a.momentum || a.product_id.localeCompare(b.product_id));
}

export function countLifecycleStages(metrics: readonly ProductGrowthMetric[]): Record<LifecycleStage, number> {
  const counts: Record<LifecycleStage, number> = {
    "Pre-Launch": 0,
    Introduction: 0,
    Growth: 0,
    Maturity: 0,
    "Decline/Sustain": 0,
    Unknown: 0,
  };
  for (const metric of metrics) counts[metric.lifecycle_stage] += 1;
  return counts;
}

export function analyzeGrowth(sales: readonly IntegratedSale[]): GrowthResult {
  const productMetrics = buildProductGrowthMetrics(sales);
  return {
    productMetrics,
    categoryOutliers: detectCategoryOutliers(productMetrics),
    risingStars: detectRisingStars(productMetrics),
    momentum: calculateGrowthMomentum(sales, productMetrics),
    lifecycleCounts: countLifecycleStages(productMetrics),
  };
}
