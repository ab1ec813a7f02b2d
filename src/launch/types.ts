export type LaunchCandidate = {
  product_id: string;
  product_name: string;
  brand: string;
  type: string;
  launch_date: string;
  base_price: number | null;
};

export type LaunchPerformance = {
  product_id: string;
  product_name: string;
  brand: string;
  type: string;
  launch_date: string;
  total_revenue: number;
  total_units: number;
  total_transactions: number;
  growth_rate_pct: number;
  market_share_pct: number;
  performance_score: number;
};

export type CannibalizationTarget = {
  new_product_id: string;
  new_product_name: string;
  targets: Array<{ product_id: string; product_name: string; launch_date: string }>;
};

export type LaunchRegistryResult = {
  newLaunches: LaunchCandidate[];
  launchPerformance: LaunchPerformance[];
  topLaunches: LaunchPerformance[];
  cannibalizationTargets: CannibalizationTarget[];
};

export type CannibalizedProduct = {
  product_id: string;
  revenue_loss: number;
  pct_change: number;
};

export type SovBreakdownPct = {
  cannibalization_pct: number;
  competitor_pct: number;
  expansion_pct: number;
};

/**
 * Source-of-volume attribution for one launch. The three breakdown shares are
 * derived independently and do not have to sum to 100%.
 */
export type SovRecord = {
  new_product_id: string;
  new_product_name: string;
  launch_date: string;
  new_product_revenue: number;
  new_product_units: number;
  cannibalized_revenue: number;
  cannibalized_products: CannibalizedProduct[];
  competitor_loss: number;
  market_expansion: number;
  sov_breakdown: SovBreakdownPct;
};

export type SovBreakdownRow = SovBreakdownPct & {
  product_id: string;
  product_name: string;
  total_revenue: number;
  cannibalization_revenue: number;
  competitor_revenue: number;
  expansion_revenue: number;
};

export type SignificanceTest = {
  target_product_id: string;
  revenue_loss: number;
  pct_change: number;
  t_statistic: number;
  p_value: number;
  is_significant: boolean;
};

export type SovResult = {
  sovByLaunch: Map<string, SovRecord>;
  sovBreakdown: SovBreakdownRow[];
  significanceTests: Map<string, SignificanceTest[]>;
  warnings: string[];
};

export type LaunchType = "Additive" | "Substitutive" | "Neutral";

export type PerformanceRating = "Excellent" | "Moderate" | "Poor";

export type PortfolioImpactRow = {
  product_id: string;
  product_name: string;
  brand: string;
  type: string;
  launch_date: string;
  new_product_revenue: number;
  cannibalized_revenue: number;
  net_impact: number;
  net_impact_pct: number;
  portfolio_growth_pct: number;
  launch_type: LaunchType;
  /** Positive infinity when nothing was cannibalized. */
  roi: number;
};

export type GroupImpactRow = {
  key: string;
  num_launches: number;
  total_new_revenue: number;
  total_lost_revenue: number;
  net_impact: number;
  net_impact_pct: number;
};

export type LaunchClassificationRow = {
  product_id: string;
  product_name: string;
  launch_date: string;
  new_product_revenue: number;
  cannibalized_revenue: number;
  net_impact: number;
  launch_type: LaunchType;
  roi: number;
  performance_rating: PerformanceRating;
};

export type PortfolioImpactResult = {
  portfolioImpact: PortfolioImpactRow[];
  categoryImpact: GroupImpactRow[];
  brandImpact: GroupImpactRow[];
  launchClassification: LaunchClassificationRow[];
  classificationCounts: Record<LaunchType, number>;
};
