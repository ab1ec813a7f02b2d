export type SaleRow = {
  transaction_id: string;
  product_id: string;
  date: string;
  units_sold: number;
  avg_price: number;
  discount_pct: number;
  revenue: number;
  channel: string | null;
  region: string | null;
};

export type ProductRow = {
  product_id: string;
  product_name: string;
  brand: string;
  type: string;
  launch_date: string | null;
  base_price: number | null;
};

export type MarketingRow = {
  campaign_id: string;
  product_id: string;
  channel: string | null;
  spend: number;
  start_date: string | null;
  end_date: string | null;
};

export type ReviewRow = {
  review_id: string;
  product_id: string;
  date: string;
  rating: number | null;
  sentiment: string | null;
  comment: string | null;
  platform: string | null;
};

export type LifecycleStage =
  | "Pre-Launch"
  | "Introduction"
  | "Growth"
  | "Maturity"
  | "Decline/Sustain"
  | "Unknown";

/** A sale joined with its product attributes (null when the product is unknown). */
export type IntegratedSale = SaleRow & {
  month: string;
  product_name: string | null;
  brand: string | null;
  type: string | null;
  launch_date: string | null;
  base_price: number | null;
  product_age_days: number | null;
  lifecycle_stage: LifecycleStage;
};

export type DatasetTables = {
  sales: SaleRow[];
  products: ProductRow[];
  marketing: MarketingRow[];
  reviews: ReviewRow[];
};

export type DataQualityReport = {
  duplicateTransactions: number;
  duplicateProducts: number;
  unknownProductSales: number;
  negativeRevenueRows: number;
};

export type Dataset = DatasetTables & {
  integrated: IntegratedSale[];
  quality: DataQualityReport;
  warnings: string[];
};

export type TableParseResult<T> = {
  rows: T[];
  warnings: number;
};
