import { daysBetween, toMonthKey } from "../lib/dates";
import type {
  DataQualityReport,
  DatasetTables,
  IntegratedSale,
  LifecycleStage,
  ProductRow,
  SaleRow,
} from "./types";

const DAYS_PER_MONTH = 30.44;

export function classifyLifecycleStage(ageDays: number | null): LifecycleStage {
  if (ageDays === null) return "Unknown";
  const ageMonths = ageDays / DAYS_PER_MONTH;
  if (ageMonths < 0) return "Pre-Launch";
  if (ageMonths <= 6) return "Introduction";
  if (ageMonths <= 18) return "Growth";
  if (ageMonths <= 36) return "Maturity";
  return "Decline/Sustain";
}

function dedupeBy<T>(rows: T[], key: (row: T) => string): { rows: T[]; duplicates: number } {
  const seen = new Set<string>();
  const kept: T[] = [];
  let duplicates = 0;
  for (const row of rows) {
    const id = key(row);
    if (seen.has(id)) {
      duplicates += 1;
      continue;
    }
    seen.add(id);
    kept.push(row);
  }
  return { rows: kept, duplicates };
}

function joinSale(sale: SaleRow, product: ProductRow | undefined): IntegratedSale {
  const launchDate = product?.launch_date ?? null;
  const ageDays = launchDate ? daysBetween(launchDate, sale.date) : null;
  return {
    ...sale,
    month: toMonthKey(sale.date),
    product_name: product?.product_name ?? null,
    brand: product?.brand ?? null,
    type: product?.type ?? null,
    launch_date: launchDate,
    base_price: product?.base_price ?? null,
    product_age_days: ageDays,
    lifecycle_stage: classifyLifecycleStage(ageDays),
  };
}

/**
 * Left-joins sales to the product master. Duplicate transaction and product
 * ids keep their first occurrence.
 */
export function integrateDataset(tables: DatasetTables): {
  tables: DatasetTables;
  integrated: IntegratedSale[];
  quality: DataQualityReport;
} {
  const sales = dedupeBy(tables.sales, (row) => row.transaction_id);
  const products = dedupeBy(tables.products, (row) => row.product_id);
  const productById = new Map(products.rows.map((row) => [row.product_id, row]));

  let unknownProductSales = 0;
  let negativeRevenueRows = 0;
  const integrated = sales.rows.map((sale) => {
    const product = productById.get(sale.product_id);
    if (!product) unknownProductSales += 1;
    if (sale.revenue < 0) negativeRevenueRows += 1;
    return joinSale(sale, product);
  });

  integrated.sort((a, b) => {
    if (a.date !== b.date) return a.date.localeCompare(b.date);
    return a.transaction_id.localeCompare(b.transaction_id);
  });

  return {
    tables: { ...tables, sales: sales.rows, products: products.rows },
    integrated,
    quality: {
      duplicateTransactions: sales.duplicates,
      duplicateProducts: products.duplicates,
      unknownProductSales,
      negativeRevenueRows,
    },
  };
}
