import { fetchAllRows } from "../db/fetchAllRows";
import type { PageResult } from "../db/fetchAllRows";
import { getSupabaseClient } from "../db/supabaseClient";
import { formatRetryError, isTransientDataError, retryAsync } from "../lib/retry";
import { buildDataset } from "./loadDataset";
import {
  parseMarketingRows,
  parseProductsRows,
  parseReviewsRows,
  parseSalesRows,
} from "./parseTables";
import type { Cell } from "./readTable";
import type { Dataset } from "./types";

type DbRecord = Record<string, unknown>;

export const DATASET_TABLES = {
  sales: { table: "sales", orderBy: "transaction_id" },
  products: { table: "products", orderBy: "product_id" },
  marketing: { table: "marketing", orderBy: "campaign_id" },
  reviews: { table: "reviews", orderBy: "review_id" },
} as const;

function toCell(value: unknown): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (value instanceof Date) return value;
  return JSON.stringify(value);
}

/** Turns query records into a header row plus value rows for the table parsers. */
export function recordsToTable(records: DbRecord[]): Cell[][] {
  if (!records.length) return [];
  const headers: string[] = [];
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!headers.includes(key)) headers.push(key);
    }
  }
  return [headers, ...records.map((record) => headers.map((header) => toCell(record[header])))];
}

async function fetchTable(table: string, orderBy: string, warnings: string[]): Promise<DbRecord[]> {
  const client = getSupabaseClient();
  return fetchAllRows<DbRecord>((from, to) =>
    retryAsync<PageResult<DbRecord>>(
      async () => {
        const result = await client.from(table).select("*").order(orderBy).range(from, to);
        if (result.error && isTransientDataError(result.error)) {
          throw result.error;
        }
        return { data: result.data, error: result.error };
      },
      {
        retries: 3,
        delaysMs: [500, 1500, 4000],
        shouldRetry: isTransientDataError,
        onRetry: ({ attempt, error }) => {
          warnings.push(`${table} rows ${from}-${to}: retry ${attempt} after ${formatRetryError(error)}`);
        },
      }
    )
  );
}

export async function fetchDatasetFromSupabase(): Promise<Dataset> {
  const warnings: string[] = [];

  const sales = parseSalesRows(
    recordsToTable(await fetchTable(DATASET_TABLES.sales.table, DATASET_TABLES.sales.orderBy, warnings))
  );
  if (sales.warnings) warnings.push(`sales: skipped ${sales.warnings} row(s).`);

  const products = parseProductsRows(
    recordsToTable(
      await fetchTable(DATASET_TABLES.products.table, DATASET_TABLES.products.orderBy, warnings)
    )
  );
  if (products.warnings) {
    warnings.push(`products: ${products.warnings} row(s) with missing id or launch date.`);
  }

  const marketing = parseMarketingRows(
    recordsToTable(
      await fetchTable(DATASET_TABLES.marketing.table, DATASET_TABLES.marketing.orderBy, warnings)
    )
  );
  const reviews = parseReviewsRows(
    recordsToTable(
      await fetchTable(DATASET_TABLES.reviews.table, DATASET_TABLES.reviews.orderBy, warnings)
    )
  );

  return buildDataset(
    {
      sales: sales.rows,
      products: products.rows,
      marketing: marketing.rows,
      reviews: reviews.rows,
    },
    warnings
  );
}
