import { parseDateCell, parseIntSafe, parseMoney, parseText } from "./cellParsers";
import { cellAt, ensureRequiredColumns, mapHeaders, readTableRows } from "./readTable";
import type { Cell, HeaderMap } from "./readTable";
import type {
  MarketingRow,
  ProductRow,
  ReviewRow,
  SaleRow,
  TableParseResult,
} from "./types";

const SALES_ALIASES = {
  transaction_id: ["transaction id", "transaction", "txn id"],
  product_id: ["product id", "product"],
  date: ["date", "transaction date", "order date"],
  units_sold: ["units sold", "units", "quantity", "qty"],
  avg_price: ["avg price", "average price", "unit price", "price"],
  discount_pct: ["discount pct", "discount", "discount percent"],
  revenue: ["revenue", "sales", "revenue idr", "net revenue"],
  channel: ["channel", "sales channel"],
  region: ["region", "area"],
};

const PRODUCT_ALIASES = {
  product_id: ["product id", "product"],
  product_name: ["product name", "name"],
  brand: ["brand"],
  type: ["type", "category", "product type"],
  launch_date: ["launch date", "launched", "launch"],
  base_price: ["base price", "list price", "msrp"],
};

const MARKETING_ALIASES = {
  campaign_id: ["campaign id", "campaign"],
  product_id: ["product id", "product"],
  channel: ["channel", "marketing channel"],
  spend: ["spend", "spend idr", "budget", "cost"],
  start_date: ["start date", "start"],
  end_date: ["end date", "end"],
};

const REVIEW_ALIASES = {
  review_id: ["review id", "review"],
  product_id: ["product id", "product"],
  date: ["date", "review date"],
  rating: ["rating", "stars"],
  sentiment: ["sentiment"],
  comment: ["comment", "review text", "text"],
  platform: ["platform", "source"],
};

function splitHeader<F extends string>(
  rows: Cell[][],
  aliases: Record<F, string[]>,
  required: readonly F[],
  tableLabel: string
): { headerMap: HeaderMap; dataRows: Cell[][] } {
  if (!rows.length) return { headerMap: new Map(), dataRows: [] };
  const headerMap = mapHeaders(rows[0] ?? [], aliases);
  ensureRequiredColumns(headerMap, required, tableLabel);
  return { headerMap, dataRows: rows.slice(1) };
}

export function parseSalesTable(input: string): TableParseResult<SaleRow> {
  return parseSalesRows(readTableRows(input));
}

export function parseSalesRows(table: Cell[][]): TableParseResult<SaleRow> {
  const { headerMap, dataRows } = splitHeader(
    table,
    SALES_ALIASES,
    ["transaction_id", "product_id", "date", "revenue"],
    "sales"
  );
  const rows: SaleRow[] = [];
  let warnings = 0;

  for (const row of dataRows) {
    const transactionId = parseText(cellAt(row, headerMap, "transaction_id"));
    const productId = parseText(cellAt(row, headerMap, "product_id"));
    const date = parseDateCell(cellAt(row, headerMap, "date"));
    const revenue = parseMoney(cellAt(row, headerMap, "revenue"));
    if (!transactionId || !productId || !date || revenue === null) {
      warnings += 1;
      continue;
    }
    rows.push({
      transaction_id: transactionId,
      product_id: productId,
      date,
      units_sold: parseIntSafe(cellAt(row, headerMap, "units_sold")) ?? 0,
      avg_price: parseMoney(cellAt(row, headerMap, "avg_price")) ?? 0,
      discount_pct: parseMoney(cellAt(row, headerMap, "discount_pct")) ?? 0,
      revenue,
      channel: parseText(cellAt(row, headerMap, "channel")),
      region: parseText(cellAt(row, headerMap, "region")),
    });
  }

  return { rows, warnings };
}

export function parseProductsTable(input: string): TableParseResult<ProductRow> {
  return parseProductsRows(readTableRows(input));
}

export function parseProductsRows(table: Cell[][]): TableParseResult<ProductRow> {
  const { headerMap, dataRows } = splitHeader(
    table,
    PRODUCT_ALIASES,
    ["product_id", "brand", "type", "launch_date"],
    "products"
  );
  const rows: ProductRow[] = [];
  let warnings = 0;

  for (const row of dataRows) {
    const productId = parseText(cellAt(row, headerMap, "product_id"));
    if (!productId) {
      warnings += 1;
      continue;
    }
    const launchDate = parseDateCell(cellAt(row, headerMap, "launch_date"));
    if (!launchDate) warnings += 1;
    rows.push({
      product_id: productId,
      product_name: parseText(cellAt(row, headerMap, "product_name")) ?? productId,
      brand: parseText(cellAt(row, headerMap, "brand")) ?? "Unknown",
      type: parseText(cellAt(row, headerMap, "type")) ?? "Unknown",
      launch_date: launchDate,
      base_price: parseMoney(cellAt(row, headerMap, "base_price")),
    });
  }

  return { rows, warnings };
}

export function parseMarketingTable(input: string): TableParseResult<MarketingRow> {
  return parseMarketingRows(readTableRows(input));
}

export function parseMarketingRows(table: Cell[][]): TableParseResult<MarketingRow> {
  const { headerMap, dataRows } = splitHeader(
    table,
    MARKETING_ALIASES,
    ["campaign_id", "product_id"],
    "marketing"
  );
  const rows: MarketingRow[] = [];
  let warnings = 0;

  for (const row of dataRows) {
    const campaignId = parseText(cellAt(row, headerMap, "campaign_id"));
    const productId = parseText(cellAt(row, headerMap, "product_id"));
    if (!campaignId || !productId) {
      warnings += 1;
      continue;
    }
    rows.push({
      campaign_id: campaignId,
      product_id: productId,
      channel: parseText(cellAt(row, headerMap, "channel")),
      spend: parseMoney(cellAt(row, headerMap, "spend")) ?? 0,
      start_date: parseDateCell(cellAt(row, headerMap, "start_date")),
      end_date: parseDateCell(cellAt(row, headerMap, "end_date")),
    });
  }

  return { rows, warnings };
}

export function parseReviewsTable(input: string): TableParseResult<ReviewRow> {
  return parseReviewsRows(readTableRows(input));
}

export function parseReviewsRows(table: Cell[][]): TableParseResult<ReviewRow> {
  const { headerMap, dataRows } = splitHeader(
    table,
    REVIEW_ALIASES,
    ["review_id", "product_id", "date"],
    "reviews"
  );
  const rows: ReviewRow[] = [];
  let warnings = 0;

  for (const row of dataRows) {
    const reviewId = parseText(cellAt(row, headerMap, "review_id"));
    const productId = parseText(cellAt(row, headerMap, "product_id"));
    const date = parseDateCell(cellAt(row, headerMap, "date"));
    if (!reviewId || !productId || !date) {
      warnings += 1;
      continue;
    }
    rows.push({
      review_id: reviewId,
      product_id: productId,
      date,
      rating: parseMoney(cellAt(row, headerMap, "rating")),
      sentiment: parseText(cellAt(row, headerMap, "sentiment")),
      comment: parseText(cellAt(row, headerMap, "comment")),
      platform: parseText(cellAt(row, headerMap, "platform")),
    });
  }

  return { rows, warnings };
}
