import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import { integrateDataset } from "../../src/dataset/integrateDataset";
import type { IntegratedSale, ProductRow, ReviewRow, SaleRow } from "../../src/dataset/types";

export function makeXlsx(
  filePath: string,
  rows: (string | number | boolean | Date | null)[][],
  sheetName = "Sheet1"
): void {
  const worksheet = XLSX.utils.aoa_to_sheet(rows);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, worksheet, sheetName);

  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  XLSX.writeFile(workbook, filePath);
}

export function makeProduct(
  product_id: string,
  brand: string,
  type: string,
  launch_date: string | null
): ProductRow {
  return { product_id, product_name: `Product ${product_id}`, brand, type, launch_date, base_price: null };
}

let nextTransaction = 0;

export function makeSale(product_id: string, date: string, revenue: number, units_sold = 1): SaleRow {
  nextTransaction += 1;
  return {
    transaction_id: `TX${String(nextTransaction).padStart(5, "0")}`,
    product_id,
    date,
    units_sold,
    avg_price: units_sold ? revenue / units_sold : 0,
    discount_pct: 0,
    revenue,
    channel: null,
    region: null,
  };
}

let nextReview = 0;

export function makeReview(
  product_id: string,
  date: string,
  rating: number | null,
  sentiment: string | null
): ReviewRow {
  nextReview += 1;
  return { review_id: `R${nextReview}`, product_id, date, rating, sentiment, comment: null, platform: null };
}

export function integrate(products: ProductRow[], sales: SaleRow[]): IntegratedSale[] {
  return integrateDataset({ sales, products, marketing: [], reviews: [] }).integrated;
}
