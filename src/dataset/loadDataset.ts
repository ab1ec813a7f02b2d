import fs from "node:fs";
import path from "node:path";
import { integrateDataset } from "./integrateDataset";
import {
  parseMarketingTable,
  parseProductsTable,
  parseReviewsTable,
  parseSalesTable,
} from "./parseTables";
import type { Dataset, DatasetTables } from "./types";

export type DatasetFiles = {
  sales: string;
  products: string;
  marketing: string | null;
  reviews: string | null;
};

const TABLE_EXTENSIONS = [".csv", ".xlsx"];

function findTableFile(folder: string, baseName: string): string | null {
  for (const ext of TABLE_EXTENSIONS) {
    const filePath = path.join(folder, `${baseName}${ext}`);
    if (fs.existsSync(filePath)) return filePath;
  }
  return null;
}

export function locateDatasetFiles(folder: string): DatasetFiles {
  if (!fs.existsSync(folder)) {
    throw new Error(`Folder not found: ${folder}`);
  }
  const sales = findTableFile(folder, "sales");
  if (!sales) {
    throw new Error(`Missing sales table (sales.csv or sales.xlsx) in ${folder}`);
  }
  const products = findTableFile(folder, "products");
  if (!products) {
    throw new Error(`Missing products table (products.csv or products.xlsx) in ${folder}`);
  }
  return {
    sales,
    products,
    marketing: findTableFile(folder, "marketing"),
    reviews: findTableFile(folder, "reviews"),
  };
}

export function buildDataset(tables: DatasetTables, warnings: string[] = []): Dataset {
  const { tables: cleaned, integrated, quality } = integrateDataset(tables);
  const allWarnings = [...warnings];
  if (quality.duplicateTransactions > 0) {
    allWarnings.push(`Dropped ${quality.duplicateTransactions} duplicate transaction(s).`);
  }
  if (quality.duplicateProducts > 0) {
    allWarnings.push(`Dropped ${quality.duplicateProducts} duplicate product(s).`);
  }
  if (quality.unknownProductSales > 0) {
    allWarnings.push(`${quality.unknownProductSales} sale(s) reference an unknown product.`);
  }
  return { ...cleaned, integrated, quality, warnings: allWarnings };
}

export function loadDatasetFromFolder(folder: string): Dataset {
  const files = locateDatasetFiles(folder);
  const warnings: string[] = [];

  const sales = parseSalesTable(files.sales);
  if (sales.warnings) warnings.push(`${files.sales}: skipped ${sales.warnings} row(s).`);
  const products = parseProductsTable(files.products);
  if (products.warnings) {
    warnings.push(`${files.products}: ${products.warnings} row(s) with missing id or launch date.`);
  }

  let marketing: DatasetTables["marketing"] = [];
  if (files.marketing) {
    const parsed = parseMarketingTable(files.marketing);
    if (parsed.warnings) warnings.push(`${files.marketing}: skipped ${parsed.warnings} row(s).`);
    marketing = parsed.rows;
  } else {
    warnings.push(`No marketing table in ${folder}; continuing without it.`);
  }

  let reviews: DatasetTables["reviews"] = [];
  if (files.reviews) {
    const parsed = parseReviewsTable(files.reviews);
    if (parsed.warnings) warnings.push(`${files.reviews}: skipped ${parsed.warnings} row(s).`);
    reviews = parsed.rows;
  } else {
    warnings.push(`No reviews table in ${folder}; continuing without it.`);
  }

  return buildDataset(
    { sales: sales.rows, products: products.rows, marketing, reviews },
    warnings
  );
}
