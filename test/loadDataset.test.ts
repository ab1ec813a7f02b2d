import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { loadDatasetFromFolder, locateDatasetFiles } from "../src/dataset/loadDataset";
import { makeXlsx } from "./utils/fixtures";

let folder = "";

function write(name: string, lines: string[]) {
  fs.writeFileSync(path.join(folder, name), lines.join("\n"));
}

beforeEach(() => {
  folder = fs.mkdtempSync(path.join(os.tmpdir(), "launch-dataset-"));
});

afterEach(() => {
  fs.rmSync(folder, { recursive: true, force: true });
});

describe("locateDatasetFiles", () => {
  it("fails for a missing folder", () => {
    const missing = path.join(folder, "nope");
    expect(() => locateDatasetFiles(missing)).toThrow(`Folder not found: ${missing}`);
  });

  it("requires the sales and products tables", () => {
    expect(() => locateDatasetFiles(folder)).toThrow(
      `Missing sales table (sales.csv or sales.xlsx) in ${folder}`
    );
    write("sales.csv", ["transaction_id,product_id,date,revenue"]);
    expect(() => locateDatasetFiles(folder)).toThrow(
      `Missing products table (products.csv or products.xlsx) in ${folder}`
    );
  });

  it("treats marketing and reviews as optional", () => {
    write("sales.csv", ["transaction_id,product_id,date,revenue"]);
    write("products.csv", ["product_id,brand,type,launch_date"]);
    write("reviews.csv", ["review_id,product_id,date"]);
    expect(locateDatasetFiles(folder)).toEqual({
      sales: path.join(folder, "sales.csv"),
      products: path.join(folder, "products.csv"),
      marketing: null,
      reviews: path.join(folder, "reviews.csv"),
    });
  });
});

describe("loadDatasetFromFolder", () => {
  it("loads, integrates and reports warnings", () => {
    write("sales.csv", [
      "transaction_id,product_id,date,units_sold,revenue",
      "T1,P1,2024-02-01,1,100",
      "T1,P1,2024-02-01,1,100",
      "T2,P2,2024-02-03,2,",
    ]);
    write("products.csv", ["product_id,product_name,brand,type,launch_date", "P1,Serum A,Glow,Serum,2024-01-01"]);

    const dataset = loadDatasetFromFolder(folder);

    expect(dataset.sales).toHaveLength(1);
    expect(dataset.integrated[0].product_name).toBe("Serum A");
    expect(dataset.marketing).toEqual([]);
    expect(dataset.warnings).toEqual([
      `${path.join(folder, "sales.csv")}: skipped 1 row(s).`,
      `No marketing table in ${folder}; continuing without it.`,
      `No reviews table in ${folder}; continuing without it.`,
      "Dropped 1 duplicate transaction(s).",
    ]);
  });
});

describe("loadDatasetFromFolder with workbooks", () => {
  it("reads .xlsx tables", () => {
    makeXlsx(path.join(folder, "sales.xlsx"), [
      ["Transaction ID", "Product ID", "Date", "Units", "Revenue"],
      ["T1", "P1", "2024-02-01", 3, 450],
    ]);
    makeXlsx(path.join(folder, "products.xlsx"), [
      ["Product ID", "Product Name", "Brand", "Category", "Launch Date"],
      ["P1", "Serum A", "Glow", "Serum", "2024-01-01"],
    ]);

    const dataset = loadDatasetFromFolder(folder);

    expect(dataset.sales).toEqual([
      {
        transaction_id: "T1",
        product_id: "P1",
        date: "2024-02-01",
        units_sold: 3,
        avg_price: 0,
        discount_pct: 0,
        revenue: 450,
        channel: null,
        region: null,
      },
    ]);
    expect(dataset.products[0].type).toBe("Serum");
  });
});
