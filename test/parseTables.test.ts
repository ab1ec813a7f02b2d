import { describe, it, expect } from "vitest";
import { normalizeHeader, parseDateCell, parseDateString, parseMoney } from "../src/dataset/cellParsers";
import { parseCsv } from "../src/dataset/readTable";
import {
  parseMarketingTable,
  parseProductsTable,
  parseReviewsTable,
  parseSalesTable,
} from "../src/dataset/parseTables";

describe("cell parsers", () => {
  it("normalizes headers", () => {
    expect(normalizeHeader("\uFEFFTransaction ID")).toBe("transaction id");
    expect(normalizeHeader(" Revenue (IDR) ")).toBe("revenue idr");
    expect(normalizeHeader("launch_date")).toBe("launch date");
  });

  it("parses money with currency prefixes and separators", () => {
    expect(parseMoney("Rp 12,000")).toBe(12000);
    expect(parseMoney("$1,234.50")).toBe(1234.5);
    expect(parseMoney(42)).toBe(42);
    expect(parseMoney("")).toBeNull();
    expect(parseMoney("n/a")).toBeNull();
  });

  it("parses ISO, month-first and day-first dates", () => {
    expect(parseDateString("2024-03-10T08:30:00Z")).toBe("2024-03-10");
    expect(parseDateString("3/15/2024")).toBe("2024-03-15");
    expect(parseDateString("25/12/2023")).toBe("2023-12-25");
    expect(parseDateString("not a date")).toBeNull();
  });

  it("parses Date objects and spreadsheet serials", () => {
    expect(parseDateCell(new Date(Date.UTC(2024, 0, 31)))).toBe("2024-01-31");
    expect(parseDateCell(45292)).toBe("2024-01-01");
    expect(parseDateCell(null)).toBeNull();
  });
});

describe("parseCsv", () => {
  it("handles quoted fields, escaped quotes and CRLF", () => {
    const rows = parseCsv('a,b\r\n"x, y","say ""hi"""\r\n\r\n1,2');
    expect(rows).toEqual([
      ["a", "b"],
      ["x, y", 'say "hi"'],
      ["1", "2"],
    ]);
  });
});

describe("parseSalesTable", () => {
  it("maps header aliases and skips incomplete rows", () => {
    const csv = [
      "Transaction ID,Product ID,Date,Units Sold,Revenue (IDR),Channel",
      'T1,P1,2024-03-10,2,"Rp 1,500",Online',
      "T2,P2,03/15/2024,1,800,",
      "T3,,2024-03-16,1,100,Online",
    ].join("\n");

    const result = parseSalesTable(csv);

    expect(result.warnings).toBe(1);
    expect(result.rows).toEqual([
      {
        transaction_id: "T1",
        product_id: "P1",
        date: "2024-03-10",
        units_sold: 2,
        avg_price: 0,
        discount_pct: 0,
        revenue: 1500,
        channel: "Online",
        region: null,
      },
      {
        transaction_id: "T2",
        product_id: "P2",
        date: "2024-03-15",
        units_sold: 1,
        avg_price: 0,
        discount_pct: 0,
        revenue: 800,
        channel: null,
        region: null,
      },
    ]);
  });

  it("rejects a table without a revenue column", () => {
    expect(() => parseSalesTable("transaction_id,product_id,date\nT1,P1,2024-01-01")).toThrow(
      "sales missing required columns: revenue"
    );
  });
});

describe("parseProductsTable", () => {
  it("keeps products without a launch date and counts them", () => {
    const csv = [
      "product_id,product_name,brand,category,launch_date,base_price",
      "P1,Serum A,Glow,Serum,2024-01-15,120000",
      "P2,,Glow,Toner,,",
    ].join("\n");

    const result = parseProductsTable(csv);

    expect(result.warnings).toBe(1);
    expect(result.rows).toEqual([
      {
        product_id: "P1",
        product_name: "Serum A",
        brand: "Glow",
        type: "Serum",
        launch_date: "2024-01-15",
        base_price: 120000,
      },
      {
        product_id: "P2",
        product_name: "P2",
        brand: "Glow",
        type: "Toner",
        launch_date: null,
        base_price: null,
      },
    ]);
  });
});

describe("optional tables", () => {
  it("parses marketing and review rows", () => {
    const marketing = parseMarketingTable(
      "campaign_id,product_id,channel,spend,start_date,end_date\nC1,P1,Social,\"5,000\",2024-01-01,2024-01-31"
    );
    expect(marketing.rows).toEqual([
      {
        campaign_id: "C1",
        product_id: "P1",
        channel: "Social",
        spend: 5000,
        start_date: "2024-01-01",
        end_date: "2024-01-31",
      },
    ]);

    const reviews = parseReviewsTable(
      "review_id,product_id,date,rating,sentiment,comment,platform\nR1,P1,2024-02-02,4,positive,Nice,Shop\nR2,P1,,5,,,"
    );
    expect(reviews.warnings).toBe(1);
    expect(reviews.rows).toEqual([
      {
        review_id: "R1",
        product_id: "P1",
        date: "2024-02-02",
        rating: 4,
        sentiment: "positive",
        comment: "Nice",
        platform: "Shop",
      },
    ]);
  });
});
