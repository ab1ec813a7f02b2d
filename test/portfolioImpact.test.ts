import { describe, it, expect } from "vitest";
import {
  aggregateImpact,
  analyzePortfolioImpact,
  classifyLaunch,
  computeRoi,
  rateLaunchPerformance,
} from "../src/launch/portfolioImpact";
import { analyzeSourceOfVolume } from "../src/launch/sourceOfVolume";
import type { LaunchRef } from "../src/launch/sourceOfVolume";
import type { SovRecord } from "../src/launch/types";
import { integrate, makeProduct, makeSale } from "./utils/fixtures";

function sovRecord(id: string, newRevenue: number, cannibalized: number): SovRecord {
  return {
    new_product_id: id,
    new_product_name: `Product ${id}`,
    launch_date: "2024-07-01",
    new_product_revenue: newRevenue,
    new_product_units: 1,
    cannibalized_revenue: cannibalized,
    cannibalized_products: [],
    competitor_loss: 0,
    market_expansion: 0,
    sov_breakdown: { cannibalization_pct: 0, competitor_pct: 0, expansion_pct: 0 },
  };
}

function ref(id: string, brand: string, type: string): LaunchRef {
  return { product_id: id, product_name: `Product ${id}`, brand, type, launch_date: "2024-07-01" };
}

describe("classification rules", () => {
  it("classifies launches by net impact relative to new revenue", () => {
    expect(classifyLaunch(150, 200)).toBe("Additive");
    expect(classifyLaunch(-150, 1000)).toBe("Substitutive");
    expect(classifyLaunch(-100, 1000)).toBe("Neutral");
    expect(classifyLaunch(0, 1000)).toBe("Neutral");
  });

  it("rates performance and computes ROI", () => {
    expect(rateLaunchPerformance(1)).toBe("Excellent");
    expect(rateLaunchPerformance(-1_000_000)).toBe("Moderate");
    expect(rateLaunchPerformance(-1_000_001)).toBe("Poor");
    expect(computeRoi(150, 50)).toBe(300);
    expect(computeRoi(500, 0)).toBe(Number.POSITIVE_INFINITY);
  });
});

describe("aggregateImpact", () => {
  it("sums revenue per group before deriving net impact", () => {
    const sov = {
      sovByLaunch: new Map([
        ["L1", sovRecord("L1", 1000, 1150)],
        ["L2", sovRecord("L2", 500, 0)],
        ["L3", sovRecord("L3", 300, 100)],
      ]),
    };
    const launches = [ref("L1", "Glow", "Serum"), ref("L2", "Glow", "Serum"), ref("L3", "Pure", "Toner")];

    expect(aggregateImpact(launches, sov, (launch) => launch.type)).toEqual([
      {
        key: "Serum",
        num_launches: 2,
        total_new_revenue: 1500,
        total_lost_revenue: 1150,
        net_impact: 350,
        net_impact_pct: (350 / 1500) * 100,
      },
      {
        key: "Toner",
        num_launches: 1,
        total_new_revenue: 300,
        total_lost_revenue: 100,
        net_impact: 200,
        net_impact_pct: (200 / 300) * 100,
      },
    ]);
  });
});

describe("analyzePortfolioImpact", () => {
  const products = [
    makeProduct("N", "Glow", "Serum", "2024-07-01"),
    makeProduct("A", "Glow", "Serum", "2022-01-01"),
    makeProduct("B", "Glow", "Serum", "2022-06-01"),
    makeProduct("S", "Glow", "Toner", "2024-07-01"),
    makeProduct("OLDT", "Glow", "Toner", "2021-01-01"),
  ];
  const sales = integrate(products, [
    makeSale("N", "2024-08-15", 200),
    makeSale("A", "2024-03-10", 100),
    makeSale("A", "2024-09-10", 50),
    makeSale("B", "2024-10-01", 80),
    makeSale("S", "2024-08-01", 1000),
    makeSale("OLDT", "2024-03-01", 1500),
    makeSale("OLDT", "2024-09-01", 350),
  ]);
  const launches = [ref("N", "Glow", "Serum"), ref("S", "Glow", "Toner")];

  it("computes net impact, launch type and portfolio growth per launch", () => {
    const sov = analyzeSourceOfVolume(sales, launches, { windowMonths: 6 });
    const result = analyzePortfolioImpact(sales, launches, sov, { windowMonths: 6 });

    expect(result.portfolioImpact.map((row) => row.product_id)).toEqual(["N", "S"]);
    const [additive, substitutive] = result.portfolioImpact;

    expect(additive).toMatchObject({
      new_product_revenue: 200,
      cannibalized_revenue: 50,
      net_impact: 150,
      net_impact_pct: 75,
      launch_type: "Additive",
      roi: 300,
    });
    expect(additive.portfolio_growth_pct).toBeCloseTo(230, 10);

    expect(substitutive).toMatchObject({
      new_product_revenue: 1000,
      cannibalized_revenue: 1150,
      net_impact: -150,
      launch_type: "Substitutive",
    });
    expect(substitutive.roi).toBeCloseTo((-150 / 1150) * 100, 10);

    expect(result.classificationCounts).toEqual({ Additive: 1, Substitutive: 1, Neutral: 0 });
    expect(result.launchClassification.map((row) => row.performance_rating)).toEqual([
      "Excellent",
      "Moderate",
    ]);
    expect(result.brandImpact).toEqual([
      {
        key: "Glow",
        num_launches: 2,
        total_new_revenue: 1200,
        total_lost_revenue: 1200,
        net_impact: 0,
        net_impact_pct: 0,
      },
    ]);
  });

  it("skips launches without a source-of-volume record", () => {
    const result = analyzePortfolioImpact(sales, launches, { sovByLaunch: new Map() });
    expect(result.portfolioImpact).toEqual([]);
    expect(result.categoryImpact.map((row) => row.net_impact)).toEqual([0, 0]);
  });

  it("returns no rows when there are no launches", () => {
    const sov = analyzeSourceOfVolume(sales, []);
    const result = analyzePortfolioImpact(sales, [], sov);

    expect(result.portfolioImpact).toEqual([]);
    expect(result.categoryImpact).toEqual([]);
    expect(result.brandImpact).toEqual([]);
    expect(result.launchClassification).toEqual([]);
    expect(result.classificationCounts).toEqual({ Additive: 0, Substitutive: 0, Neutral: 0 });
  });
});
