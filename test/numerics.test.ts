import { describe, it, expect } from "vitest";
import { invertMatrix, leastSquares, solveLinearSystem } from "../src/lib/linearAlgebra";
import { minimizeNelderMead } from "../src/lib/nelderMead";

describe("linear algebra", () => {
  it("solves small systems", () => {
    const [x, y] = solveLinearSystem(
      [
        [2, 1],
        [1, 3],
      ],
      [3, 5]
    );
    expect(x).toBeCloseTo(0.8, 12);
    expect(y).toBeCloseTo(1.4, 12);
  });

  it("throws on singular systems", () => {
    expect(() =>
      solveLinearSystem(
        [
          [1, 2],
          [2, 4],
        ],
        [1, 2]
      )
    ).toThrow("Singular matrix");
  });

  it("inverts a diagonal matrix", () => {
    expect(
      invertMatrix([
        [2, 0],
        [0, 4],
      ])
    ).toEqual([
      [0.5, 0],
      [0, 0.25],
    ]);
  });

  it("fits ordinary and ridge least squares", () => {
    const [intercept, slope] = leastSquares(
      [
        [1, 0],
        [1, 1],
        [1, 2],
      ],
      [1, 3, 5]
    );
    expect(intercept).toBeCloseTo(1, 12);
    expect(slope).toBeCloseTo(2, 12);
    expect(leastSquares([[1], [1]], [2, 2], [2])).toEqual([1]);
  });
});

describe("minimizeNelderMead", () => {
  it("finds the minimum of a quadratic bowl", () => {
    const result = minimizeNelderMead(([x, y]) => (x - 3) ** 2 + (y + 1) ** 2, [0, 0], {
      maxIterations: 500,
    });
    expect(result.x[0]).toBeCloseTo(3, 3);
    expect(result.x[1]).toBeCloseTo(-1, 3);
    expect(result.value).toBeLessThan(1e-6);
  });

  it("treats non-finite objective values as worst", () => {
    const result = minimizeNelderMead(([x]) => (x < 0 ? Number.NaN : (x - 1) ** 2), [0.5], {
      maxIterations: 300,
    });
    expect(result.x[0]).toBeCloseTo(1, 3);
  });
});
