import { describe, it, expect } from "vitest";
import { fetchAllRows } from "../src/db/fetchAllRows";
import type { PageResult } from "../src/db/fetchAllRows";
import { formatRetryError, isTransientDataError, retryAsync } from "../src/lib/retry";

function pager(rows: number[], calls: Array<[number, number]>) {
  return (from: number, to: number): Promise<PageResult<number>> => {
    calls.push([from, to]);
    return Promise.resolve({ data: rows.slice(from, to + 1), error: null });
  };
}

describe("fetchAllRows", () => {
  it("stops after a short page", async () => {
    const calls: Array<[number, number]> = [];
    const rows = await fetchAllRows(pager([1, 2, 3, 4, 5], calls), 2);
    expect(rows).toEqual([1, 2, 3, 4, 5]);
    expect(calls).toEqual([
      [0, 1],
      [2, 3],
      [4, 5],
    ]);
  });

  it("stops after an empty page when the total is a multiple of the page size", async () => {
    const calls: Array<[number, number]> = [];
    const rows = await fetchAllRows(pager([1, 2, 3, 4], calls), 2);
    expect(rows).toEqual([1, 2, 3, 4]);
    expect(calls).toHaveLength(3);
  });

  it("throws the query error", async () => {
    await expect(
      fetchAllRows(() => Promise.resolve({ data: null, error: { message: "permission denied" } }))
    ).rejects.toThrow("permission denied");
  });
});

describe("retryAsync", () => {
  it("retries transient failures", async () => {
    let attempts = 0;
    const retried: number[] = [];
    const value = await retryAsync(
      async () => {
        attempts += 1;
        if (attempts === 1) throw { status: 503, message: "Service Unavailable" };
        return "ok";
      },
      {
        retries: 2,
        delaysMs: [0],
        shouldRetry: isTransientDataError,
        onRetry: ({ attempt }) => retried.push(attempt),
      }
    );
    expect(value).toBe("ok");
    expect(retried).toEqual([1]);
  });

  it("rethrows errors that are not transient", async () => {
    await expect(
      retryAsync(
        async () => {
          throw new Error("bad request");
        },
        { retries: 3, delaysMs: [0], shouldRetry: isTransientDataError }
      )
    ).rejects.toThrow("bad request");
  });

  it("classifies and formats errors", () => {
    expect(isTransientDataError({ message: "fetch failed" })).toBe(true);
    expect(isTransientDataError({ status: 400, message: "bad" })).toBe(false);
    expect(isTransientDataError("timeout")).toBe(false);
    expect(formatRetryError({ status: 503, message: "Service Unavailable" })).toBe(
      "status 503 Service Unavailable"
    );
    expect(formatRetryError("boom")).toBe("boom");
  });
});
