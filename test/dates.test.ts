import { describe, it, expect } from "vitest";
import {
  addDays,
  addMonths,
  addMonthsToKey,
  calendarMonthsBetween,
  daysBetween,
  inRange,
  maxDate,
  monthKeyToDate,
  toMonthKey,
} from "../src/lib/dates";

describe("addMonths", () => {
  it("shifts across year boundaries", () => {
    expect(addMonths("2024-11-15", 3)).toBe("2025-02-15");
    expect(addMonths("2024-02-10", -6)).toBe("2023-08-10");
  });

  it("clamps the day to the end of the target month", () => {
    expect(addMonths("2024-01-31", 1)).toBe("2024-02-29");
    expect(addMonths("2023-01-31", 1)).toBe("2023-02-28");
    expect(addMonths("2024-08-31", -2)).toBe("2024-06-30");
  });

  it("rejects non-ISO input", () => {
    expect(() => addMonths("03/01/2024", 1)).toThrow("Invalid ISO date: 03/01/2024");
  });
});

describe("date helpers", () => {
  it("adds days and counts days between dates", () => {
    expect(addDays("2024-02-28", 2)).toBe("2024-03-01");
    expect(daysBetween("2024-01-01", "2024-03-01")).toBe(60);
    expect(daysBetween("2024-03-01", "2024-01-01")).toBe(-60);
  });

  it("converts month keys", () => {
    expect(toMonthKey("2024-07-19")).toBe("2024-07");
    expect(monthKeyToDate("2024-07")).toBe("2024-07-01");
    expect(addMonthsToKey("2024-12", 1)).toBe("2025-01");
    expect(() => monthKeyToDate("2024-7")).toThrow("Invalid month key: 2024-7");
  });

  it("counts calendar months ignoring the day", () => {
    expect(calendarMonthsBetween("2024-01-31", "2024-03-01")).toBe(2);
    expect(calendarMonthsBetween("2024-05-01", "2023-05-20")).toBe(-12);
  });

  it("finds the latest date and checks half-open ranges", () => {
    expect(maxDate(["2024-01-05", "2024-03-01", "2023-12-31"])).toBe("2024-03-01");
    expect(maxDate([])).toBeNull();
    expect(inRange("2024-01-01", "2024-01-01", "2024-02-01")).toBe(true);
    expect(inRange("2024-02-01", "2024-01-01", "2024-02-01")).toBe(false);
  });
});
