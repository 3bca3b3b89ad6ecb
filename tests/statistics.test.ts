import { describe, it, expect } from "vitest";
import {
  compareText,
  histogram,
  mean,
  median,
  pearson,
  percentileRanks,
  quantile,
  round,
  std,
  sum,
} from "../src/domain/aggregation/statistics.js";

describe("basic statistics", () => {
  it("sums and averages", () => {
    expect(sum([1, 2, 3.5])).toBe(6.5);
    expect(mean([2, 4])).toBe(3);
    expect(mean([])).toBeNull();
  });

  it("interpolates quantiles linearly", () => {
    expect(quantile([4, 1, 3, 2], 0.25)).toBe(1.75);
    expect(quantile([1, 2, 3, 4], 0.75)).toBe(3.25);
    expect(median([3, 1, 2])).toBe(2);
    expect(median([1, 2, 3, 4])).toBe(2.5);
    expect(quantile([], 0.5)).toBeNull();
  });

  it("uses the sample standard deviation", () => {
    expect(std([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(Math.sqrt(32 / 7), 10);
    expect(std([5])).toBeNull();
  });

  it("rounds to the requested decimals", () => {
    expect(round(1.23456)).toBe(1.23);
    expect(round(1.23456, 3)).toBe(1.235);
    expect(round(2.5, 0)).toBe(3);
  });
});

describe("percentileRanks", () => {
  it("gives ties their average rank", () => {
    expect(percentileRanks([10, 20, 20, 30])).toEqual([0.25, 0.625, 0.625, 1]);
  });

  it("keeps input order", () => {
    expect(percentileRanks([30, 10])).toEqual([1, 0.5]);
  });

  it("ranks a single value at 1", () => {
    expect(percentileRanks([7])).toEqual([1]);
    expect(percentileRanks([])).toEqual([]);
  });
});

describe("pearson", () => {
  it("detects perfect positive and negative relationships", () => {
    expect(pearson([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
    expect(pearson([1, 2, 3], [3, 2, 1])).toBeCloseTo(-1, 10);
  });

  it("is null with zero variance or fewer than two values", () => {
    expect(pearson([1, 2, 3], [5, 5, 5])).toBeNull();
    expect(pearson([1], [1])).toBeNull();
  });
});

describe("histogram", () => {
  it("bins values with a closed last bin and drops out-of-range values", () => {
    const bins = histogram([0, 5, 10, 95, 100, 101], 10, 0, 100);
    expect(bins).toHaveLength(10);
    expect(bins[0]).toEqual({ from: 0, to: 10, count: 2 });
    expect(bins[1].count).toBe(1);
    expect(bins[9]).toEqual({ from: 90, to: 100, count: 2 });
    expect(bins.reduce((n, b) => n + b.count, 0)).toBe(5);
  });
});

describe("compareText", () => {
  it("orders by code unit", () => {
    expect(["b", "B", "a"].sort(compareText)).toEqual(["B", "a", "b"]);
    expect(compareText("x", "x")).toBe(0);
  });
});
