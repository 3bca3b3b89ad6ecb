import { describe, it, expect } from "vitest";
import {
  bandFor,
  compositeScore,
  computeComponents,
  computeThresholds,
  scoreLeadership,
} from "../src/domain/leadership/scoring.js";
import type { LeadershipPolicy } from "../src/domain/leadership/types.js";
import { makeCompany, makeIncident, makePolicy } from "./fixtures.js";

const DEFAULT_WEIGHTS = makePolicy().weights;

/** Giving-only weights, so a company's score is its giving percentile. */
function givingOnly(overrides: Partial<LeadershipPolicy> = {}): LeadershipPolicy {
  return makePolicy({
    weights: { giving: 100, transparency: 0, consistency: 0, impact: 0, incidents: 0 },
    givingBasis: "absolute",
    ...overrides,
  });
}

const four = [
  makeCompany({ name: "A", giving: 10 }),
  makeCompany({ name: "B", giving: 20 }),
  makeCompany({ name: "C", giving: 30 }),
  makeCompany({ name: "D", giving: 40 }),
];

describe("computeComponents", () => {
  it("normalizes each component to 0..1", () => {
    const [x, y] = computeComponents(
      [
        makeCompany({ name: "X", giving: 5, revenue: 100, transparencyScore: 80, impactScore: 10, years: [2020, 2021], incidentCount: 2 }),
        makeCompany({ name: "Y", giving: 5, revenue: null, transparencyScore: null, impactScore: 90, years: [2021], incidentCount: null }),
      ],
      [],
      makePolicy(),
    );

    expect(x).toEqual({ giving: 1, transparency: 0.8, consistency: 1, impact: 0.5, incidents: 0 });
    // No revenue, no transparency score, no incident data at all
    expect(y).toEqual({ consistency: 0.5, impact: 0 });
  });

  it("ranks absolute giving under the absolute basis", () => {
    const components = computeComponents(four, [], givingOnly());
    expect(components.map((c) => c.giving)).toEqual([0.25, 0.5, 0.75, 1]);
  });

  it("counts linked incidents and treats unknown counts as zero once incidents are loaded", () => {
    const components = computeComponents(
      [
        makeCompany({ name: "X", incidentCount: 2 }),
        makeCompany({ name: "Y" }),
        makeCompany({ name: "Z" }),
      ],
      [makeIncident({ companyName: "Y" })],
      makePolicy(),
    );
    // counts: X 2, Y 1, Z 0
    expect(components.map((c) => c.incidents)).toEqual([0, 1 - 2 / 3, 1 - 1 / 3]);
  });
});

describe("compositeScore", () => {
  it("renormalizes weights over the available components", () => {
    expect(compositeScore({ transparency: 0.8 }, DEFAULT_WEIGHTS)).toBe(80);
    expect(compositeScore({ giving: 1, transparency: 0.5 }, DEFAULT_WEIGHTS)).toBe(76.9);
  });

  it("is null without components", () => {
    expect(compositeScore({}, DEFAULT_WEIGHTS)).toBeNull();
  });
});

describe("banding", () => {
  it("uses linear-interpolated quartiles", () => {
    expect(computeThresholds([25, 50, 75, 100], { mode: "quartile" })).toEqual({
      mode: "quartile",
      cutPoints: [43.75, 62.5, 81.25],
    });
  });

  it("uses mean and k standard deviations in average-relative mode", () => {
    const t = computeThresholds([25, 50, 75, 100], { mode: "average-relative", spread: 0.5 });
    const sigma = Math.sqrt(3125 / 3);
    expect(t?.cutPoints[0]).toBeCloseTo(62.5 - 0.5 * sigma, 10);
    expect(t?.cutPoints[1]).toBe(62.5);
    expect(t?.cutPoints[2]).toBeCloseTo(62.5 + 0.5 * sigma, 10);
  });

  it("bands on inclusive lower bounds", () => {
    const fixed = computeThresholds([1], { mode: "fixed", thresholds: [40, 60, 80] });
    expect(fixed).not.toBeNull();
    if (!fixed) return;
    expect(bandFor(80, fixed)).toBe("Leader");
    expect(bandFor(79.9, fixed)).toBe("Above Average");
    expect(bandFor(60, fixed)).toBe("Above Average");
    expect(bandFor(40, fixed)).toBe("Below Average");
    expect(bandFor(39.9, fixed)).toBe("Laggard");
  });

  it("has no thresholds for an empty population", () => {
    expect(computeThresholds([], { mode: "quartile" })).toBeNull();
  });
});

describe("scoreLeadership", () => {
  it("scores, ranks and bands by quartile", () => {
    const result = scoreLeadership(four, [], givingOnly({ listSize: 2 }));

    expect(result.scored.map((s) => [s.name, s.score, s.rank, s.band])).toEqual([
      ["D", 100, 1, "Leader"],
      ["C", 75, 2, "Above Average"],
      ["B", 50, 3, "Below Average"],
      ["A", 25, 4, "Laggard"],
    ]);
    expect(result.thresholds).toEqual({ mode: "quartile", cutPoints: [43.8, 62.5, 81.3] });
    expect(result.bandCounts).toEqual({
      Leader: 1,
      "Above Average": 1,
      "Below Average": 1,
      Laggard: 1,
    });
    expect(result.leaders.map((s) => s.name)).toEqual(["D", "C"]);
    expect(result.laggards.map((s) => s.name)).toEqual(["A", "B"]);
  });

  it("bands relative to the average", () => {
    const result = scoreLeadership(
      four,
      [],
      givingOnly({ banding: { mode: "average-relative", spread: 0.5 } }),
    );
    expect(result.thresholds?.cutPoints).toEqual([46.4, 62.5, 78.6]);
    expect(result.scored.map((s) => s.band)).toEqual([
      "Leader",
      "Above Average",
      "Below Average",
      "Laggard",
    ]);
  });

  it("shares ranks between equal scores, ordered by name", () => {
    const result = scoreLeadership(
      [
        makeCompany({ name: "Tie B", giving: 10 }),
        makeCompany({ name: "Top", giving: 30 }),
        makeCompany({ name: "Tie A", giving: 10 }),
      ],
      [],
      givingOnly(),
    );
    expect(result.scored.map((s) => [s.name, s.score, s.rank])).toEqual([
      ["Top", 100, 1],
      ["Tie A", 50, 2],
      ["Tie B", 50, 2],
    ]);
  });

  it("reports companies with no weighted component as unscored", () => {
    const result = scoreLeadership(
      [
        makeCompany({ name: "No Revenue", revenue: null }),
        makeCompany({ name: "Has Revenue", revenue: 100 }),
      ],
      [],
      givingOnly({ givingBasis: "revenue_share" }),
    );
    expect(result.unscored).toEqual(["No Revenue"]);
    expect(result.scored.map((s) => s.name)).toEqual(["Has Revenue"]);
  });

  it("returns an empty result for an empty population", () => {
    const result = scoreLeadership([], [], makePolicy());
    expect(result.scored).toEqual([]);
    expect(result.thresholds).toBeNull();
    expect(result.leaders).toEqual([]);
  });
});
