import { describe, it, expect } from "vitest";
import { metricValue } from "../src/domain/aggregation/aggregator.js";
import { summarizeIncidents } from "../src/domain/aggregation/incidents.js";
import { makeIncident } from "./fixtures.js";

describe("summarizeIncidents", () => {
  const summary = summarizeIncidents([
    makeIncident({ type: "Spill", severity: 3, inEnvironmentalJusticeCommunity: true, remediationCost: 2, year: 2021, promptDisclosure: true }),
    makeIncident({ companyName: null, type: "Spill", severity: 5, remediationCost: 4, year: 2022, promptDisclosure: false }),
    makeIncident({ type: "Air Emission", severity: 3, remediationCost: 0, year: null, promptDisclosure: null }),
  ]);

  it("counts totals and anonymized incidents", () => {
    expect(summary.total).toBe(3);
    expect(summary.anonymized).toBe(1);
    expect(summary.ejCount).toBe(1);
    expect(metricValue(summary.ejPct)).toBeCloseTo(100 / 3, 10);
  });

  it("groups by type (most frequent first) and by year", () => {
    expect(summary.byType.map((t) => [t.key, t.count])).toEqual([
      ["Spill", 2],
      ["Air Emission", 1],
    ]);
    expect(summary.byYear.map((y) => [y.key, y.count])).toEqual([
      ["2021", 1],
      ["2022", 1],
    ]);
  });

  it("reports every severity level with its EJ share", () => {
    expect(summary.bySeverity.map((s) => s.severity)).toEqual([1, 2, 3, 4, 5]);
    const moderate = summary.bySeverity[2];
    expect(moderate.count).toBe(2);
    expect(moderate.ejCount).toBe(1);
    expect(moderate.ejPct).toEqual({ status: "ok", value: 50 });
    expect(moderate.remediationCost).toBe(2);
    expect(summary.bySeverity[0].ejPct).toEqual({
      status: "insufficient_data",
      reason: "no severity 1 incidents",
    });
  });

  it("averages cost and severity and rates prompt disclosure over known values", () => {
    expect(summary.totalRemediationCost).toBe(6);
    expect(summary.avgRemediationCost).toEqual({ status: "ok", value: 2 });
    expect(metricValue(summary.avgSeverity)).toBeCloseTo(11 / 3, 10);
    expect(summary.promptDisclosurePct).toEqual({ status: "ok", value: 50 });
  });

  it("is insufficient for an empty view", () => {
    const empty = summarizeIncidents([]);
    expect(empty.total).toBe(0);
    expect(empty.ejPct).toEqual({ status: "insufficient_data", reason: "no incidents" });
    expect(empty.promptDisclosurePct.status).toBe("insufficient_data");
  });
});
