import { describe, it, expect } from "vitest";
import { summarizeByState } from "../src/domain/aggregation/geographic.js";
import { makeCompany, makeIncident } from "./fixtures.js";

describe("summarizeByState", () => {
  const states = summarizeByState(
    [
      makeCompany({ name: "A", state: "CA", giving: 10, localGiving: 4 }),
      makeCompany({ name: "B", state: "CA", giving: 20, localGiving: null }),
      makeCompany({ name: "C", state: "TX", giving: 5, localGiving: null }),
    ],
    [
      makeIncident({ companyName: "A", state: "CA", inEnvironmentalJusticeCommunity: true, remediationCost: 2 }),
      makeIncident({ companyName: null, state: "NY", inEnvironmentalJusticeCommunity: false, remediationCost: 3 }),
    ],
  );

  it("lists every state with companies or incidents, sorted", () => {
    expect(states.map((s) => s.state)).toEqual(["CA", "NY", "TX"]);
  });

  it("computes giving, local giving share and incident density", () => {
    const [ca] = states;
    expect(ca).toEqual({
      state: "CA",
      region: "West",
      companyCount: 2,
      totalGiving: 30,
      localGiving: 4,
      localGivingPct: { status: "ok", value: 40 },
      incidentCount: 1,
      incidentsPerCompany: { status: "ok", value: 0.5 },
      ejIncidentCount: 1,
      ejIncidentPct: { status: "ok", value: 100 },
      remediationCost: 2,
    });
  });

  it("reports insufficient data where a ratio has no base", () => {
    const ny = states[1];
    expect(ny.companyCount).toBe(0);
    expect(ny.incidentsPerCompany).toEqual({
      status: "insufficient_data",
      reason: "no companies headquartered in state",
    });
    expect(ny.ejIncidentPct).toEqual({ status: "ok", value: 0 });

    const tx = states[2];
    expect(tx.localGivingPct.status).toBe("insufficient_data");
    expect(tx.ejIncidentPct).toEqual({ status: "insufficient_data", reason: "no incidents" });
  });
});
