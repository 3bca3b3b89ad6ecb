import { regionForState } from "../dataset/regions.js";
import type { Company, Incident, Region } from "../dataset/types.js";
import { ratio } from "./aggregator.js";
import { compareText } from "./statistics.js";
import type { MetricResult } from "./types.js";

export interface StateSummary {
  state: string;
  region: Region | null;
  companyCount: number;
  totalGiving: number;
  localGiving: number;
  /** Local giving over the giving of companies that report local giving. */
  localGivingPct: MetricResult;
  incidentCount: number;
  incidentsPerCompany: MetricResult;
  ejIncidentCount: number;
  ejIncidentPct: MetricResult;
  remediationCost: number;
}

interface StateAccumulator {
  companyCount: number;
  totalGiving: number;
  localGiving: number;
  givingWithLocal: number;
  incidentCount: number;
  ejIncidentCount: number;
  remediationCost: number;
}

function emptyAccumulator(): StateAccumulator {
  return {
    companyCount: 0,
    totalGiving: 0,
    localGiving: 0,
    givingWithLocal: 0,
    incidentCount: 0,
    ejIncidentCount: 0,
    remediationCost: 0,
  };
}

/**
 * Per-state view for the choropleth: companies by headquarters state,
 * incidents by the state they happened in.
 */
export function summarizeByState(
  companies: readonly Company[],
  incidents: readonly Incident[],
): StateSummary[] {
  const states = new Map<string, StateAccumulator>();
  const get = (state: string): StateAccumulator => {
    let acc = states.get(state);
    if (!acc) {
      acc = emptyAccumulator();
      states.set(state, acc);
    }
    return acc;
  };

  for (const c of companies) {
    const acc = get(c.state);
    acc.companyCount++;
    acc.totalGiving += c.giving;
    if (c.localGiving !== null) {
      acc.localGiving += c.localGiving;
      acc.givingWithLocal += c.giving;
    }
  }

  for (const i of incidents) {
    const acc = get(i.state);
    acc.incidentCount++;
    acc.remediationCost += i.remediationCost;
    if (i.inEnvironmentalJusticeCommunity) acc.ejIncidentCount++;
  }

  return [...states.entries()]
    .sort(([a], [b]) => compareText(a, b))
    .map(([state, acc]) => ({
      state,
      region: regionForState(state),
      companyCount: acc.companyCount,
      totalGiving: acc.totalGiving,
      localGiving: acc.localGiving,
      localGivingPct: ratio(
        acc.localGiving,
        acc.givingWithLocal,
        "no local giving reported",
        100,
      ),
      incidentCount: acc.incidentCount,
      incidentsPerCompany: ratio(
        acc.incidentCount,
        acc.companyCount,
        "no companies headquartered in state",
      ),
      ejIncidentCount: acc.ejIncidentCount,
      ejIncidentPct: ratio(acc.ejIncidentCount, acc.incidentCount, "no incidents", 100),
      remediationCost: acc.remediationCost,
    }));
}
