import type { Incident } from "../dataset/types.js";
import { averageOf, ratio } from "./aggregator.js";
import { compareText, sum } from "./statistics.js";
import type { MetricResult } from "./types.js";

export interface CountShare {
  key: string;
  count: number;
  pct: MetricResult;
}

export interface SeverityRow {
  severity: number;
  count: number;
  pct: MetricResult;
  ejCount: number;
  ejPct: MetricResult;
  remediationCost: number;
}

export interface IncidentSummary {
  total: number;
  anonymized: number;
  byType: CountShare[];
  bySeverity: SeverityRow[];
  byYear: CountShare[];
  ejCount: number;
  ejPct: MetricResult;
  totalRemediationCost: number;
  avgRemediationCost: MetricResult;
  avgSeverity: MetricResult;
  promptDisclosurePct: MetricResult;
}

export const SEVERITY_LEVELS = [1, 2, 3, 4, 5] as const;

function countBy(incidents: readonly Incident[], key: (i: Incident) => string | null): Map<string, number> {
  const counts = new Map<string, number>();
  for (const i of incidents) {
    const k = key(i);
    if (k === null) continue;
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  return counts;
}

export function summarizeIncidents(incidents: readonly Incident[]): IncidentSummary {
  const total = incidents.length;
  const ej = incidents.filter((i) => i.inEnvironmentalJusticeCommunity);
  const disclosed = incidents.filter((i) => i.promptDisclosure !== null);
  const totalRemediationCost = sum(incidents.map((i) => i.remediationCost));

  const byType = [...countBy(incidents, (i) => i.type).entries()]
    .map(([key, count]) => ({ key, count, pct: ratio(count, total, "no incidents", 100) }))
    .sort((a, b) => b.count - a.count || compareText(a.key, b.key));

  const byYear = [...countBy(incidents, (i) => (i.year === null ? null : String(i.year))).entries()]
    .map(([key, count]) => ({ key, count, pct: ratio(count, total, "no incidents", 100) }))
    .sort((a, b) => compareText(a.key, b.key));

  const bySeverity = SEVERITY_LEVELS.map((severity) => {
    const level = incidents.filter((i) => i.severity === severity);
    const ejCount = level.filter((i) => i.inEnvironmentalJusticeCommunity).length;
    return {
      severity,
      count: level.length,
      pct: ratio(level.length, total, "no incidents", 100),
      ejCount,
      ejPct: ratio(ejCount, level.length, `no severity ${severity} incidents`, 100),
      remediationCost: sum(level.map((i) => i.remediationCost)),
    };
  });

  return {
    total,
    anonymized: incidents.filter((i) => i.companyName === null).length,
    byType,
    bySeverity,
    byYear,
    ejCount: ej.length,
    ejPct: ratio(ej.length, total, "no incidents", 100),
    totalRemediationCost,
    avgRemediationCost: ratio(totalRemediationCost, total, "no incidents"),
    avgSeverity: averageOf(
      incidents.map((i) => i.severity),
      "severity",
    ),
    promptDisclosurePct: ratio(
      disclosed.filter((i) => i.promptDisclosure === true).length,
      disclosed.length,
      "no disclosure data",
      100,
    ),
  };
}
