import { metricValue } from "../aggregation/aggregator.js";
import type { CauseAreaSummary } from "../aggregation/cause-areas.js";
import type { CorrelationMatrix } from "../aggregation/correlations.js";
import type { StateSummary } from "../aggregation/geographic.js";
import type { IncidentSummary } from "../aggregation/incidents.js";
import type { RankedCompany, RankingBasis } from "../aggregation/rankings.js";
import { histogram, round } from "../aggregation/statistics.js";
import type { TransparencySummary } from "../aggregation/transparency.js";
import type { TrendSummary } from "../aggregation/trends.js";
import type { Breakdown, CorrelationResult, MetricResult } from "../aggregation/types.js";
import { LEADERSHIP_BANDS, type LeadershipResult } from "../leadership/types.js";

// ============================================================================
// Chart payloads
// ============================================================================

export interface Series {
  name: string;
  values: (number | null)[];
}

export type ChartPayload =
  | {
      chart: "choropleth";
      title: string;
      locationMode: "USA-states";
      locations: string[];
      values: (number | null)[];
    }
  | { chart: "donut"; title: string; labels: string[]; values: number[] }
  | { chart: "bar"; title: string; labels: string[]; series: Series[] }
  | {
      chart: "scatter";
      title: string;
      xLabel: string;
      yLabel: string;
      points: { label: string; x: number; y: number }[];
    }
  | { chart: "histogram"; title: string; bins: { from: number; to: number; count: number }[] }
  | { chart: "line"; title: string; x: number[]; series: Series[] }
  | { chart: "heatmap"; title: string; labels: string[]; values: (number | null)[][] };

function num(m: MetricResult, decimals = 2): number | null {
  const v = metricValue(m);
  return v === null ? null : round(v, decimals);
}

const DIMENSION_LABEL: Record<Breakdown["dimension"], string> = {
  state: "State",
  region: "Region",
  industry: "Industry",
  size: "Company Size",
  year: "Year",
};

export function breakdownCharts(b: Breakdown): ChartPayload[] {
  const label = DIMENSION_LABEL[b.dimension];

  if (b.dimension === "state") {
    return [
      {
        chart: "choropleth",
        title: "Environmental Giving by State",
        locationMode: "USA-states",
        locations: b.groups.map((g) => g.key),
        values: b.groups.map((g) => round(g.totalGiving)),
      },
    ];
  }

  if (b.dimension === "year") {
    const byYear = [...b.groups].sort((x, y) => Number(x.key) - Number(y.key));
    return [
      {
        chart: "line",
        title: "Environmental Giving by Year",
        x: byYear.map((g) => Number(g.key)),
        series: [
          { name: "Total giving ($M)", values: byYear.map((g) => round(g.totalGiving)) },
          { name: "Giving % of revenue", values: byYear.map((g) => num(g.givingPctOfRevenue, 4)) },
        ],
      },
    ];
  }

  return [
    {
      chart: "donut",
      title: `Share of Giving by ${label}`,
      labels: b.groups.map((g) => g.key),
      values: b.groups.map((g) => round(g.totalGiving)),
    },
    {
      chart: "bar",
      title: `Giving as % of Revenue by ${label}`,
      labels: b.groups.map((g) => g.key),
      series: [{ name: "Giving % of revenue", values: b.groups.map((g) => num(g.givingPctOfRevenue, 4)) }],
    },
  ];
}

export type StateMeasure = "totalGiving" | "incidentCount" | "ejIncidentPct" | "localGivingPct";

export function geographicChart(states: StateSummary[], measure: StateMeasure): ChartPayload {
  const value = (s: StateSummary): number | null => {
    switch (measure) {
      case "totalGiving":
        return round(s.totalGiving);
      case "incidentCount":
        return s.incidentCount;
      case "ejIncidentPct":
        return num(s.ejIncidentPct);
      case "localGivingPct":
        return num(s.localGivingPct);
    }
  };
  return {
    chart: "choropleth",
    title: `State ${measure}`,
    locationMode: "USA-states",
    locations: states.map((s) => s.state),
    values: states.map(value),
  };
}

export function correlationCharts(results: CorrelationResult[]): ChartPayload[] {
  const charts: ChartPayload[] = [];
  for (const r of results) {
    if (r.status !== "ok" || r.points.length === 0) continue;
    charts.push({
      chart: "scatter",
      title: `${r.x} vs ${r.y} (r = ${r.r}, ${r.strength})`,
      xLabel: r.x,
      yLabel: r.y,
      points: r.points.map((p) => ({ label: p.name, x: p.x, y: p.y })),
    });
  }
  return charts;
}

export function correlationMatrixChart(m: CorrelationMatrix): ChartPayload {
  return { chart: "heatmap", title: "Correlation Matrix", labels: m.metrics, values: m.values };
}

export function leadershipCharts(result: LeadershipResult): ChartPayload[] {
  return [
    {
      chart: "histogram",
      title: "Leadership Score Distribution",
      bins: histogram(
        result.scored.map((s) => s.score),
        10,
        0,
        100,
      ),
    },
    {
      chart: "donut",
      title: "Leadership Bands",
      labels: [...LEADERSHIP_BANDS],
      values: LEADERSHIP_BANDS.map((b) => result.bandCounts[b]),
    },
  ];
}

export function incidentCharts(s: IncidentSummary): ChartPayload[] {
  return [
    {
      chart: "bar",
      title: "Incidents by Type",
      labels: s.byType.map((t) => t.key),
      series: [{ name: "Incidents", values: s.byType.map((t) => t.count) }],
    },
    {
      chart: "bar",
      title: "Environmental Justice Share by Severity",
      labels: s.bySeverity.map((r) => String(r.severity)),
      series: [
        { name: "Incidents", values: s.bySeverity.map((r) => r.count) },
        { name: "EJ community %", values: s.bySeverity.map((r) => num(r.ejPct)) },
      ],
    },
  ];
}

export function transparencyCharts(s: TransparencySummary): ChartPayload[] {
  return [
    {
      chart: "donut",
      title: "Reporting Detail Level",
      labels: s.reportingLevels.map((l) => l.level),
      values: s.reportingLevels.map((l) => l.count),
    },
    {
      chart: "bar",
      title: "Transparency Score Distribution",
      labels: s.scoreBuckets.map((b) => b.label),
      series: [{ name: "Companies", values: s.scoreBuckets.map((b) => b.count) }],
    },
  ];
}

export function causeAreaChart(s: CauseAreaSummary): ChartPayload {
  return {
    chart: "bar",
    title: "Giving by Cause Area",
    labels: s.causes.map((c) => c.cause),
    series: [{ name: "Giving ($M)", values: s.causes.map((c) => round(c.totalGiving)) }],
  };
}

export function trendCharts(t: TrendSummary): ChartPayload[] {
  return [
    {
      chart: "line",
      title: "Giving and Transparency Over Time",
      x: t.years.map((y) => y.year),
      series: [
        { name: "Total giving ($M)", values: t.years.map((y) => round(y.totalGiving)) },
        { name: "Average transparency", values: t.years.map((y) => num(y.avgTransparency)) },
      ],
    },
  ];
}

export function topCompaniesChart(rows: RankedCompany[], basis: RankingBasis): ChartPayload {
  return {
    chart: "bar",
    title: basis === "giving" ? "Top Companies by Giving" : "Top Companies by Giving % of Revenue",
    labels: rows.map((r) => r.name),
    series: [
      {
        name: basis === "giving" ? "Giving ($M)" : "Giving % of revenue",
        values: rows.map((r) =>
          basis === "giving"
            ? round(r.giving)
            : r.givingPctOfRevenue === null
              ? null
              : round(r.givingPctOfRevenue, 4),
        ),
      },
    ],
  };
}
