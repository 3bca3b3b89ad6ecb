import type { Company, Incident } from "../dataset/types.js";
import type { YearRange } from "../filters/types.js";
import { compareText, mean, sum } from "./statistics.js";
import type {
  Breakdown,
  GroupAggregate,
  GroupDimension,
  MetricResult,
  OverviewKpis,
} from "./types.js";

// ============================================================================
// MetricResult helpers
// ============================================================================

export function ok(value: number): MetricResult {
  return { status: "ok", value };
}

export function insufficient(reason: string): MetricResult {
  return { status: "insufficient_data", reason };
}

/** numerator / denominator × scale, or insufficient data on a zero denominator. */
export function ratio(
  numerator: number,
  denominator: number,
  reason: string,
  scale = 1,
): MetricResult {
  return denominator > 0 ? ok((numerator / denominator) * scale) : insufficient(reason);
}

export function averageOf(
  values: readonly (number | null)[],
  label: string,
): MetricResult {
  const present = values.filter((v): v is number => v !== null);
  const m = mean(present);
  return m === null ? insufficient(`no ${label} values`) : ok(m);
}

export function metricValue(m: MetricResult): number | null {
  return m.status === "ok" ? m.value : null;
}

// ============================================================================
// Revenue-based ratios
// ============================================================================

/**
 * Giving as a percentage of revenue. Companies without revenue are left out
 * of both sides of the ratio; they still count everywhere else.
 */
export function givingPctOfRevenue(companies: readonly Company[]): MetricResult {
  let giving = 0;
  let revenue = 0;
  for (const c of companies) {
    if (c.revenue === null) continue;
    giving += c.giving;
    revenue += c.revenue;
  }
  return ratio(giving, revenue, "no companies with reported revenue", 100);
}

/** Per-company giving % of revenue, null when revenue is absent or zero. */
export function companyGivingPct(c: Company): number | null {
  return c.revenue !== null && c.revenue > 0 ? (c.giving / c.revenue) * 100 : null;
}

// ============================================================================
// Incident attribution
// ============================================================================

/**
 * Incident count per company: linked incident records when the company has
 * any, otherwise its self-reported count.
 */
export function incidentCountsByCompany(
  companies: readonly Company[],
  incidents: readonly Incident[],
): Map<string, number> {
  const linked = new Map<string, number>();
  for (const i of incidents) {
    if (i.companyName !== null) {
      linked.set(i.companyName, (linked.get(i.companyName) ?? 0) + 1);
    }
  }
  const counts = new Map<string, number>();
  for (const c of companies) {
    counts.set(c.name, linked.get(c.name) ?? c.incidentCount ?? 0);
  }
  return counts;
}

// ============================================================================
// Group-by
// ============================================================================

export interface AggregateOptions {
  incidents?: readonly Incident[];
  /** Restricts the year dimension to years inside the range. */
  yearRange?: YearRange;
}

function groupKeys(
  c: Company,
  dimension: GroupDimension,
  yearRange: YearRange | undefined,
): string[] {
  switch (dimension) {
    case "state":
      return [c.state];
    case "industry":
      return [c.industry];
    case "region":
      return c.region ? [c.region] : [];
    case "size":
      return c.size ? [c.size] : [];
    case "year":
      return c.years
        .filter(
          (y) =>
            (yearRange?.from === undefined || y >= yearRange.from) &&
            (yearRange?.to === undefined || y <= yearRange.to),
        )
        .map(String);
  }
}

function summarizeGroup(
  key: string,
  members: Company[],
  incidentCounts: Map<string, number>,
): Omit<GroupAggregate, "sharePct"> {
  const totalGiving = sum(members.map((c) => c.giving));
  return {
    key,
    companyCount: members.length,
    totalGiving,
    givingPerCompany: totalGiving / members.length,
    revenueReported: members.filter((c) => c.revenue !== null).length,
    givingPctOfRevenue: givingPctOfRevenue(members),
    avgTransparency: averageOf(
      members.map((c) => c.transparencyScore),
      "transparency score",
    ),
    avgEsg: averageOf(members.map((c) => c.esgScore), "ESG score"),
    avgImpact: averageOf(members.map((c) => c.impactScore), "impact score"),
    incidentCount: sum(members.map((c) => incidentCounts.get(c.name) ?? 0)),
  };
}

/**
 * Per-group totals, counts and ratios for one dimension.
 *
 * Shares are relative to the sum of the group totals, so within one
 * breakdown they add up to 100. Under the year dimension a company counts
 * once in every year it has a record for.
 */
export function aggregateBy(
  companies: readonly Company[],
  dimension: GroupDimension,
  options: AggregateOptions = {},
): Breakdown {
  const buckets = new Map<string, Company[]>();
  let unassigned = 0;

  for (const c of companies) {
    const keys = groupKeys(c, dimension, options.yearRange);
    if (keys.length === 0) {
      unassigned++;
      continue;
    }
    for (const key of keys) {
      const bucket = buckets.get(key);
      if (bucket) bucket.push(c);
      else buckets.set(key, [c]);
    }
  }

  const incidentCounts = incidentCountsByCompany(companies, options.incidents ?? []);
  const partial = [...buckets.entries()].map(([key, members]) =>
    summarizeGroup(key, members, incidentCounts),
  );
  const totalGiving = sum(partial.map((g) => g.totalGiving));

  const groups: GroupAggregate[] = partial
    .map((g) => ({
      ...g,
      sharePct: ratio(g.totalGiving, totalGiving, "total giving is zero", 100),
    }))
    .sort((a, b) => b.totalGiving - a.totalGiving || compareText(a.key, b.key));

  return { dimension, totalGiving, groups, unassigned };
}

// ============================================================================
// Overview
// ============================================================================

export function computeOverview(
  companies: readonly Company[],
  incidents: readonly Incident[],
): OverviewKpis {
  const totalGiving = sum(companies.map((c) => c.giving));
  const years = companies.flatMap((c) => c.years);

  return {
    companyCount: companies.length,
    totalGiving,
    avgGivingPerCompany: ratio(totalGiving, companies.length, "no companies"),
    givingPctOfRevenue: givingPctOfRevenue(companies),
    revenueReported: companies.filter((c) => c.revenue !== null).length,
    avgTransparency: averageOf(
      companies.map((c) => c.transparencyScore),
      "transparency score",
    ),
    avgEsg: averageOf(companies.map((c) => c.esgScore), "ESG score"),
    totalIncidents:
      sum([...incidentCountsByCompany(companies, incidents).values()]) +
      incidents.filter((i) => i.companyName === null).length,
    industries: new Set(companies.map((c) => c.industry)).size,
    states: new Set(companies.map((c) => c.state)).size,
    yearSpan:
      years.length > 0
        ? { from: Math.min(...years), to: Math.max(...years) }
        : null,
  };
}
