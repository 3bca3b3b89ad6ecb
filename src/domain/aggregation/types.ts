// ============================================================================
// Aggregation Types
// ============================================================================

/**
 * A derived number, or the reason it could not be computed. Ratios over zero
 * eligible records never divide by zero; they report insufficient data.
 */
export type MetricResult =
  | { status: "ok"; value: number }
  | { status: "insufficient_data"; reason: string };

export const GROUP_DIMENSIONS = [
  "state",
  "region",
  "industry",
  "size",
  "year",
] as const;
export type GroupDimension = (typeof GROUP_DIMENSIONS)[number];

export interface GroupAggregate {
  key: string;
  companyCount: number;
  totalGiving: number;
  sharePct: MetricResult; // of the grouping's total giving
  givingPerCompany: number;
  revenueReported: number; // companies with revenue present
  givingPctOfRevenue: MetricResult;
  avgTransparency: MetricResult;
  avgEsg: MetricResult;
  avgImpact: MetricResult;
  incidentCount: number;
}

export interface Breakdown {
  dimension: GroupDimension;
  totalGiving: number;
  groups: GroupAggregate[];
  /** Companies with no value for the dimension (e.g. unknown region). */
  unassigned: number;
}

export interface OverviewKpis {
  companyCount: number;
  totalGiving: number;
  avgGivingPerCompany: MetricResult;
  givingPctOfRevenue: MetricResult;
  revenueReported: number;
  avgTransparency: MetricResult;
  avgEsg: MetricResult;
  totalIncidents: number;
  industries: number;
  states: number;
  yearSpan: { from: number; to: number } | null;
}

export type CorrelationStrength =
  | "very strong"
  | "strong"
  | "moderate"
  | "weak"
  | "very weak";

export interface CorrelationPoint {
  name: string;
  x: number;
  y: number;
}

export type CorrelationResult =
  | {
      status: "ok";
      x: string;
      y: string;
      r: number;
      pairs: number;
      strength: CorrelationStrength;
      direction: "positive" | "negative";
      points: CorrelationPoint[];
    }
  | {
      status: "insufficient_data";
      x: string;
      y: string;
      pairs: number;
      reason: string;
    };
