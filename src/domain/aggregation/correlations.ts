import type { Company } from "../dataset/types.js";
import { companyGivingPct } from "./aggregator.js";
import { pearson, round } from "./statistics.js";
import type {
  CorrelationPoint,
  CorrelationResult,
  CorrelationStrength,
} from "./types.js";

export const NUMERIC_METRICS = {
  giving: (c: Company) => c.giving,
  revenue: (c: Company) => c.revenue,
  givingPctOfRevenue: companyGivingPct,
  localGiving: (c: Company) => c.localGiving,
  transparency: (c: Company) => c.transparencyScore,
  esg: (c: Company) => c.esgScore,
  impact: (c: Company) => c.impactScore,
  lossContingencies: (c: Company) => c.lossContingencies,
  remediationExpenses: (c: Company) => c.remediationExpenses,
  incidentCount: (c: Company) => c.incidentCount,
} satisfies Record<string, (c: Company) => number | null>;

export type NumericMetric = keyof typeof NUMERIC_METRICS;

export function isNumericMetric(value: string): value is NumericMetric {
  return Object.hasOwn(NUMERIC_METRICS, value);
}

export const MIN_CORRELATION_PAIRS = 3;

/** Named pairs shown on the dashboard's correlation panel. */
export const DEFAULT_CORRELATION_PAIRS: ReadonlyArray<[NumericMetric, NumericMetric]> = [
  ["impact", "giving"],
  ["esg", "transparency"],
  ["lossContingencies", "giving"],
];

export function strengthLabel(r: number): CorrelationStrength {
  const a = Math.abs(r);
  if (a > 0.7) return "very strong";
  if (a > 0.5) return "strong";
  if (a > 0.3) return "moderate";
  if (a > 0.1) return "weak";
  return "very weak";
}

/**
 * Pearson correlation between two metrics. Companies missing either value
 * are dropped for this pair only.
 */
export function correlate(
  companies: readonly Company[],
  x: NumericMetric,
  y: NumericMetric,
  includePoints = false,
): CorrelationResult {
  const fx = NUMERIC_METRICS[x];
  const fy = NUMERIC_METRICS[y];
  const points: CorrelationPoint[] = [];
  for (const c of companies) {
    const vx = fx(c);
    const vy = fy(c);
    if (vx === null || vy === null) continue;
    points.push({ name: c.name, x: vx, y: vy });
  }

  if (points.length < MIN_CORRELATION_PAIRS) {
    return {
      status: "insufficient_data",
      x,
      y,
      pairs: points.length,
      reason: `need at least ${MIN_CORRELATION_PAIRS} companies with both values`,
    };
  }

  const r = pearson(
    points.map((p) => p.x),
    points.map((p) => p.y),
  );
  if (r === null) {
    return {
      status: "insufficient_data",
      x,
      y,
      pairs: points.length,
      reason: "one of the metrics has no variance",
    };
  }

  return {
    status: "ok",
    x,
    y,
    r: round(r, 4),
    pairs: points.length,
    strength: strengthLabel(r),
    direction: r >= 0 ? "positive" : "negative",
    points: includePoints ? points : [],
  };
}

export interface CorrelationMatrix {
  metrics: NumericMetric[];
  /** r per cell, null where insufficient. Diagonal is 1 when the metric varies. */
  values: (number | null)[][];
  pairs: number[][];
}

export function correlationMatrix(
  companies: readonly Company[],
  metrics: NumericMetric[],
): CorrelationMatrix {
  const values: (number | null)[][] = [];
  const pairs: number[][] = [];
  for (const a of metrics) {
    const rowValues: (number | null)[] = [];
    const rowPairs: number[] = [];
    for (const b of metrics) {
      const result = correlate(companies, a, b);
      rowValues.push(result.status === "ok" ? result.r : null);
      rowPairs.push(result.pairs);
    }
    values.push(rowValues);
    pairs.push(rowPairs);
  }
  return { metrics, values, pairs };
}
