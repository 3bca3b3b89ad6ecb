import { REPORTING_LEVELS, type Company, type ReportingLevel } from "../dataset/types.js";
import { averageOf, ratio } from "./aggregator.js";
import type { MetricResult } from "./types.js";

export const SCORE_BUCKETS = [
  { label: "<25", min: 0, max: 25 },
  { label: "25-50", min: 25, max: 50 },
  { label: "50-75", min: 50, max: 75 },
  { label: ">=75", min: 75, max: Infinity },
] as const;

/** Optional company fields tracked by the missing-data report. */
export const OPTIONAL_FIELDS = [
  "revenue",
  "localGiving",
  "transparencyScore",
  "esgScore",
  "impactScore",
  "lossContingencies",
  "remediationExpenses",
  "incidentCount",
  "reportingLevel",
] as const satisfies ReadonlyArray<keyof Company>;

export type OptionalField = (typeof OPTIONAL_FIELDS)[number];

export interface TransparencySummary {
  scored: number;
  avgScore: MetricResult;
  reportingLevels: { level: ReportingLevel; count: number; pct: MetricResult }[];
  scoreBuckets: { label: string; count: number; pct: MetricResult }[];
  missingData: { field: OptionalField; missing: number; pct: MetricResult }[];
}

export function summarizeTransparency(companies: readonly Company[]): TransparencySummary {
  const withLevel = companies.filter((c) => c.reportingLevel !== null);
  const scores = companies
    .map((c) => c.transparencyScore)
    .filter((s): s is number => s !== null);

  return {
    scored: scores.length,
    avgScore: averageOf(scores, "transparency score"),
    reportingLevels: REPORTING_LEVELS.map((level) => {
      const count = withLevel.filter((c) => c.reportingLevel === level).length;
      return {
        level,
        count,
        pct: ratio(count, withLevel.length, "no reporting levels", 100),
      };
    }),
    scoreBuckets: SCORE_BUCKETS.map(({ label, min, max }) => {
      const count = scores.filter((s) => s >= min && s < max).length;
      return { label, count, pct: ratio(count, scores.length, "no transparency scores", 100) };
    }),
    missingData: OPTIONAL_FIELDS.map((field) => {
      const missing = companies.filter((c) => c[field] === null).length;
      return { field, missing, pct: ratio(missing, companies.length, "no companies", 100) };
    }),
  };
}
