import type { Company, HistoryRecord } from "../dataset/types.js";
import { averageOf, insufficient, metricValue, ok, ratio } from "./aggregator.js";
import { compareText, sum } from "./statistics.js";
import type { MetricResult } from "./types.js";

export interface YearPoint {
  year: number;
  companies: number;
  totalGiving: number;
  givingPctOfRevenue: MetricResult;
  avgTransparency: MetricResult;
}

export interface IndustryTransparencyChange {
  industry: string;
  firstYear: number;
  lastYear: number;
  first: MetricResult;
  last: MetricResult;
  change: MetricResult;
}

export interface TrendSummary {
  years: YearPoint[];
  givingChangePct: MetricResult; // first year to last year
  transparencyByIndustry: IndustryTransparencyChange[];
}

function yearPoint(year: number, records: HistoryRecord[]): YearPoint {
  const withRevenue = records.filter((r) => r.revenue !== null);
  return {
    year,
    companies: new Set(records.map((r) => r.companyName)).size,
    totalGiving: sum(records.map((r) => r.giving)),
    givingPctOfRevenue: ratio(
      sum(withRevenue.map((r) => r.giving)),
      sum(withRevenue.map((r) => r.revenue ?? 0)),
      "no revenue reported",
      100,
    ),
    avgTransparency: averageOf(
      records.map((r) => r.transparencyScore),
      "transparency score",
    ),
  };
}

function groupByYear(history: readonly HistoryRecord[]): Map<number, HistoryRecord[]> {
  const byYear = new Map<number, HistoryRecord[]>();
  for (const r of history) {
    const bucket = byYear.get(r.year);
    if (bucket) bucket.push(r);
    else byYear.set(r.year, [r]);
  }
  return byYear;
}

/**
 * Year-over-year series from the history records, with each industry's
 * transparency change between its first and last year of scores.
 */
export function summarizeTrends(
  companies: readonly Company[],
  history: readonly HistoryRecord[],
): TrendSummary {
  const years = [...groupByYear(history).entries()]
    .sort(([a], [b]) => a - b)
    .map(([year, records]) => yearPoint(year, records));

  let givingChangePct: MetricResult = insufficient("need at least two years of history");
  if (years.length >= 2) {
    const first = years[0].totalGiving;
    const last = years[years.length - 1].totalGiving;
    givingChangePct = ratio(last - first, first, "no giving in first year", 100);
  }

  const industryOf = new Map(companies.map((c) => [c.name, c.industry]));
  const byIndustry = new Map<string, HistoryRecord[]>();
  for (const r of history) {
    const industry = industryOf.get(r.companyName);
    if (industry === undefined || r.transparencyScore === null) continue;
    const bucket = byIndustry.get(industry);
    if (bucket) bucket.push(r);
    else byIndustry.set(industry, [r]);
  }

  const transparencyByIndustry = [...byIndustry.entries()]
    .sort(([a], [b]) => compareText(a, b))
    .map(([industry, records]) => {
      const points = [...groupByYear(records).entries()].sort(([a], [b]) => a - b);
      const [firstYear, firstRecords] = points[0];
      const [lastYear, lastRecords] = points[points.length - 1];
      const first = averageOf(firstRecords.map((r) => r.transparencyScore), "transparency score");
      const last = averageOf(lastRecords.map((r) => r.transparencyScore), "transparency score");
      const a = metricValue(first);
      const b = metricValue(last);
      return {
        industry,
        firstYear,
        lastYear,
        first,
        last,
        change:
          points.length >= 2 && a !== null && b !== null
            ? ok(b - a)
            : insufficient("need scores in at least two years"),
      };
    });

  return { years, givingChangePct, transparencyByIndustry };
}
