import type { Company } from "../dataset/types.js";
import { ratio } from "./aggregator.js";
import { compareText, sum } from "./statistics.js";
import type { MetricResult } from "./types.js";

export interface CauseAreaRow {
  cause: string;
  totalGiving: number;
  supportingCompanies: number;
  /** Share of all environmental giving in the view. */
  pctOfTotalGiving: MetricResult;
}

export interface CauseAreaSummary {
  totalGiving: number;
  allocatedGiving: number;
  causes: CauseAreaRow[];
}

export function summarizeCauseAreas(companies: readonly Company[]): CauseAreaSummary {
  const totalGiving = sum(companies.map((c) => c.giving));
  const byCause = new Map<string, { total: number; supporters: number }>();

  for (const c of companies) {
    for (const [cause, amount] of Object.entries(c.causeAreas)) {
      if (amount <= 0) continue;
      const entry = byCause.get(cause) ?? { total: 0, supporters: 0 };
      entry.total += amount;
      entry.supporters++;
      byCause.set(cause, entry);
    }
  }

  const causes = [...byCause.entries()]
    .map(([cause, { total, supporters }]) => ({
      cause,
      totalGiving: total,
      supportingCompanies: supporters,
      pctOfTotalGiving: ratio(total, totalGiving, "total giving is zero", 100),
    }))
    .sort((a, b) => b.totalGiving - a.totalGiving || compareText(a.cause, b.cause));

  return {
    totalGiving,
    allocatedGiving: sum(causes.map((c) => c.totalGiving)),
    causes,
  };
}
