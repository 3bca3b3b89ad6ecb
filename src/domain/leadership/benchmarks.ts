import type { Company } from "../dataset/types.js";
import { companyGivingPct } from "../aggregation/aggregator.js";
import { compareText, mean, median, round, std } from "../aggregation/statistics.js";
import type { IndustryBenchmark, LeadershipResult } from "./types.js";

function present(values: (number | null | undefined)[]): number[] {
  return values.filter((v): v is number => v !== null && v !== undefined);
}

function rounded(value: number | null): number | null {
  return value === null ? null : round(value, 2);
}

/**
 * Per-industry reference values: how a typical company in the industry
 * gives, discloses and scores.
 */
export function industryBenchmarks(
  companies: readonly Company[],
  leadership: LeadershipResult,
): IndustryBenchmark[] {
  const scoreByName = new Map(leadership.scored.map((s) => [s.name, s.score]));
  const byIndustry = new Map<string, Company[]>();
  for (const c of companies) {
    const bucket = byIndustry.get(c.industry);
    if (bucket) bucket.push(c);
    else byIndustry.set(c.industry, [c]);
  }

  return [...byIndustry.entries()]
    .sort(([a], [b]) => compareText(a, b))
    .map(([industry, members]) => {
      const giving = members.map((c) => c.giving);
      const pct = present(members.map(companyGivingPct));
      const transparency = present(members.map((c) => c.transparencyScore));
      const scores = present(members.map((c) => scoreByName.get(c.name)));
      return {
        industry,
        companyCount: members.length,
        giving: {
          mean: round(mean(giving) ?? 0, 2),
          median: round(median(giving) ?? 0, 2),
          std: rounded(std(giving)),
        },
        givingPctOfRevenue: { mean: rounded(mean(pct)), median: rounded(median(pct)) },
        transparency: {
          mean: rounded(mean(transparency)),
          median: rounded(median(transparency)),
        },
        leadershipScore: { mean: rounded(mean(scores)), median: rounded(median(scores)) },
      };
    });
}
