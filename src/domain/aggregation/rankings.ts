import type { Company } from "../dataset/types.js";
import { companyGivingPct } from "./aggregator.js";
import { compareText } from "./statistics.js";

export type RankingBasis = "giving" | "givingPctOfRevenue";

export interface RankedCompany {
  rank: number;
  name: string;
  industry: string;
  state: string;
  giving: number;
  revenue: number | null;
  givingPctOfRevenue: number | null;
}

/**
 * Top companies by absolute giving or by giving as % of revenue. Under the
 * revenue basis, companies without revenue are left out.
 */
export function topCompanies(
  companies: readonly Company[],
  basis: RankingBasis,
  limit: number,
): RankedCompany[] {
  const rows = companies
    .map((c) => ({ c, pct: companyGivingPct(c) }))
    .filter(({ pct }) => basis === "giving" || pct !== null)
    .sort((a, b) => {
      const diff =
        basis === "giving" ? b.c.giving - a.c.giving : (b.pct ?? 0) - (a.pct ?? 0);
      return diff || compareText(a.c.name, b.c.name);
    });

  return rows.slice(0, Math.max(0, limit)).map(({ c, pct }, i) => ({
    rank: i + 1,
    name: c.name,
    industry: c.industry,
    state: c.state,
    giving: c.giving,
    revenue: c.revenue,
    givingPctOfRevenue: pct,
  }));
}

export interface CompanyMatch {
  company: Company;
  totalMatches: number;
  otherMatches: string[];
}

const MAX_OTHER_MATCHES = 10;

/**
 * Case-insensitive substring lookup. An exact name match wins; otherwise
 * the first match in name order.
 */
export function findCompany(
  companies: readonly Company[],
  query: string,
): CompanyMatch | null {
  const needle = query.trim().toLowerCase();
  if (!needle) return null;

  const matches = companies
    .filter((c) => c.name.toLowerCase().includes(needle))
    .sort((a, b) => compareText(a.name, b.name));
  if (matches.length === 0) return null;

  const company = matches.find((c) => c.name.toLowerCase() === needle) ?? matches[0];
  return {
    company,
    totalMatches: matches.length,
    otherMatches: matches
      .filter((c) => c !== company)
      .slice(0, MAX_OTHER_MATCHES)
      .map((c) => c.name),
  };
}
