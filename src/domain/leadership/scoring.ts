import type { Company, Incident } from "../dataset/types.js";
import { companyGivingPct } from "../aggregation/aggregator.js";
import {
  compareText,
  mean,
  percentileRanks,
  quantile,
  round,
  std,
} from "../aggregation/statistics.js";
import type {
  BandThresholds,
  BandingPolicy,
  ComponentValues,
  LeadershipBand,
  LeadershipPolicy,
  LeadershipResult,
  ScoreComponent,
  ScoredCompany,
} from "./types.js";

const SCORE_COMPONENTS: ScoreComponent[] = [
  "giving",
  "transparency",
  "consistency",
  "impact",
  "incidents",
];

// ============================================================================
// Components
// ============================================================================

/**
 * Ranks the present values of `extract` across the population and writes
 * `transform(rank)` into each company's component slot.
 */
function assignRanked(
  companies: readonly Company[],
  components: ComponentValues[],
  component: ScoreComponent,
  extract: (c: Company, index: number) => number | null,
  transform: (rank: number) => number,
): void {
  const indices: number[] = [];
  const values: number[] = [];
  companies.forEach((c, i) => {
    const v = extract(c, i);
    if (v !== null) {
      indices.push(i);
      values.push(v);
    }
  });
  percentileRanks(values).forEach((rank, k) => {
    components[indices[k]][component] = transform(rank);
  });
}

/**
 * Incident count when known: linked records first, then the self-reported
 * count. With incident data loaded, a company with neither has zero.
 */
function incidentCounts(
  companies: readonly Company[],
  incidents: readonly Incident[],
): (number | null)[] {
  const linked = new Map<string, number>();
  for (const i of incidents) {
    if (i.companyName !== null) {
      linked.set(i.companyName, (linked.get(i.companyName) ?? 0) + 1);
    }
  }
  const haveIncidentData = incidents.length > 0;
  return companies.map(
    (c) => linked.get(c.name) ?? c.incidentCount ?? (haveIncidentData ? 0 : null),
  );
}

/** Normalized 0..1 component values per company, absent where the data is. */
export function computeComponents(
  companies: readonly Company[],
  incidents: readonly Incident[],
  policy: LeadershipPolicy,
): ComponentValues[] {
  const components: ComponentValues[] = companies.map(() => ({}));

  assignRanked(
    companies,
    components,
    "giving",
    (c) => (policy.givingBasis === "absolute" ? c.giving : companyGivingPct(c)),
    (rank) => rank,
  );

  const distinctYears = new Set(companies.flatMap((c) => c.years)).size;
  companies.forEach((c, i) => {
    if (c.transparencyScore !== null) {
      components[i].transparency = c.transparencyScore / 100;
    }
    if (distinctYears > 0 && c.years.length > 0) {
      components[i].consistency = Math.min(1, c.years.length / distinctYears);
    }
  });

  assignRanked(companies, components, "impact", (c) => c.impactScore, (rank) => 1 - rank);

  const counts = incidentCounts(companies, incidents);
  assignRanked(companies, components, "incidents", (_c, i) => counts[i], (rank) => 1 - rank);

  return components;
}

/**
 * Weighted mean of the available components on a 0-100 scale, one decimal.
 * Missing components drop out and the remaining weights renormalize.
 */
export function compositeScore(
  components: ComponentValues,
  weights: Record<ScoreComponent, number>,
): number | null {
  let weighted = 0;
  let weightSum = 0;
  for (const key of SCORE_COMPONENTS) {
    const value = components[key];
    if (value === undefined) continue;
    weighted += weights[key] * value;
    weightSum += weights[key];
  }
  if (weightSum === 0) return null;
  return round((weighted / weightSum) * 100, 1);
}

// ============================================================================
// Banding
// ============================================================================

export function computeThresholds(
  scores: readonly number[],
  banding: BandingPolicy,
): BandThresholds | null {
  if (scores.length === 0) return null;

  switch (banding.mode) {
    case "quartile": {
      const q1 = quantile(scores, 0.25) ?? 0;
      const q2 = quantile(scores, 0.5) ?? 0;
      const q3 = quantile(scores, 0.75) ?? 0;
      return { mode: "quartile", cutPoints: [q1, q2, q3] };
    }
    case "average-relative": {
      const m = mean(scores) ?? 0;
      const sigma = std(scores) ?? 0;
      const k = banding.spread;
      return {
        mode: "average-relative",
        cutPoints: [m - k * sigma, m, m + k * sigma],
      };
    }
    case "fixed":
      return { mode: "fixed", cutPoints: [...banding.thresholds] };
  }
}

export function bandFor(score: number, thresholds: BandThresholds): LeadershipBand {
  const [low, mid, high] = thresholds.cutPoints;
  if (score >= high) return "Leader";
  if (score >= mid) return "Above Average";
  if (score >= low) return "Below Average";
  return "Laggard";
}

// ============================================================================
// Scoring
// ============================================================================

/**
 * Scores and bands every company in the population. Percentile-based
 * components are relative to the population passed in, so a filtered view
 * is scored against itself.
 */
export function scoreLeadership(
  companies: readonly Company[],
  incidents: readonly Incident[],
  policy: LeadershipPolicy,
): LeadershipResult {
  const components = computeComponents(companies, incidents, policy);

  const unscored: string[] = [];
  const provisional: { company: Company; score: number; components: ComponentValues }[] = [];
  companies.forEach((company, i) => {
    const score = compositeScore(components[i], policy.weights);
    if (score === null) unscored.push(company.name);
    else provisional.push({ company, score, components: components[i] });
  });

  provisional.sort(
    (a, b) => b.score - a.score || compareText(a.company.name, b.company.name),
  );

  const thresholds = computeThresholds(
    provisional.map((p) => p.score),
    policy.banding,
  );

  const bandCounts: Record<LeadershipBand, number> = {
    Leader: 0,
    "Above Average": 0,
    "Below Average": 0,
    Laggard: 0,
  };

  const scored: ScoredCompany[] = [];
  provisional.forEach((p, i) => {
    // competition ranking: equal scores share a rank
    const prev = scored[i - 1];
    const rank = prev && prev.score === p.score ? prev.rank : i + 1;
    const band = thresholds ? bandFor(p.score, thresholds) : "Laggard";
    bandCounts[band]++;
    scored.push({
      name: p.company.name,
      industry: p.company.industry,
      state: p.company.state,
      score: p.score,
      band,
      rank,
      components: roundComponents(p.components),
    });
  });

  return {
    scored,
    unscored: [...unscored].sort(compareText),
    thresholds: thresholds
      ? {
          mode: thresholds.mode,
          cutPoints: [
            round(thresholds.cutPoints[0], 1),
            round(thresholds.cutPoints[1], 1),
            round(thresholds.cutPoints[2], 1),
          ],
        }
      : null,
    bandCounts,
    leaders: scored.slice(0, policy.listSize),
    laggards: scored.slice(-policy.listSize).reverse(),
  };
}

function roundComponents(values: ComponentValues): ComponentValues {
  const out: ComponentValues = {};
  for (const key of SCORE_COMPONENTS) {
    const v = values[key];
    if (v !== undefined) out[key] = round(v, 4);
  }
  return out;
}
