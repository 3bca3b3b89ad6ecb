import { regionForState } from "./regions.js";
import { round } from "../aggregation/statistics.js";
import { reportingLevelForScore } from "./normalize.js";
import type { Company, HistoryRecord, Incident, SizeCategory } from "./types.js";

export type ImpactLevel = "high" | "medium" | "low";

export interface SampleVocabulary {
  states: { code: string; weight: number }[];
  industries: { name: string; weight: number; impact: ImpactLevel; words: string[] }[];
  sizes: { name: SizeCategory; weight: number; minRevenue: number; maxRevenue: number }[];
  namePrefixes: string[];
  nameSuffixes: string[];
  causes: string[];
  incidentTypes: Record<ImpactLevel, string[]>;
  years: number[];
}

export interface SampleData {
  companies: Company[];
  incidents: Incident[];
  history: HistoryRecord[];
}

// ============================================================================
// Seeded randomness
// ============================================================================

/** mulberry32 */
export function createRng(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

class Random {
  constructor(private readonly next: () => number) {}

  uniform(min: number, max: number): number {
    return min + (max - min) * this.next();
  }

  int(min: number, maxInclusive: number): number {
    return Math.floor(this.uniform(min, maxInclusive + 1));
  }

  chance(p: number): boolean {
    return this.next() < p;
  }

  pick<T>(items: readonly T[]): T {
    return items[Math.min(items.length - 1, Math.floor(this.next() * items.length))];
  }

  weighted<T extends { weight: number }>(items: readonly T[]): T {
    const total = items.reduce((s, i) => s + i.weight, 0);
    let r = this.next() * total;
    for (const item of items) {
      r -= item.weight;
      if (r < 0) return item;
    }
    return items[items.length - 1];
  }

  /** Box-Muller */
  normal(mean: number, sd: number): number {
    const u = Math.max(this.next(), Number.EPSILON);
    const v = this.next();
    return mean + sd * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
  }

  exponential(scale: number): number {
    return -Math.log(Math.max(this.next(), Number.EPSILON)) * scale;
  }

  poisson(lambda: number): number {
    const limit = Math.exp(-lambda);
    let k = 0;
    let p = this.next();
    while (p > limit) {
      k++;
      p *= this.next();
    }
    return k;
  }

  sample<T>(items: readonly T[], count: number): T[] {
    const pool = [...items];
    const out: T[] = [];
    while (out.length < count && pool.length > 0) {
      out.push(pool.splice(this.int(0, pool.length - 1), 1)[0]);
    }
    return out;
  }
}

// ============================================================================
// Generation
// ============================================================================

const GIVING_FACTOR: Record<ImpactLevel, number> = { high: 1.5, medium: 1.0, low: 0.7 };
const IMPACT_FACTOR: Record<ImpactLevel, number> = { high: 3.0, medium: 1.8, low: 1.0 };

const SIZE_PROFILE: Record<
  SizeCategory,
  { giving: number; transparency: number; impact: number; causes: [number, number] }
> = {
  Small: { giving: 1.2, transparency: 0.5, impact: 0.7, causes: [1, 3] },
  Medium: { giving: 1.0, transparency: 0.7, impact: 1.0, causes: [2, 5] },
  Large: { giving: 0.8, transparency: 0.85, impact: 2.0, causes: [3, 7] },
  "Very Large": { giving: 0.6, transparency: 0.95, impact: 4.0, causes: [4, 12] },
};

const clamp = (v: number, lo: number, hi: number) => Math.min(hi, Math.max(lo, v));

function uniqueName(base: string, taken: Map<string, number>): string {
  const n = (taken.get(base) ?? 0) + 1;
  taken.set(base, n);
  return n === 1 ? base : `${base} ${n}`;
}

/**
 * Generates a reproducible demo dataset. The same seed and vocabulary always
 * produce the same records.
 */
export function generateSampleData(
  vocabulary: SampleVocabulary,
  companyCount: number,
  seed: number,
): SampleData {
  const rnd = new Random(createRng(seed));
  const years = [...vocabulary.years].sort((a, b) => a - b);
  const names = new Map<string, number>();
  const companies: Company[] = [];
  const incidents: Incident[] = [];
  const history: HistoryRecord[] = [];

  for (let i = 0; i < companyCount; i++) {
    const state = rnd.weighted(vocabulary.states).code;
    const industry = rnd.weighted(vocabulary.industries);
    const size = rnd.weighted(vocabulary.sizes);
    const profile = SIZE_PROFILE[size.name];

    const revenue = rnd.uniform(size.minRevenue, size.maxRevenue);
    const givingPct =
      rnd.uniform(0.01, 0.5) * GIVING_FACTOR[industry.impact] * profile.giving;
    const giving = (revenue * givingPct) / 100;

    const base =
      industry.words.length > 0 && rnd.chance(0.7)
        ? `${rnd.pick(vocabulary.namePrefixes)} ${rnd.pick(industry.words)} ${rnd.pick(vocabulary.nameSuffixes)}`
        : `${rnd.pick(vocabulary.namePrefixes)} ${rnd.pick(vocabulary.nameSuffixes)}`;
    const name = uniqueName(base, names);

    const transparency = clamp(rnd.normal(50, 15) * profile.transparency * 1.3, 0, 100);
    const impact = clamp(
      (rnd.exponential(10) + rnd.exponential(10)) *
        IMPACT_FACTOR[industry.impact] *
        profile.impact,
      0,
      100,
    );
    const incidentLambda =
      Math.max(0.1, IMPACT_FACTOR[industry.impact] - 1) * profile.impact * 0.5;
    const incidentCount = rnd.poisson(incidentLambda);
    const esg = clamp(
      60 + givingPct * 10 - impact * 0.1 + transparency * 0.2 - 10 + rnd.normal(0, 5),
      0,
      100,
    );

    const causeCount = rnd.int(profile.causes[0], Math.min(profile.causes[1], vocabulary.causes.length));
    const chosen = rnd.sample(vocabulary.causes, causeCount);
    const shares = chosen.map(() => rnd.exponential(1));
    const shareTotal = shares.reduce((s, v) => s + v, 0);
    const causeAreas: Record<string, number> = {};
    chosen.forEach((cause, k) => {
      causeAreas[cause] = round((giving * shares[k]) / shareTotal, 4);
    });

    const firstYear = rnd.int(0, years.length - 1);
    const companyYears = years.slice(Math.min(firstYear, years.length - 1));

    companies.push({
      name,
      state,
      region: regionForState(state),
      industry: industry.name,
      size: size.name,
      revenue: round(revenue, 2),
      giving: round(giving, 4),
      localGiving: round(giving * rnd.uniform(0.15, 0.65), 4),
      transparencyScore: round(transparency, 1),
      esgScore: round(esg, 1),
      impactScore: round(impact, 1),
      lossContingencies: round(impact * 0.5 * rnd.uniform(0.6, 1.4), 3),
      remediationExpenses: round(impact * 0.3 * rnd.uniform(0.7, 1.3), 3),
      incidentCount,
      reportingLevel: reportingLevelForScore(transparency),
      years: companyYears,
      causeAreas,
    });

    const lastYear = companyYears[companyYears.length - 1];
    for (const year of companyYears) {
      const drift = 1 + 0.06 * (year - lastYear) + rnd.normal(0, 0.04);
      history.push({
        companyName: name,
        year,
        giving: round(Math.max(0, giving * drift), 4),
        revenue: round(revenue * (1 + 0.03 * (year - lastYear)), 2),
        transparencyScore: round(clamp(transparency + 2.5 * (year - lastYear), 0, 100), 1),
      });
    }

    for (let k = 0; k < incidentCount; k++) {
      const severity = rnd.weighted([
        { value: 1, weight: 30 },
        { value: 2, weight: 30 },
        { value: 3, weight: 20 },
        { value: 4, weight: 13 },
        { value: 5, weight: 7 },
      ]).value;
      incidents.push({
        companyName: rnd.chance(0.1) ? null : name,
        state: rnd.chance(0.8) ? state : rnd.weighted(vocabulary.states).code,
        latitude: round(clamp(rnd.normal(37.09, 4), 25, 49), 4),
        longitude: round(clamp(rnd.normal(-95.71, 12), -124, -67), 4),
        type: rnd.pick(vocabulary.incidentTypes[industry.impact]),
        severity,
        remediationCost: round(severity * rnd.uniform(0.05, 0.5), 3),
        inEnvironmentalJusticeCommunity: rnd.chance(0.25 + 0.05 * severity),
        year: rnd.pick(companyYears),
        promptDisclosure: rnd.chance(0.6),
      });
    }
  }

  return { companies, incidents, history };
}
