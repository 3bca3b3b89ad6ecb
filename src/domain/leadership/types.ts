// ============================================================================
// Leadership Scoring Types
// ============================================================================

export const LEADERSHIP_BANDS = [
  "Leader",
  "Above Average",
  "Below Average",
  "Laggard",
] as const;
export type LeadershipBand = (typeof LEADERSHIP_BANDS)[number];

export type ScoreComponent =
  | "giving"
  | "transparency"
  | "consistency"
  | "impact"
  | "incidents";

export type GivingBasis = "revenue_share" | "absolute";

export type BandingPolicy =
  | { mode: "quartile" }
  | { mode: "average-relative"; spread: number } // k in mean ± k·σ
  | { mode: "fixed"; thresholds: [number, number, number] }; // ascending cut points

export interface LeadershipPolicy {
  /** Integer weights, non-negative, summing to 100. */
  weights: Record<ScoreComponent, number>;
  givingBasis: GivingBasis;
  banding: BandingPolicy;
  /** Size of the leaders / laggards lists. */
  listSize: number;
}

export type ComponentValues = Partial<Record<ScoreComponent, number>>;

export interface ScoredCompany {
  name: string;
  industry: string;
  state: string;
  score: number;
  band: LeadershipBand;
  rank: number; // 1-based, by score desc
  components: ComponentValues;
}

export interface BandThresholds {
  mode: BandingPolicy["mode"];
  /** Lower bound (inclusive) of Below Average, Above Average, Leader. */
  cutPoints: [number, number, number];
}

export interface LeadershipResult {
  scored: ScoredCompany[];
  unscored: string[]; // companies with no usable component
  thresholds: BandThresholds | null;
  bandCounts: Record<LeadershipBand, number>;
  leaders: ScoredCompany[];
  laggards: ScoredCompany[];
}

export interface IndustryBenchmark {
  industry: string;
  companyCount: number;
  giving: { mean: number; median: number; std: number | null };
  givingPctOfRevenue: { mean: number | null; median: number | null };
  transparency: { mean: number | null; median: number | null };
  leadershipScore: { mean: number | null; median: number | null };
}
