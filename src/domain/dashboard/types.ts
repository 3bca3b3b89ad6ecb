import type {
  Breakdown,
  CorrelationResult,
  OverviewKpis,
} from "../aggregation/types.js";
import type { CorrelationMatrix } from "../aggregation/correlations.js";
import type { StateSummary } from "../aggregation/geographic.js";
import type { IncidentSummary } from "../aggregation/incidents.js";
import type { TransparencySummary } from "../aggregation/transparency.js";
import type { CauseAreaSummary } from "../aggregation/cause-areas.js";
import type { TrendSummary } from "../aggregation/trends.js";
import type { RankedCompany } from "../aggregation/rankings.js";
import type { FilteredView } from "../dataset/types.js";
import type { IndustryBenchmark, LeadershipResult } from "../leadership/types.js";

/** Every memoized view and the type it produces. */
export interface ViewResults {
  filteredView: FilteredView;
  overview: OverviewKpis;
  breakdown: Breakdown;
  geographic: StateSummary[];
  correlations: CorrelationResult[];
  correlationMatrix: CorrelationMatrix;
  leadership: LeadershipResult;
  benchmarks: IndustryBenchmark[];
  incidents: IncidentSummary;
  transparency: TransparencySummary;
  causeAreas: CauseAreaSummary;
  trends: TrendSummary;
  topCompanies: RankedCompany[];
}

export type ViewName = keyof ViewResults;

export const VIEW_NAMES: readonly ViewName[] = [
  "filteredView",
  "overview",
  "breakdown",
  "geographic",
  "correlations",
  "correlationMatrix",
  "leadership",
  "benchmarks",
  "incidents",
  "transparency",
  "causeAreas",
  "trends",
  "topCompanies",
];

export interface CacheStats {
  entries: number;
  maxEntries: number;
  hits: number;
  misses: number;
  evictions: number;
}
