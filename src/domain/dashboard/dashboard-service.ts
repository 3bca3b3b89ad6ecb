import { aggregateBy, computeOverview } from "../aggregation/aggregator.js";
import { summarizeCauseAreas } from "../aggregation/cause-areas.js";
import {
  correlate,
  correlationMatrix,
  DEFAULT_CORRELATION_PAIRS,
  type CorrelationMatrix,
  type NumericMetric,
} from "../aggregation/correlations.js";
import { summarizeByState, type StateSummary } from "../aggregation/geographic.js";
import { summarizeIncidents, type IncidentSummary } from "../aggregation/incidents.js";
import {
  findCompany,
  topCompanies,
  type CompanyMatch,
  type RankedCompany,
  type RankingBasis,
} from "../aggregation/rankings.js";
import { summarizeTransparency, type TransparencySummary } from "../aggregation/transparency.js";
import { summarizeTrends, type TrendSummary } from "../aggregation/trends.js";
import type { CauseAreaSummary } from "../aggregation/cause-areas.js";
import type {
  Breakdown,
  CorrelationResult,
  GroupDimension,
  OverviewKpis,
} from "../aggregation/types.js";
import type { Dataset, FilteredView } from "../dataset/types.js";
import { applyFilters, filterSignature } from "../filters/filter-engine.js";
import type { FilterSet } from "../filters/types.js";
import { industryBenchmarks } from "../leadership/benchmarks.js";
import { scoreLeadership } from "../leadership/scoring.js";
import type {
  IndustryBenchmark,
  LeadershipPolicy,
  LeadershipResult,
  ScoredCompany,
} from "../leadership/types.js";
import { AggregateCache } from "./aggregate-cache.js";
import type { CacheStats } from "./types.js";

export interface CompanyDetail extends CompanyMatch {
  leadership: ScoredCompany | null;
}

/**
 * Answers every dashboard view for a filter set against the current
 * dataset. Views are memoized in the shared AggregateCache; swapping the
 * dataset clears it.
 */
export class DashboardService {
  private dataset: Dataset;
  private policy: LeadershipPolicy;
  private cache: AggregateCache;

  constructor(dataset: Dataset, policy: LeadershipPolicy, cache: AggregateCache) {
    this.dataset = dataset;
    this.policy = policy;
    this.cache = cache;
  }

  getDataset(): Dataset {
    return this.dataset;
  }

  setDataset(dataset: Dataset): void {
    this.dataset = dataset;
    this.cache.clear();
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  private key(filters: FilterSet, params = ""): string {
    return AggregateCache.key(this.dataset.version, filterSignature(filters), params);
  }

  view(filters: FilterSet): FilteredView {
    return this.cache.getOrCompute("filteredView", this.key(filters), () =>
      applyFilters(this.dataset, filters),
    );
  }

  overview(filters: FilterSet): OverviewKpis {
    return this.cache.getOrCompute("overview", this.key(filters), () => {
      const v = this.view(filters);
      return computeOverview(v.companies, v.incidents);
    });
  }

  breakdown(filters: FilterSet, dimension: GroupDimension): Breakdown {
    return this.cache.getOrCompute("breakdown", this.key(filters, dimension), () => {
      const v = this.view(filters);
      return aggregateBy(v.companies, dimension, {
        incidents: v.incidents,
        yearRange: filters.yearRange,
      });
    });
  }

  geographic(filters: FilterSet): StateSummary[] {
    return this.cache.getOrCompute("geographic", this.key(filters), () => {
      const v = this.view(filters);
      return summarizeByState(v.companies, v.incidents);
    });
  }

  correlations(
    filters: FilterSet,
    pairs: ReadonlyArray<[NumericMetric, NumericMetric]> = DEFAULT_CORRELATION_PAIRS,
    includePoints = false,
  ): CorrelationResult[] {
    const params = `${pairs.map(([x, y]) => `${x}~${y}`).join(",")}|${includePoints ? "points" : ""}`;
    return this.cache.getOrCompute("correlations", this.key(filters, params), () => {
      const v = this.view(filters);
      return pairs.map(([x, y]) => correlate(v.companies, x, y, includePoints));
    });
  }

  correlationMatrix(filters: FilterSet, metrics: NumericMetric[]): CorrelationMatrix {
    return this.cache.getOrCompute("correlationMatrix", this.key(filters, metrics.join(",")), () =>
      correlationMatrix(this.view(filters).companies, metrics),
    );
  }

  leadership(filters: FilterSet): LeadershipResult {
    return this.cache.getOrCompute("leadership", this.key(filters), () => {
      const v = this.view(filters);
      return scoreLeadership(v.companies, v.incidents, this.policy);
    });
  }

  benchmarks(filters: FilterSet): IndustryBenchmark[] {
    return this.cache.getOrCompute("benchmarks", this.key(filters), () =>
      industryBenchmarks(this.view(filters).companies, this.leadership(filters)),
    );
  }

  incidents(filters: FilterSet): IncidentSummary {
    return this.cache.getOrCompute("incidents", this.key(filters), () =>
      summarizeIncidents(this.view(filters).incidents),
    );
  }

  transparency(filters: FilterSet): TransparencySummary {
    return this.cache.getOrCompute("transparency", this.key(filters), () =>
      summarizeTransparency(this.view(filters).companies),
    );
  }

  causeAreas(filters: FilterSet): CauseAreaSummary {
    return this.cache.getOrCompute("causeAreas", this.key(filters), () =>
      summarizeCauseAreas(this.view(filters).companies),
    );
  }

  trends(filters: FilterSet): TrendSummary {
    return this.cache.getOrCompute("trends", this.key(filters), () => {
      const v = this.view(filters);
      return summarizeTrends(v.companies, v.history);
    });
  }

  topCompanies(filters: FilterSet, basis: RankingBasis, limit: number): RankedCompany[] {
    return this.cache.getOrCompute("topCompanies", this.key(filters, `${basis}:${limit}`), () =>
      topCompanies(this.view(filters).companies, basis, limit),
    );
  }

  /** Lookup within the filtered view, with the company's leadership standing. */
  company(filters: FilterSet, query: string): CompanyDetail | null {
    const match = findCompany(this.view(filters).companies, query);
    if (!match) return null;
    const standing = this.leadership(filters).scored.find(
      (s) => s.name === match.company.name,
    );
    return { ...match, leadership: standing ?? null };
  }
}
