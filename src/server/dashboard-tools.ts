import {
  DEFAULT_CORRELATION_PAIRS,
  isNumericMetric,
  NUMERIC_METRICS,
  type NumericMetric,
} from "../domain/aggregation/correlations.js";
import type { RankingBasis } from "../domain/aggregation/rankings.js";
import { GROUP_DIMENSIONS, type GroupDimension } from "../domain/aggregation/types.js";
import {
  breakdownCharts,
  causeAreaChart,
  correlationCharts,
  correlationMatrixChart,
  geographicChart,
  incidentCharts,
  leadershipCharts,
  topCompaniesChart,
  transparencyCharts,
  trendCharts,
  type ChartPayload,
  type StateMeasure,
} from "../domain/dashboard/presentation.js";
import type { ServerContext } from "./context.js";
import {
  attribution,
  FILTERS_SCHEMA,
  recordQuery,
  resolveQuery,
  SESSION_ID_SCHEMA,
  type ResolvedQuery,
} from "./session-context.js";
import type { ToolDefinition, ToolResponse } from "./tool-registry.js";
import {
  argBool,
  argBoolOpt,
  argNumber,
  argString,
  argStringArray,
  argStringOpt,
  errorResponse,
  formatToolResponse,
} from "./tool-registry.js";

const STATE_MEASURES: readonly StateMeasure[] = [
  "totalGiving",
  "incidentCount",
  "ejIncidentPct",
  "localGivingPct",
];
const RANKING_BASES: readonly RankingBasis[] = ["giving", "givingPctOfRevenue"];
const DEFAULT_TOP_LIMIT = 10;
const MAX_TOP_LIMIT = 100;

function oneOf<T extends string>(options: readonly T[], value: string): T | undefined {
  return options.find((o) => o === value);
}

interface ViewOutput {
  result: Record<string, unknown>;
  charts?: ChartPayload[];
  /** Row count logged to query history. */
  count: number;
}

interface DashboardToolSpec {
  name: string;
  description: string;
  properties?: Record<string, unknown>;
  required?: string[];
  /** Returns a ToolResponse to reject the arguments. */
  run: (
    query: ResolvedQuery,
    args: Record<string, unknown> | undefined,
    ctx: ServerContext,
  ) => ViewOutput | ToolResponse;
}

function isToolResponse(value: ViewOutput | ToolResponse): value is ToolResponse {
  return "content" in value;
}

/**
 * Every dashboard view shares the same envelope: resolve the session's
 * filters, compute, attach charts unless include_charts is false, log the
 * query.
 */
function dashboardTool(spec: DashboardToolSpec): ToolDefinition {
  return {
    name: spec.name,
    description: spec.description,
    inputSchema: {
      type: "object",
      properties: {
        session_id: SESSION_ID_SCHEMA,
        filters: FILTERS_SCHEMA,
        include_charts: {
          type: "boolean",
          description: "Attach chart payloads (default true).",
        },
        ...spec.properties,
      },
      ...(spec.required && { required: spec.required }),
    },
    handler: async (args, ctx) => {
      const query = resolveQuery(args, ctx);
      const output = spec.run(query, args, ctx);
      if (isToolResponse(output)) return output;

      recordQuery(ctx, spec.name, query, args, output.count);
      const includeCharts = argBoolOpt(args, "include_charts") ?? true;

      return formatToolResponse({
        success: true,
        data: {
          session_id: query.sessionId,
          filters: query.filters,
          filter_signature: query.signature,
          companies_in_view: ctx.dashboard.view(query.filters).companies.length,
          ...output.result,
          ...(includeCharts && output.charts && { charts: output.charts }),
        },
        attribution: attribution(ctx),
      });
    },
  };
}

function parsePair(
  args: Record<string, unknown> | undefined,
): [NumericMetric, NumericMetric][] | string {
  const x = argStringOpt(args, "x");
  const y = argStringOpt(args, "y");
  if (x === undefined && y === undefined) return [...DEFAULT_CORRELATION_PAIRS];
  if (x === undefined || y === undefined) return "Both x and y are required for a custom pair.";
  if (!isNumericMetric(x)) return `Unknown metric "${x}".`;
  if (!isNumericMetric(y)) return `Unknown metric "${y}".`;
  return [[x, y]];
}

export function getToolDefinitions(): ToolDefinition[] {
  const metricNames = Object.keys(NUMERIC_METRICS);

  return [
    dashboardTool({
      name: "get_overview",
      description:
        "Headline KPIs for the filtered view: company count, total environmental giving, average giving per company, giving as % of revenue, average transparency and ESG scores, incident totals.",
      run: (q, _args, ctx) => {
        const overview = ctx.dashboard.overview(q.filters);
        return { result: { overview }, count: overview.companyCount };
      },
    }),
    dashboardTool({
      name: "get_breakdown",
      description:
        "Group the filtered companies by state, region, industry, size or year. Each group reports company count, total giving, share of giving, giving per company, giving % of revenue and average scores. Sorted by total giving.",
      properties: {
        dimension: {
          type: "string",
          enum: [...GROUP_DIMENSIONS],
          description: "Grouping dimension.",
        },
      },
      required: ["dimension"],
      run: (q, args, ctx) => {
        const dimension: GroupDimension | undefined = oneOf(
          GROUP_DIMENSIONS,
          argString(args, "dimension"),
        );
        if (!dimension) {
          return errorResponse(`Invalid dimension. Must be one of: ${GROUP_DIMENSIONS.join(", ")}.`);
        }
        const breakdown = ctx.dashboard.breakdown(q.filters, dimension);
        return {
          result: { breakdown },
          charts: breakdownCharts(breakdown),
          count: breakdown.groups.length,
        };
      },
    }),
    dashboardTool({
      name: "get_geographic_summary",
      description:
        "Per-state summary: companies, giving, local giving %, incidents per company, environmental justice incident count and %, remediation cost. The choropleth colors states by the chosen measure.",
      properties: {
        measure: {
          type: "string",
          enum: [...STATE_MEASURES],
          description: "Measure for the map (default totalGiving).",
        },
      },
      run: (q, args, ctx) => {
        const raw = argStringOpt(args, "measure") ?? "totalGiving";
        const measure = oneOf(STATE_MEASURES, raw);
        if (!measure) {
          return errorResponse(`Invalid measure. Must be one of: ${STATE_MEASURES.join(", ")}.`);
        }
        const states = ctx.dashboard.geographic(q.filters);
        return {
          result: { states },
          charts: [geographicChart(states, measure)],
          count: states.length,
        };
      },
    }),
    dashboardTool({
      name: "get_correlations",
      description:
        "Pearson correlations between company metrics. Without x/y, returns the standard pairs (impact vs giving, ESG vs transparency, loss contingencies vs giving). Pass metrics for a full correlation matrix.",
      properties: {
        x: { type: "string", enum: metricNames, description: "First metric of a custom pair." },
        y: { type: "string", enum: metricNames, description: "Second metric of a custom pair." },
        metrics: {
          type: "array",
          items: { type: "string", enum: metricNames },
          description: "Metrics for a correlation matrix (2 or more).",
        },
        include_points: {
          type: "boolean",
          description: "Include per-company points for scatter plots.",
        },
      },
      run: (q, args, ctx) => {
        const pairs = parsePair(args);
        if (typeof pairs === "string") return errorResponse(pairs);

        const requested = argStringArray(args, "metrics");
        const unknown = requested?.filter((m) => !isNumericMetric(m)) ?? [];
        if (unknown.length > 0) {
          return errorResponse(`Unknown metrics: ${unknown.join(", ")}.`);
        }
        const matrixMetrics = requested?.filter(isNumericMetric) ?? [];
        if (requested && matrixMetrics.length < 2) {
          return errorResponse("A correlation matrix needs at least 2 metrics.");
        }

        const includePoints = argBool(args, "include_points");
        const correlations = ctx.dashboard.correlations(q.filters, pairs, includePoints);
        const matrix =
          matrixMetrics.length >= 2
            ? ctx.dashboard.correlationMatrix(q.filters, matrixMetrics)
            : undefined;

        const charts = correlationCharts(correlations);
        if (matrix) charts.push(correlationMatrixChart(matrix));

        return {
          result: { correlations, ...(matrix && { matrix }) },
          charts,
          count: correlations.length,
        };
      },
    }),
    dashboardTool({
      name: "get_leadership",
      description:
        "Weighted leadership score (giving, transparency, consistency, impact, incidents) for every company in the view, banded into Leader / Above Average / Below Average / Laggard. Returns band counts, cut points, leaders and laggards.",
      properties: {
        include_all: {
          type: "boolean",
          description: "Include every scored company, not only the leaders/laggards lists.",
        },
      },
      run: (q, args, ctx) => {
        const leadership = ctx.dashboard.leadership(q.filters);
        const includeAll = argBool(args, "include_all");
        return {
          result: {
            policy: ctx.config.leadership,
            scored_count: leadership.scored.length,
            unscored: leadership.unscored,
            thresholds: leadership.thresholds,
            band_counts: leadership.bandCounts,
            leaders: leadership.leaders,
            laggards: leadership.laggards,
            ...(includeAll && { scored: leadership.scored }),
          },
          charts: leadershipCharts(leadership),
          count: leadership.scored.length,
        };
      },
    }),
    dashboardTool({
      name: "get_industry_benchmarks",
      description:
        "Per-industry benchmarks: mean/median/std of giving, giving % of revenue, transparency and leadership score.",
      run: (q, _args, ctx) => {
        const benchmarks = ctx.dashboard.benchmarks(q.filters);
        return { result: { benchmarks }, count: benchmarks.length };
      },
    }),
    dashboardTool({
      name: "get_incident_summary",
      description:
        "Environmental incidents in the view: totals, by type, by severity, by year, environmental justice (EJ) community share overall and per severity, remediation cost, prompt disclosure rate.",
      run: (q, _args, ctx) => {
        const incidents = ctx.dashboard.incidents(q.filters);
        return {
          result: { incidents },
          charts: incidentCharts(incidents),
          count: incidents.total,
        };
      },
    }),
    dashboardTool({
      name: "get_transparency_summary",
      description:
        "Reporting detail level distribution, transparency score buckets (<25, 25-50, 50-75, >=75) and a missing-data report per optional metric.",
      run: (q, _args, ctx) => {
        const transparency = ctx.dashboard.transparency(q.filters);
        return {
          result: { transparency },
          charts: transparencyCharts(transparency),
          count: transparency.scored,
        };
      },
    }),
    dashboardTool({
      name: "get_cause_areas",
      description:
        "Environmental giving by cause area: total per cause, supporting companies, share of all giving.",
      run: (q, _args, ctx) => {
        const causeAreas = ctx.dashboard.causeAreas(q.filters);
        return {
          result: { cause_areas: causeAreas },
          charts: [causeAreaChart(causeAreas)],
          count: causeAreas.causes.length,
        };
      },
    }),
    dashboardTool({
      name: "get_trends",
      description:
        "Year-over-year giving, giving % of revenue and average transparency from the history table, plus first-to-last-year transparency change per industry.",
      run: (q, _args, ctx) => {
        const trends = ctx.dashboard.trends(q.filters);
        return {
          result: { trends },
          charts: trendCharts(trends),
          count: trends.years.length,
        };
      },
    }),
    dashboardTool({
      name: "get_top_companies",
      description:
        "Top companies by absolute environmental giving or by giving as % of revenue (companies without revenue are excluded from the latter).",
      properties: {
        basis: {
          type: "string",
          enum: [...RANKING_BASES],
          description: "Ranking basis (default giving).",
        },
        limit: {
          type: "number",
          description: `Number of companies (default ${DEFAULT_TOP_LIMIT}, max ${MAX_TOP_LIMIT}).`,
        },
      },
      run: (q, args, ctx) => {
        const basis = oneOf(RANKING_BASES, argStringOpt(args, "basis") ?? "giving");
        if (!basis) {
          return errorResponse(`Invalid basis. Must be one of: ${RANKING_BASES.join(", ")}.`);
        }
        const limit = Math.max(
          1,
          Math.min(Math.floor(argNumber(args, "limit") ?? DEFAULT_TOP_LIMIT), MAX_TOP_LIMIT),
        );
        const companies = ctx.dashboard.topCompanies(q.filters, basis, limit);
        return {
          result: { basis, companies },
          charts: [topCompaniesChart(companies, basis)],
          count: companies.length,
        };
      },
    }),
    dashboardTool({
      name: "get_company",
      description:
        "Look up a company in the filtered view by name (case-insensitive substring). Returns its full record and its leadership score, rank and band.",
      properties: {
        name: { type: "string", description: "Company name or part of it." },
      },
      required: ["name"],
      run: (q, args, ctx) => {
        const name = argString(args, "name").trim();
        if (!name) return errorResponse("name is required.");
        const detail = ctx.dashboard.company(q.filters, name);
        if (!detail) {
          return errorResponse(`No company matching "${name}" in the current view.`);
        }
        return {
          result: {
            company: detail.company,
            leadership: detail.leadership,
            total_matches: detail.totalMatches,
            other_matches: detail.otherMatches,
          },
          count: detail.totalMatches,
        };
      },
    }),
  ];
}
