import { getErrorMessage, logWarn } from "../core/logging.js";
import { filterSignature, parseFilterSet } from "../domain/filters/filter-engine.js";
import type { FilterSet } from "../domain/filters/types.js";
import { SessionRegistry } from "../domain/dashboard/session-registry.js";
import type { ServerContext } from "./context.js";
import { argStringOpt } from "./tool-registry.js";

export interface ResolvedQuery {
  sessionId: string;
  filters: FilterSet;
  signature: string;
  /** True when the call passed its own filters instead of the session's. */
  adHoc: boolean;
}

export const SESSION_ID_SCHEMA = {
  type: "string",
  description:
    'Dashboard session id (letters, digits, ".", "_", "-"). Defaults to "default".',
} as const;

export const FILTERS_SCHEMA = {
  type: "object",
  description:
    "Filters for this call only, overriding the session's. Keys: industry, state, region, size (string or string[]), yearRange ({from?, to?}), nameContains (string).",
  properties: {
    industry: { type: ["string", "array"], items: { type: "string" } },
    state: { type: ["string", "array"], items: { type: "string" } },
    region: { type: ["string", "array"], items: { type: "string" } },
    size: { type: ["string", "array"], items: { type: "string" } },
    yearRange: {
      type: "object",
      properties: { from: { type: "integer" }, to: { type: "integer" } },
    },
    nameContains: { type: "string" },
  },
} as const;

/**
 * The filter set a dashboard call runs against: its own `filters` argument
 * when given, otherwise the session's current filters.
 */
export function resolveQuery(
  args: Record<string, unknown> | undefined,
  ctx: ServerContext,
): ResolvedQuery {
  const sessionId = SessionRegistry.normalizeId(argStringOpt(args, "session_id"));
  const raw = args?.["filters"];
  const adHoc = raw !== undefined && raw !== null;
  const filters = adHoc ? parseFilterSet(raw) : ctx.sessions.get(sessionId).filters;
  return { sessionId, filters, signature: filterSignature(filters), adHoc };
}

/** Best-effort: a failed write is logged and the query still succeeds. */
export function recordQuery(
  ctx: ServerContext,
  tool: string,
  query: ResolvedQuery,
  args: Record<string, unknown> | undefined,
  resultCount: number,
): void {
  if (!ctx.queryHistoryStore) return;
  try {
    ctx.queryHistoryStore.logQuery(
      tool,
      query.sessionId,
      query.signature,
      { ...args, filters: query.filters },
      resultCount,
    );
  } catch (err) {
    logWarn(`Query history write failed for ${tool}: ${getErrorMessage(err)}`);
  }
}

export function attribution(ctx: ServerContext): string {
  const dataset = ctx.dashboard.getDataset();
  return `Dataset: ${dataset.source} (v${dataset.version}, loaded ${dataset.loadedAt})`;
}
