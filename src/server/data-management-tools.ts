import path from "path";
import { getErrorMessage, logError } from "../core/logging.js";
import {
  defaultExportName,
  EXPORT_TABLES,
  toCsv,
  writeExport,
} from "../data-sources/csv-exporter.js";
import {
  attribution,
  FILTERS_SCHEMA,
  recordQuery,
  resolveQuery,
  SESSION_ID_SCHEMA,
} from "./session-context.js";
import type { ToolDefinition } from "./tool-registry.js";
import {
  argBool,
  argNumber,
  argStringOpt,
  errorResponse,
  formatToolResponse,
} from "./tool-registry.js";

const EXPORT_SCOPES = ["filtered", "full"] as const;

function safeParseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return { _parse_error: true, raw };
  }
}

export function getToolDefinitions(): ToolDefinition[] {
  return [
    {
      name: "dataset_status",
      description:
        "Show the loaded dataset (source, version, row counts, skipped rows with reasons), the leadership policy, aggregate cache statistics and persistence status.",
      inputSchema: { type: "object", properties: {} },
      handler: async (_args, ctx) => {
        const dataset = ctx.dashboard.getDataset();
        return formatToolResponse({
          success: true,
          data: {
            source: dataset.source,
            version: dataset.version,
            loaded_at: dataset.loadedAt,
            counts: {
              companies: dataset.companies.length,
              incidents: dataset.incidents.length,
              history: dataset.history.length,
            },
            load_report: dataset.report,
            leadership_policy: ctx.config.leadership,
            cache: ctx.dashboard.cacheStats(),
            sessions: ctx.sessions.list().length,
            persistence: {
              presets: ctx.presetStore !== undefined,
              query_history: ctx.queryHistoryStore !== undefined,
            },
          },
          attribution: attribution(ctx),
        });
      },
    },
    {
      name: "reload_dataset",
      description:
        "Reload the dataset from its configured source (CSV files/URLs, or the seeded sample). Bumps the dataset version and clears cached aggregates. Session filters are kept.",
      inputSchema: { type: "object", properties: {} },
      handler: async (_args, ctx) => {
        const previous = ctx.dashboard.getDataset().version;
        try {
          const dataset = await ctx.loader.load();
          ctx.dashboard.setDataset(dataset);
          return formatToolResponse({
            success: true,
            data: {
              previous_version: previous,
              version: dataset.version,
              source: dataset.source,
              load_report: dataset.report,
            },
            attribution: attribution(ctx),
          });
        } catch (err) {
          logError("Dataset reload failed:", getErrorMessage(err));
          return errorResponse(
            `Reload failed, still serving v${previous}: ${getErrorMessage(err)}`,
          );
        }
      },
    },
    {
      name: "export_csv",
      description:
        "Export companies, incidents or history as CSV, either the session's filtered view or the full dataset. Optionally writes the file under DATA_DIR/exports.",
      inputSchema: {
        type: "object",
        properties: {
          table: {
            type: "string",
            enum: [...EXPORT_TABLES],
            description: "Table to export (default companies).",
          },
          scope: {
            type: "string",
            enum: [...EXPORT_SCOPES],
            description: "filtered (default) or full dataset.",
          },
          session_id: SESSION_ID_SCHEMA,
          filters: FILTERS_SCHEMA,
          write_file: {
            type: "boolean",
            description: "Also write the CSV under DATA_DIR/exports.",
          },
          file_name: {
            type: "string",
            description: "File name when writing (default <table>_<timestamp>.csv).",
          },
        },
      },
      handler: async (args, ctx) => {
        const tableArg = argStringOpt(args, "table") ?? "companies";
        const table = EXPORT_TABLES.find((t) => t === tableArg);
        if (!table) {
          return errorResponse(`Invalid table. Must be one of: ${EXPORT_TABLES.join(", ")}.`);
        }
        const scopeArg = argStringOpt(args, "scope") ?? "filtered";
        const scope = EXPORT_SCOPES.find((s) => s === scopeArg);
        if (!scope) {
          return errorResponse('Invalid scope. Must be "filtered" or "full".');
        }

        const query = resolveQuery(args, ctx);
        const view = ctx.dashboard.view(scope === "full" ? {} : query.filters);
        const { csv, rowCount } = toCsv(view, table);

        let filePath: string | undefined;
        if (argBool(args, "write_file")) {
          const exportDir = path.join(ctx.config.dataDir, "exports");
          const fileName = argStringOpt(args, "file_name") ?? defaultExportName(table);
          filePath = await writeExport(exportDir, fileName, csv);
        }

        recordQuery(ctx, "export_csv", query, args, rowCount);
        return formatToolResponse({
          success: true,
          data: {
            table,
            scope,
            session_id: query.sessionId,
            filter_signature: scope === "full" ? "*" : query.signature,
            row_count: rowCount,
            ...(filePath !== undefined && { file: filePath }),
            csv,
          },
          attribution: attribution(ctx),
        });
      },
    },
    {
      name: "list_queries",
      description:
        "List recently executed dashboard queries with their filters and result counts. Filter by tool, session or date.",
      inputSchema: {
        type: "object",
        properties: {
          tool: { type: "string", description: "Only this tool (e.g. get_breakdown)." },
          session_id: { type: "string", description: "Only this session." },
          since: {
            type: "string",
            description: "Only queries after this ISO date (e.g., 2026-01-01).",
          },
          limit: {
            type: "number",
            description: "Max results to return (default 20, max 100).",
          },
        },
      },
      handler: async (args, ctx) => {
        if (!ctx.queryHistoryStore) {
          return errorResponse(
            "Query history not available. Check server logs for initialization errors.",
          );
        }

        const results = ctx.queryHistoryStore.listQueries({
          tool: argStringOpt(args, "tool"),
          sessionId: argStringOpt(args, "session_id"),
          since: argStringOpt(args, "since"),
          limit: argNumber(args, "limit"),
        });

        return formatToolResponse({
          success: true,
          data: {
            queries: results.map((r) => ({
              id: r.id,
              tool: r.tool,
              session_id: r.session_id,
              filter_signature: r.filter_signature,
              query: safeParseJson(r.query_json),
              result_count: r.result_count,
              executed_at: r.executed_at,
            })),
            total: results.length,
          },
          attribution: "",
        });
      },
    },
  ];
}
