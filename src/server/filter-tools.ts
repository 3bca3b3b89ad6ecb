import { filterSignature, parseFilterSet } from "../domain/filters/filter-engine.js";
import type { FilterSet } from "../domain/filters/types.js";
import { SessionRegistry } from "../domain/dashboard/session-registry.js";
import type { ServerContext } from "./context.js";
import { attribution, FILTERS_SCHEMA, SESSION_ID_SCHEMA } from "./session-context.js";
import type { ToolDefinition, ToolResponse } from "./tool-registry.js";
import {
  argString,
  argStringOpt,
  errorResponse,
  formatToolResponse,
} from "./tool-registry.js";

function sessionResponse(
  ctx: ServerContext,
  sessionId: string,
  filters: FilterSet,
  extra: Record<string, unknown> = {},
): ToolResponse {
  return formatToolResponse({
    success: true,
    data: {
      session_id: sessionId,
      filters,
      filter_signature: filterSignature(filters),
      companies_in_view: ctx.dashboard.view(filters).companies.length,
      ...extra,
    },
    attribution: attribution(ctx),
  });
}

const PRESETS_UNAVAILABLE =
  "Filter presets not available. Check server logs for initialization errors.";

export function getToolDefinitions(): ToolDefinition[] {
  return [
    {
      name: "set_filters",
      description:
        "Replace a session's filters. Every dashboard tool called with this session_id then runs against them. Pass filters, or the name of a saved preset.",
      inputSchema: {
        type: "object",
        properties: {
          session_id: SESSION_ID_SCHEMA,
          filters: { ...FILTERS_SCHEMA, description: "The new filter set." },
          preset: {
            type: "string",
            description: "Load the filters of this saved preset instead.",
          },
        },
      },
      handler: async (args, ctx) => {
        const sessionId = SessionRegistry.normalizeId(argStringOpt(args, "session_id"));
        const presetName = argStringOpt(args, "preset");

        let filters: FilterSet;
        if (presetName !== undefined) {
          if (!ctx.presetStore) return errorResponse(PRESETS_UNAVAILABLE);
          const preset = ctx.presetStore.get(presetName);
          if (!preset) return errorResponse(`Preset "${presetName}" not found.`);
          filters = preset.filters;
        } else {
          filters = parseFilterSet(args?.["filters"]);
        }

        const state = ctx.sessions.setFilters(sessionId, filters);
        return sessionResponse(ctx, state.id, state.filters, {
          ...(presetName !== undefined && { preset: presetName }),
        });
      },
    },
    {
      name: "get_filters",
      description: "Show a session's current filters and how many companies they keep.",
      inputSchema: {
        type: "object",
        properties: { session_id: SESSION_ID_SCHEMA },
      },
      handler: async (args, ctx) => {
        const state = ctx.sessions.get(argStringOpt(args, "session_id"));
        return sessionResponse(ctx, state.id, state.filters, {
          updated_at: state.updatedAt || null,
        });
      },
    },
    {
      name: "clear_filters",
      description: "Reset a session to the full dataset.",
      inputSchema: {
        type: "object",
        properties: { session_id: SESSION_ID_SCHEMA },
      },
      handler: async (args, ctx) => {
        const state = ctx.sessions.clear(argStringOpt(args, "session_id"));
        return sessionResponse(ctx, state.id, state.filters);
      },
    },
    {
      name: "save_filter_preset",
      description:
        "Save a named filter preset. Uses the given filters, or the session's current filters when none are passed. Saving an existing name replaces it.",
      inputSchema: {
        type: "object",
        properties: {
          name: {
            type: "string",
            description: 'Preset name (letters, digits, spaces, "_", ".", ":", "-"; max 80).',
          },
          session_id: SESSION_ID_SCHEMA,
          filters: FILTERS_SCHEMA,
        },
        required: ["name"],
      },
      handler: async (args, ctx) => {
        if (!ctx.presetStore) return errorResponse(PRESETS_UNAVAILABLE);
        const raw = args?.["filters"];
        const filters =
          raw !== undefined && raw !== null
            ? parseFilterSet(raw)
            : ctx.sessions.get(argStringOpt(args, "session_id")).filters;

        const preset = ctx.presetStore.save(argString(args, "name"), filters);
        return formatToolResponse({ success: true, data: { preset }, attribution: "" });
      },
    },
    {
      name: "list_filter_presets",
      description: "List saved filter presets by name.",
      inputSchema: { type: "object", properties: {} },
      handler: async (_args, ctx) => {
        if (!ctx.presetStore) return errorResponse(PRESETS_UNAVAILABLE);
        const presets = ctx.presetStore.list();
        return formatToolResponse({
          success: true,
          data: { presets, total: presets.length },
          attribution: "",
        });
      },
    },
    {
      name: "delete_filter_preset",
      description: "Delete a saved filter preset by name.",
      inputSchema: {
        type: "object",
        properties: { name: { type: "string", description: "Preset name." } },
        required: ["name"],
      },
      handler: async (args, ctx) => {
        if (!ctx.presetStore) return errorResponse(PRESETS_UNAVAILABLE);
        const name = argString(args, "name");
        if (!ctx.presetStore.delete(name)) {
          return errorResponse(`Preset "${name}" not found.`);
        }
        return formatToolResponse({
          success: true,
          data: { deleted: name.trim() },
          attribution: "",
        });
      },
    },
  ];
}
