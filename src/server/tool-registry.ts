import { getErrorMessage, logWarn } from "../core/logging.js";
import type { ServerContext } from "./context.js";

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError: boolean;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
  handler: (
    args: Record<string, unknown> | undefined,
    ctx: ServerContext,
  ) => Promise<ToolResponse>;
}

/** Envelope every tool serializes into its text content. */
export interface ToolResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  attribution: string;
}

// ============================================================================
// Arg-parsing helpers
// ============================================================================

export function argString(
  args: Record<string, unknown> | undefined,
  key: string,
): string {
  const val = args?.[key];
  return typeof val === "string" ? val : "";
}

export function argStringOpt(
  args: Record<string, unknown> | undefined,
  key: string,
): string | undefined {
  const val = args?.[key];
  return typeof val === "string" ? val : undefined;
}

export function argBool(
  args: Record<string, unknown> | undefined,
  key: string,
): boolean {
  return args?.[key] === true;
}

export function argNumber(
  args: Record<string, unknown> | undefined,
  key: string,
): number | undefined {
  const val = args?.[key];
  return typeof val === "number" && Number.isFinite(val) ? val : undefined;
}

export function argBoolOpt(
  args: Record<string, unknown> | undefined,
  key: string,
): boolean | undefined {
  const val = args?.[key];
  return typeof val === "boolean" ? val : undefined;
}

export function argStringArray(
  args: Record<string, unknown> | undefined,
  key: string,
): string[] | undefined {
  const val = args?.[key];
  if (!Array.isArray(val)) return undefined;
  return val.filter((v): v is string => typeof v === "string");
}

/**
 * Format a ToolResult into an MCP content response.
 */
export function formatToolResponse<T>(result: ToolResult<T>): ToolResponse {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
    isError: !result.success,
  };
}

export function errorResponse(error: string): ToolResponse {
  return formatToolResponse({ success: false, error, attribution: "" });
}

/**
 * Collects tool definitions from the tool modules and provides dispatch.
 * A handler that throws becomes an isError response, never a protocol error.
 */
export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();

  register(defs: ToolDefinition[]): void {
    for (const def of defs) {
      if (this.tools.has(def.name)) {
        throw new Error(`Duplicate tool name: ${def.name}`);
      }
      this.tools.set(def.name, def);
    }
  }

  listTools(): Array<{
    name: string;
    description: string;
    inputSchema: Record<string, unknown>;
  }> {
    return [...this.tools.values()].map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: t.inputSchema,
    }));
  }

  async callTool(
    name: string,
    args: Record<string, unknown> | undefined,
    ctx: ServerContext,
  ): Promise<ToolResponse> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new Error(`Unknown tool: ${name}`);
    }
    try {
      return await tool.handler(args, ctx);
    } catch (err) {
      const message = getErrorMessage(err);
      logWarn(`Tool ${name} failed: ${message}`);
      return errorResponse(message);
    }
  }
}
