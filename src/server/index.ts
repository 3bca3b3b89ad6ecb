import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { logInfo } from "../core/logging.js";
import { closeServerContext, createServerContext } from "./context.js";
import { ToolRegistry } from "./tool-registry.js";
import * as dashboardTools from "./dashboard-tools.js";
import * as filterTools from "./filter-tools.js";
import * as dataManagementTools from "./data-management-tools.js";

// Server configuration
const SERVER_NAME = "environmental-giving-mcp";
const SERVER_VERSION = "0.3.0";

export function createToolRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(dashboardTools.getToolDefinitions());
  registry.register(filterTools.getToolDefinitions());
  registry.register(dataManagementTools.getToolDefinitions());
  return registry;
}

// Start server
export async function startServer(): Promise<void> {
  const ctx = await createServerContext();
  const registry = createToolRegistry();

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.listTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return registry.callTool(name, args, ctx);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logInfo(`Received ${signal}, shutting down...`);
    closeServerContext(ctx);
    process.exit(0);
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logInfo(
    `${SERVER_NAME} v${SERVER_VERSION} running on stdio with ${registry.listTools().length} tools`,
  );
}
