import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListPromptsRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema
} from "@modelcontextprotocol/sdk/types.js";
import { handleToolCall, TOOLS } from "./tools.js";
import type { ZoomClient } from "./zoom-client.js";

export const SERVER_NAME = "zoom-mcp-server";
export const SERVER_VERSION = "1.0.0";

export function createMcpServer(client: ZoomClient): Server {
  const server = new Server({
    name: SERVER_NAME,
    version: SERVER_VERSION
  }, {
    capabilities: {
      tools: {},
      resources: {},
      prompts: {}
    }
  });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOLS
  }));

  // Empty lists keep clients that probe resources and prompts from failing
  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: []
  }));

  server.setRequestHandler(ListPromptsRequestSchema, async () => ({
    prompts: []
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(client, name, args);
  });

  return server;
}
