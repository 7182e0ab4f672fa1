#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import dotenv from "dotenv";
import { createMcpServer } from "./server.js";
import { ZoomClient } from "./zoom-client.js";

dotenv.config();

async function main() {
  let client: ZoomClient;
  try {
    client = ZoomClient.fromEnvironment();
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    console.error("Set the variables in your environment, a .env file or your MCP client config");
    process.exit(1);
  }

  const server = createMcpServer(client);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("Zoom MCP Server started successfully");
  console.error(`Connected to ${client.raw.baseUrl}`);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
