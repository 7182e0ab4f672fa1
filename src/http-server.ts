#!/usr/bin/env node

import express from 'express';
import cors from 'cors';
import { randomUUID } from "node:crypto";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import dotenv from "dotenv";
import { loadConfig, ZoomConfig } from "./config.js";
import { createMcpServer, SERVER_NAME } from "./server.js";
import { ZoomClient } from "./zoom-client.js";

dotenv.config();

let config: ZoomConfig;
try {
  config = loadConfig();
} catch (error) {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  console.error("Set the variables in your environment or your deployment configuration");
  process.exit(1);
}

const zoomClient = new ZoomClient({
  credentials: config.credentials,
  baseUrl: config.baseUrl,
  timezone: config.timezone,
  userId: config.userId
});

const app = express();
app.use(express.json());

// Expose Mcp-Session-Id so browser-based clients can read it
app.use(cors({
  origin: '*',
  exposedHeaders: ['Mcp-Session-Id']
}));

const transports: Record<string, StreamableHTTPServerTransport> = {};

function badRequest(message: string) {
  return {
    jsonrpc: '2.0',
    error: {
      code: -32000,
      message: `Bad Request: ${message}`,
    },
    id: null,
  };
}

app.get('/health', (req, res) => {
  res.status(200).json({ status: 'ok', service: SERVER_NAME });
});

app.all('/mcp', async (req, res) => {
  console.error(`Received ${req.method} request to /mcp`);

  try {
    const header = req.headers['mcp-session-id'];
    const sessionId = typeof header === 'string' ? header : undefined;
    let transport: StreamableHTTPServerTransport;

    if (sessionId && transports[sessionId]) {
      transport = transports[sessionId];
    } else if (!sessionId && req.method === 'POST' && isInitializeRequest(req.body)) {
      transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (newSessionId) => {
          console.error(`Session initialized with ID: ${newSessionId}`);
          transports[newSessionId] = transport;
        }
      });

      transport.onclose = () => {
        const sid = transport.sessionId;
        if (sid && transports[sid]) {
          console.error(`Transport closed for session ${sid}`);
          delete transports[sid];
        }
      };

      const server = createMcpServer(zoomClient);
      await server.connect(transport);
    } else {
      res.status(400).json(badRequest('No valid session ID provided or not an initialize request'));
      return;
    }

    await transport.handleRequest(req, res, req.body);
  } catch (error) {
    console.error('Error handling MCP request:', error);
    if (!res.headersSent) {
      res.status(500).json({
        jsonrpc: '2.0',
        error: {
          code: -32603,
          message: 'Internal server error',
        },
        id: null,
      });
    }
  }
});

process.on('SIGINT', async () => {
  console.error('Shutting down server...');

  for (const sessionId of Object.keys(transports)) {
    try {
      await transports[sessionId].close();
      delete transports[sessionId];
    } catch (error) {
      console.error(`Error closing transport for session ${sessionId}:`, error);
    }
  }

  console.error('Server shutdown complete');
  process.exit(0);
});

app.listen(config.port, () => {
  console.error(`Zoom MCP Server (HTTP) started on port ${config.port}`);
  console.error(`Streamable HTTP endpoint: /mcp (POST to initialize, GET for the event stream, DELETE to end the session)`);
  console.error(`Health check: /health`);
});
