#!/usr/bin/env node
/**
 * Similar Products Entry Point
 *
 * Run with:
 *   node dist/index.js          # webhook HTTP server (default)
 *   node dist/index.js mcp      # MCP server over stdio
 *
 * Environment variables: see src/services/config.ts
 */

import { runServer } from "./server.js";
import { runWebhookServer } from "./webhooks/serve.js";

const mode = process.argv[2] ?? "webhooks";

const run = mode === "mcp" ? runServer : runWebhookServer;

run().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
