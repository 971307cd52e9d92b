/**
 * Similar Products MCP Server
 *
 * Exposes substitute lookup and profile enrichment as MCP tools over stdio,
 * so agents can ask "what can I offer instead of product X?".
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";

import { diagnostics } from "./diagnostics/channels.js";
import {
  CleanupProfileParamsSchema,
  EnrichProfileParamsSchema,
  FindSimilarProductsParamsSchema,
} from "./schemas/index.js";
import { resolveToolName, validateToolArgs } from "./schemas/registry.js";
import { createLogger } from "./services/logger.js";
import type { SimilarProductsService } from "./services/similar-products-service.js";
import { initializeService } from "./services/startup.js";

const log = createLogger("mcp");

const SERVER_NAME = "similar-products";
const SERVER_VERSION = "1.0.0";

/**
 * Tool definitions for MCP
 */
export const TOOLS = [
  {
    name: "find_similar_products",
    description: "Rank in-stock substitutes for a product by name (BM25), price proximity and manufacturer. Read-only.",
    inputSchema: {
      type: "object" as const,
      properties: {
        product_id: {
          type: "string",
          description: "Shop product id of the out-of-stock product",
        },
        limit: {
          type: "number",
          description: "Number of substitutes to return (default: SIMILAR_PRODUCTS_LIMIT)",
        },
      },
      required: ["product_id"],
    },
  },
  {
    name: "enrich_profile",
    description: "Rank substitutes for a product and store their ids on the customer's Klaviyo profile (bis_similar_products).",
    inputSchema: {
      type: "object" as const,
      properties: {
        email: { type: "string", description: "Customer e-mail" },
        product_id: { type: "string", description: "Product the customer subscribed to" },
      },
      required: ["email", "product_id"],
    },
  },
  {
    name: "cleanup_profile",
    description: "Remove stored substitutes from a Klaviyo profile. Without product_id, removes all of them.",
    inputSchema: {
      type: "object" as const,
      properties: {
        email: { type: "string", description: "Customer e-mail" },
        product_id: { type: "string", description: "Only remove this product's entry" },
      },
      required: ["email"],
    },
  },
];

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

function textResponse(payload: unknown, isError: boolean = false): ToolResponse {
  const response: ToolResponse = {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
  };
  if (isError) response.isError = true;
  return response;
}

/**
 * Validate and dispatch one tool call
 */
export async function handleToolCall(
  service: SimilarProductsService,
  name: string,
  args: Record<string, unknown>
): Promise<ToolResponse> {
  const canonical = resolveToolName(name);

  if (!TOOLS.some((tool) => tool.name === canonical)) {
    return textResponse({ error: `Unknown tool: ${name}` }, true);
  }

  const validationError = validateToolArgs(canonical, args);
  if (validationError) {
    return textResponse({ error: validationError }, true);
  }

  try {
    switch (canonical) {
      case "find_similar_products": {
        const params = FindSimilarProductsParamsSchema.parse(args);
        const found = await service.findSimilarById(params.product_id, params.limit);
        if (!found) {
          return textResponse({ error: "Product not found", product_id: params.product_id }, true);
        }
        return textResponse({
          product_id: found.product.id,
          product_name: found.product.name,
          status: found.result.status,
          similar_ids: found.result.ids,
          matches: found.result.matches,
        });
      }
      case "enrich_profile": {
        const params = EnrichProfileParamsSchema.parse(args);
        const result = await service.enrichProfile(params.email, params.product_id);
        return textResponse(
          {
            success: result.success,
            similar_products_count: result.similarCount,
            similar_ids: result.similarIds,
            error: result.error,
          },
          !result.success
        );
      }
      case "cleanup_profile": {
        const params = CleanupProfileParamsSchema.parse(args);
        const success = await service.cleanupProfile(params.email, params.product_id);
        return textResponse({ success }, !success);
      }
      default:
        return textResponse({ error: `Unknown tool: ${name}` }, true);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    diagnostics.publishError(error instanceof Error ? error : message, `tool ${canonical}`);
    log.error("Tool call failed", { tool: canonical, error: message });
    return textResponse({ error: message }, true);
  }
}

/**
 * Create the MCP server bound to a service instance
 */
export function createServer(service: SimilarProductsService): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOLS,
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(service, name, args ?? {});
  });

  return server;
}

/**
 * Run the MCP server over stdio
 */
export async function runServer(): Promise<void> {
  const service = initializeService();
  const server = createServer(service);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  log.info("MCP server ready", { tools: TOOLS.length });
}
