/**
 * Tool Handler Setup Module
 * Manages MCP tool registration and request handling logic
 */

import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";

import { TOOL_SCHEMAS } from "../schema/toolSchemas.js";
import type { ToolContext, ToolHandlersRegistry } from "../types/index.js";
import { describeError } from "../utils/errorHandler.js";
import { logError, logInfo, logWarn } from "../utils/logging.js";
import { CONFIG } from "./config.js";

/**
 * Progress reporter for one tool call. Messages go to the server log and to the
 * client as MCP logging notifications; a failed notification is only logged.
 */
export function createToolContext(server: Server, toolName: string): ToolContext {
  return {
    info: async (message: string) => {
      logInfo(message, { tool: toolName });
      try {
        await server.sendLoggingMessage({ level: "info", logger: toolName, data: message });
      } catch (error) {
        logWarn("Could not deliver progress notification", { error: describeError(error) });
      }
    },
  };
}

/**
 * Sets up MCP tool handlers for the server
 * @param server - The MCP Server instance
 * @param toolHandlers - Registry of tool handler functions
 */
export function setupToolHandlers(server: Server, toolHandlers: ToolHandlersRegistry): void {
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: TOOL_SCHEMAS,
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const requestTimeout = setTimeout(() => {
      logWarn(`Tool ${name} is taking too long, this might lead to a client timeout`);
    }, CONFIG.MCP_SLOW_REQUEST_WARNING);

    try {
      const handler = toolHandlers[name];
      if (!handler) {
        throw new McpError(ErrorCode.MethodNotFound, `Tool ${name} not found`);
      }

      const result = await handler(args ?? {}, createToolContext(server, name));
      return { content: [{ type: "text", text: result }] };
    } catch (error) {
      // Protocol errors (unknown tool, invalid arguments) go back as JSON-RPC errors
      if (error instanceof McpError) {
        throw error;
      }

      const errorMsg = describeError(error);
      logError(`Error executing tool ${name}:`, { error: errorMsg });

      if (errorMsg.includes("timeout") || errorMsg.includes("timed out")) {
        return {
          content: [
            {
              type: "text",
              text: "The operation timed out. This might be due to high server load or network issues. Please try again with a more specific query.",
            },
          ],
        };
      }

      return {
        content: [
          {
            type: "text",
            text: `The operation encountered an error: ${errorMsg}. Please try again.`,
          },
        ],
      };
    } finally {
      clearTimeout(requestTimeout);
    }
  });
}

/**
 * Creates a tool handlers registry with the provided handlers
 * @param handlers - Object mapping tool names to handler functions
 * @returns ToolHandlersRegistry
 */
export function createToolHandlersRegistry(handlers: ToolHandlersRegistry): ToolHandlersRegistry {
  return handlers;
}
