/**
 * Tool arguments and handler type definitions
 */
import type { ToolContext } from "./documentation.js";

// ─── TOOL HANDLER TYPES ───────────────────────────────────────────────
export type ToolHandler = (args: Record<string, unknown>, ctx: ToolContext) => Promise<string>;

export interface ToolHandlersRegistry {
  parse_llms_txt?: ToolHandler;
  // Allow additional tools via index signature
  [key: string]: ToolHandler | undefined;
}

// ─── TOOL ARGUMENT TYPES ──────────────────────────────────────────────
export interface ParseLlmsTxtArgs {
  url: string;
  query: string;
}
