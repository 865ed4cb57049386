/**
 * Main type definitions export file
 * Centralized exports from focused type modules
 */

// ─── DOCUMENTATION TYPES ──────────────────────────────────────────────
export { DOCUMENTATION_LINKS_SCHEMA } from "./documentation.js";
export type {
  DocumentationLink,
  FetchResult,
  IContentReader,
  IDeveloperToolClassifier,
  IDocumentFetcher,
  ILinkExtractor,
  IManifestLocator,
  IRelevanceRanker,
  IResultAggregator,
  ManifestLookup,
  ManifestMatch,
  ToolContext,
} from "./documentation.js";

// ─── MODEL TYPES ──────────────────────────────────────────────────────
export type { IStructuredModel, StructuredRequest } from "./model.js";

// ─── TOOL TYPES ───────────────────────────────────────────────────────
export type { ParseLlmsTxtArgs, ToolHandler, ToolHandlersRegistry } from "./tools.js";

// ─── SERVER TYPES ─────────────────────────────────────────────────────
export type { DocumentationServices, ServerDependencies } from "./server.js";
