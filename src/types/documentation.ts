/**
 * Documentation discovery type definitions
 */
import { z } from "zod";

// ─── LINKS ────────────────────────────────────────────────────────────
export const DOCUMENTATION_LINK_SCHEMA = z.object({
  url: z.string().describe("URL of the documentation page"),
  title: z.string().describe("Title of the linked resource"),
  description: z.string().describe("What content the page is expected to contain"),
});

export type DocumentationLink = Readonly<z.infer<typeof DOCUMENTATION_LINK_SCHEMA>>;

export const DOCUMENTATION_LINKS_SCHEMA = z.array(DOCUMENTATION_LINK_SCHEMA);

// ─── FETCHING ─────────────────────────────────────────────────────────
/** Body text, or null when the request failed in any way. */
export type FetchResult = string | null;

export interface IDocumentFetcher {
  fetchText(url: string, headers?: Record<string, string>): Promise<FetchResult>;
}

export interface ManifestMatch {
  content: string;
  url: string;
}

export type ManifestLookup = ManifestMatch | null;

export interface IManifestLocator {
  locate(url: string): Promise<ManifestLookup>;
}

export interface IContentReader {
  read(url: string): Promise<FetchResult>;
}

// ─── MODEL-BACKED DECISIONS ───────────────────────────────────────────
export interface ILinkExtractor {
  extractLinks(sourceUrl: string, content: string): Promise<DocumentationLink[]>;
}

export interface IRelevanceRanker {
  rankLinks(manifest: ManifestMatch, query: string): Promise<DocumentationLink[]>;
}

export interface IDeveloperToolClassifier {
  isDeveloperTool(content: FetchResult): Promise<boolean>;
}

export interface IResultAggregator {
  aggregate(links: readonly DocumentationLink[], ctx?: ToolContext): Promise<string>;
}

// ─── PROGRESS ─────────────────────────────────────────────────────────
/** Receives progress messages while a tool call runs. */
export interface ToolContext {
  info(message: string): Promise<void>;
}
