/**
 * RelevanceRanker - picks the manifest links that answer a query
 */
import {
  DOCUMENTATION_LINKS_SCHEMA,
  type DocumentationLink,
  type IRelevanceRanker,
  type IStructuredModel,
  type ManifestMatch,
} from "../../types/index.js";
import { resolveDocumentLink } from "../../utils/url.js";

export const RELEVANT_LINKS_TOOL_NAME = "record_relevant_links";

export function buildRankingPrompt(manifestContent: string, query: string): string {
  return `Given this llms.txt content and user query, analyze which documentation links are most relevant.
The llms.txt format is a standardized way to provide LLM-friendly documentation, containing a project overview
and links to detailed documentation in markdown format.

llms.txt content:
${manifestContent}

User query: ${query}`;
}

export class RelevanceRanker implements IRelevanceRanker {
  constructor(private readonly model: IStructuredModel) {}

  async rankLinks(manifest: ManifestMatch, query: string): Promise<DocumentationLink[]> {
    const links = await this.model.extract({
      prompt: buildRankingPrompt(manifest.content, query),
      schema: DOCUMENTATION_LINKS_SCHEMA,
      toolName: RELEVANT_LINKS_TOOL_NAME,
      toolDescription: "Record the documentation links most relevant to the user query, most relevant first.",
    });
    return links.map((link) => ({ ...link, url: resolveDocumentLink(manifest.url, link.url) }));
  }
}
