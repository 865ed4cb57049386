/**
 * LinkExtractor - asks the model for documentation links found in page content
 */
import {
  DOCUMENTATION_LINKS_SCHEMA,
  type DocumentationLink,
  type ILinkExtractor,
  type IStructuredModel,
} from "../../types/index.js";
import { logDebug } from "../../utils/logging.js";
import { resolveLinkUrl, truncateContent } from "../../utils/url.js";
import { CONFIG } from "../config.js";

export const LINKS_TOOL_NAME = "record_documentation_links";

export function buildLinkExtractionPrompt(sourceUrl: string, content: string): string {
  return `Analyze the following webpage content and identify links that appear to lead to
documentation pages, API references, tutorials, or other developer resources.

Webpage URL: ${sourceUrl}

<webpage-content>
${content}
</webpage-content>

Extract all links that appear to point to documentation. For each link, provide:
1. The URL, exactly as it appears on the page (relative URLs are fine)
2. A title describing the resource
3. A brief description of what content you expect to find there

Focus on links that would be most valuable for a developer trying to understand how to use this tool.`;
}

export class LinkExtractor implements ILinkExtractor {
  constructor(
    private readonly model: IStructuredModel,
    private readonly charBudget: number = CONFIG.CONTENT_CHAR_BUDGET,
  ) {}

  async extractLinks(sourceUrl: string, content: string): Promise<DocumentationLink[]> {
    const excerpt = truncateContent(content, this.charBudget);
    const links = await this.model.extract({
      prompt: buildLinkExtractionPrompt(sourceUrl, excerpt),
      schema: DOCUMENTATION_LINKS_SCHEMA,
      toolName: LINKS_TOOL_NAME,
      toolDescription: "Record the documentation links found on the page.",
    });
    logDebug(`Model returned ${links.length} documentation links for ${sourceUrl}`);

    return links.map((link) => ({ ...link, url: resolveLinkUrl(sourceUrl, link.url) }));
  }
}
