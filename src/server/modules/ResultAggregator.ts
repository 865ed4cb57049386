/**
 * ResultAggregator - fetches documentation links one at a time and formats them
 */
import type {
  DocumentationLink,
  IDocumentFetcher,
  IResultAggregator,
  ToolContext,
} from "../../types/index.js";

export function formatLinkBlock(link: DocumentationLink, content: string): string {
  return `# ${link.title}\n${link.description}\n\n${content}\n---\n`;
}

export function formatMissingLinkBlock(link: DocumentationLink): string {
  return `Could not fetch content from ${link.url}\n---\n`;
}

export class ResultAggregator implements IResultAggregator {
  constructor(private readonly fetcher: IDocumentFetcher) {}

  /** One block per link in link order, joined by blank lines. */
  async aggregate(links: readonly DocumentationLink[], ctx?: ToolContext): Promise<string> {
    const blocks: string[] = [];
    for (const link of links) {
      await ctx?.info(`Fetching linked content from ${link.url}...`);
      const content = await this.fetcher.fetchText(link.url);
      blocks.push(content !== null ? formatLinkBlock(link, content) : formatMissingLinkBlock(link));
    }
    return blocks.join("\n");
  }
}
