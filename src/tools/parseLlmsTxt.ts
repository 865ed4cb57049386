/**
 * Tool handler for 'parse_llms_txt'.
 * Finds an llms.txt manifest for a site (directly, or through documentation links
 * on its page) and returns the linked documentation relevant to the query. Falls
 * back to the reader proxy for developer-tool pages without a manifest.
 * @param args - { url: string; query: string }
 * @param ctx - receives progress messages
 * @param services - fetcher, model and the components built on them
 * @returns Formatted documentation text, or a one-sentence message when nothing was found
 */
import { CONFIG } from "../server/config.js";
import type {
  DocumentationServices,
  ManifestLookup,
  ParseLlmsTxtArgs,
  ToolContext,
} from "../types/index.js";
import { logInfo } from "../utils/logging.js";
import { normalizeUrl, truncateContent } from "../utils/url.js";

export const NO_RELEVANT_DOCUMENTATION = "No relevant documentation found in llms.txt.";

export function notFoundMessage(url: string): string {
  return `Could not find llms.txt or extract documentation from ${url}.`;
}

export function buildExcerptPrompt(content: string, query: string): string {
  return `Below is documentation content for a developer tool. Based on the user's query,
extract the most relevant sections that would help answer the query.
Format your response as markdown and include code examples when available.

Documentation content:
${content}

User query: ${query}`;
}

// Stage 2: look for a manifest behind the documentation links of the page itself
async function findManifestThroughPageLinks(
  pageUrl: string,
  ctx: ToolContext,
  services: DocumentationServices,
): Promise<ManifestLookup> {
  const page = await services.fetcher.fetchText(pageUrl);
  if (page === null) {
    return null;
  }

  const links = await services.linkExtractor.extractLinks(pageUrl, page);
  for (const link of links) {
    await ctx.info(`Checking ${link.url} for llms.txt...`);
    const manifest = await services.locator.locate(link.url);
    if (manifest) {
      return manifest;
    }
  }
  return null;
}

// Stage 3: cleaned content through the reader proxy, only for developer tooling
async function readThroughProxy(
  pageUrl: string,
  query: string,
  ctx: ToolContext,
  services: DocumentationServices,
): Promise<string | null> {
  const cleaned = await services.reader.read(pageUrl);
  const isDeveloperTool = await services.classifier.isDeveloperTool(cleaned);
  if (!isDeveloperTool || cleaned === null) {
    return null;
  }

  await ctx.info("URL appears to be a developer tool, using Jina Reader as fallback...");
  await ctx.info("Using Claude to extract relevant documentation from Jina-processed content...");

  const links = await services.linkExtractor.extractLinks(pageUrl, cleaned);
  if (links.length > 0) {
    return await services.aggregator.aggregate(links, ctx);
  }

  const excerpt = await services.model.complete(
    buildExcerptPrompt(truncateContent(cleaned, CONFIG.CONTENT_CHAR_BUDGET), query),
  );
  return `# Relevant information from ${pageUrl}\n\n${excerpt}`;
}

export default async function parseLlmsTxt(
  args: ParseLlmsTxtArgs,
  ctx: ToolContext,
  services: DocumentationServices,
): Promise<string> {
  const { url, query } = args;
  const pageUrl = normalizeUrl(url);

  await ctx.info(`Looking for llms.txt or related files at ${url}`);
  let manifest = await services.locator.locate(url);

  if (!manifest) {
    await ctx.info("llms.txt not found, looking for documentation links...");
    manifest = await findManifestThroughPageLinks(pageUrl, ctx, services);
  }

  if (!manifest) {
    await ctx.info("No llms.txt found, checking if this is a developer tool...");
    const fallback = await readThroughProxy(pageUrl, query, ctx, services);
    if (fallback !== null) {
      return fallback;
    }
    logInfo(`No documentation found for ${url}`);
    return notFoundMessage(url);
  }

  await ctx.info(`Found llms.txt at ${manifest.url}, parsing with Claude...`);
  const relevantLinks = await services.ranker.rankLinks(manifest, query);
  if (relevantLinks.length === 0) {
    return NO_RELEVANT_DOCUMENTATION;
  }
  return await services.aggregator.aggregate(relevantLinks, ctx);
}
