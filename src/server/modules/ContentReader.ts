/**
 * ContentReader - fetches cleaned page text through the reader proxy
 */
import type { FetchResult, IContentReader, IDocumentFetcher } from "../../types/index.js";
import { stripScheme } from "../../utils/url.js";
import { CONFIG } from "../config.js";

export class ContentReader implements IContentReader {
  constructor(
    private readonly fetcher: IDocumentFetcher,
    private readonly apiKey?: string,
    private readonly readerOrigin: string = CONFIG.READER_ORIGIN,
  ) {}

  readerUrl(url: string): string {
    return `${this.readerOrigin}${stripScheme(url)}`;
  }

  async read(url: string): Promise<FetchResult> {
    const headers: Record<string, string> = { "User-Agent": CONFIG.USER_AGENT };
    if (this.apiKey) {
      headers[CONFIG.READER_API_KEY_HEADER] = this.apiKey;
    }
    return await this.fetcher.fetchText(this.readerUrl(url), headers);
  }
}
