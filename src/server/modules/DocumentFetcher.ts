/**
 * DocumentFetcher - single GET per call, every failure collapses to null
 * Internal hosts are refused for the requested URL and for every redirect hop
 */
import axios from "axios";
import type { FetchResult, IDocumentFetcher } from "../../types/index.js";
import { describeFetchError } from "../../utils/errorHandler.js";
import { logDebug, logWarn } from "../../utils/logging.js";
import { urlSecurity } from "../../utils/url-security.js";
import { CONFIG } from "../config.js";

export interface DocumentFetcherOptions {
  timeout?: number;
  maxRedirects?: number;
  userAgent?: string;
}

function redirectTarget(options: Record<string, unknown>): string {
  const { protocol, host, hostname } = options;
  const authority = typeof host === "string" && host.length > 0 ? host : hostname;
  return `${typeof protocol === "string" ? protocol : "http:"}//${typeof authority === "string" ? authority : ""}`;
}

function assertRedirectAllowed(options: Record<string, unknown>): void {
  const target = redirectTarget(options);
  const validation = urlSecurity.validateURL(target);
  if (!validation.valid) {
    throw new Error(`Redirect to ${target} refused: ${validation.reason ?? "blocked"}`);
  }
}

export class DocumentFetcher implements IDocumentFetcher {
  private readonly timeout: number;
  private readonly maxRedirects: number;
  private readonly userAgent: string;

  constructor(options: DocumentFetcherOptions = {}) {
    this.timeout = options.timeout ?? CONFIG.FETCH_TIMEOUT;
    this.maxRedirects = options.maxRedirects ?? CONFIG.MAX_REDIRECTS;
    this.userAgent = options.userAgent ?? CONFIG.USER_AGENT;
  }

  async fetchText(url: string, headers: Record<string, string> = {}): Promise<FetchResult> {
    const validation = urlSecurity.validateURL(url);
    if (!validation.valid) {
      logWarn(`Refusing to fetch ${url}: ${validation.reason ?? "blocked"}`);
      return null;
    }

    try {
      const response = await axios.get<unknown>(url, {
        timeout: this.timeout,
        maxRedirects: this.maxRedirects,
        responseType: "text",
        headers: { "User-Agent": this.userAgent, ...headers },
        validateStatus: (status) => status >= 200 && status < 300,
        beforeRedirect: assertRedirectAllowed,
      });

      if (typeof response.data !== "string") {
        logDebug(`Discarding non-text response from ${url}`);
        return null;
      }
      if (response.data.trim().length === 0) {
        logDebug(`Empty response body from ${url}`);
        return null;
      }

      logDebug(`Fetched ${url} (${response.data.length} chars)`);
      return response.data;
    } catch (error) {
      logDebug(`Fetch failed for ${url}: ${describeFetchError(error)}`);
      return null;
    }
  }
}
