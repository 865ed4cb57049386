/**
 * ManifestLocator - probes the conventional llms.txt locations of a site
 */
import type { IDocumentFetcher, IManifestLocator, ManifestLookup } from "../../types/index.js";
import { logDebug } from "../../utils/logging.js";
import { joinUrlPath, normalizeUrl, originOf } from "../../utils/url.js";
import { CONFIG } from "../config.js";

export class ManifestLocator implements IManifestLocator {
  constructor(
    private readonly fetcher: IDocumentFetcher,
    private readonly candidatePaths: readonly string[] = CONFIG.CANDIDATE_PATHS,
  ) {}

  /** Candidate URLs probed for `url`, in order. */
  candidateUrls(url: string): string[] {
    const normalized = normalizeUrl(url);
    const base = originOf(normalized);
    const candidates = this.candidatePaths.map((path) => joinUrlPath(base, path));
    if (normalized.endsWith(".txt")) {
      candidates.push(normalized);
    }
    return candidates;
  }

  async locate(url: string): Promise<ManifestLookup> {
    for (const candidate of this.candidateUrls(url)) {
      const content = await this.fetcher.fetchText(candidate);
      if (content !== null) {
        logDebug(`Manifest found at ${candidate}`);
        return { content, url: candidate };
      }
    }
    return null;
  }
}
