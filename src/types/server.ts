/**
 * Server module and dependency injection type definitions
 */
import type {
  IContentReader,
  IDeveloperToolClassifier,
  IDocumentFetcher,
  ILinkExtractor,
  IManifestLocator,
  IRelevanceRanker,
  IResultAggregator,
} from "./documentation.js";
import type { IStructuredModel } from "./model.js";

// ─── SERVER DEPENDENCY INJECTION ──────────────────────────────────────
export interface ServerDependencies {
  fetcher?: IDocumentFetcher;
  model?: IStructuredModel;
  readerApiKey?: string;
  candidatePaths?: readonly string[];
}

/** Everything the parse_llms_txt pipeline calls out to. */
export interface DocumentationServices {
  fetcher: IDocumentFetcher;
  model: IStructuredModel;
  locator: IManifestLocator;
  linkExtractor: ILinkExtractor;
  ranker: IRelevanceRanker;
  classifier: IDeveloperToolClassifier;
  reader: IContentReader;
  aggregator: IResultAggregator;
}
