/**
 * LlmsTxtServer - MCP server exposing the parse_llms_txt tool
 * Collaborators are injected so tests can replace the network and the model
 */
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import type {
  DocumentationServices,
  ServerDependencies,
  ToolContext,
  ToolHandlersRegistry,
} from "../types/index.js";
import { logError, logInfo } from "../utils/logging.js";
import { describeError } from "../utils/errorHandler.js";
import { PARSE_LLMS_TXT_SCHEMA } from "../validation/tool-schemas.js";
import { CONFIG } from "./config.js";
import { AnthropicStructuredModel } from "./modules/AnthropicStructuredModel.js";
import { ContentReader } from "./modules/ContentReader.js";
import { DeveloperToolClassifier } from "./modules/DeveloperToolClassifier.js";
import { DocumentFetcher } from "./modules/DocumentFetcher.js";
import { LinkExtractor } from "./modules/LinkExtractor.js";
import { ManifestLocator } from "./modules/ManifestLocator.js";
import { RelevanceRanker } from "./modules/RelevanceRanker.js";
import { ResultAggregator } from "./modules/ResultAggregator.js";
import { createToolHandlersRegistry, setupToolHandlers } from "./toolHandlerSetup.js";

import parseLlmsTxt from "../tools/parseLlmsTxt.js";

export function createDocumentationServices(
  dependencies: ServerDependencies = {},
): DocumentationServices {
  const fetcher = dependencies.fetcher ?? new DocumentFetcher();
  const model = dependencies.model ?? new AnthropicStructuredModel();
  return {
    fetcher,
    model,
    locator: new ManifestLocator(fetcher, dependencies.candidatePaths),
    linkExtractor: new LinkExtractor(model),
    ranker: new RelevanceRanker(model),
    classifier: new DeveloperToolClassifier(model),
    reader: new ContentReader(fetcher, dependencies.readerApiKey),
    aggregator: new ResultAggregator(fetcher),
  };
}

export class LlmsTxtServer {
  private readonly server: Server;
  private readonly services: DocumentationServices;
  private readonly toolHandlers: ToolHandlersRegistry;

  constructor(dependencies?: ServerDependencies) {
    this.server = new Server(
      { name: CONFIG.SERVER_NAME, version: CONFIG.SERVER_VERSION },
      {
        capabilities: {
          tools: {},
          logging: {},
        },
      },
    );

    this.services = createDocumentationServices(dependencies);
    this.toolHandlers = createToolHandlersRegistry({
      parse_llms_txt: this.handleParseLlmsTxt.bind(this),
    });
    setupToolHandlers(this.server, this.toolHandlers);

    logInfo("LlmsTxtServer initialized");
  }

  private async handleParseLlmsTxt(
    args: Record<string, unknown>,
    ctx: ToolContext,
  ): Promise<string> {
    const parsed = PARSE_LLMS_TXT_SCHEMA.safeParse(args);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
        .join("; ");
      throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for parse_llms_txt: ${issues}`);
    }
    return await parseLlmsTxt(parsed.data, ctx, this.services);
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  private setupShutdownHandler(): void {
    process.on("SIGINT", () => {
      logInfo("SIGINT received, shutting down gracefully...");
      this.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logError("Error during shutdown:", { error: describeError(error) });
          process.exit(1);
        },
      );
    });
  }

  async run(): Promise<void> {
    try {
      logInfo(`Tools registered: ${Object.keys(this.toolHandlers).join(", ")}`);
      await this.connect(new StdioServerTransport());
      this.setupShutdownHandler();
      logInfo("LlmsTxtServer connected and listening on stdio");
    } catch (error) {
      logError("Failed to start server:", {
        error: describeError(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      process.exit(1);
    }
  }

  // Getters for testing
  public getServices(): DocumentationServices {
    return this.services;
  }
}
