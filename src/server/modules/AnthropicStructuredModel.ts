/**
 * AnthropicStructuredModel - structured output through a forced tool call
 *
 * The requested schema is wrapped as `{ result: <schema> }` so that arrays and
 * booleans can travel as a tool input, which must be a JSON object.
 */
import Anthropic from "@anthropic-ai/sdk";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { IStructuredModel, StructuredRequest } from "../../types/index.js";
import { StructuredOutputError, describeError } from "../../utils/errorHandler.js";
import { logDebug } from "../../utils/logging.js";
import { CONFIG } from "../config.js";

export interface AnthropicModelOptions {
  apiKey?: string;
  model?: string;
  maxTokens?: number;
}

function decodeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export class AnthropicStructuredModel implements IStructuredModel {
  private client: Anthropic | null = null;
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(private readonly options: AnthropicModelOptions = {}) {
    this.model = options.model ?? CONFIG.DEFAULT_MODEL;
    this.maxTokens = options.maxTokens ?? CONFIG.MODEL_MAX_TOKENS;
  }

  // Created on first use so the server can start without credentials
  private getClient(): Anthropic {
    if (!this.client) {
      this.client = new Anthropic({ apiKey: this.options.apiKey });
    }
    return this.client;
  }

  async extract<T>(request: StructuredRequest<T>): Promise<T> {
    const { $schema: _draft, ...resultSchema } = zodToJsonSchema(request.schema, {
      $refStrategy: "none",
    });

    let response: Anthropic.Message;
    try {
      response = await this.getClient().messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        messages: [{ role: "user", content: request.prompt }],
        tools: [
          {
            name: request.toolName,
            description: request.toolDescription,
            input_schema: {
              type: "object",
              properties: { result: resultSchema },
              required: ["result"],
            },
          },
        ],
        tool_choice: { type: "tool", name: request.toolName },
      });
    } catch (error) {
      throw new StructuredOutputError(
        `Model request for ${request.toolName} failed: ${describeError(error)}`,
        request.toolName,
        { cause: error },
      );
    }

    const toolUse = response.content.find(
      (block) => block.type === "tool_use" && block.name === request.toolName,
    );
    if (!toolUse || toolUse.type !== "tool_use") {
      throw new StructuredOutputError(
        `Model response did not call ${request.toolName} (stop reason: ${response.stop_reason})`,
        request.toolName,
      );
    }
    logDebug(`Structured output received from ${request.toolName}`, { usage: response.usage });

    return this.parseResult(request, toolUse.input);
  }

  private parseResult<T>(request: StructuredRequest<T>, input: unknown): T {
    if (typeof input !== "object" || input === null || !("result" in input)) {
      throw new StructuredOutputError(
        `Tool call ${request.toolName} carried no result`,
        request.toolName,
      );
    }

    const parsed = request.schema.safeParse(input.result);
    if (parsed.success) {
      return parsed.data;
    }

    // Some responses carry the result JSON-encoded as a string
    if (typeof input.result === "string") {
      const decoded = request.schema.safeParse(decodeJson(input.result));
      if (decoded.success) {
        return decoded.data;
      }
    }

    throw new StructuredOutputError(
      `Tool call ${request.toolName} returned invalid output: ${parsed.error.message}`,
      request.toolName,
    );
  }

  async complete(prompt: string): Promise<string> {
    let response: Anthropic.Message;
    try {
      response = await this.getClient().messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        messages: [{ role: "user", content: prompt }],
      });
    } catch (error) {
      throw new StructuredOutputError(
        `Model request failed: ${describeError(error)}`,
        "complete",
        { cause: error },
      );
    }

    return response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .filter((text) => text.length > 0)
      .join("\n");
  }
}
