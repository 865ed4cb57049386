/**
 * Tests for AnthropicStructuredModel
 * The SDK client is replaced; requests and response parsing are checked
 */
import { beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { DOCUMENTATION_LINKS_SCHEMA } from "../../../types/index.js";
import { StructuredOutputError } from "../../../utils/errorHandler.js";
import { AnthropicStructuredModel } from "../AnthropicStructuredModel.js";

const { createMock } = vi.hoisted(() => ({ createMock: vi.fn() }));

vi.mock("@anthropic-ai/sdk", () => ({
  default: class {
    messages = { create: createMock };
  },
}));

function toolUseResponse(name: string, input: unknown) {
  return {
    id: "msg_test",
    type: "message",
    role: "assistant",
    content: [{ type: "tool_use", id: "toolu_test", name, input }],
    stop_reason: "tool_use",
    usage: { input_tokens: 10, output_tokens: 5 },
  };
}

const booleanRequest = {
  prompt: "Is this developer documentation?",
  schema: z.boolean(),
  toolName: "is_developer_tool",
  toolDescription: "Returns true for developer documentation.",
};

describe("AnthropicStructuredModel", () => {
  let model: AnthropicStructuredModel;

  beforeEach(() => {
    vi.clearAllMocks();
    model = new AnthropicStructuredModel({ apiKey: "test-key" });
  });

  describe("extract", () => {
    it("should return the validated tool input", async () => {
      const links = [{ url: "/docs", title: "Docs", description: "Start here" }];
      createMock.mockResolvedValue(toolUseResponse("record_documentation_links", { result: links }));

      const result = await model.extract({
        prompt: "Find links",
        schema: DOCUMENTATION_LINKS_SCHEMA,
        toolName: "record_documentation_links",
        toolDescription: "Record links.",
      });

      expect(result).toEqual(links);
    });

    it("should force a call to a tool wrapping the schema", async () => {
      createMock.mockResolvedValue(toolUseResponse("is_developer_tool", { result: true }));

      await model.extract(booleanRequest);

      const params = createMock.mock.calls[0]?.[0];
      expect(params).toMatchObject({
        model: "claude-3-7-sonnet-latest",
        max_tokens: 8192,
        messages: [{ role: "user", content: "Is this developer documentation?" }],
        tool_choice: { type: "tool", name: "is_developer_tool" },
      });
      expect(params.tools).toHaveLength(1);
      expect(params.tools[0]).toMatchObject({
        name: "is_developer_tool",
        description: "Returns true for developer documentation.",
        input_schema: {
          type: "object",
          properties: { result: { type: "boolean" } },
          required: ["result"],
        },
      });
      expect(params.tools[0].input_schema.properties.result).not.toHaveProperty("$schema");
    });

    it("should use the configured model name", async () => {
      createMock.mockResolvedValue(toolUseResponse("is_developer_tool", { result: false }));
      const custom = new AnthropicStructuredModel({ apiKey: "test-key", model: "test-model", maxTokens: 256 });

      await custom.extract(booleanRequest);

      expect(createMock.mock.calls[0]?.[0]).toMatchObject({ model: "test-model", max_tokens: 256 });
    });

    it("should decode a result sent as a JSON string", async () => {
      createMock.mockResolvedValue(toolUseResponse("is_developer_tool", { result: "true" }));

      expect(await model.extract(booleanRequest)).toBe(true);
    });

    it("should reject output that does not match the schema", async () => {
      createMock.mockResolvedValue(toolUseResponse("is_developer_tool", { result: "maybe" }));

      await expect(model.extract(booleanRequest)).rejects.toThrow(
        /Tool call is_developer_tool returned invalid output/,
      );
    });

    it("should reject a tool input without a result", async () => {
      createMock.mockResolvedValue(toolUseResponse("is_developer_tool", { answer: true }));

      await expect(model.extract(booleanRequest)).rejects.toThrow(
        "Tool call is_developer_tool carried no result",
      );
    });

    it("should reject a response without the tool call", async () => {
      createMock.mockResolvedValue({
        content: [{ type: "text", text: "I think so." }],
        stop_reason: "end_turn",
        usage: { input_tokens: 10, output_tokens: 5 },
      });

      await expect(model.extract(booleanRequest)).rejects.toThrow(
        "Model response did not call is_developer_tool (stop reason: end_turn)",
      );
    });

    it("should wrap API failures in StructuredOutputError", async () => {
      createMock.mockRejectedValue(new Error("overloaded"));

      const failure = model.extract(booleanRequest);

      await expect(failure).rejects.toBeInstanceOf(StructuredOutputError);
      await expect(failure).rejects.toThrow("Model request for is_developer_tool failed: overloaded");
    });
  });

  describe("complete", () => {
    it("should join the text blocks of the response", async () => {
      createMock.mockResolvedValue({
        content: [
          { type: "text", text: "First section" },
          { type: "text", text: "Second section" },
        ],
        stop_reason: "end_turn",
      });

      const text = await model.complete("Extract the relevant sections");

      expect(text).toBe("First section\nSecond section");
      expect(createMock.mock.calls[0]?.[0]).toEqual({
        model: "claude-3-7-sonnet-latest",
        max_tokens: 8192,
        messages: [{ role: "user", content: "Extract the relevant sections" }],
      });
    });

    it("should wrap API failures in StructuredOutputError", async () => {
      createMock.mockRejectedValue(new Error("rate limited"));

      await expect(model.complete("prompt")).rejects.toThrow("Model request failed: rate limited");
    });
  });
});
