/**
 * LlmsTxtServer over an in-memory MCP transport
 */
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { LoggingMessageNotificationSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FakeFetcher, FakeModel } from "../../__tests__/helpers/fakes.js";
import { LlmsTxtServer } from "../LlmsTxtServer.js";
import { RELEVANT_LINKS_TOOL_NAME } from "../modules/RelevanceRanker.js";

const PAGES = {
  "https://example.com/llms.txt": "# Example\n- [Auth](https://example.com/auth.md)",
  "https://example.com/auth.md": "Auth body",
};

const RANKED = [{ url: "https://example.com/auth.md", title: "Auth", description: "API keys" }];

describe("LlmsTxtServer", () => {
  let server: LlmsTxtServer;
  let client: Client;
  let fetcher: FakeFetcher;

  async function start(model: FakeModel): Promise<void> {
    fetcher = new FakeFetcher(PAGES);
    server = new LlmsTxtServer({ fetcher, model });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: "test-client", version: "1.0.0" });
    await server.connect(serverTransport);
    await client.connect(clientTransport);
  }

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    vi.restoreAllMocks();
  });

  it("should list the parse_llms_txt tool", async () => {
    await start(new FakeModel());

    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual(["parse_llms_txt"]);
    expect(tools[0]?.inputSchema.required).toEqual(["url", "query"]);
  });

  it("should return the documentation as one text item", async () => {
    await start(new FakeModel({ [RELEVANT_LINKS_TOOL_NAME]: [RANKED] }));

    const result = await client.callTool({
      name: "parse_llms_txt",
      arguments: { url: "example.com", query: "How do I authenticate?" },
    });

    expect(result.content).toEqual([{ type: "text", text: "# Auth\nAPI keys\n\nAuth body\n---\n" }]);
  });

  it("should send progress as logging notifications", async () => {
    await start(new FakeModel({ [RELEVANT_LINKS_TOOL_NAME]: [RANKED] }));
    const messages: unknown[] = [];
    client.setNotificationHandler(LoggingMessageNotificationSchema, (notification) => {
      messages.push(notification.params.data);
    });

    await client.callTool({
      name: "parse_llms_txt",
      arguments: { url: "example.com", query: "auth" },
    });

    expect(messages).toContain("Looking for llms.txt or related files at example.com");
    expect(messages).toContain("Found llms.txt at https://example.com/llms.txt, parsing with Claude...");
  });

  it("should trim arguments before running the pipeline", async () => {
    await start(new FakeModel({ [RELEVANT_LINKS_TOOL_NAME]: [RANKED] }));

    await client.callTool({
      name: "parse_llms_txt",
      arguments: { url: "  example.com  ", query: " auth " },
    });

    expect(fetcher.requestedUrls[0]).toBe("https://example.com/llms.txt");
  });

  it("should reject an empty url", async () => {
    await start(new FakeModel());

    await expect(
      client.callTool({ name: "parse_llms_txt", arguments: { url: "", query: "auth" } }),
    ).rejects.toThrow(/url: URL cannot be empty/);
    expect(fetcher.requests).toHaveLength(0);
  });

  it("should reject a missing query", async () => {
    await start(new FakeModel());

    await expect(
      client.callTool({ name: "parse_llms_txt", arguments: { url: "example.com" } }),
    ).rejects.toThrow(/Invalid arguments for parse_llms_txt: query/);
  });

  it("should reject URLs blocked by the security policy", async () => {
    await start(new FakeModel());

    await expect(
      client.callTool({
        name: "parse_llms_txt",
        arguments: { url: "http://localhost:3000", query: "auth" },
      }),
    ).rejects.toThrow(/Domain localhost blocked/);
  });

  it("should reject unknown tools", async () => {
    await start(new FakeModel());

    await expect(client.callTool({ name: "search", arguments: {} })).rejects.toThrow(
      /Tool search not found/,
    );
  });

  it("should turn model failures into a text result", async () => {
    await start(new FakeModel());

    const result = await client.callTool({
      name: "parse_llms_txt",
      arguments: { url: "example.com", query: "auth" },
    });

    expect(result.content).toEqual([
      {
        type: "text",
        text: "The operation encountered an error: No fake response queued for record_relevant_links. Please try again.",
      },
    ]);
  });

  it("should build default services when none are injected", () => {
    server = new LlmsTxtServer({ model: new FakeModel() });
    client = new Client({ name: "unused", version: "1.0.0" });

    const services = server.getServices();

    expect(services.fetcher.constructor.name).toBe("DocumentFetcher");
    expect(services.reader.constructor.name).toBe("ContentReader");
  });
});
