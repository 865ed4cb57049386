/**
 * MCP Tool Schema Definitions
 * Descriptions, input schemas and examples for the tools this server lists
 */

export const TOOL_SCHEMAS = [
  {
    name: "parse_llms_txt",
    description:
      "Finds the llms.txt documentation manifest of a website and returns the linked documentation pages relevant to a question. Probes the conventional manifest locations (llms.txt, docs/llms.txt, llms-ctx.txt, ...), then documentation links found on the page. For developer-tool sites without a manifest, reads a cleaned copy of the page and extracts the relevant sections. Returns markdown with one '# <title>' section per relevant page separated by '---', or a single-sentence message when no documentation was found.",
    category: "Documentation",
    keywords: ["llms.txt", "documentation", "docs", "api", "reference", "manifest", "developer"],
    use_cases: [
      "Looking up how to use a library from its own documentation",
      "Answering questions about an API with its reference pages",
      "Collecting LLM-friendly documentation for a product",
    ],
    inputSchema: {
      type: "object" as const,
      properties: {
        url: {
          type: "string",
          description:
            "URL of the llms.txt file, or of the site to search for documentation. The https:// prefix is optional.",
          examples: ["https://docs.example.com", "example.com/llms.txt"],
        },
        query: {
          type: "string",
          description: "The question the documentation should answer.",
          examples: ["How do I authenticate requests?"],
        },
      },
      required: ["url", "query"],
    },
    examples: [
      {
        description: "Site with an llms.txt at its root",
        input: { url: "https://docs.example.com", query: "How do I authenticate requests?" },
        output: "# Authentication\nAPI keys and tokens\n\n...page content...\n---\n",
      },
      {
        description: "Site without any documentation",
        input: { url: "example.org", query: "pricing" },
        output: "Could not find llms.txt or extract documentation from example.org.",
      },
    ],
  },
];
