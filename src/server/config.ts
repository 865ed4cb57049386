import { z } from "zod";

export const CONFIG = {
  SERVER_NAME: "llms-txt-parser",
  SERVER_VERSION: "0.1.0",
  USER_AGENT: "llms-txt-parser/1.0",
  FETCH_TIMEOUT: 30000,
  MAX_REDIRECTS: 10,
  MCP_SLOW_REQUEST_WARNING: 60000,
  // Manifest locations probed under the site origin, highest priority first
  CANDIDATE_PATHS: [
    "llms.txt",
    "docs/llms.txt",
    "documentation/llms.txt",
    "doc/llms.txt",
    "llms-ctx.txt",
    "llms-ctx-full.txt",
    "api/llms.txt",
    "reference/llms.txt",
  ],
  // Characters of page content sent to the model in one request
  CONTENT_CHAR_BUDGET: 100000,
  READER_ORIGIN: "https://r.jina.ai/",
  READER_API_KEY_HEADER: "x-api-key",
  DEFAULT_MODEL: "claude-3-7-sonnet-latest",
  MODEL_MAX_TOKENS: 8192,
} as const;

const ENV_SCHEMA = z.object({
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  LLMS_TXT_MODEL: z.string().min(1).default(CONFIG.DEFAULT_MODEL),
  JINA_READER_KEY: z.string().min(1).optional(),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
    z.enum(["debug", "info", "warn", "error"]).default("info"),
  ),
});

export type Environment = z.infer<typeof ENV_SCHEMA>;

/**
 * Reads the server's environment variables. Empty strings count as unset.
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): Environment {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""),
  );
  const parsed = ENV_SCHEMA.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}
