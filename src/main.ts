#!/usr/bin/env node

import { type Environment, loadEnvironment } from "./server/config.js";
import { LlmsTxtServer } from "./server/LlmsTxtServer.js";
import { AnthropicStructuredModel } from "./server/modules/AnthropicStructuredModel.js";
import { describeError } from "./utils/errorHandler.js";
import { logError, setLogLevel } from "./utils/logging.js";

let env: Environment;
try {
  env = loadEnvironment();
} catch (error) {
  logError("Failed to start server:", { error: describeError(error) });
  process.exit(1);
}
setLogLevel(env.LOG_LEVEL);

const server = new LlmsTxtServer({
  model: new AnthropicStructuredModel({ apiKey: env.ANTHROPIC_API_KEY, model: env.LLMS_TXT_MODEL }),
  readerApiKey: env.JINA_READER_KEY,
});
await server.run();
