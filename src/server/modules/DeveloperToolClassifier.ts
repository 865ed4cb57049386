/**
 * DeveloperToolClassifier - gates the reader fallback on technical pages
 */
import { z } from "zod";
import type { FetchResult, IDeveloperToolClassifier, IStructuredModel } from "../../types/index.js";
import { truncateContent } from "../../utils/url.js";
import { CONFIG } from "../config.js";

export const DEVELOPER_TOOL_NAME = "is_developer_tool";

export function buildClassificationPrompt(content: string): string {
  return `Analyze the following webpage content and determine if it appears to be documentation
for a developer tool, API, library, framework, or software development resource.
Focus on identifying technical terminology, code examples, API reference materials,
installation instructions, or other indicators of developer documentation.

<webpage-content>
${content}
</webpage-content>

Return TRUE if this is likely developer documentation, or FALSE if not.`;
}

export class DeveloperToolClassifier implements IDeveloperToolClassifier {
  constructor(
    private readonly model: IStructuredModel,
    private readonly charBudget: number = CONFIG.CONTENT_CHAR_BUDGET,
  ) {}

  async isDeveloperTool(content: FetchResult): Promise<boolean> {
    if (content === null) {
      return false;
    }
    return await this.model.extract({
      prompt: buildClassificationPrompt(truncateContent(content, this.charBudget)),
      schema: z.boolean(),
      toolName: DEVELOPER_TOOL_NAME,
      toolDescription: "Returns true if the webpage is concerning a developer tool, else false.",
    });
  }
}
