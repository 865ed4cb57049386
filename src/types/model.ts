/**
 * Structured-output model type definitions
 */
import type { z } from "zod";

export interface StructuredRequest<T> {
  prompt: string;
  schema: z.ZodType<T>;
  /** Name of the forced tool call that carries the result. */
  toolName: string;
  toolDescription: string;
}

export interface IStructuredModel {
  extract<T>(request: StructuredRequest<T>): Promise<T>;
  complete(prompt: string): Promise<string>;
}
