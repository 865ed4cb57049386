/**
 * Zod validation schemas for MCP tool arguments
 * All tool inputs must be validated against these schemas
 */

import { z } from "zod";
import { urlSecurity } from "../utils/url-security.js";

export const PARSE_LLMS_TXT_SCHEMA = z.object({
  url: z
    .string()
    .trim()
    .min(1, "URL cannot be empty")
    .max(2000, "URL too long")
    .superRefine((url, ctx) => {
      const validation = urlSecurity.validateURL(url);
      if (!validation.valid) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: validation.reason ?? "URL blocked by security policy",
        });
      }
    }),
  query: z.string().trim().min(1, "Query cannot be empty").max(5000, "Query too long"),
});
