/**
 * Error types and message helpers shared by the fetch and model layers
 */
import axios from "axios";

/** Raised when the model call fails or returns output that does not match the schema. */
export class StructuredOutputError extends Error {
  constructor(
    message: string,
    public readonly toolName: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StructuredOutputError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const NETWORK_ERROR_MESSAGES: Record<string, string> = {
  ECONNABORTED: "Request timeout - server took too long to respond",
  ETIMEDOUT: "Connection timeout - failed to establish connection",
  ENOTFOUND: "DNS resolution failed - domain not found",
  ECONNREFUSED: "Connection refused - server is not accepting connections",
  ECONNRESET: "Connection reset - network connection was interrupted",
  ERR_FR_TOO_MANY_REDIRECTS: "Too many redirects",
};

/**
 * One-line reason for a failed HTTP request, for logs only.
 */
export function describeFetchError(error: unknown): string {
  if (!axios.isAxiosError(error)) {
    return `Request failed: ${describeError(error)}`;
  }

  const status = error.response?.status;
  if (status !== undefined) {
    const statusText = error.response?.statusText || "Unknown error";
    if (status >= 400 && status < 500) {
      return `Client error (${status}): ${statusText}`;
    }
    if (status >= 500) {
      return `Server error (${status}): ${statusText}`;
    }
    return `HTTP error (${status}): ${statusText}`;
  }

  if (error.code) {
    return NETWORK_ERROR_MESSAGES[error.code] ?? `Network error (${error.code}): ${error.message}`;
  }

  return `Request failed: ${error.message}`;
}
