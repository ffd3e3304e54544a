/**
 * Maps analysis failures to the API's error payload.
 *
 * Configuration problems are the server's fault (500); everything that went
 * wrong on the model side of the exchange is reported as a bad gateway.
 */

import { ConfigurationError } from "@/lib/llm/config";
import { ModelServingError } from "@/lib/llm/chat-completions";
import { FetchTimeoutError } from "@/lib/llm/fetch-with-timeout";
import {
  CitationError,
  PayloadError,
  ResponseParseError,
  ResponseValidationError,
} from "./errors";

export type AnalysisErrorCode =
  | "configuration"
  | "payload"
  | "model"
  | "timeout"
  | "parse"
  | "validation"
  | "citation"
  | "internal";

export interface AnalysisErrorBody {
  error: string;
  code: AnalysisErrorCode;
}

export function describeAnalysisError(err: unknown): { status: number; body: AnalysisErrorBody } {
  if (err instanceof ConfigurationError) {
    return { status: 500, body: { error: err.message, code: "configuration" } };
  }
  if (err instanceof PayloadError) {
    return { status: 400, body: { error: err.message, code: "payload" } };
  }
  if (err instanceof FetchTimeoutError) {
    return { status: 504, body: { error: err.message, code: "timeout" } };
  }
  if (err instanceof ModelServingError) {
    return { status: 502, body: { error: err.message, code: "model" } };
  }
  if (err instanceof ResponseParseError) {
    return { status: 502, body: { error: err.message, code: "parse" } };
  }
  if (err instanceof ResponseValidationError) {
    return { status: 502, body: { error: err.message, code: "validation" } };
  }
  if (err instanceof CitationError) {
    return { status: 502, body: { error: err.message, code: "citation" } };
  }
  return {
    status: 500,
    body: {
      error: err instanceof Error ? err.message : "Analysis failed",
      code: "internal",
    },
  };
}
