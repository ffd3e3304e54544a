import { describe, it, expect } from "vitest";
import { describeAnalysisError } from "@/lib/insights/error-response";
import { ConfigurationError, MISSING_KEY_MESSAGE } from "@/lib/llm/config";
import { ModelServingError } from "@/lib/llm/chat-completions";
import { FetchTimeoutError } from "@/lib/llm/fetch-with-timeout";
import {
  CitationError,
  PayloadError,
  ResponseParseError,
  ResponseValidationError,
} from "@/lib/insights/errors";

describe("describeAnalysisError", () => {
  it("reports a missing credential as a server configuration error", () => {
    expect(describeAnalysisError(new ConfigurationError(MISSING_KEY_MESSAGE))).toEqual({
      status: 500,
      body: { error: MISSING_KEY_MESSAGE, code: "configuration" },
    });
  });

  it("reports an unknown column as a bad request", () => {
    expect(describeAnalysisError(new PayloadError("Unknown column")).status).toBe(400);
  });

  it("reports a timeout as 504", () => {
    const err = new FetchTimeoutError("https://api.example.test/v1/chat/completions", 50);
    expect(describeAnalysisError(err)).toEqual({
      status: 504,
      body: { error: "Request to /v1/chat/completions timed out after 50ms", code: "timeout" },
    });
  });

  it.each([
    [new ModelServingError("Completions request failed (500): boom", 500), "model"],
    [new ResponseParseError("not json", "raw"), "parse"],
    [new ResponseValidationError([{ path: "themes", message: "Required" }]), "validation"],
    [new CitationError("Checkout", [9]), "citation"],
  ])("reports %s as a bad gateway", (err, code) => {
    const { status, body } = describeAnalysisError(err);
    expect(status).toBe(502);
    expect(body.code).toBe(code);
    expect(body.error).toBe(err.message);
  });

  it("falls back to an internal error", () => {
    expect(describeAnalysisError("weird")).toEqual({
      status: 500,
      body: { error: "Analysis failed", code: "internal" },
    });
  });
});
