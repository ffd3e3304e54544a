/**
 * Chat completions client.
 *
 * Thin wrapper around an OpenAI-compatible `POST {baseUrl}/chat/completions`
 * endpoint. The analysis pipeline only relies on the `ModelClient` contract:
 * given role-tagged messages, return a single text string. Errors are never
 * retried here; they propagate to the caller.
 */

import { fetchWithTimeout } from "./fetch-with-timeout";
import type { LLMConfig } from "./config";
import { logger } from "@/lib/logger";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A single message in the chat completions format. */
export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

/** Token usage statistics returned by the model. */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/** Response from a chat completion request. */
export interface ChatCompletionResponse {
  /** The generated text content. */
  content: string;
  /** Token usage statistics (if available). */
  usage: TokenUsage | null;
  /** The model identifier that served the request. */
  model: string;
  /** The finish reason (e.g. "stop", "length"). */
  finishReason: string | null;
}

/** Options for a chat completion request. */
export interface ChatCompletionOptions {
  messages: ChatMessage[];
  /** Sampling temperature (0.0 - 1.0). */
  temperature?: number;
}

/** The only surface the analysis pipeline depends on. */
export interface ModelClient {
  complete(messages: ChatMessage[]): Promise<string>;
}

// ---------------------------------------------------------------------------
// Chat Completions (non-streaming)
// ---------------------------------------------------------------------------

/**
 * Send a chat completion request and return the parsed response.
 */
export async function chatCompletion(
  config: LLMConfig,
  options: ChatCompletionOptions
): Promise<ChatCompletionResponse> {
  const url = `${config.baseUrl}/chat/completions`;

  const body: Record<string, unknown> = {
    model: config.model,
    messages: options.messages,
  };
  if (options.temperature !== undefined) {
    body.temperature = options.temperature;
  }

  const resp = await fetchWithTimeout(
    url,
    {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${config.apiKey}`,
      },
      body: JSON.stringify(body),
    },
    config.timeoutMs
  );

  if (!resp.ok) {
    const text = await resp.text();
    throw new ModelServingError(
      `Completions request failed (${resp.status}): ${text}`,
      resp.status
    );
  }

  const data: unknown = await resp.json();
  return parseCompletionResponse(data);
}

/**
 * Build a ModelClient bound to one configuration. Each `complete` call is a
 * single request; empty completions are treated as service errors.
 */
export function createChatModelClient(config: LLMConfig): ModelClient {
  return {
    async complete(messages) {
      const startTime = Date.now();
      const response = await chatCompletion(config, { messages });
      const durationMs = Date.now() - startTime;

      logger.info("Completion received", {
        model: response.model || config.model,
        messages: messages.length,
        promptChars: messages.reduce((acc, m) => acc + m.content.length, 0),
        responseChars: response.content.length,
        finishReason: response.finishReason,
        durationMs,
        ...(response.usage && { tokenUsage: response.usage }),
      });

      const content = response.content.trim();
      if (!content) {
        throw new ModelServingError("Completions endpoint returned an empty response", 0);
      }
      return content;
    },
  };
}

// ---------------------------------------------------------------------------
// Response parsing
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function numberOrZero(value: unknown): number {
  return typeof value === "number" ? value : 0;
}

export function parseCompletionResponse(data: unknown): ChatCompletionResponse {
  if (!isRecord(data)) {
    throw new ModelServingError("Completions endpoint returned a non-object body", 0);
  }

  const choices = Array.isArray(data.choices) ? data.choices : [];
  const first: unknown = choices[0];
  const message = isRecord(first) && isRecord(first.message) ? first.message : null;

  const content = typeof message?.content === "string" ? message.content : "";
  const finishReason =
    isRecord(first) && typeof first.finish_reason === "string" ? first.finish_reason : null;
  const model = typeof data.model === "string" ? data.model : "";

  const rawUsage = isRecord(data.usage) ? data.usage : null;
  const usage: TokenUsage | null = rawUsage
    ? {
        promptTokens: numberOrZero(rawUsage.prompt_tokens),
        completionTokens: numberOrZero(rawUsage.completion_tokens),
        totalTokens: numberOrZero(rawUsage.total_tokens),
      }
    : null;

  return { content, usage, model, finishReason };
}

// ---------------------------------------------------------------------------
// Custom error
// ---------------------------------------------------------------------------

export class ModelServingError extends Error {
  readonly code = "model";
  /** HTTP status code from the endpoint (0 when the body itself was unusable). */
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = "ModelServingError";
    this.statusCode = statusCode;
  }
}
