/**
 * Completions endpoint configuration.
 *
 * Read from the process environment on first use (Next.js loads `.env` and
 * `.env.local` before the server starts):
 *
 *   OPENAI_API_KEY   credential, required
 *   OPENAI_BASE_URL  OpenAI-compatible API root (default https://api.openai.com/v1)
 *   OPENAI_MODEL     model identifier (default gpt-4o-mini)
 *   LLM_TIMEOUT_MS   per-request timeout (default 300000)
 */

import { z } from "zod/v4";

export const DEFAULT_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_MODEL = "gpt-4o-mini";

/**
 * LLM inference can take a minute or more for a 50-row payload.
 * This timeout covers the entire request lifecycle.
 */
export const DEFAULT_TIMEOUT_MS = 300_000;

export const MISSING_KEY_MESSAGE =
  "Missing OPENAI_API_KEY. Create a .env file with OPENAI_API_KEY=... and restart the app.";

export interface LLMConfig {
  apiKey: string;
  baseUrl: string; // no trailing slash
  model: string;
  timeoutMs: number;
}

export class ConfigurationError extends Error {
  readonly code = "configuration";

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().trim().min(1, MISSING_KEY_MESSAGE),
  OPENAI_BASE_URL: z.url().optional(),
  OPENAI_MODEL: z.string().trim().min(1).optional(),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

let _config: LLMConfig | null = null;

function normaliseBaseUrl(raw: string): string {
  return raw.replace(/\/+$/, "");
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value && value.trim() ? value : undefined;
}

/**
 * Returns the endpoint configuration, reading from env vars on first call.
 * Throws ConfigurationError if the credential is missing or a value is malformed.
 */
export function getConfig(): LLMConfig {
  if (_config) return _config;

  const parsed = EnvSchema.safeParse({
    OPENAI_API_KEY: process.env.OPENAI_API_KEY ?? "",
    OPENAI_BASE_URL: blankToUndefined(process.env.OPENAI_BASE_URL),
    OPENAI_MODEL: blankToUndefined(process.env.OPENAI_MODEL),
    LLM_TIMEOUT_MS: blankToUndefined(process.env.LLM_TIMEOUT_MS),
  });

  if (!parsed.success) {
    const messages = parsed.error.issues.map((i) =>
      i.path[0] === "OPENAI_API_KEY" ? i.message : `${String(i.path[0])}: ${i.message}`
    );
    throw new ConfigurationError(messages.join("; "));
  }

  const env = parsed.data;
  _config = {
    apiKey: env.OPENAI_API_KEY,
    baseUrl: normaliseBaseUrl(env.OPENAI_BASE_URL ?? DEFAULT_BASE_URL),
    model: env.OPENAI_MODEL ?? DEFAULT_MODEL,
    timeoutMs: env.LLM_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
  };

  return _config;
}

/** Non-throwing variant for the page: null when the app is configured. */
export function getConfigurationProblem(): string | null {
  try {
    getConfig();
    return null;
  } catch (err) {
    if (err instanceof ConfigurationError) return err.message;
    throw err;
  }
}

export function resetConfigForTests(): void {
  _config = null;
}
