import { describe, it, expect, afterEach, vi } from "vitest";
import {
  ModelServingError,
  chatCompletion,
  createChatModelClient,
  parseCompletionResponse,
} from "@/lib/llm/chat-completions";
import { FetchTimeoutError, fetchWithTimeout } from "@/lib/llm/fetch-with-timeout";
import type { LLMConfig } from "@/lib/llm/config";

const config: LLMConfig = {
  apiKey: "test-secret",
  baseUrl: "https://llm.example.test/v1",
  model: "test-model",
  timeoutMs: 1_000,
};

function completionBody(content: string) {
  return {
    model: "test-model-2024",
    choices: [{ message: { role: "assistant", content }, finish_reason: "stop" }],
    usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
  };
}

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
  });
}

function stubFetch(response: () => Response) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => response());
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

/** A fetch that never settles until its signal aborts. */
function stubHangingFetch() {
  vi.stubGlobal(
    "fetch",
    vi.fn(
      (_url: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () =>
            reject(Object.assign(new Error("The operation was aborted."), { name: "AbortError" }))
          );
        })
    )
  );
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("chatCompletion", () => {
  it("posts the model and messages with a bearer token", async () => {
    const fetchMock = stubFetch(() => jsonResponse(completionBody("hello")));

    const response = await chatCompletion(config, {
      messages: [{ role: "user", content: "hi" }],
    });

    expect(response).toEqual({
      content: "hello",
      model: "test-model-2024",
      finishReason: "stop",
      usage: { promptTokens: 12, completionTokens: 3, totalTokens: 15 },
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://llm.example.test/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(new Headers(init?.headers).get("Authorization")).toBe("Bearer test-secret");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test-model",
      messages: [{ role: "user", content: "hi" }],
    });
  });

  it("sends temperature only when given", async () => {
    const fetchMock = stubFetch(() => jsonResponse(completionBody("ok")));
    await chatCompletion(config, { messages: [], temperature: 0.2 });
    const [, init] = fetchMock.mock.calls[0];
    expect(JSON.parse(String(init?.body)).temperature).toBe(0.2);
  });

  it("throws ModelServingError with the endpoint status", async () => {
    stubFetch(() => new Response("rate limited", { status: 429 }));

    await expect(chatCompletion(config, { messages: [] })).rejects.toEqual(
      new ModelServingError("Completions request failed (429): rate limited", 429)
    );
  });

  it("reports a hung endpoint as a timeout", async () => {
    stubHangingFetch();
    await expect(
      chatCompletion({ ...config, timeoutMs: 20 }, { messages: [] })
    ).rejects.toBeInstanceOf(FetchTimeoutError);
  });
});

describe("fetchWithTimeout", () => {
  it("passes transport errors through unchanged", async () => {
    const failure = new TypeError("fetch failed");
    vi.stubGlobal("fetch", vi.fn(async () => Promise.reject(failure)));

    await expect(
      fetchWithTimeout("https://llm.example.test/v1/chat/completions", {}, 1_000)
    ).rejects.toBe(failure);
  });

  it("names the path and the limit when it times out", async () => {
    stubHangingFetch();
    await expect(
      fetchWithTimeout("https://llm.example.test/v1/chat/completions", {}, 10)
    ).rejects.toThrow("Request to /v1/chat/completions timed out after 10ms");
  });
});

describe("createChatModelClient", () => {
  it("returns trimmed completion text", async () => {
    stubFetch(() => jsonResponse(completionBody('  {"themes": []}\n')));
    const client = createChatModelClient(config);
    await expect(client.complete([{ role: "user", content: "x" }])).resolves.toBe('{"themes": []}');
  });

  it("treats an empty completion as a service error", async () => {
    stubFetch(() => jsonResponse(completionBody("   ")));
    const client = createChatModelClient(config);
    await expect(client.complete([])).rejects.toBeInstanceOf(ModelServingError);
  });
});

describe("parseCompletionResponse", () => {
  it("tolerates missing optional fields", () => {
    expect(parseCompletionResponse({ choices: [] })).toEqual({
      content: "",
      usage: null,
      model: "",
      finishReason: null,
    });
  });

  it("rejects a non-object body", () => {
    expect(() => parseCompletionResponse("oops")).toThrow(ModelServingError);
  });
});
