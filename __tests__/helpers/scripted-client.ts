import type { ChatMessage, ModelClient } from "@/lib/llm/chat-completions";

/**
 * ModelClient that replays canned responses in order and records every
 * request. Running out of responses fails the test loudly.
 */
export function scriptedClient(responses: Array<string | Error>) {
  const calls: ChatMessage[][] = [];
  const queue = [...responses];

  const client: ModelClient = {
    async complete(messages) {
      calls.push(messages);
      const next = queue.shift();
      if (next === undefined) {
        throw new Error(`Unexpected model call #${calls.length}`);
      }
      if (next instanceof Error) throw next;
      return next;
    },
  };

  return { client, calls };
}

export const CHECKOUT_THEME = {
  theme: "Checkout performance",
  summary: "Users report slow checkout.",
  frequency: "High",
  severity: "Medium",
  recommended_action: "Optimize checkout path.",
  cited_row_ids: [0, 2],
};

export const CHECKOUT_CSV = [
  "text",
  "Checkout is slow",
  "Love the new UI",
  "Checkout is slow on mobile",
].join("\n");
