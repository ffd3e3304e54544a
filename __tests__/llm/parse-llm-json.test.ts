import { describe, it, expect } from "vitest";
import { parseLLMJson, parseStrictJson, repairLlmJson } from "@/lib/llm/parse-llm-json";

describe("parseLLMJson", () => {
  it("parses plain JSON object", () => {
    expect(parseLLMJson('{"themes": []}')).toEqual({ themes: [] });
  });

  it("handles BOM prefix", () => {
    expect(parseLLMJson('\uFEFF{"a": 1}')).toEqual({ a: 1 });
  });

  it("handles leading/trailing whitespace", () => {
    expect(parseLLMJson('  \n  {"a": 1}  \n  ')).toEqual({ a: 1 });
  });

  it("extracts JSON from ```json fences", () => {
    const input = '```json\n{"themes": [{"theme": "Speed"}]}\n```';
    expect(parseLLMJson(input)).toEqual({ themes: [{ theme: "Speed" }] });
  });

  it("extracts JSON from fences with preamble text", () => {
    const input = 'Here are the themes:\n\n```json\n{"themes": []}\n```\n\nLet me know!';
    expect(parseLLMJson(input)).toEqual({ themes: [] });
  });

  it("handles Windows-style line endings in fences", () => {
    const input = '```json\r\n{"key": "value"}\r\n```';
    expect(parseLLMJson(input)).toEqual({ key: "value" });
  });

  it("falls back to bracket matching around prose", () => {
    const input = 'Sure! {"themes": [{"theme": "Speed"}]} Hope this helps.';
    expect(parseLLMJson(input)).toEqual({ themes: [{ theme: "Speed" }] });
  });

  it("repairs a missing comma between theme objects", () => {
    const input = '{"themes": [{"theme": "A"}\n{"theme": "B"}]}';
    expect(parseLLMJson(input)).toEqual({ themes: [{ theme: "A" }, { theme: "B" }] });
  });

  it("does not salvage a truncated theme list", () => {
    expect(() => parseLLMJson('{"themes": [{"theme": "A"}, {"theme": "B')).toThrow(SyntaxError);
  });

  it("throws SyntaxError for non-JSON input", () => {
    expect(() => parseLLMJson("just plain text")).toThrow(SyntaxError);
  });

  it("throws SyntaxError for empty string", () => {
    expect(() => parseLLMJson("")).toThrow(SyntaxError);
  });
});

describe("repairLlmJson", () => {
  it("inserts commas between adjacent objects", () => {
    expect(repairLlmJson('[{"a": 1}\n{"b": 2}]')).toBe('[{"a": 1},\n{"b": 2}]');
  });

  it("drops trailing commas", () => {
    expect(repairLlmJson('{"a": [1, 2,],}')).toBe('{"a": [1, 2]}');
  });
});

describe("parseStrictJson", () => {
  it("parses JSON with a BOM and surrounding whitespace", () => {
    expect(parseStrictJson('\uFEFF  {"themes": []}\n')).toEqual({ themes: [] });
  });

  it("unwraps a reply that is a single fenced block", () => {
    expect(parseStrictJson('```json\n{"themes": []}\n```')).toEqual({ themes: [] });
    expect(parseStrictJson('```\r\n[1, 2]\r\n```')).toEqual([1, 2]);
  });

  it("rejects prose around an embedded object", () => {
    expect(() => parseStrictJson('Sure! {"themes": []} Hope this helps.')).toThrow(SyntaxError);
  });

  it("rejects a fenced block with text before it", () => {
    expect(() => parseStrictJson('Here:\n```json\n{"themes": []}\n```')).toThrow(SyntaxError);
  });

  it("does not repair missing commas", () => {
    expect(() => parseStrictJson('[{"a": 1}\n{"b": 2}]')).toThrow(SyntaxError);
  });
});
