import test from "node:test";
import assert from "node:assert/strict";
import { toJson, toMarkdown } from "../src/render";
import type { AggregateResult } from "../src/types";

const base: AggregateResult = {
  model_a: { content: "Draft A", finish_reason: "stop", elapsed_seconds: 1.2, retried: false },
  model_b: {
    content: "",
    finish_reason: "error",
    elapsed_seconds: 90,
    retried: false,
    error: "Timeout after 90s"
  },
  models_used: { model_a: "openai/gpt-5.2", model_b: "google/gemini-3.1-pro-preview" },
  model_a_label: "GPT-5.2",
  model_b_label: "Gemini 3.1 Pro",
  runtime: "claude-code",
  request: { max_tokens: 2000, temperature: 0.4, timeout_seconds: 90, platform: null }
};

test("toMarkdown renders one section per model", () => {
  assert.equal(
    toMarkdown(base),
    [
      "# Multi-model drafts",
      "",
      "Models: GPT-5.2 (openai/gpt-5.2), Gemini 3.1 Pro (google/gemini-3.1-pro-preview)",
      "",
      "## GPT-5.2",
      "",
      "Draft A",
      "",
      "## Gemini 3.1 Pro",
      "",
      "Error: Timeout after 90s",
      ""
    ].join("\n")
  );
});

test("toMarkdown marks a truncated empty draft", () => {
  const truncated: AggregateResult = {
    ...base,
    model_b: { content: "", finish_reason: "length", elapsed_seconds: 3, retried: true }
  };
  assert.ok(toMarkdown(truncated).endsWith("## Gemini 3.1 Pro\n\n(empty)\n"));
});

test("toJson keeps non-ASCII text and ends with a newline", () => {
  assert.equal(toJson({ text: "café ☕" }), '{\n  "text": "café ☕"\n}\n');
});
