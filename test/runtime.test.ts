import test from "node:test";
import assert from "node:assert/strict";
import { loadConfig } from "../src/config";
import { detectRuntime, selectModelPair } from "../src/llm/runtime";

const config = loadConfig({});

test("detectRuntime recognises Codex and Claude Code hosts", () => {
  assert.equal(detectRuntime({ CODEX_SANDBOX: "seatbelt" }), "codex-cli");
  assert.equal(detectRuntime({ CODEX_MANAGED_BY_NPM: "1", CLAUDECODE: "1" }), "codex-cli");
  assert.equal(detectRuntime({ CLAUDECODE: "1" }), "claude-code");
  assert.equal(detectRuntime({ CLAUDE_CODE_ENTRYPOINT: "cli" }), "claude-code");
});

test("blank or missing signals resolve to unknown instead of failing", () => {
  assert.equal(detectRuntime({}), "unknown");
  assert.equal(detectRuntime({ CODEX: "   ", CLAUDECODE: "" }), "unknown");
});

test("unknown runtime falls back to the GPT + Gemini pair", () => {
  const pair = selectModelPair("unknown", config);
  assert.equal(pair.model_a.id, "openai/gpt-5.2");
  assert.equal(pair.model_b.id, "google/gemini-3.1-pro-preview");
});

test("Claude Code host gets GPT and Gemini, never a Claude model", () => {
  const runtime = detectRuntime({ CLAUDECODE: "1" });
  const pair = selectModelPair(runtime, config);

  assert.deepEqual(pair, {
    model_a: { id: "openai/gpt-5.2", label: "GPT-5.2" },
    model_b: { id: "google/gemini-3.1-pro-preview", label: "Gemini 3.1 Pro" }
  });
  assert.ok(!pair.model_a.id.startsWith("anthropic/"));
  assert.ok(!pair.model_b.id.startsWith("anthropic/"));
});

test("forcing the Codex runtime swaps GPT for Opus", () => {
  const runtime = detectRuntime({ CLAUDECODE: "1" }, true);
  assert.equal(runtime, "codex-cli");

  const pair = selectModelPair(runtime, config);
  assert.deepEqual(pair.model_a, { id: "anthropic/claude-opus-4-6", label: "Claude Opus 4.6" });
  assert.equal(pair.model_b.id, "google/gemini-3.1-pro-preview");
  assert.ok(!pair.model_a.id.startsWith("openai/"));
});

test("model id overrides use the id as the label", () => {
  const custom = loadConfig({ OPENROUTER_OPUS_MODEL: "anthropic/claude-opus-5" });
  assert.deepEqual(selectModelPair("codex-cli", custom).model_a, {
    id: "anthropic/claude-opus-5",
    label: "anthropic/claude-opus-5"
  });
});
