import test from "node:test";
import assert from "node:assert/strict";
import { loadConfig } from "../src/config";
import { clampOverride, inferPlatform, profileFor, resolveRequest } from "../src/llm/platform";

const config = loadConfig({});

test("inferPlatform reads a Platform: line case-insensitively", () => {
  assert.equal(inferPlatform("Platform: slack\nShip notes for today"), "slack");
  assert.equal(inferPlatform("Context first\n  PLATFORM :  LinkedIn\nAnnounce the launch"), "linkedin");
  assert.equal(inferPlatform("<platform> email\nFollow up with the vendor"), "email");
});

test("inferPlatform treats other, unknown tags and missing markers as no platform", () => {
  assert.equal(inferPlatform("Platform: other\nWhatever"), null);
  assert.equal(inferPlatform("Platform: tiktok\nWhatever"), null);
  assert.equal(inferPlatform("Write about slack etiquette"), null);
  assert.equal(inferPlatform("The platform: slack is mentioned mid-line"), null);
});

test("every known platform resolves to its documented budget", () => {
  const table = {
    slack: [250, 35],
    linkedin: [300, 35],
    email: [800, 90],
    substack: [2500, 90],
    article: [2500, 90]
  } as const;

  for (const [tag, [maxTokens, timeout]] of Object.entries(table)) {
    const request = resolveRequest(`Platform: ${tag}\nDraft something`, {}, config);
    assert.equal(request.platform, tag);
    assert.equal(request.max_tokens, maxTokens, tag);
    assert.equal(request.timeout_seconds, timeout, tag);
  }
});

test("short-form profiles carry a six line cap, long-form ones none", () => {
  assert.equal(profileFor("slack", config).maxLines, 6);
  assert.equal(profileFor("linkedin", config).maxLines, 6);
  assert.equal(profileFor("email", config).maxLines, undefined);
  assert.equal(profileFor(null, config).maxLines, undefined);
});

test("slack prompt resolves to 250 tokens and 35 seconds", () => {
  const request = resolveRequest("Platform: slack\nTell the team the deploy is done", {}, config);
  assert.deepEqual(request, { max_tokens: 250, temperature: 0.4, timeout_seconds: 35, platform: "slack" });
});

test("email prompt without overrides resolves to 800 tokens and 90 seconds", () => {
  const request = resolveRequest("Platform: email\nAsk for the signed contract", {}, config);
  assert.deepEqual(request, { max_tokens: 800, temperature: 0.4, timeout_seconds: 90, platform: "email" });
});

test("no marker and no override uses the default profile", () => {
  const request = resolveRequest("Write an intro for the quarterly report", {}, config);
  assert.deepEqual(request, { max_tokens: 2000, temperature: 0.4, timeout_seconds: 90, platform: null });
});

test("explicit overrides win over the platform profile field by field", () => {
  const request = resolveRequest("Platform: slack\nShort update", { maxTokens: 1200 }, config);
  assert.equal(request.max_tokens, 1200);
  assert.equal(request.timeout_seconds, 35);

  const all = resolveRequest(
    "Platform: linkedin\nPost",
    { maxTokens: 900, timeoutSeconds: 120, temperature: 0 },
    config
  );
  assert.deepEqual(all, { max_tokens: 900, temperature: 0, timeout_seconds: 120, platform: "linkedin" });
});

test("clampOverride bounds each override to its allowed range", () => {
  assert.equal(clampOverride("maxTokens", 0), 1);
  assert.equal(clampOverride("maxTokens", 50000), 32000);
  assert.equal(clampOverride("temperature", -1), 0);
  assert.equal(clampOverride("temperature", 0.7), 0.7);
  assert.equal(clampOverride("timeoutSeconds", 3000000), 600);
});
