import type { AppConfig } from "../config";
import type { ModelPair, RuntimeContext } from "../types";
import { getEnv, type Env } from "../utils/env";

const CODEX_ENV_KEYS = [
  "CODEX_SANDBOX",
  "CODEX_MANAGED_BY_NPM",
  "CODEX",
  "CODEX_INTERNAL_ORIGINATOR_OVERRIDE",
  "CODEX_SANDBOX_NETWORK_DISABLED"
] as const;

const CLAUDE_CODE_ENV_KEYS = ["CLAUDECODE", "CLAUDE_CODE_ENTRYPOINT"] as const;

function anySet(keys: readonly string[], env: Env): boolean {
  return keys.some((key) => getEnv(key, env) !== undefined);
}

export function detectRuntime(env: Env, forceCodex = false): RuntimeContext {
  if (forceCodex) return "codex-cli";
  if (anySet(CODEX_ENV_KEYS, env)) return "codex-cli";
  if (anySet(CLAUDE_CODE_ENV_KEYS, env)) return "claude-code";
  return "unknown";
}

/**
 * Picks two comparison models that do not share a provider family with the host agent.
 * Codex already runs on GPT, so it gets Opus; every other host gets GPT.
 */
export function selectModelPair(runtime: RuntimeContext, config: AppConfig): ModelPair {
  const { gpt, gemini, opus } = config.models;
  if (runtime === "codex-cli") return { model_a: opus, model_b: gemini };
  return { model_a: gpt, model_b: gemini };
}
