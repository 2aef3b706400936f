import type { AppConfig } from "../config";
import { errorMessage } from "../errors";
import type {
  AggregateResult,
  ModelPair,
  ModelResult,
  RequestOverrides,
  RequestSpec,
  ResolvedRequest,
  RuntimeContext,
  TokenBudget
} from "../types";
import type { Env } from "../utils/env";
import { safeLog } from "../utils/redact";
import { isAbortError } from "../utils/timeout";
import { buildRequestSpec, computeRetryBudget, isReasoningModel, specBudget } from "./budget";
import type { FetchLike } from "./http";
import { profileFor, resolveRequest } from "./platform";
import { normalizeDraft } from "./postprocess";
import { generateOpenRouter, type Completion } from "./providers/openrouter";
import { detectRuntime, selectModelPair } from "./runtime";

export type ExecutorContext = {
  apiKey: string;
  config: AppConfig;
  fetchImpl?: FetchLike;
};

export type CompareInput = {
  prompt: string;
  overrides?: RequestOverrides;
  forceCodexRuntime?: boolean;
};

export type CompareDeps = ExecutorContext & { env?: Env };

const EMPTY_RESPONSE = "Empty response from model";

function secondsSince(startedAt: number): number {
  return Math.round(Date.now() - startedAt) / 1000;
}

function shouldRetry(spec: RequestSpec, completion: Completion, config: AppConfig): boolean {
  return (
    isReasoningModel(spec.model_id, config) &&
    completion.finishReason === "length" &&
    completion.content.trim().length < config.retry.nearEmptyChars
  );
}

function settle(
  spec: RequestSpec,
  completion: Completion,
  budget: TokenBudget,
  startedAt: number,
  retried: boolean
): ModelResult {
  const elapsed_seconds = secondsSince(startedAt);
  if (completion.content.trim()) {
    if (completion.finishReason === "length") {
      safeLog("[compare] response truncated", { model: spec.model_id, maxTokens: budget.maxTokens });
    }
    return { content: completion.content, finish_reason: completion.finishReason, elapsed_seconds, retried };
  }

  // Truncated-empty stays "length" so the caller can tell budget exhaustion from a failed call.
  return {
    content: "",
    finish_reason: completion.finishReason === "length" ? "length" : "error",
    elapsed_seconds,
    retried,
    error: EMPTY_RESPONSE
  };
}

/**
 * One model call as a small state machine: sent -> settled, or
 * sent -> truncated-empty -> retry-sent -> settled. Never rejects.
 */
export async function callModel(spec: RequestSpec, ctx: ExecutorContext): Promise<ModelResult> {
  const startedAt = Date.now();
  let retried = false;

  try {
    const firstBudget = specBudget(spec);
    const first = await generateOpenRouter(spec, firstBudget, ctx);
    if (!shouldRetry(spec, first, ctx.config)) return settle(spec, first, firstBudget, startedAt, false);

    const retryBudget = computeRetryBudget(firstBudget, ctx.config);
    safeLog("[compare] empty truncated response, retrying", {
      model: spec.model_id,
      hasReasoning: first.hasReasoning,
      maxTokens: retryBudget.maxTokens,
      reasoningMaxTokens: retryBudget.reasoningMaxTokens
    });
    retried = true;
    const second = await generateOpenRouter(spec, retryBudget, ctx);
    return {
      ...settle(spec, second, retryBudget, startedAt, true),
      retried_with_max_tokens: retryBudget.maxTokens
    };
  } catch (err: unknown) {
    const isTimeout = isAbortError(err);
    const result: ModelResult = {
      content: "",
      finish_reason: "error",
      elapsed_seconds: isTimeout ? spec.timeout_seconds : secondsSince(startedAt),
      retried,
      error: isTimeout ? `Timeout after ${spec.timeout_seconds}s` : errorMessage(err)
    };
    safeLog("[compare] call failed", { model: spec.model_id, error: result.error });
    return result;
  }
}

function finalize(result: ModelResult, request: ResolvedRequest, config: AppConfig): ModelResult {
  if (!result.content) return Object.freeze(result);
  const content = normalizeDraft(result.content, profileFor(request.platform, config));
  return Object.freeze({ ...result, content });
}

export async function runParallelCalls(
  prompt: string,
  request: ResolvedRequest,
  pair: ModelPair,
  runtime: RuntimeContext,
  ctx: ExecutorContext
): Promise<AggregateResult> {
  const specA = buildRequestSpec(pair.model_a.id, prompt, request, ctx.config);
  const specB = buildRequestSpec(pair.model_b.id, prompt, request, ctx.config);

  // callModel never rejects, so this joins both outcomes rather than failing fast.
  const [modelA, modelB] = await Promise.all([callModel(specA, ctx), callModel(specB, ctx)]);

  return Object.freeze({
    model_a: finalize(modelA, request, ctx.config),
    model_b: finalize(modelB, request, ctx.config),
    models_used: Object.freeze({ model_a: pair.model_a.id, model_b: pair.model_b.id }),
    model_a_label: pair.model_a.label,
    model_b_label: pair.model_b.label,
    runtime,
    request: Object.freeze({ ...request })
  });
}

export async function runComparison(input: CompareInput, deps: CompareDeps): Promise<AggregateResult> {
  const runtime = detectRuntime(deps.env ?? process.env, input.forceCodexRuntime ?? false);
  const pair = selectModelPair(runtime, deps.config);
  const request = resolveRequest(input.prompt, input.overrides ?? {}, deps.config);

  safeLog("[compare] request", { runtime, models: pair, request });
  return runParallelCalls(input.prompt, request, pair, runtime, deps);
}

function hasDraft(result: ModelResult): boolean {
  return result.finish_reason !== "error" && result.content.trim().length > 0;
}

/** True when neither model produced a usable draft, truncated-empty results included. */
export function isTotalFailure(result: AggregateResult): boolean {
  return !hasDraft(result.model_a) && !hasDraft(result.model_b);
}
