import type { AppConfig } from "../config";
import type { RequestSpec, ResolvedRequest, TokenBudget } from "../types";

// Reasoning models share max_tokens between hidden reasoning and visible content.
// The overhead is added on top of the visible budget and reasoning is capped at the
// same amount, so the visible part keeps at least `visibleTokens` once the cap holds.

export function isReasoningModel(modelId: string, config: AppConfig): boolean {
  return config.reasoningOverhead.has(modelId);
}

export function computeBudget(modelId: string, visibleTokens: number, config: AppConfig): TokenBudget {
  const overhead = config.reasoningOverhead.get(modelId);
  if (overhead === undefined) return { maxTokens: visibleTokens };
  return { maxTokens: visibleTokens + overhead, reasoningMaxTokens: overhead };
}

/** Bigger total and a smaller reasoning cap, shifting the pool toward visible content. */
export function computeRetryBudget(first: TokenBudget, config: AppConfig): TokenBudget {
  const maxTokens = Math.ceil(first.maxTokens * config.retry.budgetMultiplier);
  if (first.reasoningMaxTokens === undefined) return { maxTokens };
  return {
    maxTokens,
    reasoningMaxTokens: Math.min(first.reasoningMaxTokens, config.retry.reasoningMaxTokens)
  };
}

export function buildRequestSpec(
  modelId: string,
  prompt: string,
  request: ResolvedRequest,
  config: AppConfig
): RequestSpec {
  const budget = computeBudget(modelId, request.max_tokens, config);
  return Object.freeze({
    model_id: modelId,
    prompt,
    max_output_tokens: request.max_tokens,
    reasoning_token_budget: budget.reasoningMaxTokens ?? 0,
    temperature: request.temperature,
    timeout_seconds: request.timeout_seconds
  });
}

export function specBudget(spec: RequestSpec): TokenBudget {
  if (spec.reasoning_token_budget <= 0) return { maxTokens: spec.max_output_tokens };
  return {
    maxTokens: spec.max_output_tokens + spec.reasoning_token_budget,
    reasoningMaxTokens: spec.reasoning_token_budget
  };
}
