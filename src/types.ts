export type RuntimeContext = "claude-code" | "codex-cli" | "unknown";

export type Platform = "slack" | "email" | "linkedin" | "substack" | "article";

export type ModelRole = "model_a" | "model_b";

export type FinishReason = "stop" | "length" | "error";

export type ModelRef = { id: string; label: string };

export type ModelPair = Record<ModelRole, ModelRef>;

export type PlatformProfile = {
  maxTokens: number;
  timeoutSeconds: number;
  /** Non-empty line cap for short-form surfaces. */
  maxLines?: number;
};

export type RequestOverrides = {
  maxTokens?: number;
  temperature?: number;
  timeoutSeconds?: number;
};

export type ResolvedRequest = {
  max_tokens: number;
  temperature: number;
  timeout_seconds: number;
  platform: Platform | null;
};

export type RequestSpec = Readonly<{
  model_id: string;
  prompt: string;
  max_output_tokens: number;
  reasoning_token_budget: number;
  temperature: number;
  timeout_seconds: number;
}>;

export type TokenBudget = {
  maxTokens: number;
  reasoningMaxTokens?: number;
};

export type ModelResult = {
  content: string;
  finish_reason: FinishReason;
  elapsed_seconds: number;
  retried: boolean;
  error?: string;
  retried_with_max_tokens?: number;
};

export type AggregateResult = Readonly<{
  model_a: ModelResult;
  model_b: ModelResult;
  models_used: Record<ModelRole, string>;
  model_a_label: string;
  model_b_label: string;
  runtime: RuntimeContext;
  request: ResolvedRequest;
}>;
