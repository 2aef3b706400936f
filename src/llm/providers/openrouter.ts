import type { AppConfig } from "../../config";
import { ProviderError } from "../../errors";
import type { RequestSpec, TokenBudget } from "../../types";
import { postJson, type FetchLike } from "../http";

export type ChatMessage = { role: "system" | "user" | "assistant"; content: string };

type ChatCompletionsRequest = {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature: number;
  reasoning?: { max_tokens: number };
};

export type ProviderContext = {
  apiKey: string;
  config: AppConfig;
  fetchImpl?: FetchLike;
};

export type Completion = {
  content: string;
  finishReason: "stop" | "length";
  hasReasoning: boolean;
  latencyMs: number;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Some models return content as an array of text parts instead of a string.
function coerceContent(content: unknown): string {
  if (typeof content === "string") return content;
  if (!Array.isArray(content)) return "";
  return content
    .map((part: unknown) => {
      if (typeof part === "string") return part;
      return isRecord(part) && typeof part.text === "string" ? part.text : "";
    })
    .join("");
}

export function parseCompletion(data: unknown): Omit<Completion, "latencyMs"> {
  if (!isRecord(data)) throw new ProviderError("Unexpected response structure");

  if (data.error !== undefined && data.error !== null) {
    const { error } = data;
    if (typeof error === "string") throw new ProviderError(error);
    throw new ProviderError(
      isRecord(error) && typeof error.message === "string" ? error.message : JSON.stringify(error)
    );
  }

  const first: unknown = Array.isArray(data.choices) ? data.choices[0] : undefined;
  if (!isRecord(first)) {
    throw new ProviderError(`Unexpected response structure: ${JSON.stringify(data).slice(0, 200)}`);
  }

  const message: Record<string, unknown> = isRecord(first.message) ? first.message : {};
  const reasoning = message.reasoning;
  return {
    content: coerceContent(message.content),
    finishReason: first.finish_reason === "length" ? "length" : "stop",
    hasReasoning: typeof reasoning === "string" ? reasoning.length > 0 : Boolean(reasoning)
  };
}

export function buildPayload(spec: RequestSpec, budget: TokenBudget, config: AppConfig): ChatCompletionsRequest {
  const body: ChatCompletionsRequest = {
    model: spec.model_id,
    messages: [
      { role: "system", content: config.systemPrompt },
      { role: "user", content: spec.prompt }
    ],
    max_tokens: budget.maxTokens,
    temperature: spec.temperature
  };
  // OpenRouter rejects reasoning.effort together with reasoning.max_tokens, so only the cap is sent.
  if (budget.reasoningMaxTokens !== undefined) {
    body.reasoning = { max_tokens: budget.reasoningMaxTokens };
  }
  return body;
}

export async function generateOpenRouter(
  spec: RequestSpec,
  budget: TokenBudget,
  ctx: ProviderContext
): Promise<Completion> {
  const { data, latencyMs } = await postJson(
    ctx.config.openRouterUrl,
    buildPayload(spec, budget, ctx.config),
    { authorization: `Bearer ${ctx.apiKey}`, "x-title": "second-opinion" },
    spec.timeout_seconds * 1000,
    ctx.fetchImpl
  );

  return { ...parseCompletion(data), latencyMs };
}
