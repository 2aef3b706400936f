import type { AggregateResult, ModelResult } from "./types";

export function toJson(payload: unknown): string {
  return `${JSON.stringify(payload, null, 2)}\n`;
}

function section(title: string, result: ModelResult): string {
  if (result.finish_reason === "error") return `## ${title}\n\nError: ${result.error ?? "unknown error"}\n`;
  const content = result.content.trim();
  return `## ${title}\n\n${content || "(empty)"}\n`;
}

export function toMarkdown(result: AggregateResult): string {
  const models = `Models: ${result.model_a_label} (${result.models_used.model_a}), ${result.model_b_label} (${result.models_used.model_b})`;
  return [
    "# Multi-model drafts",
    "",
    models,
    "",
    section(result.model_a_label, result.model_a),
    section(result.model_b_label, result.model_b)
  ].join("\n");
}
