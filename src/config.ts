import type { ModelRef, Platform, PlatformProfile } from "./types";
import { getEnv, getIntEnv, type Env } from "./utils/env";

export type AppConfig = Readonly<{
  openRouterUrl: string;
  models: Readonly<{ gpt: ModelRef; gemini: ModelRef; opus: ModelRef }>;
  /** Reasoning allow-list: model id -> tokens added on top of the visible budget. */
  reasoningOverhead: ReadonlyMap<string, number>;
  defaults: Readonly<{ maxTokens: number; temperature: number; timeoutSeconds: number }>;
  retry: Readonly<{
    budgetMultiplier: number;
    reasoningMaxTokens: number;
    nearEmptyChars: number;
  }>;
  platforms: Readonly<Record<Platform, Readonly<PlatformProfile>>>;
  systemPrompt: string;
}>;

const DEFAULT_OPENROUTER_URL = "https://openrouter.ai/api/v1/chat/completions";

// Gemini ids carry a -preview suffix that changes when the model graduates.
const DEFAULT_GPT: ModelRef = { id: "openai/gpt-5.2", label: "GPT-5.2" };
const DEFAULT_GEMINI: ModelRef = { id: "google/gemini-3.1-pro-preview", label: "Gemini 3.1 Pro" };
const DEFAULT_OPUS: ModelRef = { id: "anthropic/claude-opus-4-6", label: "Claude Opus 4.6" };

const DEFAULT_REASONING_OVERHEAD = 2048;

const SHORT_FORM_LINES = 6;

const PLATFORM_PROFILES: Readonly<Record<Platform, Readonly<PlatformProfile>>> = Object.freeze({
  slack: Object.freeze({ maxTokens: 250, timeoutSeconds: 35, maxLines: SHORT_FORM_LINES }),
  linkedin: Object.freeze({ maxTokens: 300, timeoutSeconds: 35, maxLines: SHORT_FORM_LINES }),
  email: Object.freeze({ maxTokens: 800, timeoutSeconds: 90 }),
  substack: Object.freeze({ maxTokens: 2500, timeoutSeconds: 90 }),
  article: Object.freeze({ maxTokens: 2500, timeoutSeconds: 90 })
});

export const SYSTEM_PROMPT = `You are a professional writing assistant.
Write a send-ready draft based on the user's input.

## Voice & Style
- Crisp, direct, warm-professional tone
- Short sentences, active voice
- Be concise: clarity beats cleverness

## Platform Rules
**Slack:** 2-6 lines, lead with purpose, clear CTA. No signature.
**Email:** Subject (if new thread) -> greeting -> purpose -> 1-2 paragraphs -> CTA -> signature.
**LinkedIn:** 2-6 lines, personable, one low-friction CTA. No signature.

## Output Rules
1. Output ONLY the draft - no preamble, no "Here's a draft...", no meta commentary
2. Preserve facts - never invent names, dates, numbers, or commitments
3. Flag gaps with [brackets]: [Confirm date], [Insert recipient name]
4. If platform is Email, include a short "Subject: ..." line at the top (unless replying to existing thread)
5. If reference examples are provided, use them for tone/style only - do NOT copy facts from examples
`;

function modelFromEnv(name: string, fallback: ModelRef, env: Env): ModelRef {
  const id = getEnv(name, env);
  if (!id || id === fallback.id) return Object.freeze({ ...fallback });
  return Object.freeze({ id, label: id });
}

export function loadConfig(env: Env = process.env): AppConfig {
  const gpt = modelFromEnv("OPENROUTER_GPT_MODEL", DEFAULT_GPT, env);
  const gemini = modelFromEnv("OPENROUTER_GEMINI_MODEL", DEFAULT_GEMINI, env);
  const opus = modelFromEnv("OPENROUTER_OPUS_MODEL", DEFAULT_OPUS, env);

  const configuredOverhead = getIntEnv("REASONING_OVERHEAD_TOKENS", DEFAULT_REASONING_OVERHEAD, env);
  const overhead = configuredOverhead > 0 ? configuredOverhead : DEFAULT_REASONING_OVERHEAD;

  return Object.freeze({
    openRouterUrl: getEnv("OPENROUTER_URL", env) ?? DEFAULT_OPENROUTER_URL,
    models: Object.freeze({ gpt, gemini, opus }),
    reasoningOverhead: new Map([
      [gpt.id, overhead],
      [gemini.id, overhead]
    ]),
    defaults: Object.freeze({ maxTokens: 2000, temperature: 0.4, timeoutSeconds: 90 }),
    retry: Object.freeze({ budgetMultiplier: 1.5, reasoningMaxTokens: 512, nearEmptyChars: 16 }),
    platforms: PLATFORM_PROFILES,
    systemPrompt: SYSTEM_PROMPT
  });
}
