import type { PlatformProfile } from "../types";

const WRAPPING_FENCE = /^```[\w-]*[ \t]*\n([\s\S]*?)\n?```$/;
// "Sure"/"Certainly" only count as a preamble when the line introduces the draft with a colon.
const LEADING_PREAMBLE = /^(?:(?:here(?:'|’)s|here is)[^\n]*|(?:sure|certainly)\b[^\n]*:[ \t]*)\n+/i;
const LEADING_LABEL = /^(?:draft|email draft|message)\s*:[ \t]*\n+/i;

function capLines(text: string, maxLines: number): string {
  const lines = text
    .split("\n")
    .map((line) => line.trimEnd())
    .filter((line) => line.trim());
  if (lines.length <= maxLines) return text;
  return lines.slice(0, maxLines).join("\n").trim();
}

function cleanOnce(text: string, profile: Readonly<PlatformProfile>): string {
  let out = text.replace(/\r\n/g, "\n").trim();
  out = out.replace(WRAPPING_FENCE, "$1").trim();
  out = out.replace(LEADING_PREAMBLE, "");
  out = out.replace(LEADING_LABEL, "");
  out = out.replace(/\n{3,}/g, "\n\n").trim();
  if (profile.maxLines !== undefined) out = capLines(out, profile.maxLines);
  return out;
}

/**
 * Local cleanup so a draft is send-ready without another model call.
 * Every step only removes text, so iterating to a fixed point terminates and
 * a second call returns its input unchanged.
 */
export function normalizeDraft(text: string, profile: Readonly<PlatformProfile>): string {
  let current = text;
  for (;;) {
    const next = cleanOnce(current, profile);
    if (next === current) return current;
    current = next;
  }
}
