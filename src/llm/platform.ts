import type { AppConfig } from "../config";
import type { Platform, PlatformProfile, RequestOverrides, ResolvedRequest } from "../types";

export const PLATFORMS: readonly Platform[] = ["slack", "email", "linkedin", "substack", "article"];

const PLATFORM_MARKERS = [
  /^\s*platform\s*:\s*(slack|email|linkedin|substack|article|other)\b/im,
  /^\s*<platform>\s*(slack|email|linkedin|substack|article|other)\b/im
];

/** Reads a `Platform: <tag>` (or `<platform> <tag>`) line; `other` means no platform. */
export function inferPlatform(prompt: string): Platform | null {
  for (const marker of PLATFORM_MARKERS) {
    const match = marker.exec(prompt);
    if (!match) continue;
    const tag = (match[1] ?? "").toLowerCase();
    return PLATFORMS.find((p) => p === tag) ?? null;
  }
  return null;
}

type Range = readonly [min: number, max: number];

/** Bounds applied to explicit overrides from both the CLI and the HTTP surface. */
export const OVERRIDE_LIMITS: Readonly<Record<keyof RequestOverrides, Range>> = {
  maxTokens: [1, 32000],
  temperature: [0, 2],
  timeoutSeconds: [1, 600]
};

export function clampOverride(name: keyof RequestOverrides, value: number): number {
  const [min, max] = OVERRIDE_LIMITS[name];
  return Math.min(max, Math.max(min, value));
}

export function profileFor(platform: Platform | null, config: AppConfig): Readonly<PlatformProfile> {
  if (platform) return config.platforms[platform];
  return { maxTokens: config.defaults.maxTokens, timeoutSeconds: config.defaults.timeoutSeconds };
}

export function resolveRequest(
  prompt: string,
  overrides: RequestOverrides,
  config: AppConfig
): ResolvedRequest {
  const platform = inferPlatform(prompt);
  const profile = profileFor(platform, config);
  return {
    max_tokens: overrides.maxTokens ?? profile.maxTokens,
    temperature: overrides.temperature ?? config.defaults.temperature,
    timeout_seconds: overrides.timeoutSeconds ?? profile.timeoutSeconds,
    platform
  };
}
