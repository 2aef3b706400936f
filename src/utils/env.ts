import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { ConfigError } from "../errors";

export type Env = Record<string, string | undefined>;

export const API_KEY_ENV = "OPENROUTER_API_KEY";

export function getEnv(name: string, env: Env = process.env): string | undefined {
  const value = env[name];
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
}

export function getIntEnv(name: string, fallback: number, env: Env = process.env): number {
  const value = getEnv(name, env);
  if (!value) return fallback;
  const n = Number.parseInt(value, 10);
  return Number.isFinite(n) ? n : fallback;
}

function dotEnvPath(repoRoot: string): string {
  return path.resolve(repoRoot, ".env");
}

/** Reads one key from `<repoRoot>/.env` without touching `process.env`. */
export function readDotEnvVar(repoRoot: string, name: string): string | undefined {
  const envPath = dotEnvPath(repoRoot);
  if (!fs.existsSync(envPath)) return undefined;

  let raw: Buffer;
  try {
    raw = fs.readFileSync(envPath);
  } catch (err: unknown) {
    // An unreadable .env (directory, permissions) counts as no .env.
    if (err instanceof Error && "code" in err) return undefined;
    throw err;
  }
  return getEnv(name, dotenv.parse(raw));
}

export function resolveApiKey(repoRoot: string, env: Env = process.env): string {
  const apiKey = getEnv(API_KEY_ENV, env) ?? readDotEnvVar(repoRoot, API_KEY_ENV);
  if (!apiKey) throw new ConfigError(`${API_KEY_ENV} not set in environment or .env file`);
  return apiKey;
}

export function loadDotEnv(repoRoot: string): void {
  const envPath = dotEnvPath(repoRoot);
  if (!fs.existsSync(envPath)) return;

  dotenv.config({ path: envPath });
}
