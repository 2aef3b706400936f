import { API_KEY_ENV } from "./env";

const SECRET_ENV_KEYS = [API_KEY_ENV] as const;

function getSecrets(): string[] {
  const secrets: string[] = [];
  for (const key of SECRET_ENV_KEYS) {
    const value = process.env[key];
    if (value && value.trim().length) secrets.push(value.trim());
  }
  return secrets;
}

export function redactSecrets(input: string, secrets: string[] = getSecrets()): string {
  let out = input;

  for (const secret of secrets) {
    out = out.split(secret).join("***");
  }

  out = out.replace(/sk-(?:or-v1-)?[A-Za-z0-9]{10,}/g, "***");
  out = out.replace(/Bearer\s+[A-Za-z0-9._-]{10,}/gi, "Bearer ***");

  return out;
}

// stdout carries the result document, so logs go to stderr.
export function safeLog(label: string, payload: unknown): void {
  try {
    const text = typeof payload === "string" ? payload : JSON.stringify(payload);
    console.error(label, redactSecrets(text));
  } catch {
    console.error(label, "[unserializable payload]");
  }
}
