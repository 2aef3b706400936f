import type { FetchLike } from "../src/llm/http";

export type RecordedCall = {
  url: string;
  authorization: string;
  model: string;
  max_tokens: number;
  temperature: number;
  reasoning?: { max_tokens: number };
  messages: Array<{ role: string; content: string }>;
};

export type FakeReply =
  | { status?: number; body: unknown; delayMs?: number }
  | { hang: true };

export function completion(content: unknown, finishReason = "stop"): { body: unknown } {
  return { body: { choices: [{ finish_reason: finishReason, message: { role: "assistant", content } }] } };
}

function headerValue(headers: RequestInit["headers"], name: string): string {
  if (!headers || Array.isArray(headers) || headers instanceof Headers) return "";
  const value = headers[name];
  return typeof value === "string" ? value : "";
}

/**
 * In-process stand-in for the chat-completions endpoint. The handler sees each
 * request payload plus how many times that model was called before.
 */
export function fakeOpenRouter(handler: (call: RecordedCall, attempt: number) => FakeReply) {
  const calls: RecordedCall[] = [];

  const fetchImpl: FetchLike = async (url, init) => {
    const payload = typeof init.body === "string" ? JSON.parse(init.body) : {};
    const call: RecordedCall = { ...payload, url, authorization: headerValue(init.headers, "authorization") };
    const attempt = calls.filter((c) => c.model === call.model).length;
    calls.push(call);

    const reply = handler(call, attempt);
    if ("hang" in reply) {
      return new Promise<Response>((_resolve, reject) => {
        init.signal?.addEventListener("abort", () => reject(init.signal?.reason));
      });
    }

    if (reply.delayMs) await new Promise((resolve) => setTimeout(resolve, reply.delayMs));
    const text = typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body);
    return new Response(text, { status: reply.status ?? 200 });
  };

  return { fetchImpl, calls };
}
