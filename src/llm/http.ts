import { HttpError, ProviderError } from "../errors";
import { withTimeout } from "../utils/timeout";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export async function postJson(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  timeoutMs: number,
  fetchImpl: FetchLike = fetch
): Promise<{ data: unknown; latencyMs: number }> {
  const { result, latencyMs } = await withTimeout(async (signal) => {
    const res = await fetchImpl(url, {
      method: "POST",
      headers: { "content-type": "application/json", ...headers },
      body: JSON.stringify(body),
      signal
    });
    const text = await res.text();
    if (!res.ok) throw new HttpError(res.status, text);
    try {
      const data: unknown = JSON.parse(text);
      return data;
    } catch {
      throw new ProviderError(`Malformed JSON response: ${text.slice(0, 200)}`);
    }
  }, timeoutMs);

  return { data: result, latencyMs };
}
