export type FetchLike = typeof fetch;

export type FetchJsonResult =
  | { ok: true; status: number; body: unknown }
  | { ok: false; status?: number; error: string };

/**
 * JSON request with an abort timeout. Never throws: transport failures,
 * non-2xx statuses and unparseable bodies come back as `{ ok: false }`.
 * A 404 keeps its status so callers can treat it as "not found".
 */
export async function fetchJson(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<FetchJsonResult> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), Math.max(250, timeoutMs));

  try {
    const response = await fetchImpl(url, { ...init, signal: controller.signal });
    const status = response.status;

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      return { ok: false, status, error: "BAD_RESPONSE" };
    }

    if (!response.ok) {
      return { ok: false, status, error: `HTTP_${status}` };
    }
    return { ok: true, status, body };
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    return { ok: false, error: message };
  } finally {
    clearTimeout(timeout);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
