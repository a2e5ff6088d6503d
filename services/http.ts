export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export async function fetchWithTimeout(
  url: string,
  options: RequestInit,
  timeoutMs: number,
  fetchImpl: FetchLike = fetch,
): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetchImpl(url, { ...options, signal: controller.signal });
  } finally {
    clearTimeout(timer);
  }
}

/** Reads the body to the end so the connection goes back to the pool. */
export async function drainBody(response: Response): Promise<string> {
  return response.text().catch(() => '');
}
