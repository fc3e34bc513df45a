/**
 * Fetches a URL and consumes the response under a single AbortController deadline,
 * so a slow body counts against `timeoutMs` just like slow headers.
 * Rejects with an `AbortError` on timeout.
 */
export async function fetchWithTimeout<T>(
  url: string,
  options: RequestInit,
  timeoutMs: number,
  consume: (response: Response) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      ...options,
      signal: controller.signal,
    });

    return await consume(response);
  } finally {
    clearTimeout(timeoutId);
  }
}
