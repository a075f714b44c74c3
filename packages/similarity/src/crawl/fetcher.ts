/**
 * FILE PURPOSE: Bounded-timeout HTTP GET returning a typed result
 *
 * HOW: One AbortController carries both the per-fetch timeout and the
 *      caller's request budget. Failures come back as a reason, never as an
 *      exception, so a crawl can tell a timeout from a 404 from a cancel.
 */

export type FetchFailureReason = 'timeout' | 'aborted' | 'http-error' | 'network' | 'too-large';

export type FetchResult =
  | { ok: true; url: string; status: number; contentType: string; body: Buffer }
  | { ok: false; url: string; reason: FetchFailureReason; status?: number; message: string };

export type FetchFn = typeof fetch;

export interface FetchPageOptions {
  timeoutMs: number;
  userAgent: string;
  signal?: AbortSignal;
  /** Response bodies larger than this are rejected. */
  maxBytes?: number;
  accept?: string;
  fetchImpl?: FetchFn;
}

export const DEFAULT_MAX_BYTES = 5 * 1024 * 1024;

export async function fetchPage(url: string, options: FetchPageOptions): Promise<FetchResult> {
  const { signal } = options;
  if (signal?.aborted) {
    return { ok: false, url, reason: 'aborted', message: 'Request budget exhausted before fetch' };
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  const doFetch = options.fetchImpl ?? fetch;
  try {
    const response = await doFetch(url, {
      method: 'GET',
      redirect: 'follow',
      headers: {
        'User-Agent': options.userAgent,
        Accept: options.accept ?? 'text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.5',
      },
      signal: controller.signal,
    });

    if (!response.ok) {
      // Release the connection; the body is never read.
      await response.body?.cancel();
      return {
        ok: false,
        url,
        reason: 'http-error',
        status: response.status,
        message: `HTTP ${response.status}`,
      };
    }

    const maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
    const declared = Number(response.headers.get('content-length') ?? '0');
    if (declared > maxBytes) {
      await response.body?.cancel();
      return { ok: false, url, reason: 'too-large', status: response.status, message: `Body of ${declared} bytes exceeds ${maxBytes}` };
    }
    const body = Buffer.from(await response.arrayBuffer());
    if (body.length > maxBytes) {
      return { ok: false, url, reason: 'too-large', status: response.status, message: `Body of ${body.length} bytes exceeds ${maxBytes}` };
    }

    return {
      ok: true,
      url: response.url || url,
      status: response.status,
      contentType: response.headers.get('content-type') ?? '',
      body,
    };
  } catch (err) {
    if (timedOut) {
      return { ok: false, url, reason: 'timeout', message: `No response within ${options.timeoutMs}ms` };
    }
    if (signal?.aborted) {
      return { ok: false, url, reason: 'aborted', message: 'Request budget exhausted during fetch' };
    }
    return { ok: false, url, reason: 'network', message: String(err) };
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}
