export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type TextResponse = {
  status: number;
  ok: boolean;
  text: string;
};

/** Thrown when no response arrived: connection failure, per-request timeout or caller abort. */
export class RequestFailure extends Error {
  readonly timedOut: boolean;

  readonly aborted: boolean;

  constructor(message: string, options: { timedOut: boolean; aborted: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'RequestFailure';
    this.timedOut = options.timedOut;
    this.aborted = options.aborted;
  }
}

/**
 * Issues one request and reads the whole body under a hard timeout. `signal` lets the caller
 * cut the request short; the timeout applies on top of it.
 */
export const fetchText = async (
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  options: { timeoutMs: number; signal?: AbortSignal },
): Promise<TextResponse> => {
  const { timeoutMs, signal } = options;
  const controller = new AbortController();
  let timedOut = false;

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = (): void => controller.abort();

  if (signal?.aborted) {
    clearTimeout(timer);
    throw new RequestFailure('request aborted before it was sent', { timedOut: false, aborted: true });
  }
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const response = await fetchImpl(url, { ...init, signal: controller.signal });
    const text = await response.text();
    return { status: response.status, ok: response.ok, text };
  } catch (error) {
    if (timedOut) {
      throw new RequestFailure(`request timed out after ${timeoutMs}ms`, {
        timedOut: true,
        aborted: false,
        cause: error,
      });
    }

    const aborted = signal?.aborted ?? false;
    const reason = error instanceof Error ? error.message : String(error);
    throw new RequestFailure(aborted ? 'request aborted' : `request failed: ${reason}`, {
      timedOut: false,
      aborted,
      cause: error,
    });
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
};

export const parseJson = (text: string): { ok: true; value: unknown } | { ok: false } => {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
};
