export type FetchLike = typeof fetch;

export interface JsonRequestOptions {
  headers?: Record<string, string>;
  /** Abort the request after this many ms (default: 10000). */
  timeoutMs?: number;
}

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly statusText: string,
    public readonly url: string,
    public readonly responseText?: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/** The request never produced a response (DNS, refused connection, timeout). */
export class NetworkError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'NetworkError';
  }
}

/** A 200 came back but its body is not JSON. */
export class ResponseParseError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly responseText: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ResponseParseError';
  }
}

function describeFailure(e: unknown) {
  if (e instanceof Error) {
    if (e.name === 'TimeoutError' || e.name === 'AbortError') return 'request timed out';
    return e.message;
  }
  return String(e);
}

/**
 * Single GET returning parsed JSON. Anything but a 200 is an HttpError; there
 * are no retries.
 */
export async function requestJson<T>(
  url: string,
  opts: JsonRequestOptions = {},
  fetcher: FetchLike = fetch,
): Promise<T> {
  let res: Response;
  try {
    res = await fetcher(url, {
      method: 'GET',
      headers: {
        accept: 'application/json',
        ...(opts.headers ?? {}),
      },
      signal: AbortSignal.timeout(opts.timeoutMs ?? 10_000),
    });
  } catch (e) {
    throw new NetworkError(`Failed to reach ${url}: ${describeFailure(e)}`, url, { cause: e });
  }

  let text: string;
  try {
    text = await res.text();
  } catch (e) {
    throw new NetworkError(`Failed to read response from ${url}: ${describeFailure(e)}`, url, {
      cause: e,
    });
  }

  if (res.status !== 200) {
    throw new HttpError(`HTTP ${res.status} ${res.statusText} for ${url}`, res.status, res.statusText, url, text);
  }

  try {
    return JSON.parse(text) as T;
  } catch (e) {
    throw new ResponseParseError(`Failed to parse JSON response from ${url}`, url, text, { cause: e });
  }
}
