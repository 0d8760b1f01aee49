export class HttpRequestError extends Error {
  public readonly url: string;

  public readonly timedOut: boolean;

  constructor(message: string, url: string, timedOut: boolean, cause?: unknown) {
    super(message, { cause });
    this.name = "HttpRequestError";
    this.url = url;
    this.timedOut = timedOut;
  }
}

export type HttpMethod = "GET" | "POST" | "PUT";

export type HttpRequest = {
  readonly method?: HttpMethod;
  readonly headers?: Record<string, string>;
  readonly body?: string;
};

export type HttpClientOptions = {
  readonly timeoutMs: number;
};

export type HttpClient = {
  readonly timeoutMs: number;
  readonly send: (url: string, request?: HttpRequest) => Promise<Response>;
};

const isTimeout = (error: unknown): boolean =>
  error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");

/**
 * Builds an immutable client whose every request is aborted after
 * `timeoutMs`. Instances carry no other state and are shared across tasks.
 */
export const createHttpClient = (options: HttpClientOptions): HttpClient => {
  const { timeoutMs } = options;

  const send = async (url: string, request: HttpRequest = {}): Promise<Response> => {
    const init: RequestInit = {
      method: request.method ?? "GET",
      headers: request.headers,
      signal: AbortSignal.timeout(timeoutMs)
    };
    if (request.body !== undefined) {
      init.body = request.body;
    }
    try {
      return await fetch(url, init);
    } catch (error) {
      if (isTimeout(error)) {
        throw new HttpRequestError(`request timed out after ${timeoutMs}ms`, url, true, error);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new HttpRequestError(reason, url, false, error);
    }
  };

  return Object.freeze({ timeoutMs, send });
};

export const PROVIDER_TIMEOUT_MS = 10_000;

export const WEBHOOK_TIMEOUT_MS = 5_000;
