import {
  CancelledError,
  ConnectionError,
  TimeoutError,
} from "../../domain/common/errors";

export type FetchLike = (
  input: string | URL | Request,
  init?: RequestInit,
) => Promise<Response>;

export type HttpMethod = "GET" | "POST";

export type TransportRequest = {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  bearerToken?: string;
  body?: string;
  timeoutMs: number;
  provider?: string;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
};

export type TransportResponse = {
  status: number;
  text: string;
};

/**
 * Issues a single HTTP request and returns the raw status and body text.
 *
 * Never retries. A deadline that elapses becomes a `TimeoutError`, an abort
 * from the caller's signal a `CancelledError`, and any other failure before
 * a status arrives a `ConnectionError`. Non-2xx statuses are returned as-is;
 * classifying them is up to the response normalizer.
 */
export async function invokeTransport(
  args: TransportRequest,
): Promise<TransportResponse> {
  if (args.signal?.aborted) {
    throw new CancelledError({
      provider: args.provider,
      message: `Request to ${args.url} was cancelled before it was sent`,
    });
  }

  const fetchImpl = args.fetchImpl ?? fetch;
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, args.timeoutMs);
  const onCallerAbort = () => controller.abort();
  args.signal?.addEventListener("abort", onCallerAbort, { once: true });

  try {
    const res = await fetchImpl(args.url, {
      method: args.method,
      headers: {
        Accept: "application/json",
        ...(args.body !== undefined
          ? { "Content-Type": "application/json" }
          : {}),
        ...args.headers,
        ...(args.bearerToken
          ? { Authorization: `Bearer ${args.bearerToken}` }
          : {}),
      },
      body: args.body,
      signal: controller.signal,
    });
    const text = await res.text();
    return { status: res.status, text };
  } catch (error) {
    if (timedOut) {
      throw new TimeoutError({
        provider: args.provider,
        message: `Request to ${args.url} timed out after ${args.timeoutMs}ms`,
        cause: error,
      });
    }
    if (args.signal?.aborted) {
      throw new CancelledError({
        provider: args.provider,
        message: `Request to ${args.url} was cancelled`,
        cause: error,
      });
    }
    throw new ConnectionError({
      provider: args.provider,
      message: `Request to ${args.url} failed: ${describe(error)}`,
      cause: error,
    });
  } finally {
    clearTimeout(timeout);
    args.signal?.removeEventListener("abort", onCallerAbort);
  }
}

function describe(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
