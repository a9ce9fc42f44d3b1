import { describe, expect, it, vi } from "vitest";
import {
  CancelledError,
  ConnectionError,
  TimeoutError,
} from "../../src/domain/common/errors";
import { invokeTransport, type FetchLike } from "../../src/infrastructure/http/transport";

const URL_ = "https://api.example.test/v1/chat/completions";

function hangingFetch(): FetchLike {
  return (_input, init) =>
    new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
    });
}

describe("invokeTransport", () => {
  it("sends JSON with a bearer token and returns status and text", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () =>
      new Response('{"ok":true}', {
        status: 201,
        headers: { "content-type": "application/json" },
      }),
    );

    const res = await invokeTransport({
      url: URL_,
      method: "POST",
      headers: { "X-Title": "relay" },
      bearerToken: "test-key",
      body: '{"a":1}',
      timeoutMs: 1_000,
      fetchImpl,
    });

    expect(res).toStrictEqual({ status: 201, text: '{"ok":true}' });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const init = fetchImpl.mock.calls[0]?.[1];
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"a":1}');
    expect(init?.headers).toEqual({
      Accept: "application/json",
      "Content-Type": "application/json",
      "X-Title": "relay",
      Authorization: "Bearer test-key",
    });
  });

  it("returns non-2xx statuses without throwing", async () => {
    const fetchImpl: FetchLike = async () => new Response("nope", { status: 503 });
    const res = await invokeTransport({
      url: URL_,
      method: "GET",
      headers: {},
      timeoutMs: 1_000,
      fetchImpl,
    });
    expect(res.status).toBe(503);
    expect(res.text).toBe("nope");
  });

  it("turns an elapsed deadline into a TimeoutError", async () => {
    const call = invokeTransport({
      url: URL_,
      method: "POST",
      headers: {},
      body: "{}",
      timeoutMs: 20,
      provider: "nvidia",
      fetchImpl: hangingFetch(),
    });
    await expect(call).rejects.toBeInstanceOf(TimeoutError);
    await expect(call).rejects.toThrow(`Request to ${URL_} timed out after 20ms`);
  });

  it("turns a caller abort into a CancelledError", async () => {
    const controller = new AbortController();
    const call = invokeTransport({
      url: URL_,
      method: "POST",
      headers: {},
      body: "{}",
      timeoutMs: 10_000,
      signal: controller.signal,
      fetchImpl: hangingFetch(),
    });
    controller.abort();
    await expect(call).rejects.toBeInstanceOf(CancelledError);
    await expect(call).rejects.toThrow(`Request to ${URL_} was cancelled`);
  });

  it("never calls fetch when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchImpl = vi.fn<FetchLike>();

    await expect(
      invokeTransport({
        url: URL_,
        method: "GET",
        headers: {},
        timeoutMs: 1_000,
        signal: controller.signal,
        fetchImpl,
      }),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("turns a network failure into a ConnectionError", async () => {
    const fetchImpl: FetchLike = async () => {
      throw new TypeError("fetch failed");
    };
    const call = invokeTransport({
      url: URL_,
      method: "GET",
      headers: {},
      timeoutMs: 1_000,
      fetchImpl,
    });
    await expect(call).rejects.toBeInstanceOf(ConnectionError);
    await expect(call).rejects.toThrow(`Request to ${URL_} failed: fetch failed`);
  });
});
