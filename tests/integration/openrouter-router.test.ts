import { describe, expect, it } from "vitest";
import nock from "nock";
import { RateLimitError } from "../../src/domain/common/errors";
import { loadConfig } from "../../src/infrastructure/config/load";
import { createLlmRouter } from "../../src/infrastructure/llm/factory";
import { silentLogger } from "../../src/infrastructure/logging/logger";

const request = {
  model: "openrouter/openai/gpt-4o-mini",
  messages: [{ role: "user" as const, content: "hi" }],
};

async function makeRouter() {
  const config = await loadConfig({
    env: {
      OPENROUTER_HTTP_REFERER: "https://relay.example",
      OPENROUTER_X_TITLE: "relay-tests",
    },
  });
  return createLlmRouter(config, {
    env: { OPENROUTER_API_KEY: "test-key" },
    logger: silentLogger,
  });
}

describe("LlmRouter against OpenRouter", () => {
  it("throws on in-band error with HTTP 200", async () => {
    nock("https://openrouter.ai")
      .post("/api/v1/chat/completions")
      .reply(200, { error: { code: 429, message: "rate limited" } });

    const call = (await makeRouter()).completion(request);
    await expect(call).rejects.toBeInstanceOf(RateLimitError);
    await expect(call).rejects.toMatchObject({
      statusCode: 429,
      retryable: true,
      message: "OpenRouter returned an error: rate limited",
    });
  });

  it("sends app attribution headers from config", async () => {
    const scope = nock("https://openrouter.ai")
      .matchHeader("http-referer", "https://relay.example")
      .matchHeader("x-title", "relay-tests")
      .post("/api/v1/chat/completions", { messages: request.messages, model: "openai/gpt-4o-mini" })
      .reply(200, {
        id: "gen-1",
        created: 1,
        model: "openai/gpt-4o-mini",
        choices: [{ message: { role: "assistant", content: "hello" }, finish_reason: "stop" }],
      });

    const res = await (await makeRouter()).completion(request);
    expect(scope.isDone()).toBe(true);
    expect(res.choices).toEqual([
      { index: 0, message: { role: "assistant", content: "hello" }, finishReason: "stop" },
    ]);
    expect(res.usage).toBeUndefined();
  });
});
