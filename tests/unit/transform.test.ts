import { describe, expect, it, vi } from "vitest";
import { BadRequestError } from "../../src/domain/common/errors";
import { parseModelId } from "../../src/infrastructure/llm/model-id";
import { nvidiaProvider } from "../../src/infrastructure/llm/providers/nvidia";
import { openaiProvider } from "../../src/infrastructure/llm/providers/openai";
import { createOpenAICompatibleTransformer } from "../../src/infrastructure/llm/providers/openai-compatible/transform";
import { createProviderRegistry } from "../../src/infrastructure/llm/registry";

const registry = createProviderRegistry();
const nvidia = createOpenAICompatibleTransformer(nvidiaProvider.capabilities);
const options = { displayName: "NVIDIA NIM", dropParams: false };

// JSON round trip: what actually goes on the wire.
const wire = (body: unknown): unknown => JSON.parse(JSON.stringify(body));

describe("OpenAI-compatible chat transform", () => {
  it("copies messages and the present sampling parameters only", () => {
    const { vendorModel } = parseModelId("nvidia/databricks/dbrx-instruct", registry);
    const body = nvidia.chat(
      {
        model: "nvidia/databricks/dbrx-instruct",
        messages: [{ role: "user", content: "X" }],
        presencePenalty: 0.5,
        frequencyPenalty: 0.1,
      },
      vendorModel,
      options,
    );

    expect(wire(body)).toStrictEqual({
      messages: [{ role: "user", content: "X" }],
      model: "databricks/dbrx-instruct",
      frequency_penalty: 0.1,
      presence_penalty: 0.5,
    });
  });

  it("renames camelCase parameters to their wire names", () => {
    // Extra message fields from untyped callers never reach the wire.
    const named = { role: "user" as const, content: "hi", name: "alice" };
    const body = nvidia.chat(
      {
        model: "nvidia/meta/llama3-8b-instruct",
        messages: [{ role: "system", content: "be brief" }, named],
        temperature: 0.2,
        topP: 0.9,
        maxTokens: 64,
        stop: ["\n\n"],
        seed: 7,
      },
      "meta/llama3-8b-instruct",
      options,
    );

    expect(wire(body)).toStrictEqual({
      messages: [
        { role: "system", content: "be brief" },
        { role: "user", content: "hi" },
      ],
      model: "meta/llama3-8b-instruct",
      temperature: 0.2,
      top_p: 0.9,
      max_tokens: 64,
      stop: ["\n\n"],
      seed: 7,
    });
  });

  it("wraps responseFormat in a type object", () => {
    const openai = createOpenAICompatibleTransformer(openaiProvider.capabilities);
    const body = openai.chat(
      {
        model: "openai/gpt-4o-mini",
        messages: [{ role: "user", content: "json please" }],
        responseFormat: "json_object",
      },
      "gpt-4o-mini",
      { displayName: "OpenAI", dropParams: false },
    );
    expect(body.response_format).toEqual({ type: "json_object" });
  });

  it("rejects parameters the provider does not accept", () => {
    const build = () =>
      nvidia.chat(
        {
          model: "nvidia/databricks/dbrx-instruct",
          messages: [{ role: "user", content: "X" }],
          n: 2,
        },
        "databricks/dbrx-instruct",
        options,
      );
    expect(build).toThrow(BadRequestError);
    expect(build).toThrow(
      "NVIDIA NIM does not support chat parameters: n. Set dropParams to omit them.",
    );
  });

  it("drops unsupported parameters when asked to", () => {
    const onDropped = vi.fn();
    const body = nvidia.chat(
      {
        model: "nvidia/databricks/dbrx-instruct",
        messages: [{ role: "user", content: "X" }],
        n: 2,
        user: "someone",
        temperature: 0,
      },
      "databricks/dbrx-instruct",
      { ...options, dropParams: true, onDropped },
    );

    expect(onDropped).toHaveBeenCalledWith(["n", "user"]);
    expect(wire(body)).toStrictEqual({
      messages: [{ role: "user", content: "X" }],
      model: "databricks/dbrx-instruct",
      temperature: 0,
    });
  });

  it("validates the canonical request", () => {
    const build = () =>
      nvidia.chat(
        { model: "nvidia/databricks/dbrx-instruct", messages: [] },
        "databricks/dbrx-instruct",
        options,
      );
    expect(build).toThrow(BadRequestError);
    expect(build).toThrow("messages: messages must not be empty");
  });

  it("produces the same body for the same request", () => {
    const request = {
      model: "nvidia/databricks/dbrx-instruct",
      messages: [{ role: "user" as const, content: "X" }],
      temperature: 1,
    };
    expect(nvidia.chat(request, "databricks/dbrx-instruct", options)).toEqual(
      nvidia.chat(request, "databricks/dbrx-instruct", options),
    );
  });
});

describe("OpenAI-compatible embedding transform", () => {
  it("sends the vendor model id with input_type", () => {
    const { vendorModel } = parseModelId("nvidia/nv-embedqa-e5-v5", registry);
    const body = nvidia.embedding(
      {
        model: "nvidia/nv-embedqa-e5-v5",
        input: "What is the meaning of life?",
        inputType: "passage",
      },
      vendorModel,
      options,
    );

    expect(wire(body)).toStrictEqual({
      input: "What is the meaning of life?",
      model: "nv-embedqa-e5-v5",
      input_type: "passage",
    });
  });

  it("keeps array input and truncate", () => {
    const body = nvidia.embedding(
      {
        model: "nvidia/nvidia/nv-embedqa-e5-v5",
        input: ["first", "second"],
        inputType: "query",
        truncate: "END",
      },
      "nvidia/nv-embedqa-e5-v5",
      options,
    );

    expect(wire(body)).toStrictEqual({
      input: ["first", "second"],
      model: "nvidia/nv-embedqa-e5-v5",
      input_type: "query",
      truncate: "END",
    });
  });

  it("rejects empty input", () => {
    expect(() =>
      nvidia.embedding(
        { model: "nvidia/nv-embedqa-e5-v5", input: "" },
        "nv-embedqa-e5-v5",
        options,
      ),
    ).toThrow("Invalid embedding request");
  });

  it("rejects dimensions for NVIDIA", () => {
    expect(() =>
      nvidia.embedding(
        { model: "nvidia/nv-embedqa-e5-v5", input: "x", dimensions: 256 },
        "nv-embedqa-e5-v5",
        options,
      ),
    ).toThrow("NVIDIA NIM does not support embedding parameters: dimensions.");
  });
});
