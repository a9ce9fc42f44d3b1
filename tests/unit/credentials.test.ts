import { describe, expect, it } from "vitest";
import { AuthenticationError } from "../../src/domain/common/errors";
import { resolveCredential } from "../../src/infrastructure/llm/credentials";
import { nvidiaProvider } from "../../src/infrastructure/llm/providers/nvidia";

describe("resolveCredential", () => {
  it("prefers an explicit key over the environment", () => {
    const credential = resolveCredential({
      explicitKey: "explicit-key",
      provider: nvidiaProvider,
      env: { NVIDIA_API_KEY: "env-key" },
    });
    expect(credential).toEqual({ value: "explicit-key", source: "explicit" });
  });

  it("reads the provider env vars in order", () => {
    expect(
      resolveCredential({
        provider: nvidiaProvider,
        env: { NVIDIA_API_KEY: "primary", NVIDIA_NIM_API_KEY: "secondary" },
      }),
    ).toEqual({ value: "primary", source: "environment", envVar: "NVIDIA_API_KEY" });

    expect(
      resolveCredential({
        provider: nvidiaProvider,
        env: { NVIDIA_NIM_API_KEY: "secondary" },
      }),
    ).toEqual({
      value: "secondary",
      source: "environment",
      envVar: "NVIDIA_NIM_API_KEY",
    });
  });

  it("treats blank values as absent", () => {
    const credential = resolveCredential({
      explicitKey: "  ",
      provider: nvidiaProvider,
      env: { NVIDIA_API_KEY: "", NVIDIA_NIM_API_KEY: "env-key" },
    });
    expect(credential.value).toBe("env-key");
  });

  it("fails with an authentication error when nothing is set", () => {
    const resolve = () => resolveCredential({ provider: nvidiaProvider, env: {} });
    expect(resolve).toThrow(AuthenticationError);
    expect(resolve).toThrow(
      "Missing API key for NVIDIA NIM. Pass apiKey or set NVIDIA_API_KEY / NVIDIA_NIM_API_KEY.",
    );
  });
});
