import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ExternalEstimationError } from "../domain/errors";
import { GeminiEstimationProvider, type GeminiClient } from "./GeminiEstimationProvider";

type GenerateParams = Parameters<GeminiClient["models"]["generateContent"]>[0];

function fakeClient(impl: (params: GenerateParams) => Promise<{ text?: string }>) {
  const generateContent = vi.fn(impl);
  const client: GeminiClient = { models: { generateContent } };
  return { client, generateContent };
}

function never(): Promise<{ text?: string }> {
  return new Promise(() => undefined);
}

const options = { apiKey: "test-key", model: "gemini-test", timeoutMs: 1000 };

describe("GeminiEstimationProvider", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns trimmed model text", async () => {
    const { client, generateContent } = fakeClient(async () => ({ text: '  {"confidence": 0.8}\n' }));
    const provider = new GeminiEstimationProvider(client, options);

    await expect(provider.complete("hello")).resolves.toBe('{"confidence": 0.8}');
    expect(generateContent).toHaveBeenCalledWith({
      model: "gemini-test",
      contents: "hello",
      config: { temperature: 0.2, abortSignal: expect.any(AbortSignal) },
    });
  });

  it("reports a missing client as not configured", async () => {
    const provider = new GeminiEstimationProvider(undefined, options);

    await expect(provider.complete("hello")).rejects.toMatchObject({ reason: "not_configured" });
  });

  it("reports blank output", async () => {
    const blank = new GeminiEstimationProvider(fakeClient(async () => ({ text: "   " })).client, options);
    const absent = new GeminiEstimationProvider(fakeClient(async () => ({})).client, options);

    await expect(blank.complete("hello")).rejects.toMatchObject({ reason: "empty_response" });
    await expect(absent.complete("hello")).rejects.toMatchObject({ reason: "empty_response" });
  });

  it("wraps SDK failures", async () => {
    const provider = new GeminiEstimationProvider(
      fakeClient(async () => {
        throw new Error("quota exceeded");
      }).client,
      options,
    );

    const err = await provider.complete("hello").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ExternalEstimationError);
    expect(err).toMatchObject({
      reason: "provider_error",
      message: "Estimation provider failed: quota exceeded",
    });
  });

  it("times out slow requests", async () => {
    const provider = new GeminiEstimationProvider(fakeClient(never).client, { ...options, timeoutMs: 10 });

    await expect(provider.complete("hello")).rejects.toMatchObject({ reason: "timeout" });
  });

  it("aborts the model request on timeout", async () => {
    const { client, generateContent } = fakeClient(never);
    const provider = new GeminiEstimationProvider(client, { ...options, timeoutMs: 10 });

    await expect(provider.complete("hello")).rejects.toMatchObject({ reason: "timeout" });
    expect(generateContent.mock.calls[0][0].config?.abortSignal?.aborted).toBe(true);
  });

  it("stops waiting when the signal aborts", async () => {
    const { client, generateContent } = fakeClient(never);
    const provider = new GeminiEstimationProvider(client, options);
    const controller = new AbortController();

    const pending = provider.complete("hello", { signal: controller.signal });
    const requestSignal = generateContent.mock.calls[0][0].config?.abortSignal;
    expect(requestSignal?.aborted).toBe(false);
    controller.abort();

    await expect(pending).rejects.toMatchObject({ reason: "cancelled" });
    expect(requestSignal?.aborted).toBe(true);
  });

  it("passes the SDK rejection of an aborted request to the abandoned-request log", async () => {
    const { client } = fakeClient(
      (params) =>
        new Promise((_resolve, reject) => {
          params.config?.abortSignal?.addEventListener("abort", () => reject(new Error("request aborted")));
        }),
    );
    const provider = new GeminiEstimationProvider(client, options);
    const controller = new AbortController();

    const pending = provider.complete("hello", { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toMatchObject({ reason: "cancelled" });
    await vi.waitFor(() => {
      expect(console.warn).toHaveBeenCalledWith("[AI] Abandoned request failed:", "request aborted");
    });
  });

  it("does not call the model with an already aborted signal", async () => {
    const { client, generateContent } = fakeClient(async () => ({ text: "unused" }));
    const provider = new GeminiEstimationProvider(client, options);
    const controller = new AbortController();
    controller.abort();

    await expect(provider.complete("hello", { signal: controller.signal })).rejects.toMatchObject({
      reason: "cancelled",
    });
    expect(generateContent).not.toHaveBeenCalled();
  });

  describe("testConnection", () => {
    it("passes on a SUCCESS reply in any case", async () => {
      const provider = new GeminiEstimationProvider(fakeClient(async () => ({ text: "success." })).client, options);
      await expect(provider.testConnection()).resolves.toBe(true);
    });

    it("fails on any other reply", async () => {
      const provider = new GeminiEstimationProvider(fakeClient(async () => ({ text: "Hello!" })).client, options);
      await expect(provider.testConnection()).resolves.toBe(false);
    });

    it("fails instead of throwing", async () => {
      const provider = new GeminiEstimationProvider(undefined, options);
      await expect(provider.testConnection()).resolves.toBe(false);
    });
  });
});
