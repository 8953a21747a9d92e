import { GoogleGenAI } from "@google/genai";
import { ExternalEstimationError } from "../domain/errors";
import type { CompletionOptions, EstimationProvider } from "./EstimationProvider";
import { CONNECTION_TEST_PROMPT } from "./PromptBuilders";

// Gemini-backed estimation provider.
// - Single gateway to the model; the engine only ever sees raw text or an ExternalEstimationError.
// - Cancellation, timeout, SDK failure and blank output map to distinct failure reasons.

export const DEFAULT_LLM_TIMEOUT_MS = 30_000;

// The subset of the SDK client used here.
export interface GeminiClient {
  readonly models: {
    generateContent(params: {
      model: string;
      contents: string;
      config?: { temperature?: number; abortSignal?: AbortSignal };
    }): Promise<{ readonly text?: string }>;
  };
}

export interface GeminiProviderOptions {
  readonly apiKey?: string;
  readonly model: string;
  readonly timeoutMs?: number;
}

export class GeminiEstimationProvider implements EstimationProvider {
  private readonly timeoutMs: number;

  constructor(
    private readonly client: GeminiClient | undefined,
    private readonly options: GeminiProviderOptions,
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_LLM_TIMEOUT_MS;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const client = this.client;
    if (!client) {
      throw new ExternalEstimationError("not_configured", "Gemini API key not configured.");
    }

    const { signal } = options;
    if (signal?.aborted) {
      throw new ExternalEstimationError("cancelled", "Estimation request was cancelled.");
    }

    // Aborted on timeout or caller cancellation so the SDK drops the HTTP request too.
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;

    const guard = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(
          new ExternalEstimationError("timeout", `Estimation provider timed out after ${this.timeoutMs}ms.`),
        );
        controller.abort();
      }, this.timeoutMs);

      onAbort = () => {
        reject(new ExternalEstimationError("cancelled", "Estimation request was cancelled."));
        controller.abort();
      };
      signal?.addEventListener("abort", onAbort, { once: true });
    });

    const request = client.models.generateContent({
      model: this.options.model,
      contents: prompt,
      config: { temperature: 0.2, abortSignal: controller.signal },
    });

    try {
      const response = await Promise.race([request, guard]);

      const text = response.text?.trim() ?? "";
      if (!text) {
        throw new ExternalEstimationError("empty_response", "Estimation provider returned an empty response.");
      }
      return text;
    } catch (err) {
      if (err instanceof ExternalEstimationError) {
        if (err.reason === "timeout" || err.reason === "cancelled") {
          // The abandoned request may still reject later.
          void request.catch((late: unknown) => {
            console.warn("[AI] Abandoned request failed:", late instanceof Error ? late.message : String(late));
          });
        }
        throw err;
      }
      throw new ExternalEstimationError(
        "provider_error",
        `Estimation provider failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    } finally {
      clearTimeout(timer);
      if (onAbort) signal?.removeEventListener("abort", onAbort);
    }
  }

  async testConnection(): Promise<boolean> {
    try {
      const text = await this.complete(CONNECTION_TEST_PROMPT);
      const connected = text.toUpperCase().includes("SUCCESS");
      console.log(`[AI] Connection test result: ${connected}`);
      return connected;
    } catch (err) {
      console.error("[AI] Connection test failed:", err instanceof Error ? err.message : String(err));
      return false;
    }
  }
}

export function createGeminiEstimationProvider(options: GeminiProviderOptions): GeminiEstimationProvider {
  const client: GeminiClient | undefined = options.apiKey ? new GoogleGenAI({ apiKey: options.apiKey }) : undefined;
  return new GeminiEstimationProvider(client, options);
}
