import Anthropic from "@anthropic-ai/sdk";

import { classifyProviderError } from "./errors";
import { observeCall } from "./observe";
import { withTimeout } from "./timeout";
import type { ChatClient, ChatRequest, ChatResult, ClientOptions } from "./types";

export interface AnthropicConfig extends ClientOptions {
  apiKey: string;
  model: string;
  /** Defaults to 1024; the Messages API requires an explicit cap. */
  maxTokens?: number;
}

type AnthropicApiError = Error & {
  statusCode?: number;
  requestId?: string | null;
};

export class AnthropicClient implements ChatClient {
  readonly provider = "anthropic";
  readonly model: string;
  private readonly client: Anthropic;

  constructor(private readonly config: AnthropicConfig) {
    this.model = config.model;
    // Retries are left to the caller; one request per call keeps latency honest.
    this.client = new Anthropic({ apiKey: config.apiKey, maxRetries: 0 });
  }

  async complete(request: ChatRequest): Promise<ChatResult> {
    return observeCall(this.config.observer, { provider: this.provider, model: this.model, request }, async () => {
      const controller = new AbortController();
      try {
        return await withTimeout(
          this.send(request, controller.signal),
          this.config.timeoutMs,
          "anthropic chat completion",
          controller,
        );
      } catch (error) {
        throw classifyProviderError(error, this.provider);
      }
    });
  }

  private async send(request: ChatRequest, signal: AbortSignal): Promise<ChatResult> {
    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: request.maxTokens ?? this.config.maxTokens ?? 1024,
          temperature: request.temperature ?? 0,
          system: request.system ?? this.config.system,
          messages: [{ role: "user", content: request.prompt }],
        },
        { signal },
      );

      const text = response.content
        .filter((block): block is Anthropic.TextBlock => block.type === "text")
        .map((block) => block.text)
        .join("");

      return {
        text: text.trim(),
        finishReason: response.stop_reason ?? "stop",
        model: response.model,
        usage: { promptTokens: response.usage.input_tokens, completionTokens: response.usage.output_tokens },
      };
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        const err: AnthropicApiError = new Error(`Anthropic API error (${error.status}): ${error.message}`);
        err.statusCode = error.status;
        err.requestId = error.headers?.["request-id"] ?? null;
        throw err;
      }
      throw error;
    }
  }
}
