import { classifyProviderError, ProviderError } from "./errors";
import { observeCall } from "./observe";
import { withTimeout } from "./timeout";
import type { ChatClient, ChatRequest, ChatResult, ClientOptions, ProviderUsage } from "./types";

export interface OpenAiCompatConfig extends ClientOptions {
  provider: string;
  model: string;
  /** Base URL up to and including the API version, e.g. `https://api.openai.com/v1`. */
  baseUrl: string;
  /** Self-hosted servers (Ollama) accept requests without a key. */
  apiKey?: string;
}

function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) return value as Record<string, unknown>;
  return {};
}

function asNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function truncateString(value: string, maxChars: number): string {
  if (value.length <= maxChars) return value;
  return `${value.slice(0, maxChars)}…`;
}

export function chatCompletionsUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/chat/completions`;
}

function extractErrorDetail(response: unknown): string | null {
  if (typeof response === "string") return response;
  const obj = asRecord(response);
  const err = obj.error;
  const msg = asRecord(err).message;
  if (typeof msg === "string") return msg;
  if (typeof obj.message === "string") return obj.message;
  if (typeof obj.error === "string") return obj.error;
  return null;
}

function extractChoice(response: unknown): { text: string; finishReason: string } | null {
  const choices = asRecord(response).choices;
  if (!Array.isArray(choices) || choices.length === 0) return null;
  const first = asRecord(choices[0]);
  const content = asRecord(first.message).content;
  if (typeof content !== "string" || content.length === 0) return null;
  const finishReason = typeof first.finish_reason === "string" ? first.finish_reason : "stop";
  return { text: content, finishReason };
}

function extractUsage(response: unknown): ProviderUsage | undefined {
  const usage = asRecord(asRecord(response).usage);
  const prompt = asNumber(usage.prompt_tokens);
  const completion = asNumber(usage.completion_tokens);
  if (prompt === null || completion === null) return undefined;
  return { promptTokens: prompt, completionTokens: completion };
}

/**
 * Chat client for any server speaking the OpenAI `/chat/completions` shape:
 * OpenAI itself, Gemini's OpenAI-compatible endpoint, and Ollama.
 */
export class OpenAiCompatClient implements ChatClient {
  readonly provider: string;
  readonly model: string;
  private readonly endpoint: string;

  constructor(private readonly config: OpenAiCompatConfig) {
    this.provider = config.provider;
    this.model = config.model;
    this.endpoint = chatCompletionsUrl(config.baseUrl);
  }

  async complete(request: ChatRequest): Promise<ChatResult> {
    return observeCall(this.config.observer, { provider: this.provider, model: this.model, request }, async () => {
      const controller = new AbortController();
      try {
        return await withTimeout(
          this.send(request, controller.signal),
          this.config.timeoutMs,
          `${this.provider} chat completion`,
          controller,
        );
      } catch (error) {
        throw classifyProviderError(error, this.provider);
      }
    });
  }

  private async send(request: ChatRequest, signal: AbortSignal): Promise<ChatResult> {
    const body = {
      model: this.model,
      messages: [
        { role: "system", content: request.system ?? this.config.system },
        { role: "user", content: request.prompt },
      ],
      temperature: request.temperature ?? 0,
      stream: false,
      ...(request.maxTokens ? { max_tokens: request.maxTokens } : {}),
    };

    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.config.apiKey) headers.authorization = `Bearer ${this.config.apiKey}`;

    const res = await fetch(this.endpoint, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal,
    });

    const contentType = res.headers.get("content-type") ?? "";
    const response: unknown = contentType.includes("application/json") ? await res.json() : await res.text();

    if (!res.ok) {
      const detail = extractErrorDetail(response);
      const suffix = detail ? `: ${truncateString(detail, 300)}` : "";
      throw classifyProviderError(
        Object.assign(new Error(`LLM provider error (${res.status})${suffix}`), { statusCode: res.status }),
        this.provider,
      );
    }

    const choice = extractChoice(response);
    if (!choice) {
      throw new ProviderError("LLM response missing message content", "LLM_PROVIDER_ERROR", this.provider);
    }

    const model = asRecord(response).model;
    return {
      text: choice.text.trim(),
      finishReason: choice.finishReason,
      model: typeof model === "string" ? model : this.model,
      usage: extractUsage(response),
    };
  }
}
