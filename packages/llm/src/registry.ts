import { createLogger } from "@banking-agent/shared";

import { AnthropicClient } from "./anthropic";
import { ProviderError } from "./errors";
import { OpenAiCompatClient } from "./openai_compat";
import type { ChatClient, ChatObserver } from "./types";

const log = createLogger({ component: "llm-registry" });

export const BANKING_SYSTEM_PROMPT = "You are a helpful banking assistant with expertise in financial services.";

const OPENAI_BASE_URL = "https://api.openai.com/v1";
const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/openai";

const DEFAULT_MODELS = {
  openai: "gpt-4o-mini",
  gemini: "gemini-1.5-flash",
  anthropic: "claude-3-5-haiku-latest",
  ollama: "llama3.2",
} as const;

export interface RegistryOptions {
  defaultProvider: string;
  fallbackProvider?: string;
}

export interface ResolvedClient {
  /** The provider that will actually serve the call, after fallback. */
  provider: string;
  client: ChatClient;
}

/**
 * Chat clients keyed by lower-cased provider name. Resolution falls back to
 * the default, then the fallback provider, before giving up.
 */
export class ProviderRegistry {
  private readonly clients = new Map<string, ChatClient>();
  private readonly defaultProvider: string;
  private readonly fallbackProvider: string | undefined;

  constructor(options: RegistryOptions) {
    this.defaultProvider = options.defaultProvider.trim().toLowerCase();
    this.fallbackProvider = options.fallbackProvider?.trim().toLowerCase() || undefined;
  }

  register(client: ChatClient): this {
    this.clients.set(client.provider.toLowerCase(), client);
    return this;
  }

  get defaultName(): string {
    return this.defaultProvider;
  }

  resolve(provider?: string | null): ResolvedClient {
    const requested = provider?.trim().toLowerCase() || this.defaultProvider;
    const direct = this.clients.get(requested);
    if (direct) return { provider: requested, client: direct };

    for (const candidate of [this.defaultProvider, this.fallbackProvider]) {
      if (!candidate || candidate === requested) continue;
      const client = this.clients.get(candidate);
      if (client) {
        log.warn({ requested, resolved: candidate }, "Provider not available, falling back");
        return { provider: candidate, client };
      }
    }

    throw new ProviderError(`No chat provider available (requested '${requested}')`, "LLM_NO_PROVIDER", requested);
  }

  isAvailable(provider: string): boolean {
    return this.clients.has(provider.trim().toLowerCase());
  }

  availability(names: readonly string[]): Record<string, boolean> {
    const result: Record<string, boolean> = {};
    for (const name of names) result[name.toLowerCase()] = this.isAvailable(name);
    return result;
  }

  providers(): string[] {
    return [...this.clients.keys()].sort();
  }
}

export interface RegistryFromEnvOptions extends RegistryOptions {
  timeoutMs: number;
  observer?: ChatObserver;
  system?: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Register every provider whose credentials (or, for Ollama, base URL) are
 * present in the environment.
 */
export function createRegistryFromEnv(
  env: NodeJS.ProcessEnv,
  options: RegistryFromEnvOptions,
): ProviderRegistry {
  const registry = new ProviderRegistry(options);
  const clientOptions = {
    system: options.system ?? BANKING_SYSTEM_PROMPT,
    timeoutMs: options.timeoutMs,
    observer: options.observer,
  };

  const openaiKey = nonEmpty(env.OPENAI_API_KEY);
  if (openaiKey) {
    registry.register(
      new OpenAiCompatClient({
        ...clientOptions,
        provider: "openai",
        baseUrl: nonEmpty(env.OPENAI_BASE_URL) ?? OPENAI_BASE_URL,
        apiKey: openaiKey,
        model: nonEmpty(env.OPENAI_MODEL) ?? DEFAULT_MODELS.openai,
      }),
    );
  }

  const geminiKey = nonEmpty(env.GEMINI_API_KEY);
  if (geminiKey) {
    registry.register(
      new OpenAiCompatClient({
        ...clientOptions,
        provider: "gemini",
        baseUrl: nonEmpty(env.GEMINI_BASE_URL) ?? GEMINI_BASE_URL,
        apiKey: geminiKey,
        model: nonEmpty(env.GEMINI_MODEL) ?? DEFAULT_MODELS.gemini,
      }),
    );
  }

  const anthropicKey = nonEmpty(env.ANTHROPIC_API_KEY);
  if (anthropicKey) {
    registry.register(
      new AnthropicClient({
        ...clientOptions,
        apiKey: anthropicKey,
        model: nonEmpty(env.ANTHROPIC_MODEL) ?? DEFAULT_MODELS.anthropic,
      }),
    );
  }

  const ollamaBaseUrl = nonEmpty(env.OLLAMA_BASE_URL);
  if (ollamaBaseUrl) {
    registry.register(
      new OpenAiCompatClient({
        ...clientOptions,
        provider: "ollama",
        baseUrl: ollamaBaseUrl,
        model: nonEmpty(env.OLLAMA_MODEL) ?? DEFAULT_MODELS.ollama,
      }),
    );
  }

  log.info({ providers: registry.providers(), defaultProvider: registry.defaultName }, "Chat providers registered");
  return registry;
}
