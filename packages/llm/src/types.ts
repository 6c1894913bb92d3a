export interface ChatRequest {
  prompt: string;
  /** Overrides the client's default system prompt. */
  system?: string;
  temperature?: number;
  maxTokens?: number;
}

/** Token usage as reported by the provider, when it reports any. */
export interface ProviderUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface ChatResult {
  text: string;
  finishReason: string;
  model: string;
  usage?: ProviderUsage;
}

/**
 * One configured chat-completion backend. `complete` resolves with the model's
 * text or rejects with a ProviderError.
 */
export interface ChatClient {
  readonly provider: string;
  readonly model: string;
  complete(request: ChatRequest): Promise<ChatResult>;
}

export interface ChatObservation {
  provider: string;
  model: string;
  request: ChatRequest;
}

/**
 * Lifecycle callbacks a client fires around each provider round trip.
 * Implementations must not throw; clients ignore observer failures.
 */
export interface ChatObserver {
  onStart(observation: ChatObservation): ObservationScope;
}

export interface ObservationScope {
  onStop(result: ChatResult): void;
  onError(error: Error): void;
}

export interface ClientOptions {
  /** Default system prompt sent with every request. */
  system: string;
  timeoutMs: number;
  observer?: ChatObserver;
}
