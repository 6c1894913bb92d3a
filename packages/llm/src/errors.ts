import { TimeoutError } from "./timeout";

export type ProviderErrorCode = "LLM_AUTH_ERROR" | "LLM_TIMEOUT" | "LLM_NO_PROVIDER" | "LLM_PROVIDER_ERROR";

/**
 * A completion call failed: the provider answered with an error, timed out,
 * rejected our credentials, or no provider is configured at all.
 */
export class ProviderError extends Error {
  readonly statusCode?: number;
  readonly requestId?: string | null;

  constructor(
    message: string,
    public readonly code: ProviderErrorCode,
    public readonly provider: string,
    details: { statusCode?: number; requestId?: string | null; cause?: unknown } = {},
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "ProviderError";
    this.statusCode = details.statusCode;
    this.requestId = details.requestId;
  }
}

const AUTH_ERROR_PATTERNS: RegExp[] = [
  /invalid api key/i,
  /incorrect api key/i,
  /api key.*required/i,
  /missing.*api key/i,
  /authentication failed/i,
  /unauthorized/i,
  /forbidden/i,
  /permission denied/i,
];

export function isAuthLikeMessage(message: string): boolean {
  return AUTH_ERROR_PATTERNS.some((pattern) => pattern.test(message));
}

/**
 * Convert whatever a client threw into a ProviderError with a stable code.
 */
export function classifyProviderError(error: unknown, provider: string): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  if (error instanceof TimeoutError) {
    return new ProviderError(error.message, "LLM_TIMEOUT", provider, { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  const statusCode =
    error && typeof error === "object" && "statusCode" in error && typeof error.statusCode === "number"
      ? error.statusCode
      : undefined;

  if (statusCode === 401 || statusCode === 403 || isAuthLikeMessage(message)) {
    return new ProviderError(
      `LLM authentication failed for provider '${provider}'. Check the configured API key.`,
      "LLM_AUTH_ERROR",
      provider,
      { statusCode, cause: error },
    );
  }

  return new ProviderError(message, "LLM_PROVIDER_ERROR", provider, { statusCode, cause: error });
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}
