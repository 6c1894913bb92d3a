export type AppEnv = "local" | "dev" | "prod";

export interface TelemetryEnv {
  serviceName: string;
  serviceVersion: string;
  deploymentEnvironment: string;
  /** OTLP/HTTP base endpoint; `/v1/traces` is appended. */
  otlpEndpoint?: string;
  otlpAuthorization?: string;
  consoleExporter: boolean;
  /** Attach truncated prompt/completion text to LLM spans. */
  captureContent: boolean;
  /** Emit an extra CLIENT span per provider call via the observation bridge. */
  clientSpans: boolean;
}

export interface RuntimeEnv {
  appEnv: AppEnv;
  port: number;
  databaseUrl: string;

  defaultProvider: string;
  fallbackProvider?: string;
  llmTimeoutMs: number;

  maxTransactionAmount: number;
  currency: string;

  telemetry: TelemetryEnv;
}

function requireEnv(name: string, value: string | undefined): string {
  if (!value) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return value;
}

function parseIntEnv(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid integer env var: ${name}=${value}`);
  }
  return parsed;
}

function parseNumberEnv(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number.parseFloat(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid positive number env var: ${name}=${value}`);
  }
  return parsed;
}

function parseBoolEnv(value: string | undefined): boolean {
  return value !== undefined && ["1", "true", "yes"].includes(value.trim().toLowerCase());
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadRuntimeEnv(env: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  const appEnvRaw = env.APP_ENV ?? "local";
  const appEnv: AppEnv =
    appEnvRaw === "prod" || appEnvRaw === "dev" || appEnvRaw === "local" ? appEnvRaw : "local";

  return {
    appEnv,
    port: parseIntEnv("API_PORT", env.API_PORT ?? env.PORT, 8080),
    databaseUrl: requireEnv("DATABASE_URL", env.DATABASE_URL),
    defaultProvider: (optional(env.DEFAULT_LLM_PROVIDER) ?? "ollama").toLowerCase(),
    fallbackProvider: optional(env.FALLBACK_LLM_PROVIDER)?.toLowerCase(),
    llmTimeoutMs: parseIntEnv("LLM_TIMEOUT_MS", env.LLM_TIMEOUT_MS, 60_000),
    maxTransactionAmount: parseNumberEnv("MAX_TRANSACTION_AMOUNT", env.MAX_TRANSACTION_AMOUNT, 10_000),
    currency: (optional(env.BANK_CURRENCY) ?? "USD").toUpperCase(),
    telemetry: {
      serviceName: optional(env.OTEL_SERVICE_NAME) ?? "banking-agent",
      serviceVersion: optional(env.SERVICE_VERSION) ?? "0.1.0",
      deploymentEnvironment: optional(env.DEPLOYMENT_ENVIRONMENT) ?? appEnv,
      otlpEndpoint: optional(env.OTEL_EXPORTER_OTLP_ENDPOINT),
      otlpAuthorization: optional(env.OTEL_EXPORTER_OTLP_AUTHORIZATION),
      consoleExporter: parseBoolEnv(env.OTEL_EXPORTER_CONSOLE),
      captureContent: parseBoolEnv(env.OTEL_INSTRUMENTATION_GENAI_CAPTURE_MESSAGE_CONTENT),
      clientSpans: parseBoolEnv(env.OTEL_CLIENT_SPANS),
    },
  };
}
