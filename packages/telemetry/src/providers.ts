import { getKnownProviders, parseIntent, type Intent } from "@banking-agent/shared";

const KNOWN_PROVIDERS = new Set(getKnownProviders());

/** Providers whose tracing-backend name differs from our config key. */
const SYSTEM_ALIASES: Record<string, string> = {
  gemini: "google",
};

/**
 * Provider key as reported in `gen_ai.system`. Gemini reports as google;
 * everything else is its lower-cased key.
 */
export function normalizeProviderName(provider: string): string {
  const key = provider.trim().toLowerCase();
  return SYSTEM_ALIASES[key] ?? key;
}

/**
 * Provider value safe to use as a metric label: a priced provider key, or
 * `other`. Keeps label cardinality fixed whatever callers pass in.
 */
export function boundedProviderLabel(provider: string): string {
  const key = provider.trim().toLowerCase();
  return KNOWN_PROVIDERS.has(key) ? key : "other";
}

export function boundedIntentLabel(intent: string | null | undefined): Intent {
  return parseIntent(intent);
}
