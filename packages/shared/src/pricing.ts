/**
 * Static per-provider token pricing used for cost estimates on LLM spans.
 * Prices are USD per 1,000 tokens and are approximate list prices; they are
 * not a billing source.
 */

export interface ProviderPricing {
  provider: string;
  promptPer1KTokens: number;
  completionPer1KTokens: number;
  /** Runs on our own hardware; never billed per token. */
  selfHosted: boolean;
}

export const PROVIDER_PRICING: readonly ProviderPricing[] = [
  { provider: "openai", promptPer1KTokens: 0.03, completionPer1KTokens: 0.06, selfHosted: false },
  { provider: "gemini", promptPer1KTokens: 0.00025, completionPer1KTokens: 0.0005, selfHosted: false },
  { provider: "anthropic", promptPer1KTokens: 0.003, completionPer1KTokens: 0.015, selfHosted: false },
  { provider: "ollama", promptPer1KTokens: 0, completionPer1KTokens: 0, selfHosted: true },
];

const pricingIndex = new Map<string, ProviderPricing>();
for (const pricing of PROVIDER_PRICING) {
  pricingIndex.set(pricing.provider, pricing);
}

/**
 * Get pricing for a provider key (case-insensitive).
 * Returns null for providers we have no price for.
 */
export function getProviderPricing(provider: string): ProviderPricing | null {
  return pricingIndex.get(provider.trim().toLowerCase()) ?? null;
}

/**
 * Provider keys the service knows how to price and label.
 */
export function getKnownProviders(): string[] {
  return PROVIDER_PRICING.map((p) => p.provider);
}
