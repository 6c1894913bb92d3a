import { getProviderPricing } from "@banking-agent/shared";

export interface CostEstimate {
  promptCostUsd: number;
  completionCostUsd: number;
}

/**
 * Rough token count: one token per four characters. This is an approximation
 * for dashboards, not a tokenizer, and it will drift from provider-reported
 * usage on non-English text and code.
 */
export function estimateTokens(text: string | null | undefined): number {
  if (!text) return 0;
  return Math.floor(text.length / 4);
}

/**
 * Cost of one call from the static per-1K-token price table. Self-hosted and
 * unknown providers cost nothing.
 */
export function estimateCost(provider: string, promptTokens: number, completionTokens: number): CostEstimate {
  const pricing = getProviderPricing(provider);
  if (!pricing || pricing.selfHosted) {
    return { promptCostUsd: 0, completionCostUsd: 0 };
  }
  return {
    promptCostUsd: (Math.max(0, promptTokens) / 1000) * pricing.promptPer1KTokens,
    completionCostUsd: (Math.max(0, completionTokens) / 1000) * pricing.completionPer1KTokens,
  };
}

export function totalCost(estimate: CostEstimate): number {
  return estimate.promptCostUsd + estimate.completionCostUsd;
}
