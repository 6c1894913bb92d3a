import crypto from "node:crypto";

import type { AttributeValue, Attributes } from "@opentelemetry/api";

/** Span attribute keys shared by the call context and business spans. */
export const GenAiAttributes = {
  SYSTEM: "gen_ai.system",
  OPERATION_NAME: "gen_ai.operation.name",
  REQUEST_MODEL: "gen_ai.request.model",
  REQUEST_TEMPERATURE: "gen_ai.request.temperature",
  REQUEST_MAX_TOKENS: "gen_ai.request.max_tokens",
  RESPONSE_MODEL: "gen_ai.response.model",
  RESPONSE_FINISH_REASONS: "gen_ai.response.finish_reasons",
  USAGE_INPUT_TOKENS: "gen_ai.usage.input_tokens",
  USAGE_OUTPUT_TOKENS: "gen_ai.usage.output_tokens",
  PROMPT: "gen_ai.prompt",
  COMPLETION: "gen_ai.completion",
} as const;

export const LlmAttributes = {
  REQUEST_TYPE: "llm.request.type",
  PROMPT_LENGTH: "llm.prompt.length",
  PROMPT_HASH: "llm.prompt.hash",
  PROMPT_TOKENS: "llm.prompt.tokens",
  RESPONSE_LENGTH: "llm.response.length",
  COMPLETION_TOKENS: "llm.completion.tokens",
  TOTAL_TOKENS: "llm.usage.total_tokens",
  LATENCY_MS: "llm.latency.ms",
  COST_USD: "llm.cost.usd",
  CORRECTNESS_SCORE: "llm.correctness.score",
  CORRECTNESS_FEEDBACK: "llm.correctness.feedback",
} as const;

export const BankingAttributes = {
  INTENT: "banking.intent",
  ACCOUNT: "banking.account",
  PROVIDER: "banking.provider",
  ACCOUNT_NUMBER: "banking.account.number",
  USER_QUERY: "banking.user.query",
  RESPONSE_STATUS: "banking.response.status",
  TRANSACTION_AMOUNT: "banking.transaction.amount",
  TRANSFER_DESTINATION: "banking.transfer.destination",
} as const;

/** Repository call spans. */
export const DbAttributes = {
  SYSTEM: "db.system",
  OPERATION: "db.operation",
  QUERY_KEY: "db.query.key",
  QUERY_VALUE: "db.query.value",
  RESULT_COUNT: "db.result.count",
  RESULT_PRESENT: "db.result.present",
} as const;

export const ERROR_TYPE = "error.type";
export const EVENT_TYPE = "event.type";

export const MAX_CONTENT_CHARS = 2000;
export const MAX_QUERY_CHARS = 200;

export function truncate(text: string, maxChars: number): string {
  return text.length <= maxChars ? text : `${text.slice(0, maxChars)}...`;
}

/** Short stable fingerprint so identical prompts can be grouped without storing them. */
export function promptHash(text: string): string {
  return crypto.createHash("sha256").update(text).digest("hex").slice(0, 16);
}

/**
 * Drop null/undefined values so callers can pass optional fields straight
 * through; OpenTelemetry rejects them anyway.
 */
export function compactAttributes(
  attributes: Record<string, AttributeValue | null | undefined>,
  prefix = "",
): Attributes {
  const result: Attributes = {};
  for (const [key, value] of Object.entries(attributes)) {
    if (value === null || value === undefined) continue;
    result[`${prefix}${key}`] = value;
  }
  return result;
}
