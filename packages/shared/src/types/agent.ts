/**
 * Intents the agent can classify a query into. Anything else the model returns
 * is treated as GENERAL_INQUIRY.
 */
export const INTENTS = [
  "CHECK_BALANCE",
  "VIEW_TRANSACTIONS",
  "DEPOSIT",
  "WITHDRAWAL",
  "TRANSFER",
  "ACCOUNT_INFO",
  "GENERAL_INQUIRY",
] as const;

export type Intent = (typeof INTENTS)[number];

export function isIntent(value: string): value is Intent {
  return INTENTS.some((intent) => intent === value);
}

/**
 * Map a model's classification label onto an Intent. The label is trimmed and
 * upper-cased; anything unrecognized becomes GENERAL_INQUIRY.
 */
export function parseIntent(label: string | null | undefined): Intent {
  const normalized = (label ?? "").trim().toUpperCase();
  return isIntent(normalized) ? normalized : "GENERAL_INQUIRY";
}

export type ResponseStatus = "SUCCESS" | "ERROR" | "PENDING";

export interface BankingRequest {
  accountRef?: string;
  operationType?: string;
  query: string;
  context?: string;
}

export interface BankingResponse<T = unknown> {
  message: string;
  data?: T;
  status: ResponseStatus;
  providerUsed: string;
}
