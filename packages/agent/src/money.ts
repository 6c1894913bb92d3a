import { ValidationError, type MoneyAmount } from "@banking-agent/shared";

const AMOUNT_PATTERN = /^\d+(\.\d{1,2})?$/;

/**
 * Parse a non-negative decimal amount with at most two places into its
 * canonical two-place string form ("12.5" -> "12.50").
 */
export function parseMoney(value: unknown, field = "amount"): MoneyAmount {
  const raw =
    typeof value === "string" ? value.trim() : typeof value === "number" && Number.isFinite(value) ? String(value) : "";
  if (!AMOUNT_PATTERN.test(raw)) {
    throw new ValidationError(`${field} must be a decimal number with at most two decimal places`);
  }
  const [whole = "0", fraction = ""] = raw.split(".");
  return `${BigInt(whole)}.${fraction.padEnd(2, "0")}`;
}

/**
 * A transaction amount: positive and no larger than `max`.
 */
export function parseTransactionAmount(value: unknown, max: number, label: string): MoneyAmount {
  const amount = parseMoney(value);
  if (/^0\.00$/.test(amount)) {
    throw new ValidationError(`${label} amount must be positive`, "INVALID_AMOUNT");
  }
  if (Number.parseFloat(amount) > max) {
    throw new ValidationError(`${label} amount exceeds the maximum of ${max.toFixed(2)}`, "AMOUNT_LIMIT_EXCEEDED");
  }
  return amount;
}
