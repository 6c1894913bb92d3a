import { describe, expect, it } from "vitest";

import { ValidationError } from "@banking-agent/shared";

import { parseMoney, parseTransactionAmount } from "./money";

describe("parseMoney", () => {
  it.each([
    ["12.5", "12.50"],
    ["0012", "12.00"],
    [" 7.05 ", "7.05"],
    [250, "250.00"],
    [0.1, "0.10"],
    ["0", "0.00"],
  ])("%j -> %s", (input, expected) => {
    expect(parseMoney(input)).toBe(expected);
  });

  it.each([["-5"], ["1.234"], ["abc"], [""], [Number.NaN], [null], [undefined], ["1e3"]])("rejects %j", (input) => {
    expect(() => parseMoney(input)).toThrow(ValidationError);
  });
});

describe("parseTransactionAmount", () => {
  it("rejects zero", () => {
    expect(() => parseTransactionAmount("0.00", 10_000, "Deposit")).toThrow("Deposit amount must be positive");
  });

  it("enforces the configured maximum", () => {
    expect(parseTransactionAmount("10000", 10_000, "Withdrawal")).toBe("10000.00");
    expect(() => parseTransactionAmount("10000.01", 10_000, "Withdrawal")).toThrow(
      "Withdrawal amount exceeds the maximum of 10000.00",
    );
  });
});
