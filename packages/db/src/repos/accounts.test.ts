import { describe, expect, it, vi } from "vitest";
import type { Queryable } from "../db";
import { createAccountsRepo, type AccountRow } from "./accounts";

const row: AccountRow = {
  id: "1",
  account_number: "ACC001",
  customer_name: "Test Customer",
  email: "test@example.com",
  account_type: "CHECKING",
  balance: "5000.00",
  currency: "USD",
  status: "ACTIVE",
  created_at: new Date("2024-06-01T09:00:00.000Z"),
  updated_at: "2024-06-02T10:30:00.000Z",
};

describe("accounts repo", () => {
  it("maps a row to a camel-cased account with ISO timestamps", async () => {
    const query = vi.fn().mockResolvedValue({ rows: [row] });
    const repo = createAccountsRepo({ query } as unknown as Queryable);

    const account = await repo.getByAccountNumber("ACC001");

    expect(account).toEqual({
      id: "1",
      accountNumber: "ACC001",
      customerName: "Test Customer",
      email: "test@example.com",
      accountType: "CHECKING",
      balance: "5000.00",
      currency: "USD",
      status: "ACTIVE",
      createdAt: "2024-06-01T09:00:00.000Z",
      updatedAt: "2024-06-02T10:30:00.000Z",
    });
    expect(query).toHaveBeenCalledWith(expect.stringContaining("where account_number = $1"), ["ACC001"]);
  });

  it("returns null when the account is missing", async () => {
    const query = vi.fn().mockResolvedValue({ rows: [] });
    const repo = createAccountsRepo({ query } as unknown as Queryable);

    await expect(repo.getByAccountNumber("NOPE")).resolves.toBeNull();
  });

  it("guards debits with a balance check in SQL", async () => {
    const query = vi.fn().mockResolvedValue({ rows: [] });
    const repo = createAccountsRepo({ query } as unknown as Queryable);

    const result = await repo.debitIfSufficient("ACC001", "100.00");

    expect(result).toBeNull();
    const [sql, params] = query.mock.calls[0] as [string, unknown[]];
    expect(sql).toContain("balance >= $2::numeric");
    expect(params).toEqual(["ACC001", "100.00"]);
  });

  it("defaults new accounts to ACTIVE", async () => {
    const query = vi.fn().mockResolvedValue({ rows: [row] });
    const repo = createAccountsRepo({ query } as unknown as Queryable);

    await repo.insert({
      accountNumber: "ACC001",
      customerName: "Test Customer",
      email: "test@example.com",
      accountType: "CHECKING",
      balance: "5000.00",
      currency: "USD",
    });

    const params = query.mock.calls[0]?.[1] as unknown[];
    expect(params[6]).toBe("ACTIVE");
  });

  it("parses the count", async () => {
    const query = vi.fn().mockResolvedValue({ rows: [{ count: "5" }] });
    const repo = createAccountsRepo({ query } as unknown as Queryable);

    await expect(repo.count()).resolves.toBe(5);
  });
});
