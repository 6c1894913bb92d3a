import { beforeEach, describe, expect, it } from "vitest";

import { createInMemoryDb, seedSampleAccounts, type Db } from "@banking-agent/db";
import { NotFoundError, ValidationError } from "@banking-agent/shared";

import { createAccountService, type AccountService } from "./account_service";

describe("account service", () => {
  let db: Db;
  let service: AccountService;

  beforeEach(async () => {
    db = createInMemoryDb();
    await seedSampleAccounts(db);
    service = createAccountService(db, { defaultCurrency: "USD" });
  });

  it("finds seeded accounts", async () => {
    expect((await service.findAll()).map((a) => a.accountNumber)).toEqual([
      "ACC001",
      "ACC002",
      "ACC003",
      "ACC004",
      "ACC005",
    ]);
    expect((await service.findByAccountNumber("ACC003"))?.balance).toBe("3500.50");
    expect(await service.findByAccountNumber("ACC999")).toBeNull();
  });

  it("creates an account with defaults", async () => {
    const account = await service.createAccount({
      accountNumber: "ACC100",
      customerName: "Test Customer",
      email: "test@example.com",
      accountType: "savings",
    });

    expect(account).toMatchObject({
      accountNumber: "ACC100",
      accountType: "SAVINGS",
      balance: "0.00",
      currency: "USD",
      status: "ACTIVE",
    });
  });

  it("rejects duplicates and invalid fields", async () => {
    const base = { accountNumber: "ACC001", customerName: "Test", email: "test@example.com", accountType: "CHECKING" };

    await expect(service.createAccount(base)).rejects.toMatchObject({
      code: "DUPLICATE_ACCOUNT",
      message: "Account number already exists: ACC001",
    });
    await expect(service.createAccount({ ...base, accountNumber: "ACC101", accountType: "CRYPTO" })).rejects.toThrow(
      "accountType must be one of: CHECKING, SAVINGS, INVESTMENT",
    );
    await expect(service.createAccount({ ...base, accountNumber: "ACC101", currency: "dollars" })).rejects.toThrow(
      "currency must be a three-letter ISO code",
    );
    await expect(service.createAccount({ ...base, accountNumber: "ACC101", email: "nope" })).rejects.toBeInstanceOf(
      ValidationError,
    );
    await expect(service.createAccount({ ...base, customerName: undefined })).rejects.toThrow(
      "Missing required field: customerName",
    );
  });

  it("reports balances and closes accounts", async () => {
    expect(await service.getBalance("ACC005")).toEqual({ accountNumber: "ACC005", balance: "8750.25", currency: "USD" });

    const closed = await service.closeAccount("ACC005");
    expect(closed.status).toBe("CLOSED");

    await expect(service.getBalance("ACC999")).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.closeAccount("ACC999")).rejects.toThrow("Account not found: ACC999");
  });
});
