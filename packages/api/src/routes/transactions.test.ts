import { afterEach, describe, expect, it } from "vitest";

import { buildTestApp, type TestApp } from "../testing.js";

describe("transaction routes", () => {
  let ctx: TestApp | null = null;

  afterEach(async () => {
    await ctx?.app.close();
    ctx = null;
  });

  async function balanceOf(app: TestApp, accountNumber: string): Promise<string> {
    const response = await app.app.inject({ method: "GET", url: `/api/accounts/${accountNumber}/balance` });
    return response.json().balance;
  }

  it("deposits into an account", async () => {
    ctx = await buildTestApp();
    const response = await ctx.app.inject({
      method: "POST",
      url: "/api/transactions/deposit",
      payload: { accountNumber: "ACC001", amount: "250.5", description: "Paycheck" },
    });

    expect(response.statusCode).toBe(201);
    expect(response.json().transaction).toMatchObject({
      accountNumber: "ACC001",
      type: "DEPOSIT",
      amount: "250.50",
      description: "Paycheck",
      status: "COMPLETED",
      balanceAfter: "5250.50",
    });
    expect(await balanceOf(ctx, "ACC001")).toBe("5250.50");
  });

  it("refuses a withdrawal larger than the balance", async () => {
    ctx = await buildTestApp();
    const response = await ctx.app.inject({
      method: "POST",
      url: "/api/transactions/withdraw",
      payload: { accountNumber: "ACC003", amount: 3600 },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ ok: false, error: { code: "INSUFFICIENT_FUNDS", message: "Insufficient funds" } });
    expect(await balanceOf(ctx, "ACC003")).toBe("3500.50");
  });

  it("enforces the per-transaction limit", async () => {
    ctx = await buildTestApp();
    const response = await ctx.app.inject({
      method: "POST",
      url: "/api/transactions/deposit",
      payload: { accountNumber: "ACC001", amount: "10000.01" },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error).toEqual({
      code: "AMOUNT_LIMIT_EXCEEDED",
      message: "Deposit amount exceeds the maximum of 10000.00",
    });
  });

  it("requires an account number", async () => {
    ctx = await buildTestApp();
    const response = await ctx.app.inject({
      method: "POST",
      url: "/api/transactions/deposit",
      payload: { amount: "10.00" },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error).toEqual({ code: "INVALID_PARAM", message: "Missing required parameter: accountNumber" });
  });

  it("transfers between accounts and records both sides", async () => {
    ctx = await buildTestApp();
    const response = await ctx.app.inject({
      method: "POST",
      url: "/api/transactions/transfer",
      payload: { fromAccount: "ACC002", toAccount: "ACC001", amount: "1000.00" },
    });

    expect(response.statusCode).toBe(201);
    expect(response.json().transaction).toMatchObject({
      accountNumber: "ACC002",
      type: "TRANSFER",
      destinationAccount: "ACC001",
      amount: "1000.00",
      balanceAfter: "14000.00",
    });
    expect(await balanceOf(ctx, "ACC002")).toBe("14000.00");
    expect(await balanceOf(ctx, "ACC001")).toBe("6000.00");

    const history = await ctx.app.inject({ method: "GET", url: "/api/transactions/account/ACC001" });
    expect(history.json().transactions).toHaveLength(1);
    expect(history.json().transactions[0]).toMatchObject({ type: "DEPOSIT", description: "Transfer from ACC002" });
  });

  it("rejects deposits into a closed account", async () => {
    ctx = await buildTestApp();
    await ctx.app.inject({ method: "DELETE", url: "/api/accounts/ACC004" });

    const response = await ctx.app.inject({
      method: "POST",
      url: "/api/transactions/deposit",
      payload: { accountNumber: "ACC004", amount: "5.00" },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.code).toBe("ACCOUNT_INACTIVE");
  });

  it("filters history by date range", async () => {
    ctx = await buildTestApp();
    await ctx.db.transactions.insert({
      accountNumber: "ACC005",
      type: "DEPOSIT",
      amount: "10.00",
      currency: "USD",
      status: "COMPLETED",
      transactionDate: "2024-03-10T12:00:00.000Z",
    });
    await ctx.db.transactions.insert({
      accountNumber: "ACC005",
      type: "WITHDRAWAL",
      amount: "4.00",
      currency: "USD",
      status: "COMPLETED",
      transactionDate: "2024-04-10T12:00:00.000Z",
    });

    const response = await ctx.app.inject({
      method: "GET",
      url: "/api/transactions/account/ACC005/range?startDate=2024-03-01T00:00:00Z&endDate=2024-03-31T23:59:59Z",
    });

    expect(response.statusCode).toBe(200);
    const transactions = response.json().transactions;
    expect(transactions).toHaveLength(1);
    expect(transactions[0]).toMatchObject({ type: "DEPOSIT", amount: "10.00" });
  });

  it("requires both ends of a date range", async () => {
    ctx = await buildTestApp();
    const response = await ctx.app.inject({
      method: "GET",
      url: "/api/transactions/account/ACC005/range?startDate=2024-03-01T00:00:00Z",
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.message).toBe("Missing required parameter: endDate");
  });

  it("rejects a date range that does not parse", async () => {
    ctx = await buildTestApp();
    const response = await ctx.app.inject({
      method: "GET",
      url: "/api/transactions/account/ACC005/range?startDate=yesterday&endDate=2024-03-31T23:59:59Z",
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      ok: false,
      error: { code: "INVALID_PARAM", message: "Invalid 'startDate' parameter: must be ISO date string" },
    });
  });
});
