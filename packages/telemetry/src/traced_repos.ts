import { context, SpanKind, SpanStatusCode, type Attributes } from "@opentelemetry/api";

import type { AccountsRepo, Db, DbContext, TransactionsRepo } from "@banking-agent/db";

import { DbAttributes } from "./attributes";
import { bestEffort, startSpanSafely } from "./guard";
import type { Telemetry } from "./telemetry";

/** The argument a repository call looks rows up by, as `[name, value]`. */
type QueryKey = readonly [string, string];

function resultAttributes(result: unknown): Attributes {
  if (Array.isArray(result)) return { [DbAttributes.RESULT_COUNT]: result.length };
  if (typeof result === "number") return { [DbAttributes.RESULT_COUNT]: result };
  if (typeof result === "boolean") return { [DbAttributes.RESULT_PRESENT]: result };
  return { [DbAttributes.RESULT_PRESENT]: result !== null && result !== undefined };
}

/**
 * Run one repository call inside a CLIENT span named `<Repo>.<method>`. The
 * span records what was looked up and how much came back.
 */
export async function tracedQuery<T>(
  telemetry: Telemetry,
  repoName: string,
  method: string,
  key: QueryKey | null,
  run: () => Promise<T>,
): Promise<T> {
  const spanName = `${repoName}.${method}`;
  const attributes: Attributes = { [DbAttributes.OPERATION]: method };
  if (key) {
    attributes[DbAttributes.QUERY_KEY] = key[0];
    attributes[DbAttributes.QUERY_VALUE] = key[1];
  }
  const span = startSpanSafely(telemetry.tracer, spanName, { kind: SpanKind.CLIENT, attributes }, context.active());

  try {
    const result = await run();
    bestEffort(`${spanName}.result`, () => {
      span.setAttributes(resultAttributes(result));
      span.setStatus({ code: SpanStatusCode.OK });
    });
    return result;
  } catch (error) {
    bestEffort(`${spanName}.status`, () => {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
    });
    throw error;
  } finally {
    bestEffort(`${spanName}.end`, () => span.end());
  }
}

export function traceAccountsRepo(telemetry: Telemetry, repo: AccountsRepo): AccountsRepo {
  const call = <T>(method: string, key: QueryKey | null, run: () => Promise<T>) =>
    tracedQuery(telemetry, "AccountsRepo", method, key, run);

  return {
    getByAccountNumber: (accountNumber) =>
      call("getByAccountNumber", ["accountNumber", accountNumber], () => repo.getByAccountNumber(accountNumber)),
    list: () => call("list", null, () => repo.list()),
    existsByAccountNumber: (accountNumber) =>
      call("existsByAccountNumber", ["accountNumber", accountNumber], () => repo.existsByAccountNumber(accountNumber)),
    count: () => call("count", null, () => repo.count()),
    insert: (draft) => call("insert", ["accountNumber", draft.accountNumber], () => repo.insert(draft)),
    credit: (accountNumber, amount) =>
      call("credit", ["accountNumber", accountNumber], () => repo.credit(accountNumber, amount)),
    debitIfSufficient: (accountNumber, amount) =>
      call("debitIfSufficient", ["accountNumber", accountNumber], () => repo.debitIfSufficient(accountNumber, amount)),
    setStatus: (accountNumber, status) =>
      call("setStatus", ["accountNumber", accountNumber], () => repo.setStatus(accountNumber, status)),
  };
}

export function traceTransactionsRepo(telemetry: Telemetry, repo: TransactionsRepo): TransactionsRepo {
  const call = <T>(method: string, key: QueryKey | null, run: () => Promise<T>) =>
    tracedQuery(telemetry, "TransactionsRepo", method, key, run);

  return {
    insert: (draft) => call("insert", ["accountNumber", draft.accountNumber], () => repo.insert(draft)),
    listByAccount: (accountNumber) =>
      call("listByAccount", ["accountNumber", accountNumber], () => repo.listByAccount(accountNumber)),
    listByAccountInRange: (params) =>
      call("listByAccountInRange", ["accountNumber", params.accountNumber], () => repo.listByAccountInRange(params)),
  };
}

export function traceDbContext(telemetry: Telemetry, ctx: DbContext): DbContext {
  return {
    ...ctx,
    accounts: traceAccountsRepo(telemetry, ctx.accounts),
    transactions: traceTransactionsRepo(telemetry, ctx.transactions),
  };
}

/** Wrap every repository, including those handed out inside `tx`, with call spans. */
export function traceDb(telemetry: Telemetry, db: Db): Db {
  return {
    ...traceDbContext(telemetry, db),
    tx<T>(fn: (tx: DbContext) => Promise<T>): Promise<T> {
      return db.tx((inner) => fn(traceDbContext(telemetry, inner)));
    },
    close: () => db.close(),
  };
}
