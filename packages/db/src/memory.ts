import type { Account, AccountStatus, MoneyAmount, Transaction } from "@banking-agent/shared";

import type { Db, DbContext } from "./db";
import type { AccountsRepo } from "./repos/accounts";
import type { TransactionsRepo } from "./repos/transactions";

interface State {
  accounts: Map<string, Account>;
  transactions: Transaction[];
  nextAccountId: number;
  nextTransactionId: number;
}

function toCents(amount: MoneyAmount): bigint {
  const match = /^(-?)(\d+)(?:\.(\d{1,2}))?$/.exec(amount.trim());
  if (!match) throw new Error(`Invalid money amount: ${amount}`);
  const [, sign = "", whole = "0", fraction = ""] = match;
  const cents = BigInt(whole) * 100n + BigInt(fraction.padEnd(2, "0"));
  return sign === "-" ? -cents : cents;
}

function fromCents(cents: bigint): MoneyAmount {
  const negative = cents < 0n;
  const abs = negative ? -cents : cents;
  const whole = abs / 100n;
  const fraction = (abs % 100n).toString().padStart(2, "0");
  return `${negative ? "-" : ""}${whole}.${fraction}`;
}

function cloneState(state: State): State {
  return {
    accounts: new Map([...state.accounts].map(([key, account]) => [key, { ...account }])),
    transactions: state.transactions.map((t) => ({ ...t })),
    nextAccountId: state.nextAccountId,
    nextTransactionId: state.nextTransactionId,
  };
}

function newestFirst(a: Transaction, b: Transaction): number {
  if (a.transactionDate !== b.transactionDate) return a.transactionDate < b.transactionDate ? 1 : -1;
  return Number(b.id) - Number(a.id);
}

function accountsRepo(state: () => State): AccountsRepo {
  const update = (accountNumber: string, patch: Partial<Account>): Account | null => {
    const current = state().accounts.get(accountNumber);
    if (!current) return null;
    const next = { ...current, ...patch, updatedAt: new Date().toISOString() };
    state().accounts.set(accountNumber, next);
    return { ...next };
  };

  return {
    async getByAccountNumber(accountNumber) {
      const account = state().accounts.get(accountNumber);
      return account ? { ...account } : null;
    },
    async list() {
      return [...state().accounts.values()]
        .sort((a, b) => Number(a.id) - Number(b.id))
        .map((account) => ({ ...account }));
    },
    async existsByAccountNumber(accountNumber) {
      return state().accounts.has(accountNumber);
    },
    async count() {
      return state().accounts.size;
    },
    async insert(draft) {
      const s = state();
      if (s.accounts.has(draft.accountNumber)) {
        throw new Error(`duplicate key value violates unique constraint: ${draft.accountNumber}`);
      }
      const now = new Date().toISOString();
      const account: Account = {
        id: String(s.nextAccountId++),
        accountNumber: draft.accountNumber,
        customerName: draft.customerName,
        email: draft.email,
        accountType: draft.accountType,
        balance: fromCents(toCents(draft.balance)),
        currency: draft.currency,
        status: draft.status ?? "ACTIVE",
        createdAt: now,
        updatedAt: now,
      };
      s.accounts.set(account.accountNumber, account);
      return { ...account };
    },
    async credit(accountNumber, amount) {
      const current = state().accounts.get(accountNumber);
      if (!current) return null;
      return update(accountNumber, { balance: fromCents(toCents(current.balance) + toCents(amount)) });
    },
    async debitIfSufficient(accountNumber, amount) {
      const current = state().accounts.get(accountNumber);
      if (!current) return null;
      const balance = toCents(current.balance);
      const debit = toCents(amount);
      if (balance < debit) return null;
      return update(accountNumber, { balance: fromCents(balance - debit) });
    },
    async setStatus(accountNumber, status: AccountStatus) {
      return update(accountNumber, { status });
    },
  };
}

function transactionsRepo(state: () => State): TransactionsRepo {
  return {
    async insert(draft) {
      const s = state();
      const transaction: Transaction = {
        id: String(s.nextTransactionId++),
        accountNumber: draft.accountNumber,
        type: draft.type,
        amount: fromCents(toCents(draft.amount)),
        currency: draft.currency,
        destinationAccount: draft.destinationAccount ?? null,
        description: draft.description ?? null,
        status: draft.status,
        transactionDate: draft.transactionDate ?? new Date().toISOString(),
        balanceAfter: draft.balanceAfter ? fromCents(toCents(draft.balanceAfter)) : null,
      };
      s.transactions.push(transaction);
      return { ...transaction };
    },
    async listByAccount(accountNumber) {
      return state()
        .transactions.filter((t) => t.accountNumber === accountNumber)
        .sort(newestFirst)
        .map((t) => ({ ...t }));
    },
    async listByAccountInRange({ accountNumber, start, end }) {
      const from = new Date(start).getTime();
      const to = new Date(end).getTime();
      return state()
        .transactions.filter((t) => {
          const at = new Date(t.transactionDate).getTime();
          return t.accountNumber === accountNumber && at >= from && at <= to;
        })
        .sort(newestFirst)
        .map((t) => ({ ...t }));
    },
  };
}

/**
 * Process-local Db with the same repo contracts as the Postgres one. Money
 * is kept exact in integer cents. `tx` snapshots the whole state and
 * restores it when its callback throws, so writes made meanwhile by other
 * concurrent transactions are discarded as well. Single-writer test use
 * only. Raw SQL is not supported.
 */
export function createInMemoryDb(): Db {
  let state: State = {
    accounts: new Map(),
    transactions: [],
    nextAccountId: 1,
    nextTransactionId: 1,
  };
  const current = () => state;

  const ctx: DbContext = {
    async query() {
      throw new Error("Raw SQL is not supported by the in-memory database");
    },
    accounts: accountsRepo(current),
    transactions: transactionsRepo(current),
  };

  return {
    ...ctx,
    async tx<T>(fn: (tx: DbContext) => Promise<T>): Promise<T> {
      const snapshot = cloneState(state);
      try {
        return await fn(ctx);
      } catch (err) {
        state = snapshot;
        throw err;
      }
    },
    async close() {},
  };
}
