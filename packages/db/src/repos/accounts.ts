import type { Account, AccountDraft, AccountStatus, AccountType, MoneyAmount } from "@banking-agent/shared";

import type { Queryable } from "../db";
import { toIso } from "./mappers";

export interface AccountRow {
  id: string;
  account_number: string;
  customer_name: string;
  email: string;
  account_type: AccountType;
  balance: string;
  currency: string;
  status: AccountStatus;
  created_at: Date | string;
  updated_at: Date | string;
}

const ACCOUNT_COLUMNS = `id::text as id, account_number, customer_name, email, account_type,
  balance::text as balance, currency, status, created_at, updated_at`;

export function mapAccountRow(row: AccountRow): Account {
  return {
    id: row.id,
    accountNumber: row.account_number,
    customerName: row.customer_name,
    email: row.email,
    accountType: row.account_type,
    balance: row.balance,
    currency: row.currency,
    status: row.status,
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at),
  };
}

export function createAccountsRepo(db: Queryable) {
  return {
    async getByAccountNumber(accountNumber: string): Promise<Account | null> {
      const res = await db.query<AccountRow>(
        `select ${ACCOUNT_COLUMNS} from accounts where account_number = $1 limit 1`,
        [accountNumber],
      );
      const row = res.rows[0];
      return row ? mapAccountRow(row) : null;
    },

    async list(): Promise<Account[]> {
      const res = await db.query<AccountRow>(`select ${ACCOUNT_COLUMNS} from accounts order by id asc`);
      return res.rows.map(mapAccountRow);
    },

    async existsByAccountNumber(accountNumber: string): Promise<boolean> {
      const res = await db.query<{ exists: boolean }>(
        "select exists(select 1 from accounts where account_number = $1) as exists",
        [accountNumber],
      );
      return res.rows[0]?.exists ?? false;
    },

    async count(): Promise<number> {
      const res = await db.query<{ count: string }>("select count(*)::text as count from accounts");
      return Number.parseInt(res.rows[0]?.count ?? "0", 10);
    },

    async insert(draft: AccountDraft): Promise<Account> {
      const res = await db.query<AccountRow>(
        `insert into accounts (account_number, customer_name, email, account_type, balance, currency, status)
         values ($1, $2, $3, $4, $5::numeric, $6, $7)
         returning ${ACCOUNT_COLUMNS}`,
        [
          draft.accountNumber,
          draft.customerName,
          draft.email,
          draft.accountType,
          draft.balance,
          draft.currency,
          draft.status ?? "ACTIVE",
        ],
      );
      const row = res.rows[0];
      if (!row) throw new Error("Failed to insert account");
      return mapAccountRow(row);
    },

    /**
     * Add `amount` to the balance. Returns null when the account does not exist.
     */
    async credit(accountNumber: string, amount: MoneyAmount): Promise<Account | null> {
      const res = await db.query<AccountRow>(
        `update accounts
         set balance = balance + $2::numeric, updated_at = now()
         where account_number = $1
         returning ${ACCOUNT_COLUMNS}`,
        [accountNumber, amount],
      );
      const row = res.rows[0];
      return row ? mapAccountRow(row) : null;
    },

    /**
     * Subtract `amount` only if the balance covers it. Returns null when the
     * account does not exist or funds are insufficient.
     */
    async debitIfSufficient(accountNumber: string, amount: MoneyAmount): Promise<Account | null> {
      const res = await db.query<AccountRow>(
        `update accounts
         set balance = balance - $2::numeric, updated_at = now()
         where account_number = $1 and balance >= $2::numeric
         returning ${ACCOUNT_COLUMNS}`,
        [accountNumber, amount],
      );
      const row = res.rows[0];
      return row ? mapAccountRow(row) : null;
    },

    async setStatus(accountNumber: string, status: AccountStatus): Promise<Account | null> {
      const res = await db.query<AccountRow>(
        `update accounts set status = $2, updated_at = now()
         where account_number = $1
         returning ${ACCOUNT_COLUMNS}`,
        [accountNumber, status],
      );
      const row = res.rows[0];
      return row ? mapAccountRow(row) : null;
    },
  };
}

export type AccountsRepo = ReturnType<typeof createAccountsRepo>;
