import type {
  MoneyAmount,
  Transaction,
  TransactionDraft,
  TransactionStatus,
  TransactionType,
} from "@banking-agent/shared";

import type { Queryable } from "../db";
import { toIso } from "./mappers";

export interface TransactionRow {
  id: string;
  account_number: string;
  type: TransactionType;
  amount: string;
  currency: string;
  destination_account: string | null;
  description: string | null;
  status: TransactionStatus;
  transaction_date: Date | string;
  balance_after: MoneyAmount | null;
}

const TRANSACTION_COLUMNS = `id::text as id, account_number, type, amount::text as amount, currency,
  destination_account, description, status, transaction_date, balance_after::text as balance_after`;

export function mapTransactionRow(row: TransactionRow): Transaction {
  return {
    id: row.id,
    accountNumber: row.account_number,
    type: row.type,
    amount: row.amount,
    currency: row.currency,
    destinationAccount: row.destination_account,
    description: row.description,
    status: row.status,
    transactionDate: toIso(row.transaction_date),
    balanceAfter: row.balance_after,
  };
}

export function createTransactionsRepo(db: Queryable) {
  return {
    async insert(draft: TransactionDraft): Promise<Transaction> {
      const res = await db.query<TransactionRow>(
        `insert into transactions (
           account_number, type, amount, currency, destination_account,
           description, status, balance_after, transaction_date
         ) values (
           $1, $2, $3::numeric, $4, $5,
           $6, $7, $8::numeric, coalesce($9::timestamptz, now())
         )
         returning ${TRANSACTION_COLUMNS}`,
        [
          draft.accountNumber,
          draft.type,
          draft.amount,
          draft.currency,
          draft.destinationAccount ?? null,
          draft.description ?? null,
          draft.status,
          draft.balanceAfter ?? null,
          draft.transactionDate ?? null,
        ],
      );
      const row = res.rows[0];
      if (!row) throw new Error("Failed to insert transaction");
      return mapTransactionRow(row);
    },

    /**
     * Transactions for an account, newest first.
     */
    async listByAccount(accountNumber: string): Promise<Transaction[]> {
      const res = await db.query<TransactionRow>(
        `select ${TRANSACTION_COLUMNS} from transactions
         where account_number = $1
         order by transaction_date desc, id desc`,
        [accountNumber],
      );
      return res.rows.map(mapTransactionRow);
    },

    async listByAccountInRange(params: {
      accountNumber: string;
      start: string;
      end: string;
    }): Promise<Transaction[]> {
      const res = await db.query<TransactionRow>(
        `select ${TRANSACTION_COLUMNS} from transactions
         where account_number = $1
           and transaction_date between $2::timestamptz and $3::timestamptz
         order by transaction_date desc, id desc`,
        [params.accountNumber, params.start, params.end],
      );
      return res.rows.map(mapTransactionRow);
    },
  };
}

export type TransactionsRepo = ReturnType<typeof createTransactionsRepo>;
