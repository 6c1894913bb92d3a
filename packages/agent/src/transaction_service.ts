import type { Db, DbContext } from "@banking-agent/db";
import {
  createLogger,
  NotFoundError,
  ValidationError,
  type Account,
  type MoneyAmount,
  type Transaction,
} from "@banking-agent/shared";
import { BankingAttributes, bestEffort, withBusinessSpan, type Telemetry } from "@banking-agent/telemetry";

import { parseTransactionAmount } from "./money";

const log = createLogger({ component: "transaction-service" });

export const DEPOSIT_SPAN = "banking.deposit";
export const WITHDRAWAL_SPAN = "banking.withdrawal";
export const TRANSFER_SPAN = "banking.transfer";

export interface MovementInput {
  accountNumber: string;
  amount: unknown;
  description?: string;
}

export interface TransferInput {
  fromAccount: string;
  toAccount: string;
  amount: unknown;
  description?: string;
}

async function requireActiveAccount(tx: DbContext, accountNumber: string): Promise<Account> {
  const account = await tx.accounts.getByAccountNumber(accountNumber);
  if (!account) throw new NotFoundError(`Account not found: ${accountNumber}`);
  if (account.status !== "ACTIVE") {
    throw new ValidationError(`Account ${accountNumber} is ${account.status}`, "ACCOUNT_INACTIVE");
  }
  return account;
}

async function withdrawIn(tx: DbContext, account: Account, amount: MoneyAmount): Promise<Account> {
  const updated = await tx.accounts.debitIfSufficient(account.accountNumber, amount);
  if (!updated) throw new ValidationError("Insufficient funds", "INSUFFICIENT_FUNDS");
  return updated;
}

async function depositIn(tx: DbContext, account: Account, amount: MoneyAmount): Promise<Account> {
  const updated = await tx.accounts.credit(account.accountNumber, amount);
  if (!updated) throw new NotFoundError(`Account not found: ${account.accountNumber}`);
  return updated;
}

function parseDate(value: string, field: string): string {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`Invalid '${field}' parameter: must be ISO date string`);
  }
  return date.toISOString();
}

export interface TransactionServiceOptions {
  maxTransactionAmount: number;
  telemetry: Telemetry;
}

/**
 * Deposits, withdrawals and transfers. Each movement updates the balance and
 * writes its ledger row in one DB transaction, inside its own business span.
 */
export function createTransactionService(db: Db, options: TransactionServiceOptions) {
  const { telemetry } = options;
  const max = options.maxTransactionAmount;

  return {
    deposit(input: MovementInput): Promise<Transaction> {
      return withBusinessSpan(
        telemetry,
        DEPOSIT_SPAN,
        { [BankingAttributes.ACCOUNT_NUMBER]: input.accountNumber },
        async (scope) => {
          const amount = parseTransactionAmount(input.amount, max, "Deposit");
          bestEffort("deposit.amount", () => scope.span.setAttribute(BankingAttributes.TRANSACTION_AMOUNT, amount));
          const transaction = await db.tx(async (tx) => {
            const account = await requireActiveAccount(tx, input.accountNumber);
            const updated = await depositIn(tx, account, amount);
            return tx.transactions.insert({
              accountNumber: account.accountNumber,
              type: "DEPOSIT",
              amount,
              currency: account.currency,
              description: input.description ?? null,
              status: "COMPLETED",
              balanceAfter: updated.balance,
            });
          });
          log.info({ accountNumber: input.accountNumber, amount }, "Deposit completed");
          return transaction;
        },
      );
    },

    withdraw(input: MovementInput): Promise<Transaction> {
      return withBusinessSpan(
        telemetry,
        WITHDRAWAL_SPAN,
        { [BankingAttributes.ACCOUNT_NUMBER]: input.accountNumber },
        async (scope) => {
          const amount = parseTransactionAmount(input.amount, max, "Withdrawal");
          bestEffort("withdraw.amount", () => scope.span.setAttribute(BankingAttributes.TRANSACTION_AMOUNT, amount));
          const transaction = await db.tx(async (tx) => {
            const account = await requireActiveAccount(tx, input.accountNumber);
            const updated = await withdrawIn(tx, account, amount);
            return tx.transactions.insert({
              accountNumber: account.accountNumber,
              type: "WITHDRAWAL",
              amount,
              currency: account.currency,
              description: input.description ?? null,
              status: "COMPLETED",
              balanceAfter: updated.balance,
            });
          });
          log.info({ accountNumber: input.accountNumber, amount }, "Withdrawal completed");
          return transaction;
        },
      );
    },

    /**
     * Move money between two accounts. Records a TRANSFER on the source and a
     * DEPOSIT on the destination; either both land or neither does.
     */
    transfer(input: TransferInput): Promise<Transaction> {
      return withBusinessSpan(
        telemetry,
        TRANSFER_SPAN,
        {
          [BankingAttributes.ACCOUNT_NUMBER]: input.fromAccount,
          [BankingAttributes.TRANSFER_DESTINATION]: input.toAccount,
        },
        async (scope) => {
          const amount = parseTransactionAmount(input.amount, max, "Transfer");
          bestEffort("transfer.amount", () => scope.span.setAttribute(BankingAttributes.TRANSACTION_AMOUNT, amount));
          if (input.fromAccount === input.toAccount) {
            throw new ValidationError("Cannot transfer to the same account", "SAME_ACCOUNT");
          }

          const transaction = await db.tx(async (tx) => {
            const source = await requireActiveAccount(tx, input.fromAccount);
            const destination = await requireActiveAccount(tx, input.toAccount);
            if (source.currency !== destination.currency) {
              throw new ValidationError("Transfers between currencies are not supported", "CURRENCY_MISMATCH");
            }

            const debited = await withdrawIn(tx, source, amount);
            const credited = await depositIn(tx, destination, amount);

            await tx.transactions.insert({
              accountNumber: destination.accountNumber,
              type: "DEPOSIT",
              amount,
              currency: destination.currency,
              description: `Transfer from ${source.accountNumber}`,
              status: "COMPLETED",
              balanceAfter: credited.balance,
            });
            return tx.transactions.insert({
              accountNumber: source.accountNumber,
              type: "TRANSFER",
              amount,
              currency: source.currency,
              destinationAccount: destination.accountNumber,
              description: input.description ?? `Transfer to ${destination.accountNumber}`,
              status: "COMPLETED",
              balanceAfter: debited.balance,
            });
          });
          log.info({ from: input.fromAccount, to: input.toAccount, amount }, "Transfer completed");
          return transaction;
        },
      );
    },

    /** Newest first. */
    getTransactionHistory(accountNumber: string): Promise<Transaction[]> {
      return db.transactions.listByAccount(accountNumber);
    },

    async getTransactionsByDateRange(accountNumber: string, startDate: string, endDate: string): Promise<Transaction[]> {
      const start = parseDate(startDate, "startDate");
      const end = parseDate(endDate, "endDate");
      if (start > end) {
        throw new ValidationError("startDate must not be after endDate");
      }
      return db.transactions.listByAccountInRange({ accountNumber, start, end });
    },
  };
}

export type TransactionService = ReturnType<typeof createTransactionService>;
