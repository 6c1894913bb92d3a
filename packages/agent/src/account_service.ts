import type { DbContext } from "@banking-agent/db";
import {
  ACCOUNT_TYPES,
  createLogger,
  NotFoundError,
  ValidationError,
  type Account,
  type AccountType,
  type MoneyAmount,
} from "@banking-agent/shared";

import { parseMoney } from "./money";

const log = createLogger({ component: "account-service" });

const ACCOUNT_NUMBER_PATTERN = /^[A-Za-z0-9-]{3,32}$/;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const CURRENCY_PATTERN = /^[A-Z]{3}$/;

/** Fields of a new account as they arrive from a client; validated by `createAccount`. */
export interface CreateAccountInput {
  accountNumber?: unknown;
  customerName?: unknown;
  email?: unknown;
  accountType?: unknown;
  balance?: unknown;
  currency?: unknown;
}

export interface AccountBalance {
  accountNumber: string;
  balance: MoneyAmount;
  currency: string;
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(`Missing required field: ${field}`);
  }
  return value.trim();
}

function isAccountType(value: string): value is AccountType {
  return ACCOUNT_TYPES.some((type) => type === value);
}

export function createAccountService(db: DbContext, options: { defaultCurrency: string }) {
  return {
    findByAccountNumber(accountNumber: string): Promise<Account | null> {
      return db.accounts.getByAccountNumber(accountNumber);
    },

    findAll(): Promise<Account[]> {
      return db.accounts.list();
    },

    async createAccount(input: CreateAccountInput): Promise<Account> {
      const accountNumber = requireString(input.accountNumber, "accountNumber");
      if (!ACCOUNT_NUMBER_PATTERN.test(accountNumber)) {
        throw new ValidationError("accountNumber must be 3-32 letters, digits or dashes");
      }
      const customerName = requireString(input.customerName, "customerName");
      const email = requireString(input.email, "email");
      if (!EMAIL_PATTERN.test(email)) {
        throw new ValidationError("email must be a valid email address");
      }
      const accountType = requireString(input.accountType, "accountType").toUpperCase();
      if (!isAccountType(accountType)) {
        throw new ValidationError(`accountType must be one of: ${ACCOUNT_TYPES.join(", ")}`);
      }
      const currency =
        input.currency === undefined ? options.defaultCurrency : requireString(input.currency, "currency").toUpperCase();
      if (!CURRENCY_PATTERN.test(currency)) {
        throw new ValidationError("currency must be a three-letter ISO code");
      }
      const balance = input.balance === undefined ? "0.00" : parseMoney(input.balance, "balance");

      if (await db.accounts.existsByAccountNumber(accountNumber)) {
        throw new ValidationError(`Account number already exists: ${accountNumber}`, "DUPLICATE_ACCOUNT");
      }

      const account = await db.accounts.insert({ accountNumber, customerName, email, accountType, balance, currency });
      log.info({ accountNumber }, "Created account");
      return account;
    },

    async getBalance(accountNumber: string): Promise<AccountBalance> {
      const account = await db.accounts.getByAccountNumber(accountNumber);
      if (!account) throw new NotFoundError(`Account not found: ${accountNumber}`);
      return { accountNumber: account.accountNumber, balance: account.balance, currency: account.currency };
    },

    async closeAccount(accountNumber: string): Promise<Account> {
      const account = await db.accounts.setStatus(accountNumber, "CLOSED");
      if (!account) throw new NotFoundError(`Account not found: ${accountNumber}`);
      log.info({ accountNumber }, "Closed account");
      return account;
    },
  };
}

export type AccountService = ReturnType<typeof createAccountService>;
