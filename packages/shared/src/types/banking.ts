export const ACCOUNT_TYPES = ["CHECKING", "SAVINGS", "INVESTMENT"] as const;
export type AccountType = (typeof ACCOUNT_TYPES)[number];

export const ACCOUNT_STATUSES = ["ACTIVE", "SUSPENDED", "CLOSED"] as const;
export type AccountStatus = (typeof ACCOUNT_STATUSES)[number];

export const TRANSACTION_TYPES = ["DEPOSIT", "WITHDRAWAL", "TRANSFER", "PAYMENT"] as const;
export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export const TRANSACTION_STATUSES = ["PENDING", "COMPLETED", "FAILED", "CANCELLED"] as const;
export type TransactionStatus = (typeof TRANSACTION_STATUSES)[number];

/**
 * Monetary amounts travel as decimal strings with two places ("1500.00") so
 * that no float arithmetic ever touches a balance.
 */
export type MoneyAmount = string;

export interface Account {
  id: string;
  accountNumber: string;
  customerName: string;
  email: string;
  accountType: AccountType;
  balance: MoneyAmount;
  currency: string;
  status: AccountStatus;
  createdAt: string; // ISO
  updatedAt: string; // ISO
}

export interface AccountDraft {
  accountNumber: string;
  customerName: string;
  email: string;
  accountType: AccountType;
  balance: MoneyAmount;
  currency: string;
  status?: AccountStatus;
}

export interface Transaction {
  id: string;
  accountNumber: string;
  type: TransactionType;
  amount: MoneyAmount;
  currency: string;
  destinationAccount: string | null;
  description: string | null;
  status: TransactionStatus;
  transactionDate: string; // ISO
  balanceAfter: MoneyAmount | null;
}

export interface TransactionDraft {
  accountNumber: string;
  type: TransactionType;
  amount: MoneyAmount;
  currency: string;
  destinationAccount?: string | null;
  description?: string | null;
  status: TransactionStatus;
  balanceAfter?: MoneyAmount | null;
  transactionDate?: string;
}
