import type { AccountDraft } from "@banking-agent/shared";
import { createLogger } from "@banking-agent/shared";

import type { DbContext } from "./db";

const log = createLogger({ component: "seed" });

export const SAMPLE_ACCOUNTS: readonly AccountDraft[] = [
  {
    accountNumber: "ACC001",
    customerName: "Sample Customer One",
    email: "customer.one@example.com",
    accountType: "CHECKING",
    balance: "5000.00",
    currency: "USD",
  },
  {
    accountNumber: "ACC002",
    customerName: "Sample Customer Two",
    email: "customer.two@example.com",
    accountType: "SAVINGS",
    balance: "15000.00",
    currency: "USD",
  },
  {
    accountNumber: "ACC003",
    customerName: "Sample Customer Three",
    email: "customer.three@example.com",
    accountType: "CHECKING",
    balance: "3500.50",
    currency: "USD",
  },
  {
    accountNumber: "ACC004",
    customerName: "Sample Customer Four",
    email: "customer.four@example.com",
    accountType: "INVESTMENT",
    balance: "25000.00",
    currency: "USD",
  },
  {
    accountNumber: "ACC005",
    customerName: "Sample Customer Five",
    email: "customer.five@example.com",
    accountType: "SAVINGS",
    balance: "8750.25",
    currency: "USD",
  },
];

/**
 * Insert the sample accounts when the accounts table is empty.
 * Returns the number of accounts created.
 */
export async function seedSampleAccounts(db: DbContext): Promise<number> {
  const existing = await db.accounts.count();
  if (existing > 0) {
    log.debug({ existing }, "Accounts present, skipping sample data");
    return 0;
  }
  for (const draft of SAMPLE_ACCOUNTS) {
    await db.accounts.insert(draft);
  }
  log.info({ created: SAMPLE_ACCOUNTS.length }, "Seeded sample accounts");
  return SAMPLE_ACCOUNTS.length;
}
