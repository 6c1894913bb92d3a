export { createDb, createContext } from "./db";
export type { Db, DbContext, Queryable } from "./db";
export { createAccountsRepo, mapAccountRow } from "./repos/accounts";
export type { AccountRow, AccountsRepo } from "./repos/accounts";
export { createTransactionsRepo, mapTransactionRow } from "./repos/transactions";
export type { TransactionRow, TransactionsRepo } from "./repos/transactions";
export { applyMigrations, listMigrationFiles, MIGRATIONS_DIR } from "./migrate";
export { seedSampleAccounts, SAMPLE_ACCOUNTS } from "./seed";
export { createInMemoryDb } from "./memory";
