import { Pool } from "pg";
import type { PoolClient, QueryResult, QueryResultRow } from "pg";

import { createAccountsRepo, type AccountsRepo } from "./repos/accounts";
import { createTransactionsRepo, type TransactionsRepo } from "./repos/transactions";

export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

export type DbContext = Queryable & {
  accounts: AccountsRepo;
  transactions: TransactionsRepo;
};

export interface Db extends DbContext {
  tx<T>(fn: (tx: DbContext) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export function createContext(db: Queryable): DbContext {
  return {
    query: db.query.bind(db),
    accounts: createAccountsRepo(db),
    transactions: createTransactionsRepo(db),
  };
}

function asQueryable(client: PoolClient): Queryable {
  return {
    query: client.query.bind(client),
  };
}

export function createDb(databaseUrl: string): Db {
  const pool = new Pool({ connectionString: databaseUrl });
  const base: Queryable = {
    query: pool.query.bind(pool),
  };

  const ctx = createContext(base);

  return {
    ...ctx,
    async tx<T>(fn: (tx: DbContext) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      try {
        await client.query("BEGIN");
        const txCtx = createContext(asQueryable(client));
        const result = await fn(txCtx);
        await client.query("COMMIT");
        return result;
      } catch (err) {
        try {
          await client.query("ROLLBACK");
        } catch {
          // the transaction error is rethrown below
        }
        throw err;
      } finally {
        client.release();
      }
    },
    async close(): Promise<void> {
      await pool.end();
    },
  };
}
