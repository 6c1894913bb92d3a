import { describe, expect, it, vi } from "vitest";
import type { Db, DbContext } from "./db";
import { applyMigrations, listMigrationFiles } from "./migrate";

describe("migrations", () => {
  it("lists the bundled SQL files in order", () => {
    expect(listMigrationFiles()).toEqual(["0001_accounts_transactions.sql"]);
  });

  it("applies only files not yet recorded", async () => {
    const txQuery = vi.fn().mockResolvedValue({ rows: [] });
    const query = vi.fn().mockImplementation((sql: string) => {
      if (sql.startsWith("select filename")) return Promise.resolve({ rows: [] });
      return Promise.resolve({ rows: [] });
    });
    const db = {
      query,
      tx: vi.fn(async (fn: (tx: DbContext) => Promise<unknown>) => fn({ query: txQuery } as unknown as DbContext)),
    } as unknown as Db;

    const applied = await applyMigrations(db);

    expect(applied).toEqual(["0001_accounts_transactions.sql"]);
    expect(txQuery).toHaveBeenCalledTimes(2);
    expect(txQuery.mock.calls[1]).toEqual([
      "insert into schema_migrations (filename) values ($1)",
      ["0001_accounts_transactions.sql"],
    ]);
  });

  it("skips files already applied", async () => {
    const query = vi.fn().mockImplementation((sql: string) => {
      if (sql.startsWith("select filename")) {
        return Promise.resolve({ rows: [{ filename: "0001_accounts_transactions.sql" }] });
      }
      return Promise.resolve({ rows: [] });
    });
    const tx = vi.fn();
    const db = { query, tx } as unknown as Db;

    await expect(applyMigrations(db)).resolves.toEqual([]);
    expect(tx).not.toHaveBeenCalled();
  });
});
