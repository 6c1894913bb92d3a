import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { createLogger } from "@banking-agent/shared";

import type { Db } from "./db";

const log = createLogger({ component: "migrate" });

export const MIGRATIONS_DIR = fileURLToPath(new URL("../migrations", import.meta.url));

export function listMigrationFiles(dir: string = MIGRATIONS_DIR): string[] {
  return readdirSync(dir)
    .filter((f) => f.endsWith(".sql"))
    .sort();
}

/**
 * Apply every `*.sql` file in `dir` that has not been applied yet, in
 * filename order, each inside its own transaction.
 */
export async function applyMigrations(db: Db, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  await db.query(
    `create table if not exists schema_migrations (
       filename text primary key,
       applied_at timestamptz not null default now()
     )`,
  );
  const appliedRes = await db.query<{ filename: string }>("select filename from schema_migrations");
  const applied = new Set(appliedRes.rows.map((r) => r.filename));

  const newlyApplied: string[] = [];
  for (const file of listMigrationFiles(dir)) {
    if (applied.has(file)) continue;
    const sql = readFileSync(join(dir, file), "utf8");
    await db.tx(async (tx) => {
      await tx.query(sql);
      await tx.query("insert into schema_migrations (filename) values ($1)", [file]);
    });
    newlyApplied.push(file);
    log.info({ file }, "Applied migration");
  }
  return newlyApplied;
}
