import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

import type { ConnectionSource, Queryable } from "./queryable";
import { inTransaction } from "./queryable";

export interface MigrationFile {
  name: string;
  sql: string;
}

export const DEFAULT_MIGRATIONS_DIR = path.resolve(
  __dirname,
  "../../migrations"
);

const CREATE_MIGRATIONS_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS schema_migrations (
  name TEXT PRIMARY KEY,
  applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

const SELECT_APPLIED_SQL = `
SELECT name
FROM schema_migrations;
`;

const INSERT_APPLIED_SQL = `
INSERT INTO schema_migrations (name)
VALUES ($1);
`;

export async function discoverMigrations(
  migrationsDir: string
): Promise<MigrationFile[]> {
  const files = await readdir(migrationsDir);
  const sqlFiles = files.filter((name) => name.endsWith(".sql")).sort();

  const migrations: MigrationFile[] = [];

  for (const fileName of sqlFiles) {
    const sql = await readFile(path.join(migrationsDir, fileName), "utf8");
    migrations.push({ name: fileName, sql });
  }

  return migrations;
}

export async function getAppliedMigrationNames(
  runner: Queryable
): Promise<Set<string>> {
  const result = await runner.query(SELECT_APPLIED_SQL);
  const names = new Set<string>();

  for (const row of result.rows) {
    if (typeof row.name === "string") {
      names.add(row.name);
    }
  }

  return names;
}

export async function applyMigration(
  client: Queryable,
  migration: MigrationFile
): Promise<void> {
  await inTransaction(client, async () => {
    await client.query(migration.sql);
    await client.query(INSERT_APPLIED_SQL, [migration.name]);
  });
}

export async function runMigrations(
  pool: ConnectionSource,
  migrationsDir: string = DEFAULT_MIGRATIONS_DIR
): Promise<number> {
  const migrations = await discoverMigrations(migrationsDir);
  const client = await pool.connect();

  try {
    await client.query(CREATE_MIGRATIONS_TABLE_SQL);
    const appliedNames = await getAppliedMigrationNames(client);

    let appliedCount = 0;

    for (const migration of migrations) {
      if (appliedNames.has(migration.name)) {
        continue;
      }

      await applyMigration(client, migration);
      appliedCount += 1;
      appliedNames.add(migration.name);
    }

    return appliedCount;
  } finally {
    client.release();
  }
}
