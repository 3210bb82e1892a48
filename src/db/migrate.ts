import fs from "node:fs";
import path from "node:path";
import type { Db } from "./connection";
import { getMigrationsDir } from "./paths";

const MIGRATION_NAME = /^\d{4}_.+\.sql$/;

function migrationNames(dir: string): string[] {
  return fs
    .readdirSync(dir)
    .filter((f) => MIGRATION_NAME.test(f))
    .sort();
}

// One row per applied file; the latest filename is the schema version.
function ensureLedger(db: Db) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      filename   TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL
    );
  `);
}

export function getCurrentVersion(db: Db): string | null {
  ensureLedger(db);
  const row = db.prepare("SELECT MAX(filename) AS filename FROM schema_version").get() as
    | { filename: string | null }
    | undefined;
  return row?.filename ?? null;
}

/**
 * Applies every `NNNN_*.sql` file after the current schema version, in
 * filename order, inside one transaction. Returns the names applied.
 */
export function runMigrations(db: Db, migrationsDir = getMigrationsDir()): string[] {
  if (!fs.existsSync(migrationsDir)) {
    throw new Error(`Migrations directory not found: ${migrationsDir}`);
  }

  const names = migrationNames(migrationsDir);
  if (names.length === 0) {
    throw new Error(`No migrations found in: ${migrationsDir}`);
  }

  const current = getCurrentVersion(db);
  if (current !== null && !names.includes(current)) {
    throw new Error(`Recorded schema version ${current} has no migration file`);
  }

  const pending = current === null ? names : names.filter((n) => n > current);
  const record = db.prepare("INSERT INTO schema_version (filename, applied_at) VALUES (?, ?)");

  db.transaction(() => {
    for (const name of pending) {
      db.exec(fs.readFileSync(path.join(migrationsDir, name), "utf8"));
      record.run(name, new Date().toISOString());
    }
  })();

  return pending;
}
