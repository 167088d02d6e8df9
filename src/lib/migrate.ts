import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import fs from 'fs-extra';
import { sql } from 'drizzle-orm';
import type { Database } from './db';
import { kbMigrations } from '../schema';

const STATEMENT_BREAKPOINT = '--> statement-breakpoint';

export const DEFAULT_MIGRATIONS_DIR = fileURLToPath(new URL('../../migrations', import.meta.url));

export type MigrationFile = {
  name: string;
  statements: string[];
};

export function splitStatements(contents: string): string[] {
  return contents
    .split(STATEMENT_BREAKPOINT)
    .map((statement) => statement.trim())
    .filter(Boolean);
}

export async function loadMigrations(directory: string = DEFAULT_MIGRATIONS_DIR): Promise<MigrationFile[]> {
  if (!(await fs.pathExists(directory))) {
    throw new Error(`Migrations directory not found: ${directory}`);
  }

  const names = (await fs.readdir(directory)).filter((name) => name.endsWith('.sql')).sort();
  const migrations: MigrationFile[] = [];
  for (const name of names) {
    const contents = await fs.readFile(join(directory, name), 'utf8');
    migrations.push({ name, statements: splitStatements(contents) });
  }
  return migrations;
}

/**
 * Applies pending migrations in name order, one transaction per file.
 * Returns the names of the migrations applied by this call.
 */
export async function runMigrations(
  db: Database,
  directory: string = DEFAULT_MIGRATIONS_DIR
): Promise<string[]> {
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS kb_migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const applied = new Set((await db.select().from(kbMigrations)).map((row) => row.name));
  const pending = (await loadMigrations(directory)).filter((migration) => !applied.has(migration.name));

  for (const migration of pending) {
    const startedMs = Date.now();
    await db.transaction(async (tx) => {
      for (const statement of migration.statements) {
        await tx.execute(sql.raw(statement));
      }
      await tx.insert(kbMigrations).values({ name: migration.name });
    });
    console.log(
      `[db][migrate] applied=${migration.name} statements=${migration.statements.length} durationMs=${Date.now() - startedMs}`
    );
  }

  return pending.map((migration) => migration.name);
}
