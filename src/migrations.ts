import fs from "fs";
import path from "path";
import type { Queryable, SessionManager } from "./db";
import { logInfo } from "./observability/logger";

export const DEFAULT_MIGRATIONS_DIR = path.join(process.cwd(), "migrations");

function listMigrationFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    return [];
  }
  return fs
    .readdirSync(dir)
    .filter((file) => file.endsWith(".sql"))
    .sort();
}

function stripSqlComments(sql: string): string {
  return sql.replace(/--.*$/gm, "").replace(/\/\*[\s\S]*?\*\//g, "");
}

// Migration files must not contain function bodies or quoted semicolons.
function splitSql(sql: string): string[] {
  return stripSqlComments(sql)
    .split(";")
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

// Shared by every worker on the database; held until the unit of work ends.
const MIGRATION_LOCK_KEY = 72410001;

async function lockMigrations(client: Queryable): Promise<void> {
  await client.query(`select pg_advisory_xact_lock(${MIGRATION_LOCK_KEY})`);
}

async function fetchAppliedMigrations(client: Queryable): Promise<Set<string>> {
  await client.query(
    `create table if not exists schema_migrations (
      id text primary key,
      applied_at timestamptz not null default now()
    )`
  );
  const res = await client.query<{ id: string }>("select id from schema_migrations");
  return new Set(res.rows.map((row) => row.id));
}

/**
 * Applies pending `*.sql` files in name order, each one in its own unit of work.
 *
 * Every unit of work holds the migration advisory lock and re-reads the applied set under it,
 * so a file another worker applied in the meantime is skipped.
 */
export async function runMigrations(
  sessions: SessionManager,
  dir: string = DEFAULT_MIGRATIONS_DIR
): Promise<string[]> {
  const applied: string[] = [];

  for (const file of await getPendingMigrations(sessions, dir)) {
    const statements = splitSql(fs.readFileSync(path.join(dir, file), "utf8"));
    const ran = await sessions.withUnitOfWork(async (client) => {
      await lockMigrations(client);
      const done = await fetchAppliedMigrations(client);
      if (done.has(file)) {
        return false;
      }
      for (const statement of statements) {
        await client.query(statement);
      }
      await client.query("insert into schema_migrations (id) values ($1)", [file]);
      return true;
    });
    if (ran) {
      applied.push(file);
      logInfo("migration_applied", { file });
    } else {
      logInfo("migration_already_applied", { file });
    }
  }

  return applied;
}

export async function getPendingMigrations(
  sessions: SessionManager,
  dir: string = DEFAULT_MIGRATIONS_DIR
): Promise<string[]> {
  const applied = await sessions.withUnitOfWork(async (client) => {
    await lockMigrations(client);
    return fetchAppliedMigrations(client);
  });
  return listMigrationFiles(dir).filter((file) => !applied.has(file));
}
