import fs from 'node:fs';
import path from 'node:path';
import { Pool, type QueryResultRow } from 'pg';
import initSqlJs, { type Database, type SqlValue } from 'sql.js';
import { createLogger, nowIso } from '@social-publisher/shared';
import { getParamPlaceholder } from '../utils/db';
import { migrationPlan, type SqlDialect } from './schema';

const logger = createLogger('db');

export interface DatabaseClient {
  dialect: SqlDialect;
  /** Runs a statement and resolves with the number of rows it changed. */
  execute: (sql: string, params?: unknown[]) => Promise<number>;
  query: <T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]) => Promise<T[]>;
  healthCheck: () => Promise<boolean>;
  close: () => Promise<void>;
}

export function detectDialect(databaseUrl: string): SqlDialect {
  return /^postgres(ql)?:\/\//.test(databaseUrl) ? 'postgres' : 'sqlite';
}

// `file:./data/dev.db` -> absolute path (directory created); `:memory:` stays in memory
function resolveSqliteFile(databaseUrl: string): string | null {
  const raw = databaseUrl.replace(/^file:/, '');
  if (!raw || raw === ':memory:') return null;

  const absolutePath = path.resolve(process.cwd(), raw);
  fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
  return absolutePath;
}

function toSqlValue(value: unknown): SqlValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || value instanceof Uint8Array) return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'bigint') return Number(value);
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value);
}

async function openSqlite(databaseUrl: string): Promise<DatabaseClient> {
  const file = resolveSqliteFile(databaseUrl);
  const SQL = await initSqlJs();
  const db: Database = new SQL.Database(file && fs.existsSync(file) ? fs.readFileSync(file) : undefined);

  // export() reopens the connection, which resets per-connection pragmas
  const applyPragmas = () => db.run('PRAGMA foreign_keys = ON;');
  applyPragmas();

  const persist = () => {
    if (!file) return;
    fs.writeFileSync(file, db.export());
    applyPragmas();
  };

  const all = <T extends QueryResultRow>(sql: string, params: unknown[]): T[] => {
    const statement = db.prepare(sql);
    try {
      statement.bind(params.map(toSqlValue));
      const rows: T[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject() as T);
      }
      return rows;
    } finally {
      statement.free();
    }
  };

  return {
    dialect: 'sqlite',
    execute: async (sql, params = []) => {
      if (params.length) {
        db.run(sql, params.map(toSqlValue));
      } else {
        db.exec(sql);
      }
      const changed = db.getRowsModified();
      persist();
      return changed;
    },
    query: async <T extends QueryResultRow = QueryResultRow>(sql: string, params: unknown[] = []) => all<T>(sql, params),
    healthCheck: async () => {
      try {
        all('SELECT 1 AS ok', []);
        return true;
      } catch {
        return false;
      }
    },
    close: async () => {
      persist();
      db.close();
    },
  };
}

function openPostgres(databaseUrl: string): DatabaseClient {
  const pool = new Pool({ connectionString: databaseUrl });
  pool.on('error', (error) => {
    logger.error('idle postgres client failed', error);
  });

  return {
    dialect: 'postgres',
    execute: async (sql, params = []) => {
      const result = await pool.query(sql, params);
      return result.rowCount ?? 0;
    },
    query: async <T extends QueryResultRow = QueryResultRow>(sql: string, params: unknown[] = []) => {
      const result = await pool.query<T>(sql, params);
      return result.rows;
    },
    healthCheck: () =>
      pool.query('SELECT 1 AS ok').then(
        () => true,
        () => false,
      ),
    close: () => pool.end(),
  };
}

interface AppliedMigrationRow {
  id: string;
}

/**
 * Applies every step of the migration plan that is not yet recorded in
 * `schema_migrations`, in plan order.
 */
export async function runMigrations(client: DatabaseClient): Promise<string[]> {
  await client.execute(
    'CREATE TABLE IF NOT EXISTS schema_migrations (id TEXT PRIMARY KEY, applied_at TEXT NOT NULL)',
  );
  const rows = await client.query<AppliedMigrationRow>('SELECT id FROM schema_migrations');
  const applied = new Set(rows.map((row) => row.id));

  const p = (index: number) => getParamPlaceholder(client.dialect, index);
  const newlyApplied: string[] = [];
  for (const step of migrationPlan) {
    if (applied.has(step.id)) continue;

    await client.execute(step.sql[client.dialect].trim());
    await client.execute(`INSERT INTO schema_migrations (id, applied_at) VALUES (${p(1)}, ${p(2)})`, [
      step.id,
      nowIso(),
    ]);
    logger.info(`applied migration ${step.id} (${step.description})`);
    newlyApplied.push(step.id);
  }
  return newlyApplied;
}

export async function createDatabaseClient(databaseUrl: string): Promise<DatabaseClient> {
  return detectDialect(databaseUrl) === 'postgres' ? openPostgres(databaseUrl) : openSqlite(databaseUrl);
}

export async function initDatabase(databaseUrl: string): Promise<DatabaseClient> {
  const client = await createDatabaseClient(databaseUrl);
  await runMigrations(client);
  return client;
}
