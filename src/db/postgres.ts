/**
 * PostgreSQL journal backend using postgres-js.
 *
 * Statements use `?` placeholders like the SQLite backend; they are rewritten
 * to `$1..$n` before execution. A single connection keeps BEGIN/COMMIT on
 * the same session as the statements between them.
 */
import postgres from "postgres";
import type { DatabaseBackend, Row, SqlDialect, SqlValue } from "./backend.js";
import { SCHEMA_STATEMENTS } from "./schema.js";

/** Rewrite `?` placeholders to positional `$n` ones. */
export function toPositional(sql: string): string {
  let n = 0;
  return sql.replace(/\?/g, () => `$${++n}`);
}

/** Host and database of a connection string, without the credentials. */
export function redactConnectionString(connectionString: string): string {
  try {
    const url = new URL(connectionString);
    return `${url.protocol}//${url.host}${url.pathname}`;
  } catch {
    return "postgres";
  }
}

export class PostgresBackend implements DatabaseBackend {
  readonly dialect: SqlDialect = "postgres";
  readonly target: string;
  private sql: postgres.Sql;
  private depth = 0;

  constructor(connectionString: string) {
    this.target = redactConnectionString(connectionString);
    this.sql = postgres(connectionString, { max: 1, onnotice: () => {} });
  }

  async initialize(): Promise<void> {
    await this.transaction(async () => {
      for (const statement of SCHEMA_STATEMENTS) await this.sql.unsafe(statement);
    });
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<void> {
    await this.sql.unsafe(toPositional(sql), params);
  }

  async query<T = Row>(sql: string, params: SqlValue[] = []): Promise<T[]> {
    const rows = await this.sql.unsafe(toPositional(sql), params);
    return rows as unknown as T[];
  }

  async queryOne<T = Row>(sql: string, params: SqlValue[] = []): Promise<T | null> {
    const rows = await this.query<T>(sql, params);
    return rows[0] ?? null;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const savepoint = `sp_${this.depth}`;
    await this.sql.unsafe(this.depth === 0 ? "BEGIN" : `SAVEPOINT ${savepoint}`);
    this.depth++;
    try {
      const result = await fn();
      this.depth--;
      await this.sql.unsafe(this.depth === 0 ? "COMMIT" : `RELEASE SAVEPOINT ${savepoint}`);
      return result;
    } catch (err) {
      this.depth--;
      await this.sql.unsafe(
        this.depth === 0 ? "ROLLBACK" : `ROLLBACK TO SAVEPOINT ${savepoint}`,
      );
      throw err;
    }
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}
