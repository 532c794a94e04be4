/**
 * SQLite journal backend on better-sqlite3.
 */
import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import Database from "better-sqlite3";
import type { DatabaseBackend, Row, SqlDialect, SqlValue } from "./backend.js";
import { SCHEMA_STATEMENTS } from "./schema.js";

const MEMORY = ":memory:";

export class SQLiteBackend implements DatabaseBackend {
  readonly dialect: SqlDialect = "sqlite";
  readonly target: string;
  private db: Database.Database;
  private depth = 0;

  constructor(path: string = MEMORY) {
    if (path === MEMORY) {
      this.target = MEMORY;
      this.db = new Database(MEMORY);
    } else {
      this.target = resolve(path);
      mkdirSync(dirname(this.target), { recursive: true });
      this.db = new Database(this.target);
      // Concurrent workers append attempts; WAL lets readers through.
      this.db.pragma("journal_mode = WAL");
      this.db.pragma("busy_timeout = 5000");
    }
    this.db.pragma("foreign_keys = ON");
  }

  async initialize(): Promise<void> {
    await this.transaction(async () => {
      for (const statement of SCHEMA_STATEMENTS) this.db.exec(statement);
    });
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<void> {
    this.db.prepare<SqlValue[]>(sql).run(...params);
  }

  async query<T = Row>(sql: string, params: SqlValue[] = []): Promise<T[]> {
    return this.db.prepare<SqlValue[], T>(sql).all(...params);
  }

  async queryOne<T = Row>(sql: string, params: SqlValue[] = []): Promise<T | null> {
    return this.db.prepare<SqlValue[], T>(sql).get(...params) ?? null;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const savepoint = `sp_${this.depth}`;
    this.db.exec(this.depth === 0 ? "BEGIN" : `SAVEPOINT ${savepoint}`);
    this.depth++;
    try {
      const result = await fn();
      this.depth--;
      this.db.exec(this.depth === 0 ? "COMMIT" : `RELEASE ${savepoint}`);
      return result;
    } catch (err) {
      this.depth--;
      this.db.exec(
        this.depth === 0 ? "ROLLBACK" : `ROLLBACK TO ${savepoint}; RELEASE ${savepoint}`,
      );
      throw err;
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
