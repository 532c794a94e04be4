/**
 * Storage for the run journal. Implementations speak raw SQL with `?`
 * placeholders; there is no ORM.
 */

/** A bindable statement parameter. */
export type SqlValue = string | number | null;

export type Row = Record<string, unknown>;

export type SqlDialect = "sqlite" | "postgres";

export interface DatabaseBackend {
  readonly dialect: SqlDialect;

  /** Where the journal lives, for log lines. Never includes credentials. */
  readonly target: string;

  /** Apply the journal schema. Safe to call on an existing journal. */
  initialize(): Promise<void>;

  /** Execute a write statement (INSERT, UPDATE, DELETE). */
  execute(sql: string, params?: SqlValue[]): Promise<void>;

  /** Run a SELECT and return all matching rows. */
  query<T = Row>(sql: string, params?: SqlValue[]): Promise<T[]>;

  /** Run a SELECT and return the first row, or null. */
  queryOne<T = Row>(sql: string, params?: SqlValue[]): Promise<T | null>;

  /**
   * Execute `fn` inside a transaction. Nested calls join the outer
   * transaction through a savepoint, so an inner failure only rolls back
   * the inner work.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>;

  close(): Promise<void>;
}
