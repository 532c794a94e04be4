/**
 * File transform unit – the per-object state machine.
 *
 *   fetched → decoded → validated → archived → source_deleted_archive
 *     → reshaped → wide_uploaded → source_deleted → done
 *
 * Any failure ends the unit with status "failed"; the source key is recorded
 * in the failure ledger exactly once and the scratch directory is removed on
 * every exit path. Journal, ledger and cleanup errors are logged, never
 * thrown: `process` always resolves to an outcome.
 */
import { randomUUID } from "node:crypto";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { gunzipSync, strFromU8 } from "fflate";
import type { Logger } from "pino";
import type { StorageBackend } from "../storage/backend.js";
import { silentLogger } from "../logger.js";
import {
  EmptyInputError,
  ObjectNotFoundError,
  errorMessage,
} from "./exceptions.js";
import type { Journal } from "./journal.js";
import { isCompressed, parseObjectKey, targetKey, type ObjectKey } from "./keys.js";
import type { FailureLedger } from "./ledger.js";
import {
  DEFAULT_COLUMNS,
  isWide,
  parseTable,
  pivotWide,
  reshapeToWide,
  toCsv,
  toLongRows,
  type ColumnNames,
  type LongRow,
  type Table,
} from "./reshape.js";
import {
  uploadWithRetry,
  type RetryPolicy,
  type Sleep,
  type TransferResult,
} from "./transfer.js";
import type {
  ProcessOptions,
  TransformOutcome,
  TransformState,
} from "./types.js";

export interface FileTransformerOptions {
  storage: StorageBackend;
  ledger: FailureLedger;
  /** Local directory for per-task scratch artifacts. */
  scratchDir: string;
  transfer?: Partial<RetryPolicy>;
  columns?: ColumnNames;
  /**
   * Only delete the source after the archive upload is confirmed. When
   * false, the source is deleted as soon as the archive upload was attempted
   * and processing continues; the file is still reported as failed.
   */
  requireConfirmedArchive?: boolean;
  journal?: Journal;
  logger?: Logger;
  sleep?: Sleep;
}

interface Fetched {
  data: Uint8Array;
  resumedFromArchive: boolean;
}

/** Mutable progress of one execution, read back when building the outcome. */
interface TaskState {
  state: TransformState;
  resumedFromArchive: boolean;
  /** The transfer primitive already wrote the ledger entry. */
  recorded: boolean;
  attemptId: string | null;
}

export class FileTransformer {
  private storage: StorageBackend;
  private ledger: FailureLedger;
  private scratchDir: string;
  private transferPolicy: Partial<RetryPolicy>;
  private columns: ColumnNames;
  private requireConfirmedArchive: boolean;
  private journal: Journal | null;
  private log: Logger;
  private sleep: Sleep | undefined;

  constructor(opts: FileTransformerOptions) {
    this.storage = opts.storage;
    this.ledger = opts.ledger;
    this.scratchDir = opts.scratchDir;
    this.transferPolicy = opts.transfer ?? {};
    this.columns = opts.columns ?? DEFAULT_COLUMNS;
    this.requireConfirmedArchive = opts.requireConfirmedArchive ?? true;
    this.journal = opts.journal ?? null;
    this.log = opts.logger ?? silentLogger();
    this.sleep = opts.sleep;
  }

  async process(
    rawKey: string,
    options: ProcessOptions = {},
  ): Promise<TransformOutcome> {
    const recordFailures = options.recordFailures ?? true;
    const task: TaskState = {
      state: "pending",
      resumedFromArchive: false,
      recorded: false,
      attemptId: null,
    };
    const taskDir = join(this.scratchDir, `task-${randomUUID()}`);

    try {
      const key = parseObjectKey(rawKey);
      const runId = options.runId;
      if (runId) {
        task.attemptId = await this.journalSafely(rawKey, "startAttempt", (journal) =>
          journal.startAttempt(runId, rawKey, key, options.phase ?? "batch"),
        );
      }
      await mkdir(taskDir, { recursive: true });
      await this.run(rawKey, key, taskDir, task, recordFailures);

      const attemptId = task.attemptId;
      if (attemptId) {
        await this.journalSafely(rawKey, "completeAttempt", (journal) =>
          journal.completeAttempt(attemptId),
        );
      }
      this.log.info({ key: rawKey }, "archived, reshaped and published");
      return {
        key: rawKey,
        status: "done",
        state: task.state,
        resumedFromArchive: task.resumedFromArchive,
      };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.log.error(
        { key: rawKey, state: task.state, err: errorMessage(err), errorName: error.name },
        "transform failed",
      );
      if (recordFailures && !task.recorded) {
        await this.recordFailure(rawKey);
      }
      const attemptId = task.attemptId;
      if (attemptId) {
        await this.journalSafely(rawKey, "failAttempt", (journal) =>
          journal.failAttempt(attemptId, error),
        );
      }
      return {
        key: rawKey,
        status: "failed",
        state: task.state,
        resumedFromArchive: task.resumedFromArchive,
        error,
      };
    } finally {
      await rm(taskDir, { recursive: true, force: true }).catch((err: unknown) => {
        this.log.warn({ key: rawKey, taskDir, err: errorMessage(err) }, "scratch cleanup failed");
      });
    }
  }

  /**
   * Run one journal write. The journal is bookkeeping: when it cannot be
   * written the unit carries on and the error is logged.
   */
  private async journalSafely<T>(
    rawKey: string,
    action: string,
    write: (journal: Journal) => Promise<T>,
  ): Promise<T | null> {
    if (!this.journal) return null;
    try {
      return await write(this.journal);
    } catch (err) {
      this.log.warn({ key: rawKey, action, err: errorMessage(err) }, "journal write failed");
      return null;
    }
  }

  /**
   * The ledger append on the failure path. A ledger that cannot be written
   * is logged; the unit still reports its own failure.
   */
  private async recordFailure(rawKey: string): Promise<void> {
    try {
      await this.ledger.record(rawKey);
    } catch (err) {
      this.log.error({ key: rawKey, err: errorMessage(err) }, "failure ledger write failed");
    }
  }

  // ------------------------------------------------------------------
  // Steps
  // ------------------------------------------------------------------

  private async run(
    rawKey: string,
    key: ObjectKey,
    taskDir: string,
    task: TaskState,
    recordFailures: boolean,
  ): Promise<void> {
    const archiveKey = targetKey(key, "archive");
    const wideKey = targetKey(key, "wide");
    const advance = async (next: TransformState): Promise<void> => {
      task.state = next;
      const attemptId = task.attemptId;
      if (attemptId) {
        await this.journalSafely(rawKey, "advance", (journal) =>
          journal.advance(attemptId, next),
        );
      }
    };

    // 1. Fetch
    this.log.info({ key: rawKey }, "processing");
    const fetched = await this.fetch(rawKey, archiveKey);
    task.resumedFromArchive = fetched.resumedFromArchive;
    await writeFile(join(taskDir, "raw"), fetched.data);
    await advance("fetched");

    // 2. Decode
    const decoded =
      !fetched.resumedFromArchive && isCompressed(key.filename)
        ? gunzipSync(fetched.data)
        : fetched.data;
    const decodedPath = join(taskDir, "decoded.csv");
    await writeFile(decodedPath, decoded);
    await advance("decoded");

    // 3. Validate
    const table = parseTable(strFromU8(decoded));
    if (table.rows.length === 0) throw new EmptyInputError(rawKey);
    const longRows = isWide(table, this.columns)
      ? null
      : toLongRows(table, this.columns);
    await advance("validated");

    // 4–5. Archive, then drop the source
    let deferred: Error | null = null;
    if (fetched.resumedFromArchive) {
      this.log.info({ key: rawKey, archiveKey }, "source gone, resuming from archive copy");
    } else {
      const archived = await this.upload(decodedPath, archiveKey, rawKey, recordFailures);
      if (archived.ok) {
        await advance("archived");
      } else {
        task.recorded = recordFailures;
        if (this.requireConfirmedArchive) throw archived.error;
        deferred = archived.error;
      }
      await this.storage.delete(rawKey);
      this.log.info({ key: rawKey }, "deleted source");
      await advance("source_deleted_archive");
    }

    // 6. Reshape
    const wide = this.reshape(table, longRows, key.locationId);
    const widePath = join(taskDir, "wide.csv");
    await writeFile(widePath, toCsv(wide), "utf8");
    await advance("reshaped");

    // 7. Publish
    const published = await this.upload(
      widePath,
      wideKey,
      rawKey,
      recordFailures && !task.recorded,
    );
    if (!published.ok) {
      task.recorded = task.recorded || recordFailures;
      throw published.error;
    }
    await advance("wide_uploaded");

    // 8. Final delete, a no-op when the source is already gone
    await this.storage.delete(rawKey);
    await advance("source_deleted");

    if (deferred) throw deferred;
    await advance("done");
  }

  private async fetch(rawKey: string, archiveKey: string): Promise<Fetched> {
    try {
      return { data: await this.storage.read(rawKey), resumedFromArchive: false };
    } catch (err) {
      if (!(err instanceof ObjectNotFoundError)) throw err;
      if (!(await this.storage.exists(archiveKey))) throw err;
      return { data: await this.storage.read(archiveKey), resumedFromArchive: true };
    }
  }

  private reshape(table: Table, longRows: LongRow[] | null, sensor: string): Table {
    return longRows
      ? pivotWide(longRows, sensor, this.columns)
      : reshapeToWide(table, sensor, this.columns);
  }

  private upload(
    localPath: string,
    remoteKey: string,
    sourceKey: string,
    record: boolean,
  ): Promise<TransferResult> {
    return uploadWithRetry(this.storage, localPath, remoteKey, {
      policy: this.transferPolicy,
      ledger: record ? this.ledger : undefined,
      ledgerKey: sourceKey,
      logger: this.log,
      sleep: this.sleep,
    });
  }
}
