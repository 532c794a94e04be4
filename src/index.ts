/**
 * sensorshift – reshape long-format sensor CSV objects to wide format,
 * archive and republish them, and re-drive whatever failed.
 */
import type { Logger } from "pino";

import { parseConfig, type PipelineSettings } from "./config.js";
import { WorkEnumerator } from "./core/enumerator.js";
import { Journal } from "./core/journal.js";
import { FileFailureLedger, type FailureLedger } from "./core/ledger.js";
import { BatchOrchestrator } from "./core/orchestrator.js";
import { RetryDriver } from "./core/retry.js";
import type { Sleep } from "./core/transfer.js";
import { FileTransformer } from "./core/transform.js";
import type { RunResult, TransformOutcome } from "./core/types.js";
import type { DatabaseBackend } from "./db/backend.js";
import { createLogger } from "./logger.js";
import type { StorageBackend } from "./storage/backend.js";

export { ConfigSchema, parseConfig, loadConfigFile } from "./config.js";
export type { Config, ConfigInput, PipelineSettings } from "./config.js";
export * from "./core/exceptions.js";
export * from "./core/keys.js";
export type * from "./core/types.js";
export { FileFailureLedger, MemoryFailureLedger } from "./core/ledger.js";
export type { FailureLedger } from "./core/ledger.js";
export { uploadWithRetry } from "./core/transfer.js";
export { reshapeToWide, parseTable, toCsv } from "./core/reshape.js";
export { DiskStorage } from "./storage/disk.js";
export { S3Storage } from "./storage/s3.js";
export type { StorageBackend } from "./storage/backend.js";

export interface SensorShiftOptions {
  storage: StorageBackend;
  db: DatabaseBackend;
  settings: PipelineSettings;
  /** Defaults to a file ledger at `settings.ledgerPath`. */
  ledger?: FailureLedger;
  logger?: Logger;
  /** Replaces the real timer for transfer and retry delays. */
  sleep?: Sleep;
}

export interface RunOptions {
  /** Skip the main batch and only drain the failure ledger. */
  retryOnly?: boolean;
}

export class SensorShift {
  private storage: StorageBackend;
  private db: DatabaseBackend;
  private settings: PipelineSettings;
  private ledger: FailureLedger;
  private journal: Journal;
  private transformer: FileTransformer;
  private orchestrator: BatchOrchestrator;
  private retryDriver: RetryDriver;
  private log: Logger;

  constructor(opts: SensorShiftOptions) {
    this.storage = opts.storage;
    this.db = opts.db;
    this.settings = opts.settings;
    this.ledger = opts.ledger ?? new FileFailureLedger(opts.settings.ledgerPath);
    this.log = opts.logger ?? createLogger();
    this.journal = new Journal(this.db);

    this.transformer = new FileTransformer({
      storage: this.storage,
      ledger: this.ledger,
      scratchDir: this.settings.scratchDir,
      transfer: this.settings.transfer,
      columns: this.settings.columns,
      requireConfirmedArchive: this.settings.requireConfirmedArchive,
      journal: this.journal,
      logger: this.log,
      sleep: opts.sleep,
    });
    this.orchestrator = new BatchOrchestrator({
      enumerator: new WorkEnumerator(this.storage, this.settings.fileSuffixes),
      transformer: this.transformer,
      concurrency: this.settings.concurrency,
      logger: this.log,
    });
    this.retryDriver = new RetryDriver({
      ledger: this.ledger,
      transformer: this.transformer,
      passes: this.settings.retry.passes,
      attempts: this.settings.retry.attempts,
      delayMs: this.settings.retry.delayMs,
      logger: this.log,
      sleep: opts.sleep,
    });
  }

  /** Construct from a configuration object (validated with zod). */
  static async fromConfig(
    config: unknown,
    overrides: Pick<SensorShiftOptions, "ledger" | "logger" | "sleep"> = {},
  ): Promise<SensorShift> {
    const { storage, db, settings, logLevel } = parseConfig(config);
    const shift = new SensorShift({
      storage,
      db,
      settings,
      ledger: overrides.ledger,
      logger: overrides.logger ?? createLogger(logLevel),
      sleep: overrides.sleep,
    });
    await shift.initialize();
    return shift;
  }

  /** Initialise the journal database (create tables). */
  async initialize(): Promise<void> {
    await this.db.initialize();
    this.log.debug({ dialect: this.db.dialect, target: this.db.target }, "journal ready");
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  /**
   * Process every configured location, then drain the failure ledger.
   * Residual failures stay in the ledger; they do not make the run throw.
   */
  async run(options: RunOptions = {}): Promise<RunResult> {
    const runId = await this.journal.startRun();
    this.log.info({ runId, retryOnly: options.retryOnly ?? false }, "run started");

    const batch = options.retryOnly
      ? null
      : await this.orchestrator.run(this.settings.locations, runId);
    const retry = await this.retryDriver.drain(runId);

    await this.journal.finishRun(runId, {
      processed: batch?.processed ?? 0,
      failed: batch?.failed ?? 0,
      recovered: retry.recovered.length,
      residual: retry.residual.length,
    });
    this.log.info(
      {
        runId,
        processed: batch?.processed ?? 0,
        recovered: retry.recovered.length,
        residual: retry.residual.length,
      },
      "run finished",
    );

    return { runId, batch, retry, residualFailures: retry.residual };
  }

  /** Run the transform unit on a single source key. */
  async processFile(key: string): Promise<TransformOutcome> {
    return this.transformer.process(key);
  }

  async close(): Promise<void> {
    await this.db.close();
  }

  // Expose for tests
  get _journal(): Journal {
    return this.journal;
  }
  get _ledger(): FailureLedger {
    return this.ledger;
  }
  get _storage(): StorageBackend {
    return this.storage;
  }
}
