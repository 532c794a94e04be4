/**
 * Retry driver – re-drives the keys left in the failure ledger after the
 * main batch, then compacts the ledger to what still failed.
 */
import type { Logger } from "pino";
import { silentLogger } from "../logger.js";
import { errorMessage } from "./exceptions.js";
import { parseObjectKey, type ObjectKey } from "./keys.js";
import type { FailureLedger } from "./ledger.js";
import { defaultSleep, type Sleep } from "./transfer.js";
import type { FileTransformer } from "./transform.js";
import type { RetrySummary } from "./types.js";

export interface RetryDriverOptions {
  ledger: FailureLedger;
  transformer: FileTransformer;
  /** Outer passes over the ledger. */
  passes?: number;
  /** Attempts per key within one pass. */
  attempts?: number;
  /** Fixed wait between attempts on the same key. */
  delayMs?: number;
  logger?: Logger;
  sleep?: Sleep;
}

export interface PassResult {
  recovered: string[];
  residual: string[];
}

export const DEFAULT_RETRY_PASSES = 5;
export const DEFAULT_RETRY_ATTEMPTS = 5;
export const DEFAULT_RETRY_DELAY_MS = 20_000;

function unique(keys: string[]): string[] {
  return [...new Set(keys)];
}

export class RetryDriver {
  private ledger: FailureLedger;
  private transformer: FileTransformer;
  private passes: number;
  private attempts: number;
  private delayMs: number;
  private log: Logger;
  private sleep: Sleep;

  constructor(opts: RetryDriverOptions) {
    this.ledger = opts.ledger;
    this.transformer = opts.transformer;
    this.passes = opts.passes ?? DEFAULT_RETRY_PASSES;
    this.attempts = Math.max(1, opts.attempts ?? DEFAULT_RETRY_ATTEMPTS);
    this.delayMs = opts.delayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.log = opts.logger ?? silentLogger();
    this.sleep = opts.sleep ?? defaultSleep;
  }

  /** Run passes until the ledger is empty or the pass budget is spent. */
  async drain(runId?: string): Promise<RetrySummary> {
    const recovered: string[] = [];
    let passes = 0;

    while (passes < this.passes) {
      const pending = await this.ledger.readAll();
      if (pending.length === 0) break;
      passes++;
      this.log.info({ pass: passes, pending: pending.length }, "retry pass");
      const result = await this.retryPass(runId);
      recovered.push(...result.recovered);
    }

    const residual = await this.ledger.readAll();
    if (residual.length === 0) {
      this.log.info({ passes, recovered: recovered.length }, "all files have been processed");
    } else {
      this.log.warn(
        { passes, recovered: recovered.length, residual: residual.length },
        "retry budget exhausted, failures left in ledger",
      );
    }
    return { passes, recovered, residual };
  }

  /** One pass: retry every ledger key, then rewrite the ledger with the residue. */
  async retryPass(runId?: string): Promise<PassResult> {
    const keys = unique(await this.ledger.readAll());
    const recovered: string[] = [];
    const residual: string[] = [];

    for (const key of keys) {
      if (await this.retryKey(key, runId)) recovered.push(key);
      else residual.push(key);
    }

    await this.ledger.rewrite(residual);
    return { recovered, residual };
  }

  private async retryKey(key: string, runId?: string): Promise<boolean> {
    let context: ObjectKey;
    try {
      context = parseObjectKey(key);
    } catch (err) {
      this.log.error({ key, err: errorMessage(err) }, "cannot retry unparseable key");
      return false;
    }

    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      const outcome = await this.transformer.process(key, {
        phase: "retry",
        runId,
        recordFailures: false,
      });
      if (outcome.status === "done") {
        this.log.info({ key, ...context, attempt }, "retry succeeded");
        return true;
      }
      this.log.warn(
        { key, attempt, attempts: this.attempts, err: outcome.error?.message },
        "retry attempt failed",
      );
      if (attempt < this.attempts) await this.sleep(this.delayMs);
    }
    return false;
  }
}
