/**
 * Transfer primitive – upload a local artifact with bounded retry.
 */
import { readFile } from "node:fs/promises";
import { setTimeout as sleepMs } from "node:timers/promises";
import type { Logger } from "pino";
import type { StorageBackend } from "../storage/backend.js";
import {
  PermanentTransferError,
  TransientTransferError,
  errorMessage,
} from "./exceptions.js";
import type { FailureLedger } from "./ledger.js";

export type BackoffKind = "fixed" | "exponential";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  backoff: BackoffKind;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 2000,
  backoff: "fixed",
};

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = async (ms) => {
  await sleepMs(ms);
};

export interface UploadOptions {
  policy?: Partial<RetryPolicy>;
  /**
   * Where exhaustion is recorded, once per key. Omit to only report it in the
   * result.
   */
  ledger?: FailureLedger;
  /** Key written to the ledger on exhaustion; defaults to the remote key. */
  ledgerKey?: string;
  logger?: Logger;
  sleep?: Sleep;
}

export type TransferResult =
  | { ok: true; key: string; attempts: number }
  | { ok: false; key: string; attempts: number; error: PermanentTransferError };

/** Delay to wait after failed attempt number `attempt` (1-based). */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  if (policy.backoff === "exponential") {
    return policy.baseDelayMs * 2 ** (attempt - 1);
  }
  return policy.baseDelayMs;
}

export async function uploadWithRetry(
  storage: StorageBackend,
  localPath: string,
  remoteKey: string,
  options: UploadOptions = {},
): Promise<TransferResult> {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const sleep = options.sleep ?? defaultSleep;
  const log = options.logger;

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const data = await readFile(localPath);
      await storage.write(remoteKey, new Uint8Array(data));
      log?.info({ key: remoteKey, attempt }, "uploaded");
      return { ok: true, key: remoteKey, attempts: attempt };
    } catch (err) {
      lastError = err;
      const transient = new TransientTransferError(remoteKey, attempt, errorMessage(err));
      if (attempt < maxAttempts) {
        const delay = backoffDelay(policy, attempt);
        log?.warn(
          { key: remoteKey, attempt, maxAttempts, delayMs: delay, err: transient.message },
          "upload failed, retrying",
        );
        await sleep(delay);
      } else {
        log?.error({ key: remoteKey, attempt, err: transient.message }, "upload failed");
      }
    }
  }

  const error = new PermanentTransferError(remoteKey, maxAttempts, errorMessage(lastError));
  if (options.ledger) {
    await options.ledger.record(options.ledgerKey ?? remoteKey);
  }
  return { ok: false, key: remoteKey, attempts: maxAttempts, error };
}
