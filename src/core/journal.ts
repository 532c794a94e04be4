/**
 * Run journal – records each run and every per-file attempt, including the
 * state reached and the error class, which the failure ledger drops.
 */
import { randomUUID } from "node:crypto";
import type { DatabaseBackend } from "../db/backend.js";
import { errorMessage, errorName } from "./exceptions.js";
import type { ObjectKey } from "./keys.js";
import type { Phase, TransformState } from "./types.js";

export type RunStatus =
  | "running"
  | "completed"
  | "completed_with_failures"
  | "interrupted";

export interface RunRow {
  id: string;
  status: RunStatus;
  files_processed: number;
  files_failed: number;
  files_recovered: number;
  residual_failures: number;
  started_at: string;
  finished_at: string | null;
}

export interface FileAttemptRow {
  id: string;
  run_id: string;
  object_key: string;
  location: string;
  location_id: string;
  year: string;
  phase: Phase;
  state: TransformState;
  status: "running" | "completed" | "failed";
  error_name: string | null;
  error_message: string | null;
}

export interface RunCounts {
  processed: number;
  failed: number;
  recovered: number;
  residual: number;
}

export class Journal {
  constructor(private db: DatabaseBackend) {}

  /**
   * Open a new run. Runs still marked running belong to a process that
   * died; they are closed as interrupted along with their open attempts.
   * One pipeline process per journal.
   */
  async startRun(): Promise<string> {
    const id = randomUUID();
    const now = new Date().toISOString();
    await this.db.transaction(async () => {
      await this.db.execute(
        `UPDATE file_attempts SET status = ?, error_name = ?, error_message = ?, updated_at = ? WHERE status = ? AND run_id IN (SELECT id FROM runs WHERE status = ?)`,
        ["failed", "InterruptedRun", "run ended before the attempt finished", now, "running", "running"],
      );
      await this.db.execute(
        `UPDATE runs SET status = ?, finished_at = ? WHERE status = ?`,
        ["interrupted", now, "running"],
      );
      await this.db.execute(
        `INSERT INTO runs (id, status, started_at) VALUES (?, ?, ?)`,
        [id, "running", now],
      );
    });
    return id;
  }

  async finishRun(runId: string, counts: RunCounts): Promise<void> {
    const status: RunStatus =
      counts.residual === 0 ? "completed" : "completed_with_failures";
    await this.db.execute(
      `UPDATE runs SET status = ?, files_processed = ?, files_failed = ?, files_recovered = ?, residual_failures = ?, finished_at = ? WHERE id = ?`,
      [
        status,
        counts.processed,
        counts.failed,
        counts.recovered,
        counts.residual,
        new Date().toISOString(),
        runId,
      ],
    );
  }

  async startAttempt(
    runId: string,
    rawKey: string,
    key: ObjectKey,
    phase: Phase,
  ): Promise<string> {
    const id = randomUUID();
    const now = new Date().toISOString();
    await this.db.execute(
      `INSERT INTO file_attempts (id, run_id, object_key, location, location_id, year, phase, state, status, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [id, runId, rawKey, key.location, key.locationId, key.year, phase, "pending", "running", now, now],
    );
    return id;
  }

  async advance(attemptId: string, state: TransformState): Promise<void> {
    await this.db.execute(
      `UPDATE file_attempts SET state = ?, updated_at = ? WHERE id = ?`,
      [state, new Date().toISOString(), attemptId],
    );
  }

  async completeAttempt(attemptId: string): Promise<void> {
    await this.db.execute(
      `UPDATE file_attempts SET state = ?, status = ?, updated_at = ? WHERE id = ?`,
      ["done", "completed", new Date().toISOString(), attemptId],
    );
  }

  async failAttempt(attemptId: string, err: unknown): Promise<void> {
    await this.db.execute(
      `UPDATE file_attempts SET status = ?, error_name = ?, error_message = ?, updated_at = ? WHERE id = ?`,
      ["failed", errorName(err), errorMessage(err), new Date().toISOString(), attemptId],
    );
  }

  async getRun(runId: string): Promise<RunRow | null> {
    return this.db.queryOne<RunRow>(`SELECT * FROM runs WHERE id = ?`, [runId]);
  }

  async attempts(runId: string): Promise<FileAttemptRow[]> {
    return this.db.query<FileAttemptRow>(
      `SELECT * FROM file_attempts WHERE run_id = ? ORDER BY created_at, object_key`,
      [runId],
    );
  }
}
