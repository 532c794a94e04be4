/**
 * Pipeline types shared across the transform unit, orchestrator and retry
 * driver.
 */
/** States of the per-file state machine, in order. */
export const TRANSFORM_STATES = [
  "pending",
  "fetched",
  "decoded",
  "validated",
  "archived",
  "source_deleted_archive",
  "reshaped",
  "wide_uploaded",
  "source_deleted",
  "done",
] as const;

export type TransformState = (typeof TRANSFORM_STATES)[number];

export type Phase = "batch" | "retry";

/** A configured sensor location: a name (e.g. a city) and its ids. */
export interface LocationDescriptor {
  name: string;
  ids: string[];
}

/** One (location, year) partition of files. */
export interface WorkUnit {
  location: string;
  locationId: string;
  year: string;
}

/** Result of running the transform unit on one key. */
export interface TransformOutcome {
  key: string;
  status: "done" | "failed";
  /** Last state reached before finishing or failing. */
  state: TransformState;
  /** The archive copy was used because the source was already gone. */
  resumedFromArchive: boolean;
  error?: Error;
}

export interface ProcessOptions {
  phase?: Phase;
  runId?: string;
  /** Append the key to the failure ledger on failure. Defaults to true. */
  recordFailures?: boolean;
}

export interface WorkUnitSummary {
  unit: WorkUnit;
  processed: number;
  failed: number;
  /** Set when the partition's files could not be listed. */
  listingError?: string;
}

export interface BatchSummary {
  units: WorkUnitSummary[];
  processed: number;
  failed: number;
  enumerationErrors: string[];
}

export interface RetrySummary {
  passes: number;
  recovered: string[];
  residual: string[];
}

/** Result returned from SensorShift.run(). */
export interface RunResult {
  runId: string;
  batch: BatchSummary | null;
  retry: RetrySummary;
  residualFailures: string[];
}
