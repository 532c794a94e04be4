/**
 * Batch orchestrator – fans (location, year) work units out over one global
 * worker pool; files inside a unit run sequentially in listing order.
 */
import type { Logger } from "pino";
import { silentLogger } from "../logger.js";
import type { WorkEnumerator } from "./enumerator.js";
import { errorMessage } from "./exceptions.js";
import { runPool } from "./pool.js";
import type { FileTransformer } from "./transform.js";
import type {
  BatchSummary,
  LocationDescriptor,
  WorkUnit,
  WorkUnitSummary,
} from "./types.js";

export const DEFAULT_CONCURRENCY = 4;

export interface BatchOrchestratorOptions {
  enumerator: WorkEnumerator;
  transformer: FileTransformer;
  concurrency?: number;
  logger?: Logger;
}

export class BatchOrchestrator {
  private enumerator: WorkEnumerator;
  private transformer: FileTransformer;
  private concurrency: number;
  private log: Logger;

  constructor(opts: BatchOrchestratorOptions) {
    this.enumerator = opts.enumerator;
    this.transformer = opts.transformer;
    this.concurrency = opts.concurrency ?? DEFAULT_CONCURRENCY;
    this.log = opts.logger ?? silentLogger();
  }

  /** Enumerate every (location, year) pair across all descriptors. */
  async discover(
    locations: LocationDescriptor[],
  ): Promise<{ units: WorkUnit[]; errors: string[] }> {
    const units: WorkUnit[] = [];
    const errors: string[] = [];

    for (const { name, ids } of locations) {
      for (const locationId of ids) {
        try {
          const years = await this.enumerator.listYears(name, locationId);
          this.log.info({ location: name, locationId, years }, "discovered years");
          for (const year of years) units.push({ location: name, locationId, year });
        } catch (err) {
          const message = `${name}/${locationId}: ${errorMessage(err)}`;
          this.log.error({ location: name, locationId, err: errorMessage(err) }, "year listing failed");
          errors.push(message);
        }
      }
    }

    return { units, errors };
  }

  async run(
    locations: LocationDescriptor[],
    runId?: string,
  ): Promise<BatchSummary> {
    const { units, errors } = await this.discover(locations);

    const summaries = await runPool(units, this.concurrency, (unit) =>
      this.processUnit(unit, runId),
    );
    for (const { unit, listingError } of summaries) {
      if (listingError) {
        errors.push(`${unit.location}/${unit.locationId}/${unit.year}: ${listingError}`);
      }
    }

    const summary: BatchSummary = {
      units: summaries,
      processed: summaries.reduce((s, u) => s + u.processed, 0),
      failed: summaries.reduce((s, u) => s + u.failed, 0),
      enumerationErrors: errors,
    };
    this.log.info(
      { units: units.length, processed: summary.processed, failed: summary.failed },
      "batch complete",
    );
    return summary;
  }

  /** Process every file of one partition, one after the other. */
  async processUnit(unit: WorkUnit, runId?: string): Promise<WorkUnitSummary> {
    let files: string[];
    try {
      files = await this.enumerator.listFiles(unit.location, unit.locationId, unit.year);
    } catch (err) {
      this.log.error({ ...unit, err: errorMessage(err) }, "file listing failed");
      return { unit, processed: 0, failed: 0, listingError: errorMessage(err) };
    }

    let processed = 0;
    let failed = 0;

    for (const file of files) {
      const outcome = await this.transformer.process(file, { phase: "batch", runId });
      if (outcome.status === "done") processed++;
      else failed++;
    }

    this.log.info({ ...unit, files: files.length, processed, failed }, "partition complete");
    return { unit, processed, failed };
  }
}
