/**
 * Shared test fixtures: CSV builders, temp dirs, a fault-injecting store and
 * a pre-configured transformer.
 */
import { mkdtempSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { gzipSync, strToU8 } from "fflate";

import { FileTransformer, type FileTransformerOptions } from "../src/core/transform.js";
import { MemoryFailureLedger, type FailureLedger } from "../src/core/ledger.js";
import type { Sleep } from "../src/core/transfer.js";
import type { ListOptions, ObjectListing, StorageBackend } from "../src/storage/backend.js";
import { DiskStorage } from "../src/storage/disk.js";

// ---------------------------------------------------------------------------
// CSV fixtures
// ---------------------------------------------------------------------------

export const LONG_HEADER = "location_id,sensors_id,location,datetime,lat,lon,parameter,units,value";

export type LongFixtureRow = [datetime: string, parameter: string, value: string];

export function longCsv(rows: LongFixtureRow[]): string {
  const lines = rows.map(
    ([datetime, parameter, value]) =>
      `3647,9001,Lyon Centre,${datetime},45.75,4.85,${parameter},µg/m³,${value}`,
  );
  return [LONG_HEADER, ...lines].join("\n") + "\n";
}

export function gz(text: string): Uint8Array {
  return gzipSync(strToU8(text));
}

export const SAMPLE_ROWS: LongFixtureRow[] = [
  ["2022-01-01T00:00", "pm25", "12.0"],
  ["2022-01-01T00:00", "no2", "5.0"],
];

export const SAMPLE_KEY = "lyon/3647/2022/loc3647-2022-01.csv.gz";
export const SAMPLE_ARCHIVE_KEY = "lyon/archive/3647/2022/loc3647-2022-01.csv";
export const SAMPLE_WIDE_KEY = "lyon/wide/3647/2022/loc3647-2022-01.csv";

// ---------------------------------------------------------------------------
// Temp dirs
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "sensorshift-test-"));
}

export const noSleep: Sleep = async () => {};

export function decode(data: Uint8Array): string {
  return new TextDecoder().decode(data);
}

// ---------------------------------------------------------------------------
// Fault-injecting storage
// ---------------------------------------------------------------------------

/**
 * Wraps a real store; `failWrites(match, n)` makes the next `n` writes whose
 * key contains `match` throw. `n = Infinity` fails them all. `failLists`
 * does the same for every listing whose prefix contains `match`.
 */
export class FlakyStorage implements StorageBackend {
  readonly writes: string[] = [];
  readonly deletes: string[] = [];
  private failures: { match: string; remaining: number }[] = [];
  private listFailures: string[] = [];

  constructor(private inner: StorageBackend) {}

  failWrites(match: string, times: number): void {
    this.failures.push({ match, remaining: times });
  }

  failLists(match: string): void {
    this.listFailures.push(match);
  }

  async write(key: string, data: Uint8Array | string): Promise<void> {
    this.writes.push(key);
    const rule = this.failures.find((f) => key.includes(f.match) && f.remaining > 0);
    if (rule) {
      rule.remaining -= 1;
      throw new Error(`simulated outage writing ${key}`);
    }
    await this.inner.write(key, data);
  }

  read(key: string): Promise<Uint8Array> {
    return this.inner.read(key);
  }

  async list(prefix: string, options?: ListOptions): Promise<ObjectListing> {
    if (this.listFailures.some((m) => prefix.includes(m))) {
      throw new Error(`simulated outage listing ${prefix}`);
    }
    return this.inner.list(prefix, options);
  }

  exists(key: string): Promise<boolean> {
    return this.inner.exists(key);
  }

  async delete(key: string): Promise<void> {
    this.deletes.push(key);
    await this.inner.delete(key);
  }
}

// ---------------------------------------------------------------------------
// Pre-configured transformer
// ---------------------------------------------------------------------------

export interface Harness {
  dir: string;
  store: DiskStorage;
  storage: FlakyStorage;
  ledger: FailureLedger;
  transformer: FileTransformer;
}

export function makeHarness(
  overrides: Partial<FileTransformerOptions> = {},
): Harness {
  const dir = makeTmpDir();
  const store = new DiskStorage(join(dir, "bucket"));
  const storage = new FlakyStorage(store);
  const ledger = overrides.ledger ?? new MemoryFailureLedger();
  const transformer = new FileTransformer({
    storage,
    ledger,
    scratchDir: join(dir, "scratch"),
    transfer: { maxAttempts: 5, baseDelayMs: 0 },
    sleep: noSleep,
    ...overrides,
  });
  return { dir, store, storage, ledger, transformer };
}
