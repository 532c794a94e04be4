/**
 * Unit tests for the retrying upload primitive.
 */
import { describe, test, expect } from "vitest";
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { backoffDelay, uploadWithRetry } from "../src/core/transfer.js";
import { MemoryFailureLedger } from "../src/core/ledger.js";
import { PermanentTransferError } from "../src/core/exceptions.js";
import { DiskStorage } from "../src/storage/disk.js";
import { FlakyStorage, decode, makeTmpDir } from "./fixtures.js";

function setup() {
  const dir = makeTmpDir();
  const storage = new FlakyStorage(new DiskStorage(join(dir, "bucket")));
  const local = join(dir, "artifact.csv");
  writeFileSync(local, "datetime,sensor\n");
  const delays: number[] = [];
  const sleep = async (ms: number) => {
    delays.push(ms);
  };
  return { storage, local, delays, sleep };
}

describe("uploadWithRetry", () => {
  test("first attempt succeeds", async () => {
    const { storage, local, delays, sleep } = setup();
    const ledger = new MemoryFailureLedger();
    const result = await uploadWithRetry(storage, local, "lyon/wide/1/2022/a.csv", {
      ledger,
      sleep,
    });
    expect(result).toEqual({ ok: true, key: "lyon/wide/1/2022/a.csv", attempts: 1 });
    expect(decode(await storage.read("lyon/wide/1/2022/a.csv"))).toBe("datetime,sensor\n");
    expect(delays).toEqual([]);
    expect(await ledger.readAll()).toEqual([]);
  });

  test("fails four times then succeeds on the fifth", async () => {
    const { storage, local, delays, sleep } = setup();
    storage.failWrites("a.csv", 4);
    const ledger = new MemoryFailureLedger();
    const result = await uploadWithRetry(storage, local, "x/wide/1/2022/a.csv", {
      ledger,
      sleep,
      policy: { baseDelayMs: 2000 },
    });
    expect(result.ok).toBe(true);
    expect(result.attempts).toBe(5);
    expect(delays).toEqual([2000, 2000, 2000, 2000]);
    expect(await ledger.readAll()).toEqual([]);
  });

  test("exhaustion records the key once and reports failure", async () => {
    const { storage, local, delays, sleep } = setup();
    storage.failWrites("a.csv", Infinity);
    const ledger = new MemoryFailureLedger();
    const result = await uploadWithRetry(storage, local, "x/wide/1/2022/a.csv", {
      ledger,
      sleep,
      policy: { baseDelayMs: 10 },
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(PermanentTransferError);
      expect(result.error.message).toBe(
        "Transfer of x/wide/1/2022/a.csv gave up after 5 attempts: simulated outage writing x/wide/1/2022/a.csv",
      );
    }
    expect(storage.writes).toHaveLength(5);
    expect(delays).toEqual([10, 10, 10, 10]);
    expect(await ledger.readAll()).toEqual(["x/wide/1/2022/a.csv"]);
  });

  test("ledgerKey overrides the recorded key", async () => {
    const { storage, local, sleep } = setup();
    storage.failWrites("a.csv", Infinity);
    const ledger = new MemoryFailureLedger();
    await uploadWithRetry(storage, local, "x/wide/1/2022/a.csv", {
      ledger,
      ledgerKey: "x/1/2022/a.csv.gz",
      sleep,
      policy: { maxAttempts: 2 },
    });
    expect(await ledger.readAll()).toEqual(["x/1/2022/a.csv.gz"]);
  });

  test("exponential backoff doubles the wait", async () => {
    const { storage, local, delays, sleep } = setup();
    storage.failWrites("a.csv", Infinity);
    await uploadWithRetry(storage, local, "x/wide/1/2022/a.csv", {
      sleep,
      policy: { baseDelayMs: 100, backoff: "exponential" },
    });
    expect(delays).toEqual([100, 200, 400, 800]);
  });

  test("a missing local artifact counts as a failed attempt", async () => {
    const { storage, sleep } = setup();
    const result = await uploadWithRetry(storage, "/nonexistent/artifact.csv", "k", {
      sleep,
      policy: { maxAttempts: 2 },
    });
    expect(result.ok).toBe(false);
    expect(storage.writes).toEqual([]);
  });
});

describe("backoffDelay", () => {
  test("fixed", () => {
    expect(backoffDelay({ maxAttempts: 5, baseDelayMs: 2000, backoff: "fixed" }, 3)).toBe(2000);
  });

  test("exponential", () => {
    expect(backoffDelay({ maxAttempts: 5, baseDelayMs: 500, backoff: "exponential" }, 3)).toBe(
      2000,
    );
  });
});
