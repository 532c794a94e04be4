/**
 * Failure ledger – durable record of source keys whose last attempt did not
 * reach "source deleted".
 */
import { appendFile, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { randomUUID } from "node:crypto";

export interface FailureLedger {
  /** Add one key. Safe to call concurrently. */
  append(key: string): Promise<void>;

  /**
   * Add `key` unless it is already recorded. Resolves to whether a line was
   * written.
   */
  record(key: string): Promise<boolean>;

  /** Every recorded key, in append order. A missing ledger reads as empty. */
  readAll(): Promise<string[]>;

  /** Replace the whole ledger with exactly `keys`. */
  rewrite(keys: string[]): Promise<void>;
}

/**
 * Serializes async critical sections. Each caller waits for the previous
 * holder, whether it resolved or rejected.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

function parseLines(text: string): string[] {
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function serializeLines(keys: string[]): string {
  return keys.map((k) => `${k}\n`).join("");
}

export class FileFailureLedger implements FailureLedger {
  private lock = new Mutex();

  constructor(readonly path: string) {}

  async append(key: string): Promise<void> {
    const line = `${key.trim()}\n`;
    await this.lock.runExclusive(async () => {
      await mkdir(dirname(this.path), { recursive: true });
      await appendFile(this.path, line, "utf8");
    });
  }

  async record(key: string): Promise<boolean> {
    const trimmed = key.trim();
    return this.lock.runExclusive(async () => {
      if ((await this.readLines()).includes(trimmed)) return false;
      await mkdir(dirname(this.path), { recursive: true });
      await appendFile(this.path, `${trimmed}\n`, "utf8");
      return true;
    });
  }

  async readAll(): Promise<string[]> {
    return this.lock.runExclusive(() => this.readLines());
  }

  async rewrite(keys: string[]): Promise<void> {
    await this.lock.runExclusive(async () => {
      await mkdir(dirname(this.path), { recursive: true });
      const tmp = `${this.path}.${randomUUID()}.tmp`;
      await writeFile(tmp, serializeLines(keys), "utf8");
      await rename(tmp, this.path);
    });
  }

  private async readLines(): Promise<string[]> {
    try {
      return parseLines(await readFile(this.path, "utf8"));
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }
  }
}

export class MemoryFailureLedger implements FailureLedger {
  private keys: string[] = [];

  async append(key: string): Promise<void> {
    this.keys.push(key.trim());
  }

  async record(key: string): Promise<boolean> {
    const trimmed = key.trim();
    if (this.keys.includes(trimmed)) return false;
    this.keys.push(trimmed);
    return true;
  }

  async readAll(): Promise<string[]> {
    return [...this.keys];
  }

  async rewrite(keys: string[]): Promise<void> {
    this.keys = keys.map((k) => k.trim()).filter((k) => k.length > 0);
  }
}
