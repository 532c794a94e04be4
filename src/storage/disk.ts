/**
 * Local filesystem storage backend.
 */
import type { Dirent } from "node:fs";
import { mkdir, readdir, readFile, stat, unlink, writeFile } from "node:fs/promises";
import { dirname, join, resolve, sep } from "node:path";
import { ObjectNotFoundError } from "../core/exceptions.js";
import { rollUpListing, type ListOptions, type ObjectListing, type StorageBackend } from "./backend.js";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function isNotDirectory(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOTDIR";
}

export class DiskStorage implements StorageBackend {
  private basePath: string;

  constructor(basePath: string) {
    this.basePath = resolve(basePath);
  }

  private resolve(key: string): string {
    return join(this.basePath, key);
  }

  async write(key: string, data: Uint8Array | string): Promise<void> {
    const fullPath = this.resolve(key);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, data);
  }

  async read(key: string): Promise<Uint8Array> {
    try {
      const buf = await readFile(this.resolve(key));
      return new Uint8Array(buf);
    } catch (err) {
      if (isNotFound(err)) throw new ObjectNotFoundError(key);
      throw err;
    }
  }

  async list(prefix: string, options: ListOptions = {}): Promise<ObjectListing> {
    // Only the directory holding the prefix can contain matching keys.
    const dirPart = prefix.slice(0, prefix.lastIndexOf("/") + 1);
    const all = (await this.walk(dirPart)).filter((k) => k.startsWith(prefix));
    return rollUpListing(prefix, all, options.delimiter);
  }

  async exists(key: string): Promise<boolean> {
    try {
      const s = await stat(this.resolve(key));
      return s.isFile();
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await unlink(this.resolve(key));
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
  }

  /** Every key under `dir` (a "/"-terminated key prefix, or ""), sorted. */
  private async walk(dir: string): Promise<string[]> {
    const keys: string[] = [];
    const visit = async (dir: string): Promise<void> => {
      let entries: Dirent[];
      try {
        entries = await readdir(dir, { withFileTypes: true });
      } catch (err) {
        if (isNotFound(err) || isNotDirectory(err)) return;
        throw err;
      }
      for (const entry of entries) {
        const full = join(dir, entry.name);
        if (entry.isDirectory()) {
          await visit(full);
        } else if (entry.isFile()) {
          // Make key relative to basePath, always "/"-separated
          keys.push(full.slice(this.basePath.length + 1).split(sep).join("/"));
        }
      }
    };

    await visit(join(this.basePath, dir));
    return keys.sort();
  }
}
