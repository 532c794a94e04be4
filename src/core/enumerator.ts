/**
 * Work enumerator – read-only discovery of years and files per location.
 */
import type { StorageBackend } from "../storage/backend.js";
import { isYear, locationPrefix, yearPrefix } from "./keys.js";

export const DEFAULT_FILE_SUFFIXES = [".csv.gz"];

export class WorkEnumerator {
  private storage: StorageBackend;
  private suffixes: string[];

  constructor(storage: StorageBackend, suffixes: string[] = DEFAULT_FILE_SUFFIXES) {
    this.storage = storage;
    this.suffixes = suffixes;
  }

  /** Year-named sub-prefixes under `{location}/{locationId}/`, sorted. */
  async listYears(location: string, locationId: string): Promise<string[]> {
    const prefix = locationPrefix(location, locationId);
    const { prefixes } = await this.storage.list(prefix, { delimiter: "/" });
    return prefixes
      .map((p) => p.slice(prefix.length).replace(/\/$/, ""))
      .filter(isYear)
      .sort();
  }

  /** Source keys under the year prefix that carry a recognized suffix. */
  async listFiles(
    location: string,
    locationId: string,
    year: string,
  ): Promise<string[]> {
    const prefix = yearPrefix(location, locationId, year);
    const { keys } = await this.storage.list(prefix);
    return keys.filter(
      (key) =>
        !key.slice(prefix.length).includes("/") &&
        this.suffixes.some((suffix) => key.endsWith(suffix)),
    );
  }
}
