/**
 * Abstract object store interface.
 */

/** Result of a listing: object keys plus delimiter-rolled common prefixes. */
export interface ObjectListing {
  keys: string[];
  prefixes: string[];
}

export interface ListOptions {
  /** Roll keys up at this delimiter into `prefixes` (e.g. "/"). */
  delimiter?: string;
}

export interface StorageBackend {
  /** Write data to the given key. */
  write(key: string, data: Uint8Array | string): Promise<void>;

  /** Read data from the given key. Throws ObjectNotFoundError when absent. */
  read(key: string): Promise<Uint8Array>;

  /** List keys (and, with a delimiter, common prefixes) under `prefix`. */
  list(prefix: string, options?: ListOptions): Promise<ObjectListing>;

  /** Check if the key exists. */
  exists(key: string): Promise<boolean>;

  /** Delete the given key. Deleting a missing key is a no-op. */
  delete(key: string): Promise<void>;
}

/** Split a flat key list into direct keys and common prefixes. */
export function rollUpListing(
  prefix: string,
  allKeys: string[],
  delimiter: string | undefined,
): ObjectListing {
  if (!delimiter) return { keys: allKeys, prefixes: [] };

  const keys: string[] = [];
  const prefixes = new Set<string>();
  for (const key of allKeys) {
    const rest = key.slice(prefix.length);
    const idx = rest.indexOf(delimiter);
    if (idx === -1) {
      keys.push(key);
    } else {
      prefixes.add(prefix + rest.slice(0, idx + delimiter.length));
    }
  }
  return { keys, prefixes: [...prefixes].sort() };
}
