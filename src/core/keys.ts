/**
 * Object key model.
 *
 * Source objects live at `{location}/{locationId}/{year}/{filename}`; the
 * archive and wide copies live beside them under `archive/` and `wide/`
 * with the compression suffix dropped.
 */
import { InvalidObjectKeyError } from "./exceptions.js";

export interface ObjectKey {
  location: string;
  locationId: string;
  year: string;
  filename: string;
}

export type TargetKind = "archive" | "wide";

const YEAR_RE = /^\d{4}$/;

export const COMPRESSED_SUFFIX = ".gz";

export function parseObjectKey(raw: string): ObjectKey {
  const key = raw.trim();
  const parts = key.split("/");
  if (parts.length !== 4) {
    throw new InvalidObjectKeyError(
      key,
      `expected 4 path segments, got ${parts.length}`,
    );
  }
  const [location, locationId, year, filename] = parts;
  if (!location || !locationId || !year || !filename) {
    throw new InvalidObjectKeyError(key, "empty path segment");
  }
  if (!YEAR_RE.test(year)) {
    throw new InvalidObjectKeyError(key, `"${year}" is not a year`);
  }
  if (locationId === "archive" || locationId === "wide") {
    throw new InvalidObjectKeyError(key, "not a source key");
  }
  return { location, locationId, year, filename };
}

export function formatObjectKey(key: ObjectKey): string {
  return `${key.location}/${key.locationId}/${key.year}/${key.filename}`;
}

export function isCompressed(filename: string): boolean {
  return filename.endsWith(COMPRESSED_SUFFIX);
}

/** `loc-2022-01.csv.gz` → `loc-2022-01.csv`; other names are unchanged. */
export function stripCompressionSuffix(filename: string): string {
  return isCompressed(filename)
    ? filename.slice(0, -COMPRESSED_SUFFIX.length)
    : filename;
}

export function targetKey(key: ObjectKey, kind: TargetKind): string {
  return `${key.location}/${kind}/${key.locationId}/${key.year}/${stripCompressionSuffix(key.filename)}`;
}

export function yearPrefix(
  location: string,
  locationId: string,
  year: string,
): string {
  return `${location}/${locationId}/${year}/`;
}

export function locationPrefix(location: string, locationId: string): string {
  return `${location}/${locationId}/`;
}

export function isYear(value: string): boolean {
  return YEAR_RE.test(value);
}
