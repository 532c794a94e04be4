#!/usr/bin/env node
/**
 * CLI entrypoint for sensorshift.
 *
 * Usage:
 *   sensorshift --config sensorshift.json
 *   sensorshift --location lyon --ids 3647,2696 --bucket sensor-data
 */
import { parseArgs } from "node:util";
import { describeLocations, loadConfigFile, validateConfig } from "./config.js";
import { ConfigError } from "./core/exceptions.js";
import { SensorShift } from "./index.js";

const USAGE = `
sensorshift: reshape long sensor CSVs to wide format and republish them

Usage:
  sensorshift --config <file.json>
  sensorshift --location <name> --ids <id,id,...> [--bucket <name>]
  sensorshift --config <file.json> --retry-only

Options:
  --config <file>        JSON configuration file
  --location <name>      Location (top-level prefix), e.g. a city
  --ids <a,b,c>          Comma-separated location ids under --location
  --storage <disk|s3>    Object store backend      (default: disk)
  --storage-path <dir>   Disk store directory      (default: ./data)
  --bucket <name>        S3 bucket (implies --storage s3)
  --prefix <p>           S3 key prefix
  --region <r>           S3 region
  --endpoint <url>       S3-compatible endpoint
  --ledger <file>        Failure ledger            (default: ./failed_files.txt)
  --scratch <dir>        Local scratch directory
  --db-path <file>       SQLite run journal        (default: :memory:)
  --concurrency <n>      Parallel partitions       (default: 4)
  --retry-only           Only re-drive the failure ledger
  --strict               Exit 2 when failures remain after retries
  --log-level <level>    fatal|error|warn|info|debug|trace|silent
  --help                 Show this help
`.trim();

const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    config: { type: "string" },
    location: { type: "string" },
    ids: { type: "string" },
    storage: { type: "string" },
    "storage-path": { type: "string" },
    bucket: { type: "string" },
    prefix: { type: "string" },
    region: { type: "string" },
    endpoint: { type: "string" },
    ledger: { type: "string" },
    scratch: { type: "string" },
    "db-path": { type: "string" },
    concurrency: { type: "string" },
    "retry-only": { type: "boolean", default: false },
    strict: { type: "boolean", default: false },
    "log-level": { type: "string" },
    help: { type: "boolean", short: "h", default: false },
  },
  strict: true,
});

if (values.help) {
  console.log(USAGE);
  process.exit(0);
}

if (!values.config && !values.location && !values["retry-only"]) {
  console.error(USAGE);
  process.exit(1);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value && typeof value === "object" && !Array.isArray(value));
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const existing = raw[name];
  const value = isRecord(existing) ? { ...existing } : {};
  raw[name] = value;
  return value;
}

/** Layer command-line flags over the config file contents. */
function applyFlags(base: unknown): Record<string, unknown> {
  const raw: Record<string, unknown> = isRecord(base) ? { ...base } : {};
  const pipeline = section(raw, "pipeline");

  if (values.location) {
    if (!values.ids) throw new ConfigError("--location needs --ids");
    const ids = values.ids.split(",").map((id) => id.trim()).filter(Boolean);
    pipeline.locations = [{ name: values.location, ids }];
  }
  if (values.ledger) pipeline.ledgerPath = values.ledger;
  if (values.scratch) pipeline.scratchDir = values.scratch;
  if (values.concurrency) pipeline.concurrency = Number(values.concurrency);

  const storageKind = values.bucket ? "s3" : values.storage;
  if (storageKind === "s3") {
    const existing = isRecord(raw.storage) && isRecord(raw.storage.config) ? raw.storage.config : {};
    raw.storage = {
      provider: "s3",
      config: {
        ...existing,
        ...(values.bucket ? { bucket: values.bucket } : {}),
        ...(values.prefix ? { prefix: values.prefix } : {}),
        ...(values.region ? { region: values.region } : {}),
        ...(values.endpoint ? { endpoint: values.endpoint, forcePathStyle: true } : {}),
      },
    };
  } else if (storageKind === "disk" || values["storage-path"]) {
    raw.storage = {
      provider: "disk",
      config: { basePath: values["storage-path"] ?? "./data" },
    };
  } else if (storageKind) {
    throw new ConfigError(`Unknown storage backend: ${storageKind}`);
  }

  if (values["db-path"]) {
    raw.db = { provider: "sqlite", config: { path: values["db-path"] } };
  }
  if (values["log-level"]) raw.logLevel = values["log-level"];
  return raw;
}

let shift: SensorShift;
try {
  const fileConfig = values.config ? await loadConfigFile(values.config) : {};
  const config = validateConfig(applyFlags(fileConfig));
  console.log(`Locations: ${describeLocations(config.pipeline.locations) || "(none)"}`);
  shift = await SensorShift.fromConfig(config);
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(err.message);
    process.exit(1);
  }
  throw err;
}

const result = await shift.run({ retryOnly: values["retry-only"] });
await shift.close();

if (result.batch) {
  console.log(
    `Processed ${result.batch.processed} files, ${result.batch.failed} failed in the first pass`,
  );
}
if (result.retry.recovered.length > 0) {
  console.log(`Recovered ${result.retry.recovered.length} files on retry`);
}

if (result.residualFailures.length === 0) {
  console.log("All files have been treated and transformed into wide csv, end of the process.");
} else {
  console.log(
    `${result.residualFailures.length} files still failing, left in the failure ledger:`,
  );
  for (const key of result.residualFailures) console.log(`  ${key}`);
  if (values.strict) process.exit(2);
}
