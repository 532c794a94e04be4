/**
 * Configuration validation and backend factory.
 */
import { readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ConfigError } from "./core/exceptions.js";
import type { LocationDescriptor } from "./core/types.js";
import type { DatabaseBackend } from "./db/backend.js";
import { PostgresBackend } from "./db/postgres.js";
import { SQLiteBackend } from "./db/sqlite.js";
import type { StorageBackend } from "./storage/backend.js";
import { DiskStorage } from "./storage/disk.js";
import { S3Storage } from "./storage/s3.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const DiskStorageSchema = z.object({
  provider: z.literal("disk"),
  config: z
    .object({ basePath: z.string().min(1).default("./data") })
    .default({}),
});

const S3StorageSchema = z.object({
  provider: z.literal("s3"),
  config: z.object({
    bucket: z.string().min(1),
    endpoint: z.string().url().optional(),
    region: z.string().optional(),
    prefix: z.string().optional(),
    forcePathStyle: z.boolean().optional(),
    accessKeyId: z.string().optional(),
    secretAccessKey: z.string().optional(),
  }),
});

const StorageConfigSchema = z
  .discriminatedUnion("provider", [DiskStorageSchema, S3StorageSchema])
  .default({ provider: "disk", config: {} });

const SQLiteConfigSchema = z.object({
  provider: z.literal("sqlite"),
  config: z.object({ path: z.string().min(1).default(":memory:") }).default({}),
});

const PostgresConfigSchema = z.object({
  provider: z.literal("postgres"),
  config: z.object({ connectionString: z.string().min(1) }),
});

const DbConfigSchema = z
  .discriminatedUnion("provider", [SQLiteConfigSchema, PostgresConfigSchema])
  .default({ provider: "sqlite", config: {} });

const LocationSchema = z.object({
  name: z.string().min(1),
  ids: z
    .array(
      z
        .union([z.string().min(1), z.number().int().nonnegative()])
        .transform((id) => String(id)),
    )
    .min(1),
});

const ColumnsSchema = z
  .object({
    timestamp: z.string().min(1).default("datetime"),
    parameter: z.string().min(1).default("parameter"),
    value: z.string().min(1).default("value"),
    sensor: z.string().min(1).default("sensor"),
  })
  .default({});

const TransferSchema = z
  .object({
    maxAttempts: z.number().int().positive().default(5),
    baseDelayMs: z.number().int().nonnegative().default(2000),
    backoff: z.enum(["fixed", "exponential"]).default("fixed"),
  })
  .default({});

const RetrySchema = z
  .object({
    passes: z.number().int().nonnegative().default(5),
    attempts: z.number().int().positive().default(5),
    delayMs: z.number().int().nonnegative().default(20_000),
  })
  .default({});

const PipelineSchema = z
  .object({
    locations: z.array(LocationSchema).default([]),
    concurrency: z.number().int().positive().default(4),
    ledgerPath: z.string().min(1).default("./failed_files.txt"),
    scratchDir: z.string().min(1).default(join(tmpdir(), "sensorshift")),
    fileSuffixes: z.array(z.string().min(1)).min(1).default([".csv.gz"]),
    requireConfirmedArchive: z.boolean().default(true),
    columns: ColumnsSchema,
    transfer: TransferSchema,
    retry: RetrySchema,
  })
  .default({});

export const ConfigSchema = z.object({
  storage: StorageConfigSchema,
  db: DbConfigSchema,
  pipeline: PipelineSchema,
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type PipelineSettings = Config["pipeline"];
export type StorageConfig = Config["storage"];
export type DbConfig = Config["db"];

// ---------------------------------------------------------------------------
// Backend factories
// ---------------------------------------------------------------------------

export function buildStorage(config: StorageConfig): StorageBackend {
  switch (config.provider) {
    case "disk":
      return new DiskStorage(config.config.basePath);
    case "s3":
      return new S3Storage(config.config);
  }
}

export function buildDb(config: DbConfig): DatabaseBackend {
  switch (config.provider) {
    case "sqlite":
      return new SQLiteBackend(config.config.path);
    case "postgres":
      return new PostgresBackend(config.config.connectionString);
  }
}

// ---------------------------------------------------------------------------
// Top-level config → backends
// ---------------------------------------------------------------------------

export function validateConfig(raw: unknown): Config {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

export interface ParsedConfig {
  storage: StorageBackend;
  db: DatabaseBackend;
  settings: PipelineSettings;
  logLevel: Config["logLevel"];
}

export function parseConfig(raw: unknown): ParsedConfig {
  const config = validateConfig(raw);
  return {
    storage: buildStorage(config.storage),
    db: buildDb(config.db),
    settings: config.pipeline,
    logLevel: config.logLevel,
  };
}

export async function loadConfigFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${String(err)}`);
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${String(err)}`);
  }
}

export function describeLocations(locations: LocationDescriptor[]): string {
  return locations.map((l) => `${l.name}[${l.ids.join(",")}]`).join(" ");
}
