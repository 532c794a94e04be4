/**
 * S3-compatible storage backend using the AWS SDK v3 client.
 *
 * Works with AWS S3 and any S3-compatible endpoint (MinIO, GCS XML API with
 * HMAC keys) through `endpoint` + `forcePathStyle`.
 */
import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3ServiceException,
  S3Client,
} from "@aws-sdk/client-s3";
import { ObjectNotFoundError } from "../core/exceptions.js";
import type { ListOptions, ObjectListing, StorageBackend } from "./backend.js";

export interface S3StorageConfig {
  bucket: string;
  endpoint?: string;
  region?: string;
  prefix?: string;
  forcePathStyle?: boolean;
  accessKeyId?: string;
  secretAccessKey?: string;
}

function isMissing(err: unknown): boolean {
  if (!(err instanceof S3ServiceException)) return false;
  return (
    err.name === "NoSuchKey" ||
    err.name === "NotFound" ||
    err.$metadata.httpStatusCode === 404
  );
}

export class S3Storage implements StorageBackend {
  private client: S3Client;
  private bucket: string;
  private prefix: string;

  constructor(config: S3StorageConfig, client?: S3Client) {
    this.client =
      client ??
      new S3Client({
        endpoint: config.endpoint,
        region: config.region ?? "us-east-1",
        forcePathStyle: config.forcePathStyle,
        credentials:
          config.accessKeyId && config.secretAccessKey
            ? {
                accessKeyId: config.accessKeyId,
                secretAccessKey: config.secretAccessKey,
              }
            : undefined,
      });
    this.bucket = config.bucket;
    this.prefix = config.prefix ? config.prefix.replace(/\/$/, "") + "/" : "";
  }

  private fullKey(key: string): string {
    return `${this.prefix}${key}`;
  }

  private relativeKey(fullKey: string): string {
    return fullKey.startsWith(this.prefix)
      ? fullKey.slice(this.prefix.length)
      : fullKey;
  }

  async write(key: string, data: Uint8Array | string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: this.fullKey(key),
        Body: data,
      }),
    );
  }

  async read(key: string): Promise<Uint8Array> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: this.fullKey(key) }),
      );
      if (!response.Body) throw new ObjectNotFoundError(key);
      return await response.Body.transformToByteArray();
    } catch (err) {
      if (isMissing(err)) throw new ObjectNotFoundError(key);
      throw err;
    }
  }

  async list(prefix: string, options: ListOptions = {}): Promise<ObjectListing> {
    const keys: string[] = [];
    const prefixes: string[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: this.fullKey(prefix),
          Delimiter: options.delimiter,
          ContinuationToken: continuationToken,
        }),
      );

      for (const object of response.Contents ?? []) {
        if (typeof object.Key === "string") keys.push(this.relativeKey(object.Key));
      }
      for (const common of response.CommonPrefixes ?? []) {
        if (typeof common.Prefix === "string") {
          prefixes.push(this.relativeKey(common.Prefix));
        }
      }

      continuationToken = response.IsTruncated
        ? response.NextContinuationToken
        : undefined;
    } while (continuationToken);

    return { keys, prefixes };
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({ Bucket: this.bucket, Key: this.fullKey(key) }),
      );
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  async delete(key: string): Promise<void> {
    await this.client.send(
      new DeleteObjectCommand({ Bucket: this.bucket, Key: this.fullKey(key) }),
    );
  }
}
