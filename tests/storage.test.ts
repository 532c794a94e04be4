/**
 * Unit tests for DiskStorage and S3Storage.
 */
import { describe, test, expect, beforeEach } from "vitest";
import { join } from "node:path";
import { Readable } from "node:stream";
import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  NotFound,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { sdkStreamMixin } from "@smithy/util-stream";
import { mockClient } from "aws-sdk-client-mock";
import { ObjectNotFoundError } from "../src/core/exceptions.js";
import { DiskStorage } from "../src/storage/disk.js";
import { S3Storage } from "../src/storage/s3.js";
import { decode, makeTmpDir } from "./fixtures.js";

describe("DiskStorage", () => {
  test("write and read", async () => {
    const s = new DiskStorage(join(makeTmpDir(), "store"));
    await s.write("a/b.txt", "hello");
    expect(decode(await s.read("a/b.txt"))).toBe("hello");
  });

  test("reading a missing key throws ObjectNotFoundError", async () => {
    const s = new DiskStorage(join(makeTmpDir(), "store"));
    await expect(s.read("missing.txt")).rejects.toBeInstanceOf(ObjectNotFoundError);
  });

  test("exists", async () => {
    const s = new DiskStorage(join(makeTmpDir(), "store"));
    expect(await s.exists("missing.txt")).toBe(false);
    await s.write("found.txt", "here");
    expect(await s.exists("found.txt")).toBe(true);
    expect(await s.exists("")).toBe(false);
  });

  test("list keys under a prefix", async () => {
    const s = new DiskStorage(join(makeTmpDir(), "store"));
    await s.write("p/two.txt", "2");
    await s.write("p/one.txt", "1");
    await s.write("p/sub/three.txt", "3");
    await s.write("q/four.txt", "4");
    expect(await s.list("p/")).toEqual({
      keys: ["p/one.txt", "p/sub/three.txt", "p/two.txt"],
      prefixes: [],
    });
  });

  test("list rolls keys up at the delimiter", async () => {
    const s = new DiskStorage(join(makeTmpDir(), "store"));
    await s.write("p/one.txt", "1");
    await s.write("p/b/x.txt", "x");
    await s.write("p/a/y.txt", "y");
    await s.write("p/a/z/w.txt", "w");
    expect(await s.list("p/", { delimiter: "/" })).toEqual({
      keys: ["p/one.txt"],
      prefixes: ["p/a/", "p/b/"],
    });
  });

  test("a prefix may end mid-name", async () => {
    const s = new DiskStorage(join(makeTmpDir(), "store"));
    await s.write("p/one.txt", "1");
    await s.write("p/other/two.txt", "2");
    await s.write("p/sub/three.txt", "3");
    await s.write("po.txt", "4");
    expect(await s.list("p/o")).toEqual({
      keys: ["p/one.txt", "p/other/two.txt"],
      prefixes: [],
    });
    expect(await s.list("p")).toEqual({
      keys: ["p/one.txt", "p/other/two.txt", "p/sub/three.txt", "po.txt"],
      prefixes: [],
    });
  });

  test("a prefix through a missing directory or a file lists nothing", async () => {
    const s = new DiskStorage(join(makeTmpDir(), "store"));
    await s.write("p/one.txt", "1");
    expect(await s.list("p/missing/")).toEqual({ keys: [], prefixes: [] });
    expect(await s.list("p/one.txt/")).toEqual({ keys: [], prefixes: [] });
  });

  test("listing an empty store", async () => {
    const s = new DiskStorage(join(makeTmpDir(), "store"));
    expect(await s.list("nope/")).toEqual({ keys: [], prefixes: [] });
  });

  test("delete", async () => {
    const s = new DiskStorage(join(makeTmpDir(), "store"));
    await s.write("del.txt", "bye");
    await s.delete("del.txt");
    expect(await s.exists("del.txt")).toBe(false);
  });

  test("deleting a missing key is a no-op", async () => {
    const s = new DiskStorage(join(makeTmpDir(), "store"));
    await expect(s.delete("never-there.txt")).resolves.toBeUndefined();
  });
});

describe("S3Storage", () => {
  const s3Mock = mockClient(S3Client);

  function makeStorage(prefix?: string): S3Storage {
    return new S3Storage(
      { bucket: "sensor-bucket", prefix },
      new S3Client({ region: "us-east-1" }),
    );
  }

  beforeEach(() => {
    s3Mock.reset();
  });

  test("write puts the object under the key prefix", async () => {
    s3Mock.on(PutObjectCommand).resolves({});
    await makeStorage("raw/").write("lyon/a.csv", "x");

    const calls = s3Mock.commandCalls(PutObjectCommand);
    expect(calls).toHaveLength(1);
    expect(calls[0].args[0].input).toEqual({
      Bucket: "sensor-bucket",
      Key: "raw/lyon/a.csv",
      Body: "x",
    });
  });

  test("read returns the object bytes", async () => {
    s3Mock.on(GetObjectCommand).resolves({
      Body: sdkStreamMixin(Readable.from([Buffer.from("a,b\n")])),
    });
    expect(decode(await makeStorage().read("lyon/a.csv"))).toBe("a,b\n");
  });

  test("read maps NoSuchKey to ObjectNotFoundError", async () => {
    s3Mock
      .on(GetObjectCommand)
      .rejects(new NoSuchKey({ message: "gone", $metadata: { httpStatusCode: 404 } }));
    await expect(makeStorage().read("lyon/a.csv")).rejects.toBeInstanceOf(
      ObjectNotFoundError,
    );
  });

  test("read rethrows other failures", async () => {
    s3Mock.on(GetObjectCommand).rejects(new Error("socket hang up"));
    await expect(makeStorage().read("lyon/a.csv")).rejects.toThrow("socket hang up");
  });

  test("exists is false on a 404 head", async () => {
    s3Mock
      .on(HeadObjectCommand, { Key: "lyon/missing.csv" })
      .rejects(new NotFound({ message: "not found", $metadata: { httpStatusCode: 404 } }))
      .on(HeadObjectCommand, { Key: "lyon/present.csv" })
      .resolves({});
    const storage = makeStorage();
    expect(await storage.exists("lyon/missing.csv")).toBe(false);
    expect(await storage.exists("lyon/present.csv")).toBe(true);
  });

  test("list follows continuation tokens and strips the prefix", async () => {
    s3Mock
      .on(ListObjectsV2Command)
      .resolvesOnce({
        Contents: [{ Key: "raw/lyon/3647/2022/a.csv.gz" }],
        IsTruncated: true,
        NextContinuationToken: "page-2",
      })
      .resolvesOnce({
        Contents: [{ Key: "raw/lyon/3647/2022/b.csv.gz" }],
        IsTruncated: false,
      });

    const listing = await makeStorage("raw").list("lyon/3647/2022/");

    expect(listing).toEqual({
      keys: ["lyon/3647/2022/a.csv.gz", "lyon/3647/2022/b.csv.gz"],
      prefixes: [],
    });
    const calls = s3Mock.commandCalls(ListObjectsV2Command);
    expect(calls).toHaveLength(2);
    expect(calls[0].args[0].input.Prefix).toBe("raw/lyon/3647/2022/");
    expect(calls[1].args[0].input.ContinuationToken).toBe("page-2");
  });

  test("list returns common prefixes with a delimiter", async () => {
    s3Mock.on(ListObjectsV2Command).resolves({
      CommonPrefixes: [{ Prefix: "lyon/3647/2021/" }, { Prefix: "lyon/3647/2022/" }],
      IsTruncated: false,
    });

    const listing = await makeStorage().list("lyon/3647/", { delimiter: "/" });

    expect(listing.prefixes).toEqual(["lyon/3647/2021/", "lyon/3647/2022/"]);
    expect(s3Mock.commandCalls(ListObjectsV2Command)[0].args[0].input.Delimiter).toBe("/");
  });

  test("delete sends DeleteObject", async () => {
    s3Mock.on(DeleteObjectCommand).resolves({});
    await makeStorage().delete("lyon/a.csv");
    expect(s3Mock.commandCalls(DeleteObjectCommand)[0].args[0].input).toEqual({
      Bucket: "sensor-bucket",
      Key: "lyon/a.csv",
    });
  });
});
