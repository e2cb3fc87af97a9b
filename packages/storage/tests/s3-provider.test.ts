/**
 * Tests for S3Provider against an in-process fake object store.
 *
 * Verifies:
 * - Missing bucket / object reads as "nothing stored yet" (info)
 * - Other fetch failures are logged at warn and read as "nothing stored yet"
 * - The bucket is created once, tolerating "already owned"
 * - Write failures surface as WRITE_FAILED
 */

import { describe, it, expect, beforeEach } from "vitest";
import pino from "pino";
import {
  BucketAlreadyOwnedByYou,
  NoSuchBucket,
  NoSuchKey,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { createLedger, ledgersEqual } from "@budgetme/ledger";
import {
  OBJECT_KEY,
  S3Provider,
  isMissingObjectError,
  type S3ObjectClient,
} from "../src/s3-provider.js";
import { StorageError } from "../src/types.js";

const T0 = new Date(2024, 0, 15, 9, 0).getTime();
const BUCKET = "bucket-test0001";

// =============================================================================
// Fake store
// =============================================================================

class FakeObjectStore implements S3ObjectClient {
  readonly buckets = new Map<string, Map<string, string>>();
  createCalls = 0;
  getFailure: unknown = undefined;
  createFailure: unknown = undefined;

  async getObject(bucket: string, key: string): Promise<string | undefined> {
    if (this.getFailure !== undefined) {
      throw this.getFailure;
    }
    const objects = this.buckets.get(bucket);
    if (objects === undefined) {
      throw new NoSuchBucket({ message: "The specified bucket does not exist", $metadata: { httpStatusCode: 404 } });
    }
    const body = objects.get(key);
    if (body === undefined) {
      throw new NoSuchKey({ message: "The specified key does not exist.", $metadata: { httpStatusCode: 404 } });
    }
    return body;
  }

  async putObject(bucket: string, key: string, body: string): Promise<void> {
    const objects = this.buckets.get(bucket);
    if (objects === undefined) {
      throw new NoSuchBucket({ message: "The specified bucket does not exist", $metadata: { httpStatusCode: 404 } });
    }
    objects.set(key, body);
  }

  async createBucket(bucket: string): Promise<void> {
    this.createCalls += 1;
    if (this.createFailure !== undefined) {
      throw this.createFailure;
    }
    if (this.buckets.has(bucket)) {
      throw new BucketAlreadyOwnedByYou({ message: "Already owned", $metadata: { httpStatusCode: 409 } });
    }
    this.buckets.set(bucket, new Map());
  }
}

interface LogLine {
  readonly level: number;
  readonly msg: string;
}

let store: FakeObjectStore;
let logs: LogLine[];
let provider: S3Provider;

beforeEach(() => {
  store = new FakeObjectStore();
  logs = [];
  const logger = pino(
    { level: "debug" },
    {
      write(line: string) {
        const parsed: { level: number; msg: string } = JSON.parse(line);
        logs.push({ level: parsed.level, msg: parsed.msg });
      },
    },
  );
  provider = new S3Provider({ bucketName: BUCKET, region: "us-east-1", client: store, logger });
});

// =============================================================================
// Tests
// =============================================================================

describe("S3Provider.fetch", () => {
  it("returns undefined when the bucket does not exist", async () => {
    await expect(provider.fetch()).resolves.toBeUndefined();
    expect(logs).toEqual([{ level: 30, msg: "No ledger object yet" }]);
  });

  it("returns undefined when the object does not exist", async () => {
    store.buckets.set(BUCKET, new Map());
    await expect(provider.fetch()).resolves.toBeUndefined();
    expect(logs).toEqual([{ level: 30, msg: "No ledger object yet" }]);
  });

  it("logs other failures at warn and returns undefined", async () => {
    store.getFailure = new Error("socket hang up");
    await expect(provider.fetch()).resolves.toBeUndefined();
    expect(logs).toEqual([{ level: 40, msg: "Could not fetch ledger object" }]);
  });

  it("returns undefined for an object without a body", async () => {
    const empty: S3ObjectClient = {
      getObject: async () => undefined,
      putObject: async () => undefined,
      createBucket: async () => undefined,
    };
    const bodiless = new S3Provider({ bucketName: BUCKET, region: "us-east-1", client: empty });
    await expect(bodiless.fetch()).resolves.toBeUndefined();
  });

  it("throws on a corrupt object", async () => {
    store.buckets.set(BUCKET, new Map([[OBJECT_KEY, "[]"]]));
    await expect(provider.fetch()).rejects.toBeInstanceOf(StorageError);
  });
});

describe("S3Provider.store", () => {
  it("creates the bucket and writes data.json", async () => {
    await provider.store(createLedger(T0));

    expect(store.createCalls).toBe(1);
    const body = store.buckets.get(BUCKET)?.get(OBJECT_KEY);
    expect(body).toBeDefined();
    expect(JSON.parse(body ?? "null")).toMatchObject({ version: 1, balance: 10 });
  });

  it("reads back what it stored", async () => {
    const ledger = { ...createLedger(T0), balance: 7.25 };
    await provider.store(ledger);

    const loaded = await provider.fetch();
    expect(loaded && ledgersEqual(loaded, ledger)).toBe(true);
  });

  it("creates the bucket only once per provider", async () => {
    await provider.store(createLedger(T0));
    await provider.store(createLedger(T0));
    expect(store.createCalls).toBe(1);
  });

  it("writes into a bucket the user already owns", async () => {
    store.buckets.set(BUCKET, new Map());
    await provider.store(createLedger(T0));

    expect(store.createCalls).toBe(1);
    expect(store.buckets.get(BUCKET)?.has(OBJECT_KEY)).toBe(true);
  });

  it("reports WRITE_FAILED when the bucket name is taken by someone else", async () => {
    store.createFailure = new S3ServiceException({
      name: "BucketAlreadyExists",
      $fault: "client",
      $metadata: { httpStatusCode: 409 },
      message: "The requested bucket name is not available",
    });

    await expect(provider.store(createLedger(T0))).rejects.toMatchObject({
      name: "StorageError",
      code: "WRITE_FAILED",
    });
  });

  it("describes its location", () => {
    expect(provider.description).toBe(`s3://${BUCKET}/data.json`);
  });
});

describe("isMissingObjectError", () => {
  it("recognises a bare 404", () => {
    const notFound = new S3ServiceException({
      name: "NotFound",
      $fault: "client",
      $metadata: { httpStatusCode: 404 },
    });
    expect(isMissingObjectError(notFound)).toBe(true);
  });

  it("rejects access errors and plain errors", () => {
    const denied = new S3ServiceException({
      name: "AccessDenied",
      $fault: "client",
      $metadata: { httpStatusCode: 403 },
    });
    expect(isMissingObjectError(denied)).toBe(false);
    expect(isMissingObjectError(new Error("timeout"))).toBe(false);
  });
});
