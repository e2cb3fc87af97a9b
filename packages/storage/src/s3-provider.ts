/**
 * @budgetme/storage — S3-compatible object store provider.
 *
 * The ledger lives in a single object, `data.json`, in a bucket the user
 * owns. The bucket is created on first write. Any S3-compatible store
 * (R2, MinIO, ...) works through a custom endpoint.
 */

import {
  BucketAlreadyOwnedByYou,
  BucketLocationConstraint,
  CreateBucketCommand,
  GetObjectCommand,
  NoSuchBucket,
  NoSuchKey,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import pino, { type Logger } from "pino";
import type { LedgerState } from "@budgetme/types";
import { decodeLedger, encodeLedger } from "./codec.js";
import { StorageError, type StorageProvider } from "./types.js";

export const OBJECT_KEY = "data.json";

// =============================================================================
// Client seam
// =============================================================================

/**
 * The three object-store calls the provider makes.
 *
 * `wrapS3Client` adapts a real `S3Client`; tests pass a fake.
 */
export interface S3ObjectClient {
  /** @returns the object body, or undefined when the object has no body */
  getObject(bucket: string, key: string): Promise<string | undefined>;
  putObject(bucket: string, key: string, body: string): Promise<void>;
  createBucket(bucket: string, region: string): Promise<void>;
}

/** us-east-1 is the default location and must not be sent as a constraint. */
function locationConstraint(region: string): BucketLocationConstraint | undefined {
  return Object.values(BucketLocationConstraint).find((constraint) => constraint === region);
}

export function wrapS3Client(client: S3Client): S3ObjectClient {
  return {
    async getObject(bucket, key) {
      const output = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      return output.Body?.transformToString("utf8");
    },

    async putObject(bucket, key, body) {
      await client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentType: "application/json",
        }),
      );
    },

    async createBucket(bucket, region) {
      const constraint = locationConstraint(region);
      await client.send(
        new CreateBucketCommand({
          Bucket: bucket,
          ...(constraint !== undefined
            ? { CreateBucketConfiguration: { LocationConstraint: constraint } }
            : {}),
        }),
      );
    },
  };
}

// =============================================================================
// Error classification
// =============================================================================

/**
 * Whether a client error means "nothing stored yet".
 */
export function isMissingObjectError(err: unknown): boolean {
  if (err instanceof NoSuchKey || err instanceof NoSuchBucket) {
    return true;
  }
  if (err instanceof S3ServiceException) {
    return (
      err.name === "NoSuchKey" ||
      err.name === "NoSuchBucket" ||
      err.$metadata.httpStatusCode === 404
    );
  }
  return false;
}

function isBucketOwnedError(err: unknown): boolean {
  return (
    err instanceof BucketAlreadyOwnedByYou ||
    (err instanceof S3ServiceException && err.name === "BucketAlreadyOwnedByYou")
  );
}

// =============================================================================
// Provider
// =============================================================================

export interface S3ProviderOptions {
  readonly bucketName: string;
  readonly region: string;
  readonly client: S3ObjectClient;
  readonly logger?: Logger | undefined;
}

export class S3Provider implements StorageProvider {
  readonly bucketName: string;
  readonly region: string;
  private readonly client: S3ObjectClient;
  private readonly logger: Logger;
  private bucketReady = false;

  constructor(options: S3ProviderOptions) {
    this.bucketName = options.bucketName;
    this.region = options.region;
    this.client = options.client;
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  get description(): string {
    return `s3://${this.bucketName}/${OBJECT_KEY}`;
  }

  async fetch(): Promise<LedgerState | undefined> {
    let text: string | undefined;
    try {
      text = await this.client.getObject(this.bucketName, OBJECT_KEY);
    } catch (err) {
      if (isMissingObjectError(err)) {
        this.logger.info({ bucket: this.bucketName }, "No ledger object yet");
      } else {
        this.logger.warn({ err, bucket: this.bucketName }, "Could not fetch ledger object");
      }
      return undefined;
    }
    if (text === undefined) {
      this.logger.warn({ bucket: this.bucketName }, "Ledger object has no body");
      return undefined;
    }
    return decodeLedger(text);
  }

  async store(state: LedgerState): Promise<void> {
    await this.ensureBucket();
    try {
      await this.client.putObject(this.bucketName, OBJECT_KEY, encodeLedger(state));
    } catch (err) {
      throw new StorageError("WRITE_FAILED", `Could not write ${this.description}`, { cause: err });
    }
    this.logger.debug({ bucket: this.bucketName }, "Ledger object written");
  }

  private async ensureBucket(): Promise<void> {
    if (this.bucketReady) {
      return;
    }
    try {
      await this.client.createBucket(this.bucketName, this.region);
      this.logger.info({ bucket: this.bucketName }, "Bucket created");
    } catch (err) {
      if (!isBucketOwnedError(err)) {
        throw new StorageError("WRITE_FAILED", `Could not create bucket ${this.bucketName}`, {
          cause: err,
        });
      }
    }
    this.bucketReady = true;
  }
}
