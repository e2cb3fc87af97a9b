/**
 * @budgetme/storage — Storage configuration and provider factory.
 *
 * Exactly one storage backend is active at a time, so the configuration
 * is a sum type selected by `kind`.
 */

import { randomInt } from "node:crypto";
import { S3Client } from "@aws-sdk/client-s3";
import { z } from "zod";
import type { Logger } from "pino";
import { LocalFileProvider } from "./local-provider.js";
import { S3Provider, wrapS3Client, type S3ObjectClient } from "./s3-provider.js";
import type { StorageProvider } from "./types.js";

export const DEFAULT_REGION = "us-east-1";

// =============================================================================
// Schema
// =============================================================================

export const LocalStorageConfigSchema = z.object({
  kind: z.literal("local"),
  path: z.string().min(1),
});

export const S3StorageConfigSchema = z.object({
  kind: z.literal("s3"),
  accessKey: z.string().default(""),
  secretKey: z.string().default(""),
  bucketName: z.string().min(1),
  region: z.string().min(1).default(DEFAULT_REGION),
  endpoint: z.string().url().optional(),
});

export const StorageConfigSchema = z.discriminatedUnion("kind", [
  LocalStorageConfigSchema,
  S3StorageConfigSchema,
]);

export type LocalStorageConfig = z.infer<typeof LocalStorageConfigSchema>;
export type S3StorageConfig = z.infer<typeof S3StorageConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type StorageKind = StorageConfig["kind"];

// =============================================================================
// Defaults
// =============================================================================

const BUCKET_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

/**
 * `bucket-` followed by eight random lower-case alphanumerics.
 */
export function generateBucketName(): string {
  let suffix = "";
  for (let i = 0; i < 8; i++) {
    suffix += BUCKET_ALPHABET.charAt(randomInt(BUCKET_ALPHABET.length));
  }
  return `bucket-${suffix}`;
}

export function defaultLocalConfig(dataDirectory: string): LocalStorageConfig {
  return { kind: "local", path: dataDirectory };
}

export function defaultS3Config(): S3StorageConfig {
  return {
    kind: "s3",
    accessKey: "",
    secretKey: "",
    bucketName: generateBucketName(),
    region: DEFAULT_REGION,
  };
}

// =============================================================================
// Factory
// =============================================================================

export interface CreateProviderOptions {
  readonly logger?: Logger | undefined;
  /** Replaces the client built from the configuration's credentials */
  readonly s3Client?: S3ObjectClient | undefined;
}

function buildS3Client(config: S3StorageConfig): S3ObjectClient {
  const client = new S3Client({
    region: config.region,
    credentials: {
      accessKeyId: config.accessKey,
      secretAccessKey: config.secretKey,
    },
    // S3-compatible stores generally address buckets by path.
    ...(config.endpoint !== undefined ? { endpoint: config.endpoint, forcePathStyle: true } : {}),
  });
  return wrapS3Client(client);
}

export function createProvider(
  config: StorageConfig,
  options: CreateProviderOptions = {},
): StorageProvider {
  switch (config.kind) {
    case "local":
      return new LocalFileProvider(config.path, { logger: options.logger });
    case "s3":
      return new S3Provider({
        bucketName: config.bucketName,
        region: config.region,
        client: options.s3Client ?? buildS3Client(config),
        logger: options.logger,
      });
  }
}
