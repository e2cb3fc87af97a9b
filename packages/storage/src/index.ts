/**
 * @budgetme/storage — Ledger persistence.
 *
 * Provides:
 * - The StorageProvider contract
 * - The persisted-document codec (snake_case JSON, versioned)
 * - LocalFileProvider, S3Provider and InMemoryProvider
 * - The StorageConfig sum type and createProvider()
 */

// Contract
export type { StorageProvider, StorageErrorCode } from "./types.js";
export { StorageError } from "./types.js";

// Codec
export type { LedgerDocument } from "./codec.js";
export {
  SUPPORTED_VERSIONS,
  LedgerDocumentSchema,
  decodeLedger,
  encodeLedger,
} from "./codec.js";

// Providers
export type { LocalFileProviderOptions } from "./local-provider.js";
export { DATA_FILE_NAME, expandHome, LocalFileProvider } from "./local-provider.js";

export type { S3ObjectClient, S3ProviderOptions } from "./s3-provider.js";
export { OBJECT_KEY, isMissingObjectError, wrapS3Client, S3Provider } from "./s3-provider.js";

export { InMemoryProvider } from "./memory-provider.js";

// Configuration
export type {
  LocalStorageConfig,
  S3StorageConfig,
  StorageConfig,
  StorageKind,
  CreateProviderOptions,
} from "./config.js";
export {
  DEFAULT_REGION,
  LocalStorageConfigSchema,
  S3StorageConfigSchema,
  StorageConfigSchema,
  generateBucketName,
  defaultLocalConfig,
  defaultS3Config,
  createProvider,
} from "./config.js";
