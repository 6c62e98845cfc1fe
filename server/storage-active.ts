/**
 * Photo store selection.
 *
 * The store is chosen once, when the server starts, and handed to whatever
 * needs it. An explicit STORAGE_MODE wins; otherwise development stores
 * photos on disk and every other environment uses the bucket.
 *
 * Remote mode never falls back to local: a deployment that expects durable
 * object storage gets ConfigurationError on each operation instead of files
 * written to an ephemeral disk.
 */

import type { AppConfig, StorageMode } from "./_core/env";
import { S3Bucket, type S3ClientFactory } from "./s3-bucket";
import type { PhotoStore } from "./storage-interface";
import { LocalPhotoStore } from "./storage-local";
import { RemotePhotoStore } from "./storage-remote";

export function resolveStorageMode(config: Pick<AppConfig, "environment" | "storage">): StorageMode {
  if (config.storage.mode) return config.storage.mode;
  return config.environment === "development" ? "local" : "remote";
}

export interface StorageDeps {
  s3ClientFactory?: S3ClientFactory;
  /** Reuse an existing bucket (and its client) for the remote store. */
  bucket?: S3Bucket;
}

export function createBucket(config: AppConfig, deps: StorageDeps = {}): S3Bucket {
  return new S3Bucket(config.storage.remote, deps.s3ClientFactory);
}

export function createPhotoStore(config: AppConfig, deps: StorageDeps = {}): PhotoStore {
  if (resolveStorageMode(config) === "local") {
    return new LocalPhotoStore(config.uploadDir);
  }
  return new RemotePhotoStore(deps.bucket ?? createBucket(config, deps));
}
