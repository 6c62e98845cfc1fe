import {
  createProductRepository,
  createRegistrantRepository,
  createUserRepository,
  type Database,
  type UserRepository,
} from "../db";
import { ProductService } from "../product-service";
import { RegistrantService } from "../registrant-service";
import type { S3Bucket } from "../s3-bucket";
import { createBucket, createPhotoStore, resolveStorageMode, type StorageDeps } from "../storage-active";
import type { PhotoStore } from "../storage-interface";
import { BackupSync } from "../storage-sync";
import type { AppConfig, StorageMode } from "./env";
import { logger } from "./logger";
import { SessionManager } from "./sdk";

/** Everything a request handler needs, built once at startup. */
export interface AppServices {
  config: AppConfig;
  storageMode: StorageMode;
  photoStore: PhotoStore;
  bucket: S3Bucket;
  backupSync: BackupSync;
  registrants: RegistrantService;
  products: ProductService;
  users: UserRepository;
  sessions: SessionManager;
}

export function createServices(
  config: AppConfig,
  db: Database,
  storageDeps: StorageDeps = {}
): AppServices {
  const users = createUserRepository(db);
  const bucket = createBucket(config, storageDeps);
  const photoStore = createPhotoStore(config, { ...storageDeps, bucket });

  return {
    config,
    storageMode: resolveStorageMode(config),
    photoStore,
    bucket,
    backupSync: new BackupSync(bucket, logger.child({ component: "backup-sync" })),
    registrants: new RegistrantService(
      photoStore,
      createRegistrantRepository(db),
      logger.child({ component: "registrants" })
    ),
    products: new ProductService(createProductRepository(db)),
    users,
    sessions: new SessionManager(config.secretKey, users),
  };
}
