/**
 * Demo data for a fresh install: staff accounts, products, registrants and
 * the bundled sample photos. Every row has a fixed id, so seeding again
 * overwrites the demo rows instead of duplicating them.
 */
import path from "path";
import fs from "fs/promises";
import { hash } from "bcryptjs";
import { SAMPLE_PHOTOS_SUBDIR, UPLOAD_URL_PREFIX } from "@shared/const";
import type { StorageMode } from "./_core/env";
import { errorMeta, type Logger } from "./_core/logger";
import type { ProductRepository, RegistrantRepository, UserRepository } from "./db";
import { demoProducts, demoRegistrants, demoUsers } from "./demo-data";
import type { S3Bucket } from "./s3-bucket";
import { errorCode } from "./storage-errors";
import type { BackupSync } from "./storage-sync";

const SAMPLE_PHOTO = /\.(jpe?g|png)$/i;
const DEMO_ADMIN_ID = "demo-admin";

export interface DemoSeedDeps {
  storageMode: StorageMode;
  uploadDir: string;
  bucket: S3Bucket;
  backupSync: BackupSync;
  users: UserRepository;
  registrants: RegistrantRepository;
  products: ProductRepository;
  log: Logger;
}

export interface DemoAdmin {
  email: string;
  password: string;
  name?: string;
}

export interface DemoSeedOptions {
  /** Only created or promoted when given; there are no default credentials. */
  admin?: DemoAdmin;
  bcryptRounds?: number;
}

export interface DemoSeedReport {
  admin: "created" | "updated" | "skipped";
  users: number;
  products: number;
  registrants: number;
  /** Registrants that were given a sample photo. */
  photos: number;
  errors: string[];
}

export class DemoSeeder {
  constructor(private readonly deps: DemoSeedDeps) {}

  async seed(options: DemoSeedOptions = {}): Promise<DemoSeedReport> {
    const { users, products, registrants, log } = this.deps;
    const report: DemoSeedReport = { admin: "skipped", users: 0, products: 0, registrants: 0, photos: 0, errors: [] };

    if (options.admin) {
      report.admin = await this.upsertAdmin(options.admin, options.bcryptRounds ?? 12);
    }

    for (const user of demoUsers) {
      await users.upsertUser(user);
      report.users += 1;
    }
    for (const product of demoProducts) {
      await products.upsertProduct(product);
      report.products += 1;
    }

    let photoUrls: string[] = [];
    try {
      photoUrls = await this.publishSamplePhotos(report.errors);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      report.errors.push(`${SAMPLE_PHOTOS_SUBDIR}: ${message}`);
      log.warn("Sample photos were not published", errorMeta(error));
    }

    for (const [index, registrant] of demoRegistrants.entries()) {
      const photoUrl = index < photoUrls.length ? photoUrls[index] : undefined;
      await registrants.upsertRegistrant({ ...registrant, photoUrl });
      report.registrants += 1;
      if (photoUrl) report.photos += 1;
    }

    log.info("Demo data seeded", {
      admin: report.admin,
      users: report.users,
      products: report.products,
      registrants: report.registrants,
      photos: report.photos,
    });
    return report;
  }

  private async upsertAdmin(admin: DemoAdmin, rounds: number): Promise<DemoSeedReport["admin"]> {
    const existing = await this.deps.users.getUserByEmail(admin.email);
    await this.deps.users.upsertUser({
      id: existing?.id ?? DEMO_ADMIN_ID,
      email: admin.email,
      name: admin.name ?? existing?.name ?? "Demo Admin",
      passwordHash: await hash(admin.password, rounds),
      loginMethod: "password",
      role: "admin",
      isActive: true,
    });
    return existing ? "updated" : "created";
  }

  /**
   * Make the sample photos under `<uploadDir>/sample_photos` reachable and
   * return their URLs in file-name order. Locally they are already served;
   * remotely they are backed up under the `sample_photos/` prefix and only
   * the keys the bucket now holds are returned.
   */
  private async publishSamplePhotos(errors: string[]): Promise<string[]> {
    const { storageMode, uploadDir, bucket, backupSync, log } = this.deps;
    const dir = path.join(uploadDir, SAMPLE_PHOTOS_SUBDIR);

    let names: string[];
    try {
      names = (await fs.readdir(dir)).filter((name) => SAMPLE_PHOTO.test(name)).sort();
    } catch (error) {
      if (errorCode(error) !== "ENOENT") throw error;
      log.warn("No sample photos directory", { dir });
      return [];
    }
    if (names.length === 0) return [];

    if (storageMode === "local") {
      return names.map((name) => `${UPLOAD_URL_PREFIX}/${SAMPLE_PHOTOS_SUBDIR}/${name}`);
    }

    const prefix = `${SAMPLE_PHOTOS_SUBDIR}/`;
    const sync = await backupSync.backup(dir, { keyPrefix: prefix });
    errors.push(...sync.errors.map((error) => prefix + error));

    const stored = new Set(await bucket.listKeys(prefix));
    return names
      .map((name) => prefix + name)
      .filter((key) => stored.has(key))
      .map((key) => bucket.publicUrl(key));
  }
}
