/**
 * Fill a fresh database with demo staff, products and registrants, and
 * publish the sample photos under UPLOAD_DIR/sample_photos.
 *
 *   npm run db:push
 *   npm run init-demo                                          # no admin account
 *   npm run init-demo -- admin@example.com 'a-long-password' ["Display Name"]
 */
import "dotenv/config";
import { z } from "zod";
import { loadConfig } from "../_core/env";
import { errorMeta, logger } from "../_core/logger";
import { connectDatabase, createProductRepository, createRegistrantRepository, createUserRepository } from "../db";
import { DemoSeeder, type DemoAdmin } from "../demo-seed";
import { createBucket, resolveStorageMode } from "../storage-active";
import { BackupSync } from "../storage-sync";

const adminArgsSchema = z
  .tuple([z.string().email(), z.string().min(8, "Password must be at least 8 characters")])
  .rest(z.string());

async function main(argv: string[]): Promise<number> {
  let admin: DemoAdmin | undefined;
  if (argv.length > 0) {
    const parsed = adminArgsSchema.safeParse(argv);
    if (!parsed.success) {
      logger.error("Usage: init-demo [<admin email> <admin password> [name]]", {
        issues: parsed.error.issues.map((i) => i.message),
      });
      return 2;
    }
    const [email, password, ...rest] = parsed.data;
    admin = { email, password, name: rest.join(" ").trim() || undefined };
  }

  const config = loadConfig();
  logger.configure({ json: config.isProduction });
  const db = connectDatabase(config.databaseUrl);
  const bucket = createBucket(config);
  const log = logger.child({ component: "init-demo" });

  const seeder = new DemoSeeder({
    storageMode: resolveStorageMode(config),
    uploadDir: config.uploadDir,
    bucket,
    backupSync: new BackupSync(bucket, log),
    users: createUserRepository(db),
    registrants: createRegistrantRepository(db),
    products: createProductRepository(db),
    log,
  });

  const report = await seeder.seed({ admin });
  report.errors.forEach((error) => logger.warn(error));
  logger.info("Demo initialization complete", {
    admin: report.admin,
    users: report.users,
    products: report.products,
    registrants: report.registrants,
    photos: report.photos,
  });
  return report.errors.length === 0 ? 0 : 1;
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error) => {
    logger.error("init-demo failed", errorMeta(error));
    process.exit(1);
  }
);
