/**
 * Copy photos between the upload directory and the bucket.
 *
 *   npm run photos:backup             # UPLOAD_DIR -> bucket
 *   npm run photos:restore [prefix]   # bucket -> UPLOAD_DIR (prefix defaults to "photos/")
 *
 * Exits non-zero when the pass could not run or any file failed.
 */
import "dotenv/config";
import { PHOTOS_SUBDIR } from "@shared/const";
import { loadConfig } from "../_core/env";
import { errorMeta, logger } from "../_core/logger";
import { createBucket } from "../storage-active";
import { BackupSync, runSync } from "../storage-sync";

async function main(argv: string[]): Promise<number> {
  const [direction, prefixArg] = argv;
  if (direction !== "backup" && direction !== "restore") {
    logger.error("Usage: photo-sync <backup|restore> [prefix]");
    return 2;
  }

  const config = loadConfig();
  logger.configure({ json: config.isProduction });
  const sync = new BackupSync(createBucket(config), logger.child({ component: "photo-sync" }));

  const result =
    direction === "backup"
      ? await runSync("Backup", () => sync.backup(config.uploadDir))
      : await runSync("Restore", () => sync.restore(prefixArg ?? `${PHOTOS_SUBDIR}/`, config.uploadDir));

  result.errors.forEach((error) => logger.warn(error));
  if (result.success) {
    logger.info(result.message);
  } else {
    logger.error(result.message, { kind: result.errorKind });
  }
  return result.success && result.errors.length === 0 ? 0 : 1;
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error) => {
    logger.error("photo-sync crashed", errorMeta(error));
    process.exit(1);
  }
);
