/**
 * Bulk copy between the upload directory and the bucket.
 *
 * Both directions are best-effort and sequential: a failing file is recorded
 * and the pass moves on, so a report always comes back. Neither direction
 * diffs anything; backup re-uploads every file and restore overwrites local
 * copies byte-for-byte.
 */

import path from "path";
import fs from "fs/promises";
import type { Dirent } from "fs";
import type { Logger } from "./_core/logger";
import { contentTypeFor } from "./photo-filename";
import type { S3Bucket } from "./s3-bucket";
import { errorCode, failureFrom, StorageError, type StorageErrorKind } from "./storage-errors";

export interface SyncReport {
  /** Files transferred successfully. */
  count: number;
  /** One "<path or key>: <reason>" entry per file that failed. */
  errors: string[];
}

export interface BackupOptions {
  /** Prepended to every relative path to form the object key. */
  keyPrefix?: string;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join("/");
}

export type DirectoryReader = (dir: string) => Promise<Dirent[]>;

export const readDirectory: DirectoryReader = (dir) => fs.readdir(dir, { withFileTypes: true });

interface Listing {
  files: string[];
  /** Subdirectories that could not be read, as "<relative dir>: <reason>". */
  errors: string[];
}

/**
 * Collect every file under `root` in sorted order. Only a failure to read the
 * root itself is thrown; an unreadable subdirectory is recorded and skipped.
 */
async function listFilesRecursive(
  readDir: DirectoryReader,
  root: string,
  dir: string = root,
  listing: Listing = { files: [], errors: [] }
): Promise<Listing> {
  let entries: Dirent[];
  try {
    entries = await readDir(dir);
  } catch (error) {
    if (dir === root) throw error;
    listing.errors.push(`${toPosix(path.relative(root, dir))}: ${describe(error)}`);
    return listing;
  }
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const absolute = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await listFilesRecursive(readDir, root, absolute, listing);
    } else if (entry.isFile() || entry.isSymbolicLink()) {
      listing.files.push(absolute);
    }
  }
  return listing;
}

function isInside(parent: string, candidate: string): boolean {
  return candidate.startsWith(parent + path.sep);
}

export class BackupSync {
  constructor(
    private readonly bucket: S3Bucket,
    private readonly log: Logger,
    private readonly readDir: DirectoryReader = readDirectory
  ) {}

  /**
   * Upload every file under `localRoot`, keyed by its path relative to the
   * root. Symlinks are followed only when their target stays inside the root.
   */
  async backup(localRoot: string, options: BackupOptions = {}): Promise<SyncReport> {
    this.bucket.assertConfigured();
    const root = path.resolve(localRoot);
    const keyPrefix = options.keyPrefix ?? "";

    let listing: Listing;
    let realRoot: string;
    try {
      listing = await listFilesRecursive(this.readDir, root);
      realRoot = await fs.realpath(root);
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return { count: 0, errors: [`${localRoot}: directory not found`] };
      }
      throw new StorageError(`Failed to list ${localRoot}: ${describe(error)}`, {
        code: errorCode(error),
        cause: error,
      });
    }

    for (const dirError of listing.errors) {
      this.log.warn("Backup skipped a directory", { err: dirError });
    }

    const report: SyncReport = { count: 0, errors: [...listing.errors] };
    for (const file of listing.files) {
      const relative = toPosix(path.relative(root, file));
      const key = keyPrefix + relative;
      try {
        if (!isInside(realRoot, await fs.realpath(file))) {
          report.errors.push(`${relative}: resolves outside ${localRoot}`);
          continue;
        }
        const data = await fs.readFile(file);
        await this.bucket.putObject(key, data, contentTypeFor(file));
        report.count += 1;
      } catch (error) {
        report.errors.push(`${relative}: ${describe(error)}`);
        this.log.warn("Backup skipped a file", { file: relative, err: describe(error) });
      }
    }

    this.log.info("Backup finished", {
      bucket: this.bucket.name,
      uploaded: report.count,
      failed: report.errors.length,
    });
    return report;
  }

  /**
   * Download every object under `remotePrefix` into `localRoot`, keeping the
   * full key as the relative path. Existing files are overwritten.
   */
  async restore(remotePrefix: string, localRoot: string): Promise<SyncReport> {
    this.bucket.assertConfigured();
    const root = path.resolve(localRoot);
    const keys = await this.bucket.listKeys(remotePrefix);

    const report: SyncReport = { count: 0, errors: [] };
    for (const key of keys) {
      const target = path.resolve(root, key);
      if (!isInside(root, target)) {
        report.errors.push(`${key}: resolves outside ${localRoot}`);
        continue;
      }
      try {
        const data = await this.bucket.getObject(key);
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, data);
        report.count += 1;
      } catch (error) {
        report.errors.push(`${key}: ${describe(error)}`);
        this.log.warn("Restore skipped an object", { key, err: describe(error) });
      }
    }

    this.log.info("Restore finished", {
      bucket: this.bucket.name,
      prefix: remotePrefix,
      downloaded: report.count,
      failed: report.errors.length,
    });
    return report;
  }
}

export interface SyncResult extends SyncReport {
  success: boolean;
  message: string;
  errorKind?: StorageErrorKind;
}

/**
 * Run a backup or restore pass and fold the outcome into a result the HTTP
 * layer can render. Per-file errors keep `success` true; only a pass that
 * could not start (credentials, listing) reports failure.
 */
export async function runSync(action: "Backup" | "Restore", pass: () => Promise<SyncReport>): Promise<SyncResult> {
  try {
    const report = await pass();
    const failed = report.errors.length;
    return {
      success: true,
      message: `${action} finished: ${report.count} file(s) copied${failed > 0 ? `, ${failed} failed` : ""}`,
      ...report,
    };
  } catch (error) {
    const failure = failureFrom(error, `${action} failed`);
    return { ...failure, count: 0, errors: [] };
  }
}
