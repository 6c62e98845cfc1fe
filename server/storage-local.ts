// Local filesystem photo store, used in development
import path from "path";
import fs from "fs/promises";
import { PHOTOS_SUBDIR, UPLOAD_URL_PREFIX } from "@shared/const";
import { logger } from "./_core/logger";
import { uniquePhotoFilename } from "./photo-filename";
import { errorCode, NotFoundError, StorageError } from "./storage-errors";
import type { PhotoStore } from "./storage-interface";

const log = logger.child({ component: "storage-local" });

/** Strip leading slashes from a storage key (keeps internal segments intact). */
function normalizeKey(relKey: string): string {
  return relKey.replace(/^\/+/, "");
}

function wrapFsError(action: string, target: string, error: unknown): StorageError {
  const code = errorCode(error);
  return new StorageError(`Failed to ${action} ${target}${code ? ` (${code})` : ""}`, {
    code,
    cause: error,
  });
}

export class LocalPhotoStore implements PhotoStore {
  readonly kind = "local";
  private readonly root: string;
  private readonly publicPrefix: string;

  constructor(uploadDir: string, publicPrefix: string = UPLOAD_URL_PREFIX) {
    this.root = path.resolve(uploadDir);
    this.publicPrefix = publicPrefix.replace(/\/+$/, "");
  }

  /**
   * Resolve a relative key to an absolute file path inside the upload directory.
   * Throws if the resolved path escapes it (directory traversal).
   */
  resolvePath(relKey: string): string {
    const resolved = path.resolve(this.root, normalizeKey(relKey));
    if (!resolved.startsWith(this.root + path.sep) && resolved !== this.root) {
      throw new StorageError("Directory traversal detected", { code: "EACCES_TRAVERSAL" });
    }
    return resolved;
  }

  /** Map a public URL back to its key, or undefined when it is not served from this store. */
  keyFromUrl(url: string): string | undefined {
    const pathname = url.split(/[?#]/, 1)[0];
    if (!pathname.startsWith(this.publicPrefix + "/")) return undefined;
    try {
      return decodeURIComponent(pathname.slice(this.publicPrefix.length + 1));
    } catch {
      return undefined;
    }
  }

  async put(data: Buffer | Uint8Array, originalFilename: string): Promise<string> {
    const key = `${PHOTOS_SUBDIR}/${uniquePhotoFilename(originalFilename)}`;
    const filePath = this.resolvePath(key);

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, data);
    } catch (error) {
      throw wrapFsError("write", key, error);
    }

    log.debug("Photo stored", { key, bytes: data.byteLength });
    return `${this.publicPrefix}/${key}`;
  }

  async read(url: string): Promise<Buffer> {
    const key = this.keyFromUrl(url);
    if (key === undefined) {
      throw new NotFoundError(`${url} is not a local upload URL`);
    }
    const filePath = this.resolvePath(key);
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        throw new NotFoundError(`No photo stored at ${url}`);
      }
      throw wrapFsError("read", key, error);
    }
  }

  async delete(url: string): Promise<boolean> {
    const key = this.keyFromUrl(url);
    if (key === undefined) {
      log.warn("Refusing to delete a URL outside the upload prefix", { url });
      return false;
    }
    const filePath = this.resolvePath(key);
    try {
      await fs.unlink(filePath);
      log.debug("Photo removed", { key });
    } catch (error) {
      // Already gone is the outcome we want.
      if (errorCode(error) !== "ENOENT") {
        throw wrapFsError("delete", key, error);
      }
    }
    return true;
  }
}
