// S3-compatible object storage photo store, used outside development
import { PHOTOS_SUBDIR } from "@shared/const";
import { logger } from "./_core/logger";
import { contentTypeFor, uniquePhotoFilename } from "./photo-filename";
import type { S3Bucket } from "./s3-bucket";
import { NotFoundError } from "./storage-errors";
import type { PhotoStore } from "./storage-interface";

const log = logger.child({ component: "storage-remote" });

export class RemotePhotoStore implements PhotoStore {
  readonly kind = "remote";

  constructor(private readonly bucket: S3Bucket) {}

  async put(data: Buffer | Uint8Array, originalFilename: string): Promise<string> {
    // Fail on missing credentials before any key is generated or request built.
    this.bucket.assertConfigured();

    const filename = uniquePhotoFilename(originalFilename);
    const key = `${PHOTOS_SUBDIR}/${filename}`;
    await this.bucket.putObject(key, data, contentTypeFor(filename));

    log.debug("Photo uploaded", { bucket: this.bucket.name, key, bytes: data.byteLength });
    return this.bucket.publicUrl(key);
  }

  async read(url: string): Promise<Buffer> {
    const key = this.bucket.keyFromUrl(url);
    if (key === undefined) {
      throw new NotFoundError(`${url} is not served from bucket ${this.bucket.name ?? ""}`);
    }
    return this.bucket.getObject(key);
  }

  /** The object stays in the bucket; callers drop only their reference. */
  async delete(url: string): Promise<boolean> {
    log.info("Remote photo retained; only the reference is removed", { url });
    return false;
  }
}
