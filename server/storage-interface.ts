/**
 * Common contract for photo storage backends.
 *
 * Two implementations exist:
 *  - storage-local.ts:  files under the upload directory, served by Express
 *  - storage-remote.ts: objects in an S3-compatible bucket
 *
 * storage-active.ts picks one at startup from the configuration.
 */

export type StorageKind = "local" | "remote";

export interface PhotoStore {
  readonly kind: StorageKind;

  /**
   * Persist the bytes under a freshly generated unique filename.
   * @returns the public URL the photo is served from.
   */
  put(data: Buffer | Uint8Array, originalFilename: string): Promise<string>;

  /**
   * Fetch the bytes behind a URL previously returned by `put`.
   * Throws NotFoundError when nothing is stored there.
   */
  read(url: string): Promise<Buffer>;

  /**
   * Ensure the photo behind `url` is gone.
   * @returns true when the photo is absent afterwards (including when it never
   *   existed), false when this backend does not remove the URL.
   */
  delete(url: string): Promise<boolean>;
}
