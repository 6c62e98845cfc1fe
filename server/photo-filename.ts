import path from "path";
import { nanoid } from "nanoid";

const DEFAULT_EXTENSION = ".jpg";
const SAFE_EXTENSION = /^\.[A-Za-z0-9]{1,10}$/;

const contentTypes: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".heic": "image/heic",
  ".heif": "image/heif",
  ".avif": "image/avif",
  ".svg": "image/svg+xml",
};

/**
 * Generate a storage filename for an uploaded photo: a random 21-character
 * token plus the original extension (".jpg" when there is none, or when it
 * contains anything but letters and digits).
 *
 * Concurrent uploads never share a name, so no locking is needed around writes.
 */
export function uniquePhotoFilename(originalFilename: string | undefined): string {
  const ext = originalFilename ? path.extname(originalFilename) : "";
  return `${nanoid()}${SAFE_EXTENSION.test(ext) ? ext : DEFAULT_EXTENSION}`;
}

export function contentTypeFor(filename: string): string {
  return contentTypes[path.extname(filename).toLowerCase()] ?? "application/octet-stream";
}
