import {
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import type { RemoteStorageSettings } from "./_core/env";
import { ConfigurationError, errorCode, NotFoundError, StorageError } from "./storage-errors";

export type S3Sender = Pick<S3Client, "send">;

export interface ResolvedRemoteSettings extends RemoteStorageSettings {
  bucket: string;
  accessKeyId: string;
  secretAccessKey: string;
}

export type S3ClientFactory = (settings: ResolvedRemoteSettings) => S3Sender;

export const createS3Client: S3ClientFactory = (settings) =>
  new S3Client({
    region: settings.region,
    endpoint: settings.endpointUrl,
    // S3-compatible providers address buckets by path, not by subdomain.
    forcePathStyle: Boolean(settings.endpointUrl),
    credentials: {
      accessKeyId: settings.accessKeyId,
      secretAccessKey: settings.secretAccessKey,
    },
  });

const NOT_FOUND_CODES = new Set(["NoSuchKey", "NotFound"]);

function trimSlashes(value: string): string {
  return value.replace(/\/+$/, "");
}

function encodeKey(key: string): string {
  return key.split("/").map(encodeURIComponent).join("/");
}

/**
 * Thin wrapper over one S3 bucket. Credentials are checked before the client
 * is built, so a misconfigured bucket never reaches the network.
 */
export class S3Bucket {
  private client: S3Sender | undefined;

  constructor(
    private readonly settings: RemoteStorageSettings,
    private readonly clientFactory: S3ClientFactory = createS3Client
  ) {}

  get name(): string | undefined {
    return this.settings.bucket;
  }

  /** Throws ConfigurationError naming every missing credential. */
  assertConfigured(): ResolvedRemoteSettings {
    const { accessKeyId, secretAccessKey, bucket } = this.settings;
    if (accessKeyId && secretAccessKey && bucket) {
      return { ...this.settings, accessKeyId, secretAccessKey, bucket };
    }
    const missing = [
      !accessKeyId && "S3_ACCESS_KEY",
      !secretAccessKey && "S3_SECRET_KEY",
      !bucket && "S3_BUCKET",
    ].filter((name): name is string => typeof name === "string");
    throw new ConfigurationError(`S3 credentials not configured (missing ${missing.join(", ")})`);
  }

  private connect(): { client: S3Sender; bucket: string } {
    const resolved = this.assertConfigured();
    this.client ??= this.clientFactory(resolved);
    return { client: this.client, bucket: resolved.bucket };
  }

  /** Base every public URL starts with, without a trailing slash. */
  publicBase(): string {
    const { bucket } = this.assertConfigured();
    const { cdnBaseUrl, endpointUrl, region } = this.settings;
    // A CDN base already points inside the bucket.
    if (cdnBaseUrl) return trimSlashes(cdnBaseUrl);
    if (endpointUrl) return `${trimSlashes(endpointUrl)}/${bucket}`;
    return `https://${bucket}.s3.${region}.amazonaws.com`;
  }

  publicUrl(key: string): string {
    return `${this.publicBase()}/${encodeKey(key)}`;
  }

  keyFromUrl(url: string): string | undefined {
    const base = this.publicBase() + "/";
    if (!url.startsWith(base)) return undefined;
    try {
      return url.slice(base.length).split("/").map(decodeURIComponent).join("/");
    } catch {
      return undefined;
    }
  }

  async putObject(key: string, body: Buffer | Uint8Array, contentType: string): Promise<void> {
    const { client, bucket } = this.connect();
    try {
      await client.send(
        new PutObjectCommand({ Bucket: bucket, Key: key, Body: body, ContentType: contentType })
      );
    } catch (error) {
      throw this.wrap("upload", key, error);
    }
  }

  async getObject(key: string): Promise<Buffer> {
    const { client, bucket } = this.connect();
    try {
      const result = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      if (!result.Body) {
        throw new StorageError(`S3 returned an empty body for ${key}`);
      }
      return Buffer.from(await result.Body.transformToByteArray());
    } catch (error) {
      if (NOT_FOUND_CODES.has(errorCode(error) ?? "")) {
        throw new NotFoundError(`No object stored at ${key}`);
      }
      throw this.wrap("download", key, error);
    }
  }

  /** Every object key under `prefix`, following pagination. Directory markers are skipped. */
  async listKeys(prefix: string): Promise<string[]> {
    const { client, bucket } = this.connect();
    const keys: string[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const page = await client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            Prefix: prefix || undefined,
            ContinuationToken: continuationToken,
          })
        );
        for (const object of page.Contents ?? []) {
          if (object.Key && !object.Key.endsWith("/")) keys.push(object.Key);
        }
        continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      throw this.wrap("list", prefix || "(bucket root)", error);
    }

    return keys;
  }

  private wrap(action: string, key: string, error: unknown): Error {
    if (error instanceof StorageError || error instanceof NotFoundError) return error;
    const code = errorCode(error);
    const detail = error instanceof Error ? error.message : String(error);
    return new StorageError(`S3 ${action} failed for ${key}: ${detail}`, { code, cause: error });
  }
}
