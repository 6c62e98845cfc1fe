import path from "path";
import os from "os";
import fs from "fs/promises";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig } from "./_core/env";
import { S3Bucket } from "./s3-bucket";
import { createPhotoStore, resolveStorageMode } from "./storage-active";
import { ConfigurationError } from "./storage-errors";
import { createFakeS3 } from "./testing/fake-s3";

let uploadDir: string;

beforeEach(async () => {
  uploadDir = await fs.mkdtemp(path.join(os.tmpdir(), "photos-active-"));
});

afterEach(async () => {
  await fs.rm(uploadDir, { recursive: true, force: true });
});

describe("resolveStorageMode", () => {
  it.each([
    [{}, "local"],
    [{ ENVIRONMENT: "development" }, "local"],
    [{ ENVIRONMENT: "production" }, "remote"],
    [{ ENVIRONMENT: "staging" }, "remote"],
    [{ ENVIRONMENT: "test" }, "remote"],
    [{ ENVIRONMENT: "production", STORAGE_MODE: "local" }, "local"],
    [{ ENVIRONMENT: "development", STORAGE_MODE: "remote" }, "remote"],
  ])("resolves %o to %s", (env, expected) => {
    expect(resolveStorageMode(loadConfig(env))).toBe(expected);
  });
});

describe("createPhotoStore", () => {
  it("stores photos on disk in development", async () => {
    const store = createPhotoStore(loadConfig({ UPLOAD_DIR: uploadDir }));
    expect(store.kind).toBe("local");

    const url = await store.put(Buffer.from("x"), "a.png");
    const file = path.join(uploadDir, url.replace("/static/uploads/", ""));
    expect(await fs.readFile(file, "utf-8")).toBe("x");
  });

  it("uses the bucket in production", async () => {
    const fake = createFakeS3();
    const config = loadConfig({
      ENVIRONMENT: "production",
      UPLOAD_DIR: uploadDir,
      S3_BUCKET: "registrant-photos",
      S3_ACCESS_KEY: "test-access-key",
      S3_SECRET_KEY: "test-secret",
    });
    const store = createPhotoStore(config, { s3ClientFactory: fake.factory });

    expect(store.kind).toBe("remote");
    await store.put(Buffer.from("x"), "a.png");
    expect(fake.objects.size).toBe(1);
  });

  it("does not fall back to disk when remote credentials are missing", async () => {
    const fake = createFakeS3();
    const store = createPhotoStore(
      loadConfig({ ENVIRONMENT: "production", UPLOAD_DIR: uploadDir }),
      { s3ClientFactory: fake.factory }
    );

    expect(store.kind).toBe("remote");
    await expect(store.put(Buffer.from("x"), "a.png")).rejects.toBeInstanceOf(ConfigurationError);
    expect(await fs.readdir(uploadDir)).toEqual([]);
    expect(fake.send).not.toHaveBeenCalled();
  });

  it("reuses a bucket that is handed in", async () => {
    const fake = createFakeS3();
    const config = loadConfig({
      STORAGE_MODE: "remote",
      S3_BUCKET: "shared",
      S3_ACCESS_KEY: "test-access-key",
      S3_SECRET_KEY: "test-secret",
    });
    const bucket = new S3Bucket(config.storage.remote, fake.factory);
    const store = createPhotoStore(config, { bucket });

    const url = await store.put(Buffer.from("x"), "a.jpg");
    expect(bucket.keyFromUrl(url)).toMatch(/^photos\/[A-Za-z0-9_-]{21}\.jpg$/);
    expect(fake.factory).toHaveBeenCalledTimes(1);
  });
});
