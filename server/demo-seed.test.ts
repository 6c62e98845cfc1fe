/**
 * Demo seeding against in-memory repositories, a temp upload directory and
 * the fake bucket.
 */

import path from "path";
import os from "os";
import fs from "fs/promises";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { compare } from "bcryptjs";
import type { RemoteStorageSettings, StorageMode } from "./_core/env";
import { Logger } from "./_core/logger";
import { DemoSeeder } from "./demo-seed";
import { S3Bucket } from "./s3-bucket";
import { BackupSync } from "./storage-sync";
import { createFakeS3, providerError } from "./testing/fake-s3";
import { MemoryProducts } from "./testing/memory-products";
import { MemoryRegistrants } from "./testing/memory-registrants";
import { makeUser, MemoryUsers } from "./testing/memory-users";

const quietLogger = new Logger({}, { level: "error" });

const remoteSettings: RemoteStorageSettings = {
  endpointUrl: "https://objects.example.test",
  region: "us-east-1",
  bucket: "registrant-photos",
  accessKeyId: "test-access-key",
  secretAccessKey: "test-secret",
  cdnBaseUrl: undefined,
};

let uploadDir: string;
let fake: ReturnType<typeof createFakeS3>;
let users: MemoryUsers;
let registrants: MemoryRegistrants;
let products: MemoryProducts;

function seeder(storageMode: StorageMode, settings: RemoteStorageSettings = remoteSettings): DemoSeeder {
  const bucket = new S3Bucket(settings, fake.factory);
  return new DemoSeeder({
    storageMode,
    uploadDir,
    bucket,
    backupSync: new BackupSync(bucket, quietLogger),
    users,
    registrants,
    products,
    log: quietLogger,
  });
}

async function addSamplePhotos(names: string[]) {
  const dir = path.join(uploadDir, "sample_photos");
  await fs.mkdir(dir, { recursive: true });
  for (const name of names) {
    await fs.writeFile(path.join(dir, name), `bytes of ${name}`);
  }
}

beforeEach(async () => {
  uploadDir = await fs.mkdtemp(path.join(os.tmpdir(), "photos-demo-"));
  fake = createFakeS3();
  users = new MemoryUsers();
  registrants = new MemoryRegistrants();
  products = new MemoryProducts();
});

afterEach(async () => {
  await fs.rm(uploadDir, { recursive: true, force: true });
});

describe("DemoSeeder in local mode", () => {
  it("seeds every table and points registrants at the served sample photos", async () => {
    await addSamplePhotos(["c.jpg", "a.jpg", "readme.txt", "b.png"]);

    const report = await seeder("local").seed();

    expect(report).toEqual({ admin: "skipped", users: 3, products: 4, registrants: 4, photos: 3, errors: [] });
    expect(registrants.rows.get("demo-registrant-1")?.photoUrl).toBe("/static/uploads/sample_photos/a.jpg");
    expect(registrants.rows.get("demo-registrant-2")?.photoUrl).toBe("/static/uploads/sample_photos/b.png");
    expect(registrants.rows.get("demo-registrant-3")?.photoUrl).toBe("/static/uploads/sample_photos/c.jpg");
    expect(registrants.rows.get("demo-registrant-4")?.photoUrl).toBeNull();
    expect(users.rows.every((u) => u.passwordHash === null)).toBe(true);
    expect(fake.send).not.toHaveBeenCalled();
  });

  it("seeds without photos when there is no sample directory", async () => {
    const report = await seeder("local").seed();

    expect(report.photos).toBe(0);
    expect(report.errors).toEqual([]);
    expect(registrants.rows.size).toBe(4);
  });

  it("creates the admin only when credentials are given", async () => {
    const report = await seeder("local").seed({
      admin: { email: "Owner@Example.test", password: "test-password" },
      bcryptRounds: 4,
    });

    expect(report.admin).toBe("created");
    const admin = users.rows.find((u) => u.id === "demo-admin");
    expect(admin).toMatchObject({ email: "owner@example.test", name: "Demo Admin", role: "admin", isActive: true });
    await expect(compare("test-password", admin?.passwordHash ?? "")).resolves.toBe(true);
  });

  it("promotes an existing account instead of adding a second one", async () => {
    users.rows.push(makeUser({ id: "staff-7", email: "owner@example.test", name: "Casey" }));

    const report = await seeder("local").seed({
      admin: { email: "owner@example.test", password: "test-password" },
      bcryptRounds: 4,
    });

    expect(report.admin).toBe("updated");
    expect(users.rows.filter((u) => u.email === "owner@example.test")).toEqual([
      expect.objectContaining({ id: "staff-7", name: "Casey", role: "admin" }),
    ]);
  });

  it("can run again without duplicating rows or dropping staff notes", async () => {
    await addSamplePhotos(["a.jpg"]);
    await seeder("local").seed();
    await registrants.setNotes("demo-registrant-1", "Prefers email");

    await seeder("local").seed();

    expect(users.rows).toHaveLength(3);
    expect(products.rows.size).toBe(4);
    expect(registrants.rows.size).toBe(4);
    expect(registrants.rows.get("demo-registrant-1")).toMatchObject({
      notes: "Prefers email",
      photoUrl: "/static/uploads/sample_photos/a.jpg",
    });
  });
});

describe("DemoSeeder in remote mode", () => {
  it("backs the sample photos up to the bucket and links their public URLs", async () => {
    await addSamplePhotos(["a.jpg", "b.jpg"]);

    const report = await seeder("remote").seed();

    expect(report.photos).toBe(2);
    expect([...fake.objects.keys()].sort()).toEqual(["sample_photos/a.jpg", "sample_photos/b.jpg"]);
    expect(registrants.rows.get("demo-registrant-1")?.photoUrl).toBe(
      "https://objects.example.test/registrant-photos/sample_photos/a.jpg"
    );
  });

  it("skips a photo the bucket refused and reports it", async () => {
    await addSamplePhotos(["a.jpg", "b.png", "c.jpg"]);
    fake.failures.set("sample_photos/b.png", providerError("SlowDown", "Please reduce your request rate."));

    const report = await seeder("remote").seed();

    expect(report.photos).toBe(2);
    expect(report.errors).toEqual([
      "sample_photos/b.png: S3 upload failed for sample_photos/b.png: Please reduce your request rate.",
    ]);
    expect(registrants.rows.get("demo-registrant-2")?.photoUrl).toBe(
      "https://objects.example.test/registrant-photos/sample_photos/c.jpg"
    );
  });

  it("still seeds the rows when the bucket is not configured", async () => {
    await addSamplePhotos(["a.jpg"]);

    const report = await seeder("remote", {
      ...remoteSettings,
      accessKeyId: undefined,
      secretAccessKey: undefined,
      bucket: undefined,
    }).seed();

    expect(report).toMatchObject({ registrants: 4, photos: 0 });
    expect(report.errors).toEqual([
      "sample_photos: S3 credentials not configured (missing S3_ACCESS_KEY, S3_SECRET_KEY, S3_BUCKET)",
    ]);
  });
});
