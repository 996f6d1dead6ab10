import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { LocalStorageProvider, createStorageProvider } from "../storage";
import { S3StorageProvider, contentTypeFor } from "../storage-s3";

describe("LocalStorageProvider", () => {
  let dir: string;
  let storage: LocalStorageProvider;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "storage-"));
    storage = new LocalStorageProvider(dir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes into nested directories and reads back", async () => {
    await storage.write("run-1/result.json", '{"ok":true}');
    expect((await storage.read("run-1/result.json")).toString("utf-8")).toBe('{"ok":true}');
  });

  it("deletes a file", async () => {
    await storage.write("run-1/prompt.txt", "prompt");
    await storage.delete("run-1/prompt.txt");
    await expect(storage.read("run-1/prompt.txt")).rejects.toThrow();
  });

  it("refuses paths that leave the base directory", async () => {
    await expect(storage.write("../escape.txt", "x")).rejects.toThrow("Path traversal detected");
    await expect(storage.read("run-1/../../etc/passwd")).rejects.toThrow("Path traversal detected");
  });
});

describe("createStorageProvider", () => {
  it("prefers S3, then a local directory, else disables archiving", () => {
    const s3 = {
      endpoint: "http://localhost:9000",
      region: "us-east-1",
      bucket: "runs",
      accessKeyId: "test-access",
      secretAccessKey: "test-secret",
    };
    expect(createStorageProvider({ dir: "archive", s3 })).toBeInstanceOf(S3StorageProvider);
    expect(createStorageProvider({ dir: "archive" })).toBeInstanceOf(LocalStorageProvider);
    expect(createStorageProvider({})).toBeNull();
  });
});

describe("contentTypeFor", () => {
  it("labels archive files by extension", () => {
    expect(contentTypeFor("run-1/result.json")).toBe("application/json");
    expect(contentTypeFor("run-1/prompt.txt")).toBe("text/plain; charset=utf-8");
  });
});
