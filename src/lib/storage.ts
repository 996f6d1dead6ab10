import { mkdir, readFile, unlink, writeFile } from "fs/promises";
import { dirname, resolve, sep } from "path";
import { S3StorageProvider, type S3Config } from "./storage-s3";

/**
 * Storage abstraction for archived run bundles.
 *
 * The local implementation writes under a base directory. Deployments without
 * a persistent disk use the S3-compatible provider with the same interface.
 *
 * Usage:
 *   const storage = createStorageProvider({ dir: "archive" });
 *   await storage.write("run-123/result.json", json);
 */
export interface StorageProvider {
  write(relativePath: string, data: Buffer | string): Promise<void>;
  read(relativePath: string): Promise<Buffer>;
  delete(relativePath: string): Promise<void>;
}

export class LocalStorageProvider implements StorageProvider {
  private basePath: string;

  constructor(basePath: string = process.cwd()) {
    this.basePath = resolve(basePath);
  }

  private resolve(relativePath: string): string {
    const fullPath = resolve(this.basePath, relativePath);
    if (fullPath !== this.basePath && !fullPath.startsWith(this.basePath + sep)) {
      throw new Error("Path traversal detected");
    }
    return fullPath;
  }

  async write(relativePath: string, data: Buffer | string): Promise<void> {
    const fullPath = this.resolve(relativePath);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, data);
  }

  async read(relativePath: string): Promise<Buffer> {
    return readFile(this.resolve(relativePath));
  }

  async delete(relativePath: string): Promise<void> {
    await unlink(this.resolve(relativePath));
  }
}

/**
 * S3 when configured, else a local directory, else null (archiving off).
 */
export function createStorageProvider(options: { dir?: string; s3?: S3Config }): StorageProvider | null {
  if (options.s3) return new S3StorageProvider(options.s3);
  if (options.dir) return new LocalStorageProvider(options.dir);
  return null;
}
