import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  DeleteObjectCommand,
} from "@aws-sdk/client-s3";
import type { StorageProvider } from "./storage";

export interface S3Config {
  endpoint: string;
  region: string;
  bucket: string;
  accessKeyId: string;
  secretAccessKey: string;
  pathPrefix?: string;
  forcePathStyle?: boolean;
}

/** Archive bundles hold JSON documents and plain-text prompts. */
export function contentTypeFor(relativePath: string): string {
  if (relativePath.endsWith(".json")) return "application/json";
  return "text/plain; charset=utf-8";
}

export class S3StorageProvider implements StorageProvider {
  private client: S3Client;
  private bucket: string;
  private pathPrefix: string;

  constructor(config: S3Config) {
    this.client = new S3Client({
      endpoint: config.endpoint,
      region: config.region,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
      forcePathStyle: config.forcePathStyle ?? false,
    });
    this.bucket = config.bucket;
    this.pathPrefix = config.pathPrefix || "";
  }

  private key(relativePath: string): string {
    return this.pathPrefix + relativePath;
  }

  async write(relativePath: string, data: Buffer | string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: this.key(relativePath),
        Body: data,
        ContentType: contentTypeFor(relativePath),
      })
    );
  }

  async read(relativePath: string): Promise<Buffer> {
    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: this.bucket,
        Key: this.key(relativePath),
      })
    );
    if (!response.Body) {
      throw new Error(`Empty object body for ${this.key(relativePath)}`);
    }
    return Buffer.from(await response.Body.transformToByteArray());
  }

  async delete(relativePath: string): Promise<void> {
    await this.client.send(
      new DeleteObjectCommand({
        Bucket: this.bucket,
        Key: this.key(relativePath),
      })
    );
  }
}
