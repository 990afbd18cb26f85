import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { GetObjectCommand, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import type { StoredArtifact } from "./types.js";

export type StorageConfig = {
  type: "local" | "s3";
  dir: string;
  bucket?: string;
  region?: string;
  endpoint?: string;
  forcePathStyle?: boolean;
  accessKeyId?: string;
  secretAccessKey?: string;
};

export type StorageClient = {
  put: (key: string, body: string, contentType?: string) => Promise<StoredArtifact>;
  get: (key: string) => Promise<string | null>;
};

export function describeStorage(config: StorageConfig) {
  return {
    type: config.type,
    dir: config.type === "local" ? resolve(config.dir) : null,
    bucket: config.bucket ?? null,
    region: config.region ?? null,
    endpoint: config.endpoint ?? null
  };
}

export function createStorageClient(config: StorageConfig): StorageClient {
  if (config.type === "s3") {
    return createS3Client(config);
  }
  return createLocalClient(resolve(config.dir));
}

function createLocalClient(basePath: string): StorageClient {
  return {
    async put(key, body) {
      const filePath = resolve(basePath, key);
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, body, "utf8");
      return {
        key,
        uri: filePath,
        size: Buffer.byteLength(body, "utf8")
      };
    },
    async get(key) {
      try {
        return await readFile(resolve(basePath, key), "utf8");
      } catch (error) {
        if (isErrorWithCode(error, "ENOENT")) return null;
        throw error;
      }
    }
  };
}

function createS3Client(config: StorageConfig): StorageClient {
  const bucket = config.bucket;
  if (!bucket) {
    throw new Error("Missing storage bucket for S3.");
  }
  const client = new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    credentials: config.accessKeyId
      ? {
          accessKeyId: config.accessKeyId,
          secretAccessKey: config.secretAccessKey ?? ""
        }
      : undefined
  });

  return {
    async put(key, body, contentType) {
      await client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentType: contentType ?? "text/plain; charset=utf-8"
        })
      );
      return {
        key,
        uri: `s3://${bucket}/${key}`,
        size: Buffer.byteLength(body, "utf8")
      };
    },
    async get(key) {
      try {
        const response = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
        return (await response.Body?.transformToString("utf-8")) ?? null;
      } catch (error) {
        if (error instanceof Error && error.name === "NoSuchKey") return null;
        throw error;
      }
    }
  };
}

function isErrorWithCode(error: unknown, code: string) {
  return error instanceof Error && "code" in error && error.code === code;
}
