import { GetObjectCommand, HeadObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { ObjectStoreError } from '../errors';
import type { ObjectStore, UploadOptions } from './objectStore';
import { normalizeObjectPath } from './objectStore';

export type S3ObjectStoreConfig = {
  bucket: string;
  region?: string;
  endpoint?: string;
  forcePathStyle?: boolean;
  accessKeyId?: string;
  secretAccessKey?: string;
  sessionToken?: string;
};

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('$metadata' in error)) {
    return undefined;
  }
  const metadata = error.$metadata;
  if (typeof metadata !== 'object' || metadata === null || !('httpStatusCode' in metadata)) {
    return undefined;
  }
  return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
}

function isNotFound(error: unknown): boolean {
  if (error instanceof Error && (error.name === 'NoSuchKey' || error.name === 'NotFound')) {
    return true;
  }
  return statusCodeOf(error) === 404;
}

export function createS3Client(config: S3ObjectStoreConfig): S3Client {
  return new S3Client({
    region: config.region ?? 'us-east-1',
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle ?? Boolean(config.endpoint),
    credentials:
      config.accessKeyId && config.secretAccessKey
        ? {
            accessKeyId: config.accessKeyId,
            secretAccessKey: config.secretAccessKey,
            sessionToken: config.sessionToken
          }
        : undefined
  });
}

/** A container maps to a key prefix inside one bucket. */
export class S3ObjectStore implements ObjectStore {
  readonly container: string;
  private readonly client: S3Client;
  private readonly bucket: string;

  constructor(client: S3Client, bucket: string, container: string) {
    this.client = client;
    this.bucket = bucket;
    this.container = normalizeObjectPath(container);
  }

  private key(objectPath: string): string {
    return `${this.container}/${normalizeObjectPath(objectPath)}`;
  }

  private async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async upload(objectPath: string, body: Uint8Array, options: UploadOptions = {}): Promise<void> {
    const key = this.key(objectPath);
    try {
      if (options.overwrite === false && (await this.exists(key))) {
        throw new ObjectStoreError(`Object s3://${this.bucket}/${key} already exists`, 'object_exists', objectPath);
      }
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentLength: body.byteLength,
          ContentType: options.contentType ?? 'application/octet-stream'
        })
      );
    } catch (error) {
      if (error instanceof ObjectStoreError) {
        throw error;
      }
      throw new ObjectStoreError(`Failed to upload s3://${this.bucket}/${key}`, 'object_store_error', objectPath, error);
    }
  }

  async download(objectPath: string): Promise<Uint8Array | null> {
    const key = this.key(objectPath);
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!response.Body) {
        return new Uint8Array();
      }
      return await response.Body.transformToByteArray();
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new ObjectStoreError(`Failed to download s3://${this.bucket}/${key}`, 'object_store_error', objectPath, error);
    }
  }
}
