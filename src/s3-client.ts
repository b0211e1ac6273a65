// Node.js built-in modules
import * as fs from 'node:fs';
import type { Readable, Transform } from 'node:stream';

// Third-party dependencies
import {
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';

// Local imports
import { normalizeEtag } from './checksum';
import { logError, logVerbose } from './logger';
import { createThrottleStream } from './throttle';

// Types
import type { ListObjectsV2CommandOutput, S3ClientConfig } from '@aws-sdk/client-s3';
import type { CredentialGate } from './credentials';
import type { BandwidthLimiter } from './throttle';
import type { AwsCredentials, DestinationObject, DestinationStore } from './types';

export interface S3ClientOptions {
  region: string;
  credentials: AwsCredentials;
  requestTimeoutMs?: number;
  // Optional parameters, for S3 compatible endpoints
  endpoint?: string;
  forcePathStyle?: boolean;
}

const MAX_LIST_PAGE_SIZE = 1000;

/**
 * Create an S3 client from an explicit credentials object
 */
export function createS3Client(options: S3ClientOptions): S3Client {
  const clientConfig: S3ClientConfig = {
    region: options.region,
    credentials: {
      accessKeyId: options.credentials.accessKeyId,
      secretAccessKey: options.credentials.secretAccessKey,
      sessionToken: options.credentials.sessionToken,
    },
    forcePathStyle: options.forcePathStyle ?? false,
  };

  if (options.endpoint) {
    clientConfig.endpoint = options.endpoint;
  }

  // Bound every call so a hung socket cannot hold a worker slot forever
  if (options.requestTimeoutMs) {
    clientConfig.requestHandler = {
      requestTimeout: options.requestTimeoutMs,
      connectionTimeout: Math.min(options.requestTimeoutMs, 30000),
    };
  }

  return new S3Client(clientConfig);
}

/**
 * 404-class S3 errors: HeadObject reports "NotFound", GetObject "NoSuchKey", buckets "NoSuchBucket"
 */
export function isNotFoundError(error: unknown): boolean {
  if (!(error instanceof S3ServiceException)) {
    return false;
  }
  return error.name === 'NotFound'
    || error.name === 'NoSuchKey'
    || error.name === 'NoSuchBucket'
    || error.$metadata?.httpStatusCode === 404;
}

/**
 * Fail when the bucket is missing or not accessible
 */
export async function ensureBucketExists(client: S3Client, bucket: string): Promise<void> {
  try {
    await client.send(new HeadBucketCommand({ Bucket: bucket }));
  } catch (error) {
    if (isNotFoundError(error)) {
      logError(`Bucket ${bucket} does not exist. Exiting.`);
      throw new Error(`S3 bucket '${bucket}' does not exist.`);
    }
    logError(`Failed to access bucket ${bucket}`, error);
    throw error;
  }
}

/**
 * List all objects in a bucket with pagination
 */
export async function* listAllObjects(
  client: S3Client,
  bucket: string,
  prefix?: string,
  pageSize = MAX_LIST_PAGE_SIZE
): AsyncGenerator<DestinationObject[]> {
  let continuationToken: string | undefined;

  do {
    const command = new ListObjectsV2Command({
      Bucket: bucket,
      Prefix: prefix || undefined,
      ContinuationToken: continuationToken,
      MaxKeys: Math.min(pageSize, MAX_LIST_PAGE_SIZE),
    });

    const response: ListObjectsV2CommandOutput = await client.send(command);

    if (response.Contents && response.Contents.length > 0) {
      const page: DestinationObject[] = [];
      for (const item of response.Contents) {
        if (item.Key) {
          page.push({
            key: item.Key,
            etag: normalizeEtag(item.ETag ?? ''),
            size: item.Size ?? 0,
          });
        }
      }
      yield page;
    }

    continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
  } while (continuationToken);
}

/**
 * Get the remote digest of an object, undefined when it does not exist
 */
export async function headObject(
  client: S3Client,
  bucket: string,
  key: string
): Promise<DestinationObject | undefined> {
  try {
    const response = await client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
    return {
      key,
      etag: normalizeEtag(response.ETag ?? ''),
      size: response.ContentLength ?? 0,
    };
  } catch (error) {
    if (isNotFoundError(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Upload a local file in a single PutObject, paced by the shared limiter
 */
export async function uploadFile(
  client: S3Client,
  bucket: string,
  key: string,
  localPath: string,
  limiter?: BandwidthLimiter
): Promise<void> {
  const { size } = await fs.promises.stat(localPath);
  const fileStream = fs.createReadStream(localPath);

  let body: Readable = fileStream;
  let throttle: Transform | undefined;
  if (limiter) {
    const stream = createThrottleStream(limiter);
    fileStream.on('error', (error) => stream.destroy(error));
    body = fileStream.pipe(stream);
    throttle = stream;
  }

  try {
    await client.send(new PutObjectCommand({
      Bucket: bucket,
      Key: key,
      Body: body,
      ContentLength: size,
    }));
  } finally {
    fileStream.destroy();
    throttle?.destroy();
  }
}

/**
 * Create a zero-byte object representing a folder
 */
export async function putDirectoryMarker(client: S3Client, bucket: string, key: string): Promise<void> {
  await client.send(new PutObjectCommand({ Bucket: bucket, Key: key, Body: '' }));
}

export interface S3DestinationStoreOptions {
  bucket: string;
  region: string;
  gate: CredentialGate;
  prefix?: string;
  limiter?: BandwidthLimiter;
  requestTimeoutMs?: number;
  listPageSize?: number;
  createClient?: (options: S3ClientOptions) => S3Client;
}

/**
 * Destination store backed by one shared S3 client.
 * The client is rebuilt lazily whenever the credential gate hands out a new generation;
 * the replaced client is destroyed once its last in-flight call settles.
 */
export class S3DestinationStore implements DestinationStore {
  private client: S3Client;
  private clientGeneration: number;
  private readonly createClient: (options: S3ClientOptions) => S3Client;
  private readonly inFlight = new Map<S3Client, number>();
  private readonly retired = new Set<S3Client>();

  constructor(private readonly options: S3DestinationStoreOptions) {
    this.createClient = options.createClient ?? createS3Client;
    this.clientGeneration = options.gate.generation;
    this.client = this.buildClient();
  }

  get name(): string {
    return `s3://${this.options.bucket}`;
  }

  private buildClient(): S3Client {
    return this.createClient({
      region: this.options.region,
      credentials: this.options.gate.current,
      requestTimeoutMs: this.options.requestTimeoutMs,
    });
  }

  private acquire(): S3Client {
    if (this.clientGeneration !== this.options.gate.generation) {
      logVerbose(`Rebuilding S3 client with credentials generation ${this.options.gate.generation}`);
      const previous = this.client;
      this.clientGeneration = this.options.gate.generation;
      this.client = this.buildClient();

      if (this.inFlight.has(previous)) {
        this.retired.add(previous);
      } else {
        previous.destroy();
      }
    }

    this.inFlight.set(this.client, (this.inFlight.get(this.client) ?? 0) + 1);
    return this.client;
  }

  private release(client: S3Client): void {
    const remaining = (this.inFlight.get(client) ?? 1) - 1;
    if (remaining > 0) {
      this.inFlight.set(client, remaining);
      return;
    }

    this.inFlight.delete(client);
    if (this.retired.delete(client)) {
      client.destroy();
    }
  }

  private async withClient<T>(operation: (client: S3Client) => Promise<T>): Promise<T> {
    const client = this.acquire();
    try {
      return await operation(client);
    } finally {
      this.release(client);
    }
  }

  ensureBucket(): Promise<void> {
    return this.withClient(client => ensureBucketExists(client, this.options.bucket));
  }

  async *listObjects(): AsyncGenerator<DestinationObject[]> {
    const client = this.acquire();
    try {
      yield* listAllObjects(client, this.options.bucket, this.options.prefix, this.options.listPageSize);
    } finally {
      this.release(client);
    }
  }

  headObject(key: string): Promise<DestinationObject | undefined> {
    return this.withClient(client => headObject(client, this.options.bucket, key));
  }

  uploadFile(localPath: string, key: string): Promise<void> {
    return this.withClient(client => uploadFile(client, this.options.bucket, key, localPath, this.options.limiter));
  }

  putDirectoryMarker(key: string): Promise<void> {
    return this.withClient(client => putDirectoryMarker(client, this.options.bucket, key));
  }
}
