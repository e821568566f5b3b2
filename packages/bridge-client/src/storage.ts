/**
 * Storage Client
 *
 * Object operations against S3 using broker-issued credentials. Every call is
 * checked against the service's bucket patterns before it goes out, and an
 * S3 authorization failure triggers one re-authorization and retry.
 */

import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { assertBucketAuthorized, type CredentialBundle } from '@s3bridge/bridge-core';
import type { CredentialCache } from './credential-cache';

export interface StorageClientConfig {
  serviceId: string;
  credentials: CredentialCache;
  /** AWS region (default: AWS_REGION or us-east-1) */
  region?: string;
  /** Checked locally before any network call; otherwise the bundle's own patterns are used */
  bucketPatterns?: string[];
  /** How long one call may wait for credentials */
  credentialTimeoutMs?: number;
}

export interface StoredObject {
  key: string;
  size: number;
  lastModified?: Date;
}

const STORAGE_AUTH_FAILURES = new Set([
  'AccessDenied',
  'InvalidAccessKeyId',
  'ExpiredToken',
  'InvalidToken',
  'TokenRefreshRequired',
  'SignatureDoesNotMatch',
]);

const NOT_FOUND_ERRORS = new Set(['NoSuchKey', 'NotFound']);

function httpStatusOf(error: Error): number | undefined {
  if (!('$metadata' in error)) {
    return undefined;
  }
  const metadata = error.$metadata;
  if (
    typeof metadata === 'object' &&
    metadata !== null &&
    'httpStatusCode' in metadata &&
    typeof metadata.httpStatusCode === 'number'
  ) {
    return metadata.httpStatusCode;
  }
  return undefined;
}

/**
 * Whether S3 rejected the request because of the credential rather than the request
 */
export function isStorageAuthFailure(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return STORAGE_AUTH_FAILURES.has(error.name) || httpStatusOf(error) === 403;
}

function isNotFound(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return NOT_FOUND_ERRORS.has(error.name) || httpStatusOf(error) === 404;
}

export class StorageClient {
  private readonly serviceId: string;
  private readonly credentials: CredentialCache;
  private readonly region: string;
  private readonly bucketPatterns: string[] | undefined;
  private readonly credentialTimeoutMs: number | undefined;
  private current: { accessKey: string; client: S3Client } | null = null;

  constructor(config: StorageClientConfig) {
    this.serviceId = config.serviceId;
    this.credentials = config.credentials;
    this.region = config.region || process.env.AWS_REGION || 'us-east-1';
    this.bucketPatterns =
      config.bucketPatterns && config.bucketPatterns.length > 0 ? config.bucketPatterns : undefined;
    this.credentialTimeoutMs = config.credentialTimeoutMs;
  }

  async getObject(bucket: string, key: string): Promise<Uint8Array> {
    return this.withCredentials(bucket, async (client) => {
      const response = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      if (!response.Body) {
        throw new Error(`Object ${bucket}/${key} has no body`);
      }
      return response.Body.transformToByteArray();
    });
  }

  async getObjectText(bucket: string, key: string): Promise<string> {
    const bytes = await this.getObject(bucket, key);
    return new TextDecoder().decode(bytes);
  }

  async readJson(bucket: string, key: string): Promise<unknown> {
    const text = await this.getObjectText(bucket, key);
    return JSON.parse(text);
  }

  async putObject(
    bucket: string,
    key: string,
    body: string | Uint8Array,
    contentType?: string
  ): Promise<void> {
    await this.withCredentials(bucket, (client) =>
      client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentType: contentType,
        })
      )
    );
  }

  async writeJson(bucket: string, key: string, value: unknown): Promise<void> {
    await this.putObject(bucket, key, JSON.stringify(value, null, 2), 'application/json');
  }

  async listObjects(bucket: string, prefix?: string): Promise<StoredObject[]> {
    return this.withCredentials(bucket, async (client) => {
      const objects: StoredObject[] = [];
      let continuationToken: string | undefined;

      do {
        const page = await client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            Prefix: prefix,
            ContinuationToken: continuationToken,
          })
        );
        for (const item of page.Contents ?? []) {
          if (item.Key) {
            objects.push({ key: item.Key, size: item.Size ?? 0, lastModified: item.LastModified });
          }
        }
        continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
      } while (continuationToken);

      return objects;
    });
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    await this.withCredentials(bucket, (client) =>
      client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }))
    );
  }

  async objectExists(bucket: string, key: string): Promise<boolean> {
    return this.withCredentials(bucket, async (client) => {
      try {
        await client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
        return true;
      } catch (error) {
        if (isNotFound(error)) {
          return false;
        }
        throw error;
      }
    });
  }

  private async withCredentials<T>(
    bucket: string,
    operation: (client: S3Client) => Promise<T>
  ): Promise<T> {
    if (this.bucketPatterns) {
      assertBucketAuthorized(bucket, this.bucketPatterns, this.serviceId);
    }

    const bundle = await this.acquire(bucket);
    try {
      return await operation(this.clientFor(bundle));
    } catch (error) {
      if (!isStorageAuthFailure(error)) {
        throw error;
      }
      console.warn('[Storage] Credential rejected by S3, re-authorizing', {
        serviceId: this.serviceId,
        bucket,
        error: error instanceof Error ? error.name : String(error),
      });
      // Another call may already have replaced this credential
      this.credentials.invalidate(this.serviceId, bundle.accessKey);
    }

    const fresh = await this.acquire(bucket);
    return operation(this.clientFor(fresh));
  }

  private async acquire(bucket: string): Promise<CredentialBundle> {
    const bundle = await this.credentials.getCredentials(this.serviceId, {
      timeoutMs: this.credentialTimeoutMs,
    });
    if (!this.bucketPatterns) {
      assertBucketAuthorized(bucket, bundle.bucketPatterns, this.serviceId);
    }
    return bundle;
  }

  private clientFor(bundle: CredentialBundle): S3Client {
    if (this.current && this.current.accessKey === bundle.accessKey) {
      return this.current.client;
    }
    this.current?.client.destroy();
    const client = new S3Client({
      region: this.region,
      credentials: {
        accessKeyId: bundle.accessKey,
        secretAccessKey: bundle.secretKey,
        sessionToken: bundle.sessionToken,
        expiration: new Date(bundle.expiresAt),
      },
    });
    this.current = { accessKey: bundle.accessKey, client };
    return client;
  }
}
