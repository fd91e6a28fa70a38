import { GetObjectCommand, ListObjectsV2Command, S3Client, type S3ClientConfig } from '@aws-sdk/client-s3';
import { createWriteStream } from 'fs';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { ResultAsync as RA, errAsync, type ResultAsync } from 'neverthrow';
import type { ObjectLocator, ObjectStoreError, ObjectStorePort } from '../../ports/object-store.port.js';
import type { Manifest } from '../../domain/manifest.js';
import type { Logger } from '../../core/logging/types.js';
import { isAbortError, manifestKey, manifestsPrefix, versionFromManifestKey } from '../object-store-keys.js';

export interface S3ObjectStoreConfig {
  readonly bucket: string;
  readonly region: string;
  readonly endpoint?: string;
  readonly forcePathStyle?: boolean;
  /** Public release buckets are read anonymously when no credentials are given. */
  readonly accessKeyId?: string;
  readonly secretAccessKey?: string;
  readonly sessionToken?: string;
}

function s3ErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  for (const field of ['Code', 'code', 'name']) {
    const value: unknown = Reflect.get(error, field);
    if (typeof value === 'string' && value.length > 0) return value;
  }
  return undefined;
}

function httpStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('$metadata' in error)) return undefined;
  const metadata: unknown = error.$metadata;
  if (typeof metadata !== 'object' || metadata === null || !('httpStatusCode' in metadata)) return undefined;
  const status: unknown = metadata.httpStatusCode;
  return typeof status === 'number' ? status : undefined;
}

export function mapS3Error(error: unknown, key: string): ObjectStoreError {
  if (isAbortError(error)) return { code: 'OBJECT_STORE_ABORTED', message: `Transfer of ${key} aborted`, key };

  const code = s3ErrorCode(error)?.toLowerCase();
  if (httpStatus(error) === 404 || code === 'nosuchkey' || code === 'notfound') {
    return { code: 'OBJECT_NOT_FOUND', message: `No object at s3 key ${key}`, key };
  }
  return {
    code: 'OBJECT_STORE_IO_ERROR',
    message: `S3 request for ${key} failed: ${error instanceof Error ? error.message : String(error)}`,
    key,
  };
}

/** Under Node the SDK hands back an IncomingMessage. */
function toNodeReadable(body: unknown): Readable | null {
  return body instanceof Readable ? body : null;
}

function clientConfig(config: S3ObjectStoreConfig): S3ClientConfig {
  const options: S3ClientConfig = {
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
  };
  if (config.accessKeyId && config.secretAccessKey) {
    options.credentials = {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
      sessionToken: config.sessionToken,
    };
  } else {
    // unsigned requests
    options.signer = { sign: async (request) => request };
  }
  return options;
}

/**
 * Release bucket on S3 (AWS SDK v3).
 */
export class S3ObjectStore implements ObjectStorePort {
  private readonly client: S3Client;
  private readonly bucket: string;

  constructor(config: S3ObjectStoreConfig, private readonly logger?: Logger, client?: S3Client) {
    this.bucket = config.bucket;
    this.client = client ?? new S3Client(clientConfig(config));
  }

  listVersions(project: string): ResultAsync<readonly string[], ObjectStoreError> {
    const prefix = manifestsPrefix(project);
    return RA.fromPromise(
      (async () => {
        const versions: string[] = [];
        let continuationToken: string | undefined;
        do {
          const response = await this.client.send(
            new ListObjectsV2Command({ Bucket: this.bucket, Prefix: prefix, ContinuationToken: continuationToken })
          );
          for (const object of response.Contents ?? []) {
            const version = object.Key ? versionFromManifestKey(project, object.Key) : null;
            if (version !== null) versions.push(version);
          }
          continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
        } while (continuationToken);
        this.logger?.debug({ bucket: this.bucket, prefix, count: versions.length }, 'listed manifests');
        return versions;
      })(),
      (e) => mapS3Error(e, prefix)
    );
  }

  fetchManifest(project: string, version: string): ResultAsync<Uint8Array, ObjectStoreError> {
    return this.getBytes(manifestKey(project, version));
  }

  fetchMetadataTable(manifest: Manifest, table: string): ResultAsync<Uint8Array, ObjectStoreError> {
    const entry = manifest.metadataFiles.get(table);
    if (entry === undefined) {
      return errAsync({ code: 'OBJECT_NOT_FOUND', message: `Manifest lists no metadata file "${table}"`, key: table });
    }
    return this.getBytes(entry.key, entry.versionId);
  }

  download(locator: ObjectLocator, destPath: string, signal?: AbortSignal): ResultAsync<void, ObjectStoreError> {
    return RA.fromPromise(
      (async () => {
        const response = await this.client.send(
          new GetObjectCommand({ Bucket: this.bucket, Key: locator.key, VersionId: locator.versionId }),
          { abortSignal: signal }
        );
        const body = toNodeReadable(response.Body);
        if (body === null) throw new Error('S3 response body is not streamable');
        await pipeline(body, createWriteStream(destPath), { signal });
      })(),
      (e) => mapS3Error(e, locator.key)
    );
  }

  private getBytes(key: string, versionId?: string): ResultAsync<Uint8Array, ObjectStoreError> {
    return RA.fromPromise(
      (async () => {
        const response = await this.client.send(
          new GetObjectCommand({ Bucket: this.bucket, Key: key, VersionId: versionId })
        );
        if (!response.Body) throw new Error('S3 response has no body');
        return response.Body.transformToByteArray();
      })(),
      (e) => mapS3Error(e, key)
    );
  }
}
