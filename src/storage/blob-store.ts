/**
 * Object Store Client
 *
 * Reads raw extracts from, and writes artifacts to, an S3-compatible object
 * store addressed by account + container. The account selects the endpoint
 * (see `store.endpoint` in the config), the container is the bucket.
 *
 * Every failure surfaces as a TransportError naming the object location.
 */

import {
  GetObjectCommand,
  NoSuchBucket,
  NoSuchKey,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { TransportError, errorMessage } from '../core/errors.js';
import type { StoreCredential } from './credentials.js';

/**
 * Minimal store surface used by source readers and sinks
 */
export interface BlobStore {
  /** Printable location of an object */
  locate(container: string, key: string): string;
  /** Read an object as UTF-8 text */
  getText(container: string, key: string): Promise<string>;
  /** Write an object, returning its location */
  put(container: string, key: string, body: Uint8Array, contentType: string): Promise<string>;
}

/**
 * Connection settings for S3BlobStore
 */
export interface S3BlobStoreOptions {
  /** Store account identifier */
  readonly account: string;
  /** Endpoint URL; `{account}` is replaced by the account */
  readonly endpointTemplate: string;
  readonly region: string;
  readonly forcePathStyle: boolean;
  readonly credential: StoreCredential;
}

/**
 * Error names the store returns for a rejected credential
 */
const CREDENTIAL_ERRORS = new Set([
  'AccessDenied',
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'ExpiredToken',
  'InvalidToken',
]);

/**
 * Expand the endpoint template for an account
 */
export function resolveEndpoint(template: string, account: string): string {
  return template.replaceAll('{account}', encodeURIComponent(account));
}

/**
 * Human-readable reason for a failed store call
 */
export function describeStoreFailure(error: unknown): string {
  if (error instanceof NoSuchKey) {
    return 'Object not found';
  }
  if (error instanceof NoSuchBucket) {
    return 'Container not found';
  }
  if (error instanceof S3ServiceException) {
    if (CREDENTIAL_ERRORS.has(error.name) || error.$metadata.httpStatusCode === 403) {
      return `Credential rejected by store (${error.name})`;
    }
    return `Store request failed (${error.name})`;
  }
  return `Store unreachable: ${errorMessage(error)}`;
}

/**
 * BlobStore backed by @aws-sdk/client-s3
 */
export class S3BlobStore implements BlobStore {
  private readonly client: S3Client;
  private readonly account: string;

  constructor(options: S3BlobStoreOptions, client?: S3Client) {
    this.account = options.account;
    this.client =
      client ??
      new S3Client({
        endpoint: resolveEndpoint(options.endpointTemplate, options.account),
        region: options.region,
        credentials: {
          accessKeyId: options.credential.accessKeyId,
          secretAccessKey: options.credential.secretAccessKey,
          sessionToken: options.credential.sessionToken,
        },
        forcePathStyle: options.forcePathStyle,
      });
  }

  locate(container: string, key: string): string {
    return `${this.account}/${container}/${key}`;
  }

  async getText(container: string, key: string): Promise<string> {
    const location = this.locate(container, key);
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: container, Key: key })
      );
      if (!response.Body) {
        throw new TransportError(location, 'Object has no body');
      }
      return await response.Body.transformToString('utf-8');
    } catch (error) {
      if (error instanceof TransportError) throw error;
      throw new TransportError(location, describeStoreFailure(error), error);
    }
  }

  async put(
    container: string,
    key: string,
    body: Uint8Array,
    contentType: string
  ): Promise<string> {
    const location = this.locate(container, key);
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: container,
          Key: key,
          Body: body,
          ContentType: contentType,
        })
      );
      return location;
    } catch (error) {
      throw new TransportError(location, describeStoreFailure(error), error);
    }
  }
}
