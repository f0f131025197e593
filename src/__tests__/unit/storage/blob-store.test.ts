/**
 * Object Store Client Tests
 *
 * The S3 client is never contacted: `send` is stubbed per test.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  GetObjectCommand,
  NoSuchBucket,
  NoSuchKey,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { TransportError } from '../../../core/errors.js';
import {
  S3BlobStore,
  describeStoreFailure,
  resolveEndpoint,
} from '../../../storage/blob-store.js';
import type { S3BlobStoreOptions } from '../../../storage/blob-store.js';

const OPTIONS: S3BlobStoreOptions = {
  account: 'test-account',
  endpointTemplate: 'https://{account}.store.example.test',
  region: 'auto',
  forcePathStyle: false,
  credential: { accessKeyId: 'test-key-id', secretAccessKey: 'test-secret' },
};

function serviceError(name: string, httpStatusCode: number): S3ServiceException {
  return new S3ServiceException({ name, $fault: 'client', $metadata: { httpStatusCode }, message: name });
}

function createStore(): { store: S3BlobStore; client: S3Client } {
  const client = new S3Client({
    region: OPTIONS.region,
    endpoint: resolveEndpoint(OPTIONS.endpointTemplate, OPTIONS.account),
    credentials: OPTIONS.credential,
  });
  return { store: new S3BlobStore(OPTIONS, client), client };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('resolveEndpoint', () => {
  it('substitutes the account', () => {
    expect(resolveEndpoint('https://{account}.r2.cloudflarestorage.com', 'abc123')).toBe(
      'https://abc123.r2.cloudflarestorage.com'
    );
  });

  it('leaves a fixed endpoint unchanged', () => {
    expect(resolveEndpoint('http://localhost:9000', 'abc123')).toBe('http://localhost:9000');
  });
});

describe('describeStoreFailure', () => {
  it('names missing objects and containers', () => {
    expect(describeStoreFailure(new NoSuchKey({ message: 'missing', $metadata: {} }))).toBe('Object not found');
    expect(describeStoreFailure(new NoSuchBucket({ message: 'missing', $metadata: {} }))).toBe(
      'Container not found'
    );
  });

  it('recognises a rejected credential', () => {
    expect(describeStoreFailure(serviceError('InvalidAccessKeyId', 403))).toBe(
      'Credential rejected by store (InvalidAccessKeyId)'
    );
    expect(describeStoreFailure(serviceError('Forbidden', 403))).toBe('Credential rejected by store (Forbidden)');
  });

  it('reports other service and network failures', () => {
    expect(describeStoreFailure(serviceError('SlowDown', 503))).toBe('Store request failed (SlowDown)');
    expect(describeStoreFailure(new Error('getaddrinfo ENOTFOUND'))).toBe(
      'Store unreachable: getaddrinfo ENOTFOUND'
    );
  });
});

describe('S3BlobStore', () => {
  it('locates objects as account/container/key', () => {
    expect(createStore().store.locate('exports', 'curated/df_merged.csv')).toBe(
      'test-account/exports/curated/df_merged.csv'
    );
  });

  it('reads object bodies as UTF-8 text', async () => {
    const { store, client } = createStore();
    const send = vi.spyOn(client, 'send').mockImplementation(async () => ({
      Body: { transformToString: async () => 'COUNTRY,SEX,YEAR,VALUE\n' },
      $metadata: {},
    }));

    await expect(store.getText('exports', 'raw/a.csv')).resolves.toBe('COUNTRY,SEX,YEAR,VALUE\n');
    const command = send.mock.calls[0]?.[0];
    expect(command).toBeInstanceOf(GetObjectCommand);
    expect(command?.input).toEqual({ Bucket: 'exports', Key: 'raw/a.csv' });
  });

  it('maps a missing object to a TransportError naming the location', async () => {
    const { store, client } = createStore();
    vi.spyOn(client, 'send').mockRejectedValue(new NoSuchKey({ message: 'missing', $metadata: {} }));

    const read = store.getText('exports', 'raw/missing.csv');

    await expect(read).rejects.toBeInstanceOf(TransportError);
    await expect(read).rejects.toMatchObject({
      location: 'test-account/exports/raw/missing.csv',
      message: 'Object not found (test-account/exports/raw/missing.csv)',
      exitCode: 4,
    });
  });

  it('puts bodies with their content type', async () => {
    const { store, client } = createStore();
    const send = vi.spyOn(client, 'send').mockImplementation(async () => ({ $metadata: {} }));
    const body = Buffer.from('x', 'utf-8');

    await expect(store.put('exports', 'curated/df_merged.csv', body, 'text/csv; charset=utf-8')).resolves.toBe(
      'test-account/exports/curated/df_merged.csv'
    );
    const command = send.mock.calls[0]?.[0];
    expect(command).toBeInstanceOf(PutObjectCommand);
    expect(command?.input).toEqual({
      Bucket: 'exports',
      Key: 'curated/df_merged.csv',
      Body: body,
      ContentType: 'text/csv; charset=utf-8',
    });
  });

  it('maps a rejected write to a TransportError', async () => {
    const { store, client } = createStore();
    vi.spyOn(client, 'send').mockRejectedValue(serviceError('AccessDenied', 403));

    await expect(store.put('exports', 'k', new Uint8Array(), 'text/csv')).rejects.toMatchObject({
      message: 'Credential rejected by store (AccessDenied) (test-account/exports/k)',
    });
  });
});
