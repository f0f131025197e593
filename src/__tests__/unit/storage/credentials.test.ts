/**
 * Store Credential Tests
 */

import { describe, it, expect } from 'vitest';
import {
  EnvCredentialProvider,
  StaticCredentialProvider,
} from '../../../storage/credentials.js';

describe('EnvCredentialProvider', () => {
  it('reads the key pair from the environment', () => {
    const provider = new EnvCredentialProvider({
      HEALTH_ETL_ACCESS_KEY_ID: 'test-key-id',
      HEALTH_ETL_SECRET_ACCESS_KEY: ' test-secret ',
    });

    expect(provider.resolve()).toEqual({ accessKeyId: 'test-key-id', secretAccessKey: 'test-secret' });
  });

  it('includes a session token when present', () => {
    const provider = new EnvCredentialProvider({
      HEALTH_ETL_ACCESS_KEY_ID: 'test-key-id',
      HEALTH_ETL_SECRET_ACCESS_KEY: 'test-secret',
      HEALTH_ETL_SESSION_TOKEN: 'test-token',
    });

    expect(provider.resolve()?.sessionToken).toBe('test-token');
  });

  it('returns null when either half is missing or blank', () => {
    expect(new EnvCredentialProvider({}).resolve()).toBeNull();
    expect(new EnvCredentialProvider({ HEALTH_ETL_ACCESS_KEY_ID: 'test-key-id' }).resolve()).toBeNull();
    expect(
      new EnvCredentialProvider({
        HEALTH_ETL_ACCESS_KEY_ID: 'test-key-id',
        HEALTH_ETL_SECRET_ACCESS_KEY: '   ',
      }).resolve()
    ).toBeNull();
  });
});

describe('StaticCredentialProvider', () => {
  it('returns what it was given', () => {
    expect(new StaticCredentialProvider(null).resolve()).toBeNull();
    expect(
      new StaticCredentialProvider({ accessKeyId: 'test-key-id', secretAccessKey: 'test-secret' }).resolve()
    ).toEqual({ accessKeyId: 'test-key-id', secretAccessKey: 'test-secret' });
  });
});
