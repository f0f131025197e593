/**
 * Store Credentials
 *
 * The object-store secret is resolved once at startup and handed to the
 * store client; nothing below the CLI reads the environment.
 */

/**
 * Access key pair for the S3-compatible store
 */
export interface StoreCredential {
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
  readonly sessionToken?: string;
}

/**
 * Supplies the store credential, or null when none is configured
 */
export interface CredentialProvider {
  resolve(): StoreCredential | null;
}

/**
 * Environment variable names read by EnvCredentialProvider
 */
export const CREDENTIAL_ENV = {
  ACCESS_KEY_ID: 'HEALTH_ETL_ACCESS_KEY_ID',
  SECRET_ACCESS_KEY: 'HEALTH_ETL_SECRET_ACCESS_KEY',
  SESSION_TOKEN: 'HEALTH_ETL_SESSION_TOKEN',
} as const;

/**
 * Reads the credential from an environment map (process.env at startup)
 */
export class EnvCredentialProvider implements CredentialProvider {
  constructor(private readonly env: NodeJS.ProcessEnv) {}

  resolve(): StoreCredential | null {
    const accessKeyId = this.env[CREDENTIAL_ENV.ACCESS_KEY_ID]?.trim();
    const secretAccessKey = this.env[CREDENTIAL_ENV.SECRET_ACCESS_KEY]?.trim();
    if (!accessKeyId || !secretAccessKey) {
      return null;
    }

    const sessionToken = this.env[CREDENTIAL_ENV.SESSION_TOKEN]?.trim();
    return sessionToken
      ? { accessKeyId, secretAccessKey, sessionToken }
      : { accessKeyId, secretAccessKey };
  }
}

/**
 * Fixed credential (tests, embedding)
 */
export class StaticCredentialProvider implements CredentialProvider {
  constructor(private readonly credential: StoreCredential | null) {}

  resolve(): StoreCredential | null {
    return this.credential;
  }
}
