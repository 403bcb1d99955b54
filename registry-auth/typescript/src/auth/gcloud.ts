/**
 * Google Cloud token broker for gcr.io and Artifact Registry hosts.
 * @module auth/gcloud
 */

import { GoogleAuth } from 'google-auth-library';
import { SecretString } from './secret.js';
import type { AuthConfig, Authenticator } from './authenticator.js';
import { RegistryAuthError, RegistryAuthErrorKind } from '../errors.js';

/**
 * Username Google registries expect alongside an OAuth2 access token.
 */
export const OAUTH2_USERNAME = 'oauth2accesstoken';

/**
 * OAuth2 scopes required for registry access.
 */
export const CLOUD_PLATFORM_SCOPES = [
  'https://www.googleapis.com/auth/cloud-platform',
];

/**
 * Refresh threshold - refresh token when 20% of TTL remains.
 */
const REFRESH_THRESHOLD = 0.2;

/**
 * Lifetime assumed when the credential does not report an expiry.
 */
const DEFAULT_TOKEN_TTL_MS = 3600 * 1000;

/**
 * Access token with its validity window.
 */
export interface AccessToken {
  token: string;
  expiresAt: Date;
}

/**
 * Source of Google OAuth2 access tokens.
 */
export interface AccessTokenSource {
  fetchToken(): Promise<AccessToken>;
}

/**
 * The part of a google-auth-library client used here.
 */
export interface AccessTokenClient {
  getAccessToken(): Promise<{ token?: string | null }>;
  credentials?: { expiry_date?: number | null };
}

/**
 * The part of GoogleAuth used here.
 */
export interface GoogleAuthLike {
  getClient(): Promise<AccessTokenClient>;
}

/**
 * Builds an authenticator for a cloud provider's registries.
 * Rejects when the provider's credentials are unavailable.
 */
export interface CloudTokenBrokerFactory {
  create(): Promise<Authenticator>;
}

interface CachedToken {
  token: SecretString;
  issuedAt: Date;
  expiresAt: Date;
}

/**
 * Narrows a GoogleAuth instance to {@link GoogleAuthLike}.
 */
class GoogleAuthAdapter implements GoogleAuthLike {
  private readonly auth: GoogleAuth;

  constructor(auth: GoogleAuth) {
    this.auth = auth;
  }

  async getClient(): Promise<AccessTokenClient> {
    const client = await this.auth.getClient();
    return {
      getAccessToken: () => client.getAccessToken(),
      // The client replaces its credentials on every refresh
      get credentials() {
        return client.credentials;
      },
    };
  }
}

/**
 * Access token source backed by Application Default Credentials.
 */
export class GoogleAccessTokenSource implements AccessTokenSource {
  private readonly auth: GoogleAuthLike;

  constructor(auth: GoogleAuthLike) {
    this.auth = auth;
  }

  async fetchToken(): Promise<AccessToken> {
    const client = await this.auth.getClient();
    const response = await client.getAccessToken();

    if (!response.token) {
      throw new RegistryAuthError(
        RegistryAuthErrorKind.TokenRefreshFailed,
        'Failed to obtain access token from Google credentials'
      );
    }

    const expiryDate = client.credentials?.expiry_date;
    return {
      token: response.token,
      expiresAt: new Date(expiryDate ?? Date.now() + DEFAULT_TOKEN_TTL_MS),
    };
  }
}

/**
 * Authenticator presenting Google OAuth2 access tokens.
 * Tokens are reused until less than 20% of their lifetime remains.
 */
export class GcloudAuthenticator implements Authenticator {
  private readonly source: AccessTokenSource;
  private cachedToken?: CachedToken;
  private refreshPromise?: Promise<CachedToken>;

  constructor(source: AccessTokenSource) {
    this.source = source;
  }

  async authorization(): Promise<AuthConfig> {
    const token = await this.getToken();
    return { username: OAUTH2_USERNAME, password: token };
  }

  /**
   * Gets an access token, refreshing it when close to expiry.
   */
  async getToken(): Promise<string> {
    if (this.cachedToken && !this.shouldRefresh(this.cachedToken)) {
      return this.cachedToken.token.expose();
    }

    // Only one refresh at a time
    if (this.refreshPromise) {
      const cached = await this.refreshPromise;
      return cached.token.expose();
    }

    this.refreshPromise = this.refreshToken();
    try {
      const cached = await this.refreshPromise;
      return cached.token.expose();
    } finally {
      this.refreshPromise = undefined;
    }
  }

  /**
   * Clears the token cache, forcing a refresh on next request.
   */
  clearCache(): void {
    this.cachedToken = undefined;
  }

  private async refreshToken(): Promise<CachedToken> {
    try {
      const issuedAt = new Date();
      const response = await this.source.fetchToken();
      const cached: CachedToken = {
        token: new SecretString(response.token),
        issuedAt,
        expiresAt: response.expiresAt,
      };
      this.cachedToken = cached;
      return cached;
    } catch (error) {
      throw wrapTokenError(error);
    }
  }

  private shouldRefresh(cached: CachedToken): boolean {
    const now = Date.now();
    const expiresAt = cached.expiresAt.getTime();
    const totalTtl = expiresAt - cached.issuedAt.getTime();
    const remaining = expiresAt - now;

    return remaining < totalTtl * REFRESH_THRESHOLD;
  }

  toString(): string {
    return 'GcloudAuthenticator';
  }
}

/**
 * Options for {@link GcloudAuthenticatorFactory}.
 */
export interface GcloudAuthenticatorFactoryOptions {
  /** Path to a service account key file */
  keyFile?: string;
  /** GCP project ID */
  projectId?: string;
  /** Creates the auth instance (defaults to GoogleAuth) */
  createAuth?: () => GoogleAuthLike;
}

/**
 * Creates {@link GcloudAuthenticator}s, failing when no Google
 * credentials can be found.
 */
export class GcloudAuthenticatorFactory implements CloudTokenBrokerFactory {
  private readonly options: GcloudAuthenticatorFactoryOptions;

  constructor(options: GcloudAuthenticatorFactoryOptions = {}) {
    this.options = options;
  }

  async create(): Promise<Authenticator> {
    const auth: GoogleAuthLike = this.options.createAuth
      ? this.options.createAuth()
      : new GoogleAuthAdapter(
          new GoogleAuth({
            scopes: CLOUD_PLATFORM_SCOPES,
            keyFile: this.options.keyFile,
            projectId: this.options.projectId,
          })
        );

    try {
      await auth.getClient();
    } catch (error) {
      throw RegistryAuthError.credentialsNotFound(
        'Google credentials not found. Set GOOGLE_APPLICATION_CREDENTIALS or run `gcloud auth application-default login`.',
        error instanceof Error ? error : undefined
      );
    }

    return new GcloudAuthenticator(new GoogleAccessTokenSource(auth));
  }
}

/**
 * Wraps token errors in RegistryAuthError.
 */
function wrapTokenError(error: unknown): RegistryAuthError {
  if (error instanceof RegistryAuthError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  if (message.includes('Could not load the default credentials')) {
    return RegistryAuthError.credentialsNotFound(
      'Google credentials not found. Set GOOGLE_APPLICATION_CREDENTIALS or configure authentication.',
      error instanceof Error ? error : undefined
    );
  }

  return new RegistryAuthError(
    RegistryAuthErrorKind.TokenRefreshFailed,
    `Failed to refresh token: ${message}`,
    { cause: error instanceof Error ? error : undefined }
  );
}
