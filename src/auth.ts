/**
 * Authentication mechanisms for GitHub API.
 * @module auth
 */

import { createPrivateKey, type KeyObject } from 'crypto';
import * as jose from 'jose';
import { z } from 'zod';
import { GitHubError, GitHubErrorKind } from './errors.js';
import type { Logger } from './logging.js';
import { NoopLogger } from './logging.js';
import { SecretString } from './secret.js';
import type { InstallationToken, InstallationTokenCache } from './token-cache.js';

export { SecretString } from './secret.js';

/**
 * GitHub App credential: signs short-lived JWTs.
 */
export interface AppCredential {
  readonly type: 'app';
  /** GitHub App ID. */
  readonly appId: number;
  /** Private key (PEM, PKCS#1 or PKCS#8). */
  readonly privateKey: SecretString;
}

/**
 * Credential used by a client. Exactly one is active per client.
 */
export type Credential =
  | { readonly type: 'none' }
  | { readonly type: 'bearer'; readonly token: SecretString }
  | { readonly type: 'basic'; readonly username: string; readonly password: SecretString }
  | { readonly type: 'oauth_app'; readonly token: SecretString }
  | AppCredential
  | {
      readonly type: 'installation';
      readonly app: AppCredential;
      readonly installationId: number;
    };

function frozen<T extends Credential>(credential: T): T {
  Object.freeze(credential);
  return credential;
}

/**
 * Credential factory functions.
 */
export namespace Credential {
  /**
   * No authentication.
   */
  export function none(): Credential {
    return frozen({ type: 'none' });
  }

  /**
   * Personal access token or any other bearer token.
   */
  export function bearer(token: string): Credential {
    return frozen({ type: 'bearer', token: new SecretString(token) });
  }

  /**
   * HTTP basic authentication.
   */
  export function basic(username: string, password: string): Credential {
    return frozen({ type: 'basic', username, password: new SecretString(password) });
  }

  /**
   * OAuth App user access token.
   */
  export function oauthApp(token: string): Credential {
    return frozen({ type: 'oauth_app', token: new SecretString(token) });
  }

  /**
   * GitHub App authentication (app-level JWT).
   */
  export function app(appId: number, privateKey: string): AppCredential {
    return frozen({ type: 'app', appId, privateKey: new SecretString(privateKey) });
  }

  /**
   * GitHub App installation authentication.
   */
  export function installation(app: AppCredential, installationId: number): Credential {
    return frozen({ type: 'installation', app, installationId });
  }

  /**
   * Gets a redacted form of the credential for logging.
   */
  export function tokenPrefix(credential: Credential): string {
    switch (credential.type) {
      case 'none':
        return 'none';
      case 'bearer': {
        const exposed = credential.token.expose();
        if (exposed.startsWith('ghp_')) {
          return 'ghp_***';
        } else if (exposed.startsWith('github_pat_')) {
          return 'github_pat_***';
        }
        return '***';
      }
      case 'basic':
        return `basic:${credential.username}:***`;
      case 'oauth_app':
        return 'gho_***';
      case 'app':
        return `app_jwt:${credential.appId}`;
      case 'installation':
        return `ghs_***:${credential.installationId}`;
    }
  }
}

const envSchema = z.object({
  GITHUB_TOKEN: z.string().min(1).optional(),
  GH_TOKEN: z.string().min(1).optional(),
  GITHUB_OAUTH_TOKEN: z.string().min(1).optional(),
  GITHUB_APP_ID: z.coerce.number().int().positive().optional(),
  GITHUB_APP_PRIVATE_KEY: z.string().min(1).optional(),
  GITHUB_APP_INSTALLATION_ID: z.coerce.number().int().positive().optional(),
});

/**
 * Reads a credential from environment variables.
 *
 * Priority: GitHub App > OAuth token > GITHUB_TOKEN / GH_TOKEN > none.
 */
export function credentialFromEnv(env: NodeJS.ProcessEnv = process.env): Credential {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw GitHubError.configuration(
      `Invalid credential environment: ${parsed.error.issues.map((i) => i.path.join('.')).join(', ')}`,
      parsed.error
    );
  }
  const vars = parsed.data;

  if (vars.GITHUB_APP_ID !== undefined && vars.GITHUB_APP_PRIVATE_KEY) {
    const app = Credential.app(vars.GITHUB_APP_ID, vars.GITHUB_APP_PRIVATE_KEY);
    return vars.GITHUB_APP_INSTALLATION_ID !== undefined
      ? Credential.installation(app, vars.GITHUB_APP_INSTALLATION_ID)
      : app;
  }
  if (vars.GITHUB_OAUTH_TOKEN) {
    return Credential.oauthApp(vars.GITHUB_OAUTH_TOKEN);
  }
  const token = vars.GITHUB_TOKEN ?? vars.GH_TOKEN;
  if (token) {
    return Credential.bearer(token);
  }
  return Credential.none();
}

/** JWT lifetime; GitHub rejects anything above ten minutes. */
const JWT_LIFETIME_SECONDS = 9 * 60;

/** Issued-at is backdated to tolerate clock drift. */
const JWT_CLOCK_DRIFT_SECONDS = 60;

/**
 * Signs a GitHub App JWT (RS256) with claims `{ iat, exp, iss }`.
 * @throws {GitHubError} `invalid_app_credentials` if the key is unusable.
 */
export async function createAppJwt(app: AppCredential, nowMs: number = Date.now()): Promise<string> {
  let key: KeyObject;
  try {
    key = createPrivateKey(app.privateKey.expose());
  } catch (error) {
    throw new GitHubError(
      GitHubErrorKind.InvalidAppCredentials,
      `Failed to parse GitHub App private key: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const now = Math.floor(nowMs / 1000);
  const iat = now - JWT_CLOCK_DRIFT_SECONDS;
  const exp = now + JWT_LIFETIME_SECONDS;

  try {
    return await new jose.SignJWT({})
      .setProtectedHeader({ alg: 'RS256', typ: 'JWT' })
      .setIssuedAt(iat)
      .setExpirationTime(exp)
      .setIssuer(app.appId.toString())
      .sign(key);
  } catch (error) {
    throw new GitHubError(
      GitHubErrorKind.InvalidAppCredentials,
      `Failed to generate JWT: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}

/**
 * Performs the installation token exchange for an app.
 */
export type InstallationTokenExchange = (
  app: AppCredential,
  installationId: number
) => Promise<InstallationToken>;

/**
 * Options for {@link AuthManager}.
 */
export interface AuthManagerOptions {
  credential: Credential;
  /** Base URL whose origin may receive the credential. */
  baseUrl: string;
  /** GraphQL endpoint; its origin may also receive the credential. */
  graphqlUrl?: string;
  tokenCache: InstallationTokenCache;
  exchange: InstallationTokenExchange;
  logger?: Logger;
}

/**
 * Derives per-request Authorization headers from the client credential.
 */
export class AuthManager {
  private readonly credential: Credential;
  private readonly origins: ReadonlySet<string>;
  private readonly tokenCache: InstallationTokenCache;
  private readonly exchange: InstallationTokenExchange;
  private readonly logger: Logger;

  constructor(options: AuthManagerOptions) {
    this.credential = options.credential;
    this.origins = new Set(
      [options.baseUrl, options.graphqlUrl]
        .filter((url): url is string => url !== undefined)
        .map((url) => new URL(url).origin)
    );
    this.tokenCache = options.tokenCache;
    this.exchange = options.exchange;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Gets the client credential.
   */
  getCredential(): Credential {
    return this.credential;
  }

  /**
   * Returns true if `url` has the origin (scheme, host and effective port)
   * of the API base URL or the GraphQL endpoint.
   */
  isSameAuthority(url: string): boolean {
    try {
      return this.origins.has(new URL(url).origin);
    } catch {
      return false;
    }
  }

  /**
   * Generates the Authorization header value for a request to `url`, or
   * `undefined` when no header must be sent (no credential, or a host other
   * than the API authority).
   */
  async authorizationFor(
    url: string,
    credential: Credential = this.credential
  ): Promise<string | undefined> {
    if (credential.type === 'none') {
      return undefined;
    }
    if (!this.isSameAuthority(url)) {
      this.logger.debug('Omitting credential for foreign authority', {
        host: safeHost(url),
      });
      return undefined;
    }

    switch (credential.type) {
      case 'bearer':
      case 'oauth_app':
        return `Bearer ${credential.token.expose()}`;

      case 'basic': {
        const encoded = Buffer.from(
          `${credential.username}:${credential.password.expose()}`,
          'utf8'
        ).toString('base64');
        return `Basic ${encoded}`;
      }

      case 'app':
        return `Bearer ${await createAppJwt(credential)}`;

      case 'installation': {
        const token = await this.installationToken(credential.app, credential.installationId);
        return `Bearer ${token.expose()}`;
      }
    }
  }

  /**
   * Returns a valid installation token, exchanging at most once per stale
   * installation however many callers are waiting.
   */
  async installationToken(app: AppCredential, installationId: number): Promise<SecretString> {
    try {
      return await this.tokenCache.getToken(installationId, () =>
        this.exchange(app, installationId)
      );
    } catch (error) {
      if (error instanceof GitHubError && error.kind === GitHubErrorKind.InvalidAppCredentials) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new GitHubError(
        GitHubErrorKind.AppAuthenticationFailed,
        `Failed to obtain installation token for installation ${installationId}: ${detail}`,
        {
          statusCode: error instanceof GitHubError ? error.statusCode : undefined,
          cause: error,
        }
      );
    }
  }
}

function safeHost(url: string): string | undefined {
  try {
    return new URL(url).host;
  } catch {
    return undefined;
  }
}
