/**
 * In-memory cache of GitHub App installation access tokens.
 *
 * Each installation has its own entry and its own in-flight exchange, so a
 * stale token for one installation never blocks requests for another.
 * Concurrent callers for the same installation share a single exchange.
 *
 * @module token-cache
 */

import { SecretString } from './secret.js';
import type { Logger } from './logging.js';
import { NoopLogger } from './logging.js';

/** Default refresh margin: tokens are renewed one minute before expiry. */
export const DEFAULT_TOKEN_SAFETY_MARGIN = 60 * 1000;

/**
 * Installation token returned by the token exchange endpoint.
 */
export interface InstallationToken {
  /** Access token. */
  token: string;
  /** Expiration time. */
  expiresAt: Date;
  /** Permissions granted. */
  permissions?: Record<string, string>;
  /** Repository selection. */
  repositorySelection?: string;
}

/**
 * Cached installation token.
 */
interface CachedInstallationToken {
  readonly token: SecretString;
  readonly expiresAt: Date;
}

/**
 * Token cache options.
 */
export interface TokenCacheOptions {
  /** Renew this many milliseconds before `expiresAt`. */
  safetyMarginMs?: number;
  /** Clock in epoch milliseconds, replaceable in tests. */
  clock?: () => number;
  /** Logger for refresh events. */
  logger?: Logger;
}

export class InstallationTokenCache {
  private readonly entries: Map<number, CachedInstallationToken> = new Map();
  private readonly inflight: Map<number, Promise<CachedInstallationToken>> = new Map();
  private readonly safetyMarginMs: number;
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(options: TokenCacheOptions = {}) {
    this.safetyMarginMs = options.safetyMarginMs ?? DEFAULT_TOKEN_SAFETY_MARGIN;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Returns a usable token for the installation, running `exchange` when
   * the cached one is missing or stale. A failed exchange leaves the cache
   * untouched and rejects every waiter with the same error.
   */
  async getToken(
    installationId: number,
    exchange: () => Promise<InstallationToken>
  ): Promise<SecretString> {
    const cached = this.entries.get(installationId);
    if (cached && this.isFresh(cached)) {
      return cached.token;
    }

    const pending = this.inflight.get(installationId);
    if (pending) {
      return (await pending).token;
    }

    const refresh = this.refresh(installationId, exchange);
    this.inflight.set(installationId, refresh);
    try {
      return (await refresh).token;
    } finally {
      this.inflight.delete(installationId);
    }
  }

  /**
   * Returns the cached token if it is still fresh.
   */
  peek(installationId: number): SecretString | undefined {
    const cached = this.entries.get(installationId);
    return cached && this.isFresh(cached) ? cached.token : undefined;
  }

  /**
   * Seeds the cache with a token obtained elsewhere.
   */
  set(installationId: number, token: string, expiresAt: Date): void {
    this.entries.set(installationId, { token: new SecretString(token), expiresAt });
  }

  /**
   * Drops the cached token for one installation.
   */
  invalidate(installationId: number): void {
    this.entries.delete(installationId);
  }

  /**
   * Drops every cached token.
   */
  clear(): void {
    this.entries.clear();
  }

  private isFresh(entry: CachedInstallationToken): boolean {
    return this.clock() < entry.expiresAt.getTime() - this.safetyMarginMs;
  }

  private async refresh(
    installationId: number,
    exchange: () => Promise<InstallationToken>
  ): Promise<CachedInstallationToken> {
    this.logger.debug('Exchanging installation token', { installationId });
    const result = await exchange();
    const entry: CachedInstallationToken = {
      token: new SecretString(result.token),
      expiresAt: result.expiresAt,
    };
    this.entries.set(installationId, entry);
    this.logger.debug('Installation token cached', {
      installationId,
      expiresAt: result.expiresAt.toISOString(),
    });
    return entry;
  }
}
