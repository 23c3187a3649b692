/**
 * GitHub Apps Service
 *
 * Endpoints that authenticate as the app itself (JWT) and the installation
 * token exchange.
 *
 * @module services/apps
 */

import { z } from 'zod';
import type { AppCredential } from '../auth.js';
import type { GitHubClient } from '../client.js';
import type { Page } from '../pagination.js';
import type { InstallationToken } from '../token-cache.js';
import { repositorySchema, simpleUserSchema, type Repository } from './repositories.js';

export const appSchema = z.object({
  id: z.number(),
  slug: z.string().optional(),
  node_id: z.string().optional(),
  owner: simpleUserSchema.nullable().optional(),
  name: z.string(),
  description: z.string().nullable().optional(),
  external_url: z.string().optional(),
  html_url: z.string(),
  permissions: z.record(z.string()).optional(),
  events: z.array(z.string()).optional(),
});

/**
 * GitHub App
 */
export type App = z.infer<typeof appSchema>;

export const installationSchema = z.object({
  id: z.number(),
  account: simpleUserSchema.nullable(),
  access_tokens_url: z.string().optional(),
  repositories_url: z.string().optional(),
  html_url: z.string().optional(),
  app_id: z.number().optional(),
  target_id: z.number().optional(),
  target_type: z.string().optional(),
  permissions: z.record(z.string()),
  events: z.array(z.string()),
  single_file_name: z.string().nullable().optional(),
  repository_selection: z.string().optional(),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

/**
 * Installation of a GitHub App
 */
export type Installation = z.infer<typeof installationSchema>;

const installationTokenSchema = z.object({
  token: z.string().min(1),
  expires_at: z.string().datetime({ offset: true }).optional(),
  permissions: z.record(z.string()).optional(),
  repository_selection: z.string().optional(),
});

/** Installation tokens live one hour when the response omits `expires_at`. */
const DEFAULT_TOKEN_LIFETIME_MS = 60 * 60 * 1000;

/**
 * Request body of the installation token exchange
 */
export interface CreateInstallationAccessToken {
  /** Repository names the token is limited to */
  repositories?: string[];
  /** Repository IDs the token is limited to */
  repository_ids?: number[];
  /** Permissions the token is limited to */
  permissions?: Record<string, string>;
}

/**
 * Parameters for listing installations
 */
export interface ListInstallationsParams {
  /** Results per page (max 100) */
  per_page?: number;
  /** Page number */
  page?: number;
  /** Only installations updated after this time (ISO 8601) */
  since?: string;
}

/**
 * Handler for `/app` endpoints
 */
export class AppsHandler {
  constructor(private readonly client: GitHubClient) {}

  /**
   * App credential for app-level endpoints, even on an installation client.
   */
  private credential(): AppCredential | undefined {
    return this.client.appCredential();
  }

  /**
   * Get the authenticated app
   */
  getAuthenticated(): Promise<App> {
    return this.client.get('/app', appSchema, { credential: this.credential() });
  }

  /**
   * Get an app by slug
   */
  get(appSlug: string): Promise<App> {
    return this.client.get(`/apps/${encodeURIComponent(appSlug)}`, appSchema);
  }

  /**
   * List installations of the authenticated app
   */
  listInstallations(params: ListInstallationsParams = {}): Promise<Page<Installation>> {
    return this.client.getPage('/app/installations', installationSchema, {
      query: [
        ['per_page', params.per_page],
        ['page', params.page],
        ['since', params.since],
      ],
      credential: this.credential(),
    });
  }

  /**
   * Get an installation by ID
   */
  installation(installationId: number): Promise<Installation> {
    return this.client.get(`/app/installations/${installationId}`, installationSchema, {
      credential: this.credential(),
    });
  }

  /**
   * Get the installation on a repository
   */
  getRepositoryInstallation(owner: string, repo: string): Promise<Installation> {
    return this.client.get(
      `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/installation`,
      installationSchema,
      { credential: this.credential() }
    );
  }

  /**
   * Get the installation on an organization
   */
  getOrgInstallation(org: string): Promise<Installation> {
    return this.client.get(`/orgs/${encodeURIComponent(org)}/installation`, installationSchema, {
      credential: this.credential(),
    });
  }

  /**
   * Get the installation on a user account
   */
  getUserInstallation(username: string): Promise<Installation> {
    return this.client.get(
      `/users/${encodeURIComponent(username)}/installation`,
      installationSchema,
      { credential: this.credential() }
    );
  }

  /**
   * Exchange the app JWT for an installation access token. The POST is
   * marked idempotent: repeating it only mints another token.
   */
  async createInstallationAccessToken(
    installationId: number,
    request: CreateInstallationAccessToken = {},
    app: AppCredential | undefined = this.credential()
  ): Promise<InstallationToken> {
    const response = await this.client.post(
      `/app/installations/${installationId}/access_tokens`,
      request,
      installationTokenSchema,
      { credential: app, idempotent: true }
    );
    return {
      token: response.token,
      expiresAt: response.expires_at
        ? new Date(response.expires_at)
        : new Date(Date.now() + DEFAULT_TOKEN_LIFETIME_MS),
      permissions: response.permissions,
      repositorySelection: response.repository_selection,
    };
  }

  /**
   * Repositories accessible to the installation token in use
   */
  listInstallationRepositories(params: { per_page?: number; page?: number } = {}): Promise<
    Page<Repository>
  > {
    return this.client.getPage('/installation/repositories', repositorySchema, {
      query: [
        ['per_page', params.per_page],
        ['page', params.page],
      ],
    });
  }
}
