/**
 * GitHub Repositories Service
 *
 * Endpoints of a single repository:
 * - Repository metadata and updates
 * - Branches, tags and contributors
 * - README and tarball downloads
 *
 * @module services/repositories
 */

import { z } from 'zod';
import type { GitHubClient } from '../client.js';
import { noContent, text } from '../decode.js';
import type { Page } from '../pagination.js';
import { formatMediaType, type QueryParams, type QueryValue } from '../request.js';

export const simpleUserSchema = z.object({
  login: z.string(),
  id: z.number(),
  node_id: z.string().optional(),
  avatar_url: z.string().optional(),
  html_url: z.string().optional(),
  type: z.string().optional(),
  site_admin: z.boolean().optional(),
});

/**
 * User or organization summary
 */
export type SimpleUser = z.infer<typeof simpleUserSchema>;

export const repositorySchema = z.object({
  id: z.number(),
  node_id: z.string().optional(),
  name: z.string(),
  full_name: z.string(),
  owner: simpleUserSchema.optional(),
  private: z.boolean().optional(),
  html_url: z.string().optional(),
  description: z.string().nullable().optional(),
  fork: z.boolean().optional(),
  url: z.string(),
  default_branch: z.string().optional(),
  visibility: z.string().optional(),
  archived: z.boolean().optional(),
  stargazers_count: z.number().optional(),
  forks_count: z.number().optional(),
  open_issues_count: z.number().optional(),
  created_at: z.string().nullable().optional(),
  updated_at: z.string().nullable().optional(),
  pushed_at: z.string().nullable().optional(),
});

/**
 * Repository
 */
export type Repository = z.infer<typeof repositorySchema>;

export const branchSchema = z.object({
  name: z.string(),
  commit: z.object({ sha: z.string(), url: z.string() }),
  protected: z.boolean().optional(),
});

/**
 * Branch
 */
export type Branch = z.infer<typeof branchSchema>;

export const tagSchema = z.object({
  name: z.string(),
  commit: z.object({ sha: z.string(), url: z.string() }),
  zipball_url: z.string().optional(),
  tarball_url: z.string().optional(),
});

/**
 * Tag
 */
export type Tag = z.infer<typeof tagSchema>;

export const contributorSchema = z.object({
  login: z.string().optional(),
  id: z.number().optional(),
  type: z.string(),
  contributions: z.number(),
});

/**
 * Contributor
 */
export type Contributor = z.infer<typeof contributorSchema>;

/**
 * Request to update a repository
 */
export interface UpdateRepoRequest {
  /** Repository name */
  name?: string;
  /** Repository description */
  description?: string;
  /** Homepage URL */
  homepage?: string;
  /** Make repository private */
  private?: boolean;
  /** Default branch */
  default_branch?: string;
  /** Archive repository */
  archived?: boolean;
}

/**
 * Parameters for list endpoints
 */
export interface ListParams {
  /** Results per page (max 100) */
  per_page?: number;
  /** Page number */
  page?: number;
}

function listQuery(params: ListParams = {}): Array<[string, QueryValue]> {
  return [
    ['per_page', params.per_page === undefined ? undefined : Math.min(params.per_page, 100)],
    ['page', params.page],
  ];
}

/**
 * Handler for `/repos/{owner}/{repo}`
 */
export class RepoHandler {
  constructor(
    private readonly client: GitHubClient,
    readonly owner: string,
    readonly repo: string
  ) {}

  private route(suffix: string = ''): string {
    return `/repos/${encodeURIComponent(this.owner)}/${encodeURIComponent(this.repo)}${suffix}`;
  }

  /**
   * Get a repository
   */
  get(): Promise<Repository> {
    return this.client.get(this.route(), repositorySchema);
  }

  /**
   * Update a repository
   */
  update(request: UpdateRepoRequest): Promise<Repository> {
    return this.client.patch(this.route(), request, repositorySchema);
  }

  /**
   * Delete a repository
   */
  async delete(): Promise<void> {
    await this.client.delete(this.route(), noContent);
  }

  /**
   * List branches
   */
  listBranches(params?: ListParams): Promise<Page<Branch>> {
    return this.client.getPage(this.route('/branches'), branchSchema, { query: listQuery(params) });
  }

  /**
   * List tags
   */
  listTags(params?: ListParams): Promise<Page<Tag>> {
    return this.client.getPage(this.route('/tags'), tagSchema, { query: listQuery(params) });
  }

  /**
   * List contributors
   */
  listContributors(params?: ListParams & { anon?: boolean }): Promise<Page<Contributor>> {
    const query: QueryParams = [...listQuery(params), ['anon', params?.anon]];
    return this.client.getPage(this.route('/contributors'), contributorSchema, { query });
  }

  /**
   * Raw README contents
   */
  readme(ref?: string): Promise<string> {
    return this.client.get(this.route('/readme'), text, {
      query: { ref },
      accept: formatMediaType('raw'),
    });
  }

  /**
   * Tarball archive of a ref. GitHub answers with a redirect to its
   * download host, which receives no credentials.
   */
  downloadTarball(ref: string): Promise<Uint8Array> {
    return this.client.download(this.route(`/tarball/${encodeURIComponent(ref)}`));
  }
}
