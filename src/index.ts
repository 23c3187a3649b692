/**
 * GitHub API client core
 *
 * Typed REST and GraphQL access to GitHub with:
 * - Personal, OAuth, basic and GitHub App credentials
 * - Installation token exchange with a shared, single-flight cache
 * - Link header pagination
 * - Retry with exponential backoff and rate limit awareness
 * - Conditional requests against an optional cache
 *
 * @example
 * ```typescript
 * import { GitHubClient, GitHubConfig } from 'github-dispatch';
 *
 * const client = new GitHubClient(
 *   GitHubConfig.builder().personalToken(process.env.GITHUB_TOKEN ?? '').build()
 * );
 *
 * const repo = await client.repositories('octocat', 'hello-world').get();
 * console.log(repo.full_name);
 * ```
 *
 * @module github-dispatch
 */

// Core modules
export * from './config.js';
export * from './errors.js';
export * from './auth.js';
export * from './client.js';
export * from './registry.js';
export * from './logging.js';
export * from './secret.js';

// Dispatch engine
export * from './request.js';
export * from './transport.js';
export * from './dispatcher.js';
export * from './outcome.js';
export * from './decode.js';
export * from './pagination.js';
export * from './graphql.js';
export * from './rate-limit.js';
export * from './cache.js';
export * from './resilience.js';
export * from './token-cache.js';

// Services
export * from './services/apps.js';
export * from './services/repositories.js';
