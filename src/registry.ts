/**
 * Process-wide shared client.
 *
 * The slot is replaced by a single assignment, so readers see either the
 * previous client or the new one.
 *
 * @module registry
 */

import { GitHubClient, type ClientOptions } from './client.js';
import { createDefaultConfig, type GitHubConfig } from './config.js';

/**
 * Global client instance.
 */
let sharedClient: GitHubClient | undefined;

/**
 * Builds a client from `config` and makes it the shared instance.
 *
 * @example
 * ```typescript
 * initialise(GitHubConfig.builder().personalToken('token').build());
 * const repo = await instance().repositories('owner', 'repo').get();
 * ```
 * @throws {GitHubError} If the configuration is invalid; the slot keeps
 * its previous client.
 */
export function initialise(config: GitHubConfig, options?: ClientOptions): GitHubClient {
  const client = new GitHubClient(config, options);
  sharedClient = client;
  return client;
}

/**
 * Gets the shared client, creating an unauthenticated default client on
 * first access.
 */
export function instance(): GitHubClient {
  if (!sharedClient) {
    sharedClient = new GitHubClient(createDefaultConfig());
  }
  return sharedClient;
}

/**
 * Empties the slot. The next call to {@link instance} creates a default
 * client.
 */
export function resetInstance(): void {
  sharedClient = undefined;
}
