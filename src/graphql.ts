/**
 * GitHub GraphQL Service
 *
 * Client for GitHub's GraphQL API v4, dispatched through the same engine as
 * REST calls.
 *
 * @module graphql
 */

import { z } from 'zod';
import { tryDecode, type Decoder } from './decode.js';
import type { Dispatcher } from './dispatcher.js';
import { GitHubError, GitHubErrorKind } from './errors.js';
import { failure, success, type Outcome } from './outcome.js';
import type { RequestBuilder } from './request.js';

/**
 * GraphQL request
 */
export interface GraphQLRequest {
  query: string;
  variables?: Record<string, unknown>;
  operationName?: string;
}

/**
 * Per-call options.
 */
export interface GraphQLOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
  timeout?: number;
  /** Allow retrying the POST. Set for queries, left unset for mutations. */
  idempotent?: boolean;
}

const graphqlErrorSchema = z.object({
  message: z.string(),
  type: z.string().optional(),
  path: z.array(z.union([z.string(), z.number()])).optional(),
  locations: z.array(z.object({ line: z.number(), column: z.number() })).optional(),
  extensions: z.record(z.unknown()).optional(),
});

/**
 * GraphQL error
 */
export type GraphQLError = z.infer<typeof graphqlErrorSchema>;

const graphqlEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(graphqlErrorSchema).optional(),
});

/**
 * GitHub GraphQL Client
 */
export class GraphQLClient {
  constructor(
    private readonly builder: RequestBuilder,
    private readonly dispatcher: Dispatcher,
    private readonly endpoint: string
  ) {}

  /**
   * Runs a query. Queries are retried like any idempotent request.
   */
  query<T>(
    query: string,
    data: Decoder<T>,
    variables?: Record<string, unknown>,
    options: GraphQLOptions = {}
  ): Promise<Outcome<T>> {
    return this.execute({ query, variables }, data, { idempotent: true, ...options });
  }

  /**
   * Runs a mutation.
   */
  mutation<T>(
    mutation: string,
    data: Decoder<T>,
    variables?: Record<string, unknown>,
    options: GraphQLOptions = {}
  ): Promise<Outcome<T>> {
    return this.execute({ query: mutation, variables }, data, options);
  }

  /**
   * Executes a GraphQL request. A response carrying `errors` becomes a
   * `query_error` failure even when the HTTP status is 200; otherwise
   * `data` goes through the decoder.
   */
  async execute<T>(
    request: GraphQLRequest,
    data: Decoder<T>,
    options: GraphQLOptions = {}
  ): Promise<Outcome<T>> {
    const built = this.builder.build('POST', this.endpoint, {
      body: request,
      headers: options.headers,
      signal: options.signal,
      timeout: options.timeout,
      idempotent: options.idempotent ?? false,
    });

    const outcome = await this.dispatcher.send(built, graphqlEnvelopeSchema);
    if (outcome.type !== 'success') {
      return outcome;
    }

    const requestId = outcome.headers.get('x-github-request-id') ?? undefined;
    const errors = outcome.value.errors;
    if (errors && errors.length > 0) {
      return failure(
        'github_error',
        new GitHubError(GitHubErrorKind.QueryError, errors.map((e) => e.message).join('; '), {
          statusCode: outcome.status,
          requestId,
          errors,
        })
      );
    }

    const decoded = tryDecode(data, outcome.value.data);
    if (!decoded.success) {
      return failure(
        'decode_error',
        GitHubError.decode(
          `GraphQL data did not match the expected shape: ${decoded.error.message}`,
          JSON.stringify(outcome.value.data) ?? '',
          { statusCode: outcome.status, requestId, cause: decoded.error }
        )
      );
    }
    return success(decoded.data, outcome.status, outcome.headers);
  }
}
