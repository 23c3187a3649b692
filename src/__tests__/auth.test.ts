import { createPublicKey, generateKeyPairSync } from 'crypto';
import { decodeJwt, jwtVerify } from 'jose';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AuthManager, Credential, createAppJwt, credentialFromEnv } from '../auth.js';
import { GitHubError, GitHubErrorKind } from '../errors.js';
import { InstallationTokenCache } from '../token-cache.js';
import { testKeys } from '../__mocks__/keys.js';

const BASE_URL = 'https://api.github.com';

function manager(credential: Credential, exchange = vi.fn()) {
  return new AuthManager({
    credential,
    baseUrl: BASE_URL,
    tokenCache: new InstallationTokenCache(),
    exchange,
  });
}

describe('Credential', () => {
  it('freezes credentials', () => {
    const credential = Credential.bearer('test-token');
    expect(Object.isFrozen(credential)).toBe(true);
  });

  it('never prints secrets', () => {
    const credential = Credential.bearer('test-token');
    expect(JSON.stringify(credential)).toBe('{"type":"bearer","token":"***"}');
    expect(`${credential.type === 'bearer' ? credential.token : ''}`).toBe('***');
  });

  it('redacts tokens for logging', () => {
    expect(Credential.tokenPrefix(Credential.bearer('ghp_test'))).toBe('ghp_***');
    expect(Credential.tokenPrefix(Credential.basic('octo', 'test-secret'))).toBe('basic:octo:***');
    expect(Credential.tokenPrefix(Credential.app(42, 'key'))).toBe('app_jwt:42');
    expect(
      Credential.tokenPrefix(Credential.installation(Credential.app(42, 'key'), 7))
    ).toBe('ghs_***:7');
  });
});

describe('credentialFromEnv', () => {
  it('prefers app credentials', () => {
    const credential = credentialFromEnv({
      GITHUB_APP_ID: '42',
      GITHUB_APP_PRIVATE_KEY: 'key',
      GITHUB_APP_INSTALLATION_ID: '7',
      GITHUB_TOKEN: 'test-token',
    });
    expect(credential.type).toBe('installation');
    if (credential.type === 'installation') {
      expect(credential.app.appId).toBe(42);
      expect(credential.installationId).toBe(7);
    }
  });

  it('falls back to GH_TOKEN', () => {
    const credential = credentialFromEnv({ GH_TOKEN: 'test-token' });
    expect(credential.type).toBe('bearer');
  });

  it('uses the OAuth token before GITHUB_TOKEN', () => {
    const credential = credentialFromEnv({
      GITHUB_OAUTH_TOKEN: 'test-oauth',
      GITHUB_TOKEN: 'test-token',
    });
    expect(credential.type).toBe('oauth_app');
  });

  it('returns none without variables', () => {
    expect(credentialFromEnv({}).type).toBe('none');
  });

  it('rejects a non-numeric app id', () => {
    expect(() => credentialFromEnv({ GITHUB_APP_ID: 'abc', GITHUB_APP_PRIVATE_KEY: 'key' })).toThrow(
      GitHubError
    );
  });
});

describe('createAppJwt', () => {
  it('signs RS256 claims backdated by a minute', async () => {
    const app = Credential.app(1234, testKeys.privateKey);
    const now = Date.UTC(2024, 0, 1, 12, 0, 0);

    const jwt = await createAppJwt(app, now);

    const claims = decodeJwt(jwt);
    expect(claims.iss).toBe('1234');
    expect(claims.iat).toBe(now / 1000 - 60);
    expect(claims.exp).toBe(now / 1000 + 540);
  });

  it('produces a token verifiable with the public key', async () => {
    const app = Credential.app(1234, testKeys.privateKey);

    const jwt = await createAppJwt(app);

    const { payload, protectedHeader } = await jwtVerify(jwt, createPublicKey(testKeys.publicKey));
    expect(protectedHeader.alg).toBe('RS256');
    expect(payload.iss).toBe('1234');
  });

  it('accepts PKCS#8 keys', async () => {
    const { privateKey } = generateKeyPairSync('rsa', {
      modulusLength: 2048,
      publicKeyEncoding: { type: 'spki', format: 'pem' },
      privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
    });

    const jwt = await createAppJwt(Credential.app(1, privateKey));

    expect(jwt.split('.')).toHaveLength(3);
  });

  it('reports an unusable key as invalid app credentials', async () => {
    const app = Credential.app(1234, 'not a key');

    await expect(createAppJwt(app)).rejects.toMatchObject({
      kind: GitHubErrorKind.InvalidAppCredentials,
      category: 'auth',
    });
  });
});

describe('AuthManager', () => {
  it('derives bearer headers', async () => {
    const auth = manager(Credential.bearer('test-token'));
    await expect(auth.authorizationFor(`${BASE_URL}/user`)).resolves.toBe('Bearer test-token');
  });

  it('derives OAuth app headers', async () => {
    const auth = manager(Credential.oauthApp('test-oauth'));
    await expect(auth.authorizationFor(`${BASE_URL}/user`)).resolves.toBe('Bearer test-oauth');
  });

  it('derives basic headers', async () => {
    const auth = manager(Credential.basic('octo', 'test-secret'));
    const expected = `Basic ${Buffer.from('octo:test-secret').toString('base64')}`;
    await expect(auth.authorizationFor(`${BASE_URL}/user`)).resolves.toBe(expected);
  });

  it('sends nothing without a credential', async () => {
    const auth = manager(Credential.none());
    await expect(auth.authorizationFor(`${BASE_URL}/user`)).resolves.toBeUndefined();
  });

  it('omits the header for other authorities', async () => {
    const auth = manager(Credential.bearer('test-token'));
    await expect(
      auth.authorizationFor('https://codeload.github.com/octo/repo/tar.gz/main')
    ).resolves.toBeUndefined();
    await expect(auth.authorizationFor('https://api.github.com:8443/user')).resolves.toBeUndefined();
  });

  it('omits the header for another scheme on the same host', async () => {
    const auth = manager(Credential.bearer('test-token'));
    await expect(auth.authorizationFor('http://api.github.com/user')).resolves.toBeUndefined();
    await expect(auth.authorizationFor('https://api.github.com:443/user')).resolves.toBe(
      'Bearer test-token'
    );
  });

  it('accepts the origin of a separate GraphQL endpoint', async () => {
    const auth = new AuthManager({
      credential: Credential.bearer('test-token'),
      baseUrl: 'https://ghe.example.com/api/v3',
      graphqlUrl: 'https://graphql.example.com/api/graphql',
      tokenCache: new InstallationTokenCache(),
      exchange: vi.fn(),
    });

    await expect(auth.authorizationFor('https://graphql.example.com/api/graphql')).resolves.toBe(
      'Bearer test-token'
    );
    await expect(auth.authorizationFor('https://other.example.com/x')).resolves.toBeUndefined();
  });

  it('honours a per-request credential', async () => {
    const auth = manager(Credential.bearer('test-token'));
    await expect(
      auth.authorizationFor(`${BASE_URL}/user`, Credential.bearer('test-other'))
    ).resolves.toBe('Bearer test-other');
  });

  it('signs a fresh JWT for app credentials', async () => {
    const auth = manager(Credential.app(1234, testKeys.privateKey));

    const header = await auth.authorizationFor(`${BASE_URL}/app`);

    expect(header?.startsWith('Bearer ')).toBe(true);
    expect(decodeJwt(header?.slice('Bearer '.length) ?? '').iss).toBe('1234');
  });

  describe('installation credentials', () => {
    const app = Credential.app(1234, testKeys.privateKey);
    let exchange: ReturnType<typeof vi.fn>;

    beforeEach(() => {
      exchange = vi.fn();
    });

    it('uses the exchanged token', async () => {
      exchange.mockResolvedValue({
        token: 'test-installation',
        expiresAt: new Date(Date.now() + 3600_000),
      });
      const auth = manager(Credential.installation(app, 7), exchange);

      await expect(auth.authorizationFor(`${BASE_URL}/repos/o/r`)).resolves.toBe(
        'Bearer test-installation'
      );
      expect(exchange).toHaveBeenCalledWith(app, 7);
    });

    it('wraps exchange failures as app authentication errors', async () => {
      const cause = new GitHubError(GitHubErrorKind.BadCredentials, 'Bad credentials', {
        statusCode: 401,
      });
      exchange.mockRejectedValue(cause);
      const auth = manager(Credential.installation(app, 7), exchange);

      const error = await auth.authorizationFor(`${BASE_URL}/repos/o/r`).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GitHubError);
      expect(error).toMatchObject({
        kind: GitHubErrorKind.AppAuthenticationFailed,
        category: 'auth',
        statusCode: 401,
        cause,
      });
    });
  });
});
