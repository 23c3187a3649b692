import { afterEach, describe, it, expect } from 'vitest';
import { GitHubConfig } from '../config.js';
import { GitHubErrorKind } from '../errors.js';
import { initialise, instance, resetInstance } from '../registry.js';

describe('registry', () => {
  afterEach(() => {
    resetInstance();
  });

  it('creates an unauthenticated default client on first access', () => {
    const client = instance();

    expect(client.getCredential().type).toBe('none');
    expect(instance()).toBe(client);
  });

  it('replaces the shared client', () => {
    const before = instance();
    const client = initialise(GitHubConfig.builder().personalToken('test-token').build());

    expect(instance()).toBe(client);
    expect(instance()).not.toBe(before);
    expect(instance().getCredential().type).toBe('bearer');
  });

  it('keeps the previous client when the configuration is invalid', () => {
    const client = initialise(GitHubConfig.builder().personalToken('test-token').build());
    const invalid = { ...GitHubConfig.defaultConfig(), timeout: -1 };

    let error: unknown;
    try {
      initialise(invalid);
    } catch (e) {
      error = e;
    }

    expect(error).toMatchObject({ kind: GitHubErrorKind.InvalidConfiguration });
    expect(instance()).toBe(client);
  });

  it('starts over after a reset', () => {
    const client = instance();
    resetInstance();

    expect(instance()).not.toBe(client);
  });
});
