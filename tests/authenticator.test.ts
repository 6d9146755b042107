import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { PassThrough } from 'stream';
import { OAuth2Client } from 'google-auth-library';
import { Authenticator, readClientSecret } from '../src/api/authenticator';
import { AuthorizationRequest, Authorizer, extractAuthorizationCode, ManualAuthorizer } from '../src/api/authorizers';
import { FileTokenCache } from '../src/api/token-cache';
import { AuthError } from '../src/utils/errors';

class FakeAuthorizer implements Authorizer {
  readonly requests: AuthorizationRequest[] = [];

  constructor(private readonly outcome: string | Error) {}

  async obtainAuthorizationCode(request: AuthorizationRequest): Promise<string> {
    this.requests.push(request);
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return this.outcome;
  }
}

const HOUR = 60 * 60 * 1000;

describe('Authenticator', () => {
  let tempDir: string;
  let credentialsPath: string;
  let tokenCache: FileTokenCache;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'playsync-auth-'));
    credentialsPath = path.join(tempDir, 'client_secret.json');
    tokenCache = new FileTokenCache(path.join(tempDir, 'token_cache.json'));
    await fs.writeJson(credentialsPath, {
      installed: {
        client_id: 'test-client-id',
        client_secret: 'test-client-secret',
        redirect_uris: ['http://localhost']
      }
    });
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  function authenticator(authorizer: Authorizer): Authenticator {
    return new Authenticator({ credentialsPath, tokenStore: tokenCache, authorizer, redirectPort: 8085 });
  }

  it('fails with AuthError when the credentials file is missing', async () => {
    await fs.remove(credentialsPath);
    await expect(authenticator(new FakeAuthorizer('test-code')).getValidToken()).rejects.toThrow(
      `OAuth2 credentials file not found: ${credentialsPath}`
    );
  });

  it('fails with AuthError when the credentials file has no client', async () => {
    await fs.writeJson(credentialsPath, { something: 'else' });
    await expect(authenticator(new FakeAuthorizer('test-code')).getValidToken()).rejects.toBeInstanceOf(AuthError);
  });

  it('reuses a cached token without asking for consent', async () => {
    await tokenCache.save({
      access_token: 'test-access-token',
      refresh_token: 'test-refresh-token',
      expiry_date: Date.now() + HOUR
    });
    const authorizer = new FakeAuthorizer('test-code');

    expect(await authenticator(authorizer).getValidToken()).toBe('test-access-token');
    expect(authorizer.requests).toEqual([]);
  });

  it('runs the consent flow and caches the tokens on first use', async () => {
    const getToken = vi.spyOn(OAuth2Client.prototype, 'getToken').mockImplementation(async () => ({
      tokens: { access_token: 'fresh-access-token', refresh_token: 'fresh-refresh-token', expiry_date: Date.now() + HOUR },
      res: null
    }));
    const authorizer = new FakeAuthorizer('test-code');

    expect(await authenticator(authorizer).getValidToken()).toBe('fresh-access-token');

    expect(getToken).toHaveBeenCalledWith('test-code');
    expect(authorizer.requests).toHaveLength(1);
    expect(authorizer.requests[0].redirectUri).toBe('http://localhost:8085');
    const authUrl = new URL(authorizer.requests[0].authUrl);
    expect(authUrl.searchParams.get('access_type')).toBe('offline');
    expect(authUrl.searchParams.get('client_id')).toBe('test-client-id');
    expect(authUrl.searchParams.get('scope')).toBe(
      'https://www.googleapis.com/auth/youtube.readonly https://www.googleapis.com/auth/youtube'
    );
    expect(await tokenCache.load()).toMatchObject({
      access_token: 'fresh-access-token',
      refresh_token: 'fresh-refresh-token'
    });
  });

  it('re-authenticates when the cached refresh token was revoked', async () => {
    await tokenCache.save({ access_token: 'stale-access-token', refresh_token: 'revoked-refresh-token', expiry_date: 0 });
    vi.spyOn(OAuth2Client.prototype, 'getAccessToken')
      .mockImplementationOnce(async () => {
        throw new Error('invalid_grant');
      })
      .mockImplementationOnce(async () => ({ token: 'fresh-access-token', res: null }));
    vi.spyOn(OAuth2Client.prototype, 'getToken').mockImplementation(async () => ({
      tokens: { access_token: 'fresh-access-token', refresh_token: 'fresh-refresh-token' },
      res: null
    }));
    const authorizer = new FakeAuthorizer('test-code');

    expect(await authenticator(authorizer).getValidToken()).toBe('fresh-access-token');
    expect(authorizer.requests).toHaveLength(1);
    expect(await tokenCache.load()).toMatchObject({ refresh_token: 'fresh-refresh-token' });
  });

  it('saves tokens the client refreshes during API calls', async () => {
    await tokenCache.save({
      access_token: 'test-access-token',
      refresh_token: 'test-refresh-token',
      expiry_date: Date.now() + HOUR
    });
    const auth = authenticator(new FakeAuthorizer('test-code'));
    const client = await auth.getAuthorizedClient();
    const refreshedExpiry = Date.now() + 2 * HOUR;

    client.emit('tokens', { access_token: 'refreshed-access-token', expiry_date: refreshedExpiry });
    await auth.getValidToken();

    expect(await tokenCache.load()).toEqual({
      access_token: 'refreshed-access-token',
      refresh_token: 'test-refresh-token',
      expiry_date: refreshedExpiry
    });
  });

  it('wraps a failed consent step in AuthError', async () => {
    const error = await authenticator(new FakeAuthorizer(new Error('consent denied')))
      .getValidToken()
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ message: 'Authorization failed: consent denied' });
    expect(await tokenCache.load()).toBeNull();
  });
});

describe('readClientSecret', () => {
  it('accepts web client files too', async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'playsync-secret-'));
    const file = path.join(tempDir, 'web.json');
    await fs.writeJson(file, { web: { client_id: 'web-id', client_secret: 'web-secret' } });

    expect(await readClientSecret(file)).toEqual({ client_id: 'web-id', client_secret: 'web-secret' });
    await fs.remove(tempDir);
  });
});

describe('FileTokenCache', () => {
  it('ignores a cache without any token', async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'playsync-cache-'));
    const cache = new FileTokenCache(path.join(tempDir, 'token_cache.json'));
    await fs.writeJson(cache.filePath, { token_type: 'Bearer' });

    expect(await cache.load()).toBeNull();
    await cache.clear();
    expect(await fs.pathExists(cache.filePath)).toBe(false);
    await fs.remove(tempDir);
  });
});

describe('authorization code input', () => {
  it('extracts the code from a pasted redirect URL', () => {
    expect(extractAuthorizationCode('http://localhost:8085/?code=test-code&scope=youtube')).toBe('test-code');
    expect(extractAuthorizationCode('  test-code  ')).toBe('test-code');
    expect(extractAuthorizationCode('   ')).toBeNull();
  });

  it('reads the code from the input stream', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const pending = new ManualAuthorizer(input, output).obtainAuthorizationCode({
      authUrl: 'https://accounts.google.com/o/oauth2/v2/auth?client_id=test-client-id',
      redirectUri: 'http://localhost:8085'
    });

    input.write('http://localhost:8085/?code=pasted-code\n');

    await expect(pending).resolves.toBe('pasted-code');
  });

  it('fails when the input closes without an answer', async () => {
    const input = new PassThrough();
    const pending = new ManualAuthorizer(input, new PassThrough()).obtainAuthorizationCode({
      authUrl: 'https://accounts.google.com/o/oauth2/v2/auth?client_id=test-client-id',
      redirectUri: 'http://localhost:8085'
    });

    input.end();

    const error = await pending.catch((err: unknown) => err);
    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ message: 'No authorization code provided' });
  });
});
