import * as fs from 'fs-extra';
import { z } from 'zod';
import { Credentials, OAuth2Client } from 'google-auth-library';
import { Authorizer } from './authorizers';
import { TokenStore } from './token-cache';
import { AuthError, describeError } from '../utils/errors';
import { getLogger, logVerbose } from '../utils/logger';

export const YOUTUBE_SCOPES = [
  'https://www.googleapis.com/auth/youtube.readonly',
  'https://www.googleapis.com/auth/youtube'
];

// client_secret.json as downloaded from the Google Cloud console
const ClientSecretSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional()
});

const CredentialsFileSchema = z.union([
  z.object({ installed: ClientSecretSchema }).transform(file => file.installed),
  z.object({ web: ClientSecretSchema }).transform(file => file.web)
]);

export type ClientSecret = z.infer<typeof ClientSecretSchema>;

export interface AuthenticatorOptions {
  credentialsPath: string;
  tokenStore: TokenStore;
  authorizer: Authorizer;
  redirectPort: number;
}

export async function readClientSecret(credentialsPath: string): Promise<ClientSecret> {
  if (!(await fs.pathExists(credentialsPath))) {
    throw new AuthError(`OAuth2 credentials file not found: ${credentialsPath}`);
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(credentialsPath);
  } catch (error) {
    throw new AuthError(`OAuth2 credentials file is unreadable: ${credentialsPath}`, { cause: error });
  }

  const parsed = CredentialsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AuthError(
      `OAuth2 credentials file ${credentialsPath} has no "installed" or "web" client with client_id and client_secret`
    );
  }
  return parsed.data;
}

function isInvalidGrant(error: unknown): boolean {
  return describeError(error).includes('invalid_grant');
}

/**
 * Hands out an authorized OAuth2Client, reusing the token cache and
 * falling back to the interactive consent flow.
 */
export class Authenticator {
  private client: OAuth2Client | null = null;
  private pendingTokenSave: Promise<void> = Promise.resolve();

  constructor(private readonly options: AuthenticatorOptions) {}

  get redirectUri(): string {
    return `http://localhost:${this.options.redirectPort}`;
  }

  async getAuthorizedClient(): Promise<OAuth2Client> {
    if (this.client) {
      return this.client;
    }

    const secret = await readClientSecret(this.options.credentialsPath);
    const client = new OAuth2Client(secret.client_id, secret.client_secret, this.redirectUri);

    const cached = await this.options.tokenStore.load();
    if (!cached || !(await this.tryCachedTokens(client, cached))) {
      await this.authorizeInteractively(client);
    }

    this.persistRefreshedTokens(client);
    this.client = client;
    return client;
  }

  /**
   * A valid access token, refreshed through the cached refresh token when
   * needed.
   */
  async getValidToken(): Promise<string> {
    const client = await this.getAuthorizedClient();
    const token = await this.fetchAccessToken(client);
    await this.pendingTokenSave;
    return token;
  }

  /**
   * The client refreshes expired access tokens on its own during API calls
   * and announces them through the `tokens` event.
   */
  private persistRefreshedTokens(client: OAuth2Client): void {
    client.on('tokens', tokens => {
      const credentials = { ...client.credentials, ...tokens };
      this.pendingTokenSave = this.pendingTokenSave
        .then(() => this.options.tokenStore.save(credentials))
        .catch((error: unknown) => {
          getLogger().warning(`Could not save refreshed OAuth tokens: ${describeError(error)}`);
        });
    });
  }

  private async tryCachedTokens(client: OAuth2Client, cached: Credentials): Promise<boolean> {
    const previousAccessToken = cached.access_token;
    client.setCredentials(cached);
    try {
      const token = await this.fetchAccessToken(client);
      await this.persistIfChanged(client.credentials, previousAccessToken);
      logVerbose(`Using cached OAuth token${token === previousAccessToken ? '' : ' (refreshed)'}`);
      return true;
    } catch (error) {
      if (isInvalidGrant(error)) {
        getLogger().warning('Cached OAuth token was revoked or expired, re-authenticating...');
        await this.options.tokenStore.clear();
        client.setCredentials({});
        return false;
      }
      throw error instanceof AuthError
        ? error
        : new AuthError(`Failed to refresh OAuth token: ${describeError(error)}`, { cause: error });
    }
  }

  private async fetchAccessToken(client: OAuth2Client): Promise<string> {
    const { token } = await client.getAccessToken();
    if (!token) {
      throw new AuthError('OAuth client returned no access token');
    }
    return token;
  }

  private async persistIfChanged(credentials: Credentials, previousAccessToken: string | null | undefined): Promise<void> {
    if (credentials.access_token && credentials.access_token !== previousAccessToken) {
      await this.options.tokenStore.save(credentials);
    }
  }

  private async authorizeInteractively(client: OAuth2Client): Promise<void> {
    const authUrl = client.generateAuthUrl({
      access_type: 'offline',
      scope: YOUTUBE_SCOPES,
      prompt: 'consent'
    });

    let tokens: Credentials;
    try {
      const code = await this.options.authorizer.obtainAuthorizationCode({
        authUrl,
        redirectUri: this.redirectUri
      });
      ({ tokens } = await client.getToken(code));
    } catch (error) {
      if (error instanceof AuthError) throw error;
      throw new AuthError(`Authorization failed: ${describeError(error)}`, { cause: error });
    }

    client.setCredentials(tokens);
    await this.options.tokenStore.save(tokens);
    getLogger().success('OAuth authentication completed, tokens cached');
  }
}
