import * as http from 'http';
import * as readline from 'readline';
import { AuthError } from '../utils/errors';
import { getLogger, logVerbose } from '../utils/logger';

export interface AuthorizationRequest {
  authUrl: string;
  redirectUri: string;
}

/**
 * The interactive step of the OAuth flow: get the user's consent and hand
 * back the authorization code.
 */
export interface Authorizer {
  obtainAuthorizationCode(request: AuthorizationRequest): Promise<string>;
}

const SUCCESS_PAGE =
  '<!DOCTYPE html><html><head><meta charset="UTF-8"><title>playsync</title></head>' +
  '<body style="font-family: system-ui; text-align: center; margin-top: 20vh">' +
  '<h2>Authentication successful</h2><p>You can close this tab and return to the terminal.</p>' +
  '</body></html>';

/**
 * Listens on the loopback redirect URI and captures the code Google sends
 * back after consent.
 */
export class LoopbackAuthorizer implements Authorizer {
  constructor(private readonly timeoutMs: number = 120000) {}

  obtainAuthorizationCode({ authUrl, redirectUri }: AuthorizationRequest): Promise<string> {
    const redirect = new URL(redirectUri);
    const logger = getLogger();

    return new Promise<string>((resolve, reject) => {
      let settled = false;

      const finish = (outcome: { code: string } | { error: Error }): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        server.close();
        if ('code' in outcome) {
          resolve(outcome.code);
        } else {
          reject(outcome.error);
        }
      };

      const server = http.createServer((req, res) => {
        const url = new URL(req.url ?? '/', redirectUri);
        const code = url.searchParams.get('code');
        const error = url.searchParams.get('error');

        if (error) {
          res.writeHead(400, { 'Content-Type': 'text/plain; charset=utf-8' });
          res.end('playsync - Authentication failed. Close this tab and try again.');
          finish({ error: new AuthError(`Authorization denied: ${error}`) });
          return;
        }

        if (code) {
          res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
          res.end(SUCCESS_PAGE);
          finish({ code });
          return;
        }

        res.writeHead(404, { 'Content-Type': 'text/plain; charset=utf-8' });
        res.end('Waiting for authentication...');
      });

      const timer = setTimeout(() => {
        finish({ error: new AuthError('Authorization timed out waiting for browser consent') });
      }, this.timeoutMs);

      server.on('error', err => {
        finish({ error: new AuthError(`Could not listen on ${redirectUri}: ${err.message}`, { cause: err }) });
      });

      server.listen(Number(redirect.port), redirect.hostname, () => {
        logVerbose(`Waiting for OAuth redirect on ${redirectUri}`);
        logger.info('Open this URL in your browser to authorize playsync:');
        logger.info(authUrl);
      });
    });
  }
}

/**
 * Prints the consent URL and reads the code (or the whole redirected URL)
 * from stdin.
 */
export class ManualAuthorizer implements Authorizer {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  async obtainAuthorizationCode({ authUrl }: AuthorizationRequest): Promise<string> {
    const logger = getLogger();
    logger.info(`Authorization URL: ${authUrl}`);
    logger.info('Open this URL, approve access, then paste the code (or the full URL you were redirected to).');

    const rl = readline.createInterface({ input: this.input, output: this.output });
    // Resolves null when the input closes without an answer (no terminal attached)
    const answer = await new Promise<string | null>(resolve => {
      rl.once('close', () => resolve(null));
      rl.question('\nAuthorization code: ', value => {
        resolve(value.trim());
        rl.close();
      });
    });

    const code = answer === null ? null : extractAuthorizationCode(answer);
    if (!code) {
      throw new AuthError('No authorization code provided');
    }
    return code;
  }
}

export function extractAuthorizationCode(input: string): string | null {
  const trimmed = input.trim();
  if (!trimmed) return null;
  if (/^https?:\/\//i.test(trimmed)) {
    return new URL(trimmed).searchParams.get('code');
  }
  return trimmed;
}
