import { Authenticator } from '../api/authenticator';
import { Authorizer, LoopbackAuthorizer, ManualAuthorizer } from '../api/authorizers';
import { FileTokenCache } from '../api/token-cache';
import { createYouTubeApi, YouTubeClient } from '../api/youtube-client';
import { AppSettings, appPathsFor } from '../config/config-loader';
import { ConfigStore } from '../config/config-store';
import { PlaylistClient } from '../types/api-types';
import { InquirerPrompter, Prompter } from '../utils/prompter';

/**
 * Everything the commands touch outside their own process, passed in
 * explicitly so tests can swap each piece.
 */
export interface CliContext {
  store: ConfigStore;
  prompter: Prompter;
  interactive: boolean;
  createClient(credentialsPath: string): Promise<PlaylistClient>;
}

function authorizerFor(settings: AppSettings): Authorizer {
  return settings.oauth.flow === 'manual'
    ? new ManualAuthorizer()
    : new LoopbackAuthorizer(settings.oauth.timeoutMs);
}

export function createDefaultContext(settings: AppSettings): CliContext {
  const paths = appPathsFor(settings);

  return {
    store: new ConfigStore(paths.configFile),
    prompter: new InquirerPrompter(),
    interactive: Boolean(process.stdin.isTTY),
    async createClient(credentialsPath: string): Promise<PlaylistClient> {
      const authenticator = new Authenticator({
        credentialsPath,
        tokenStore: new FileTokenCache(paths.tokenCacheFile),
        authorizer: authorizerFor(settings),
        redirectPort: settings.oauth.redirectPort
      });
      // Authenticate up front so a consent prompt never interrupts a sync
      await authenticator.getValidToken();
      const auth = await authenticator.getAuthorizedClient();
      return new YouTubeClient(createYouTubeApi(auth), settings.rateLimiting);
    }
  };
}
