export * from './types/api-types';
export * from './utils/errors';
export {
  ConfigStore,
  emptyConfiguration,
  findRule,
  withRule,
  withUpdatedRule,
  withoutRule,
  withCredentialsPath
} from './config/config-store';
export { ConfigLoader, loadSettings } from './config/config-loader';
export type { AppSettings } from './config/config-loader';
export { Authenticator, readClientSecret, YOUTUBE_SCOPES } from './api/authenticator';
export { LoopbackAuthorizer, ManualAuthorizer } from './api/authorizers';
export type { Authorizer, AuthorizationRequest } from './api/authorizers';
export { FileTokenCache } from './api/token-cache';
export type { TokenStore } from './api/token-cache';
export { YouTubeClient, createYouTubeApi } from './api/youtube-client';
export type { YouTubeApi } from './api/youtube-client';
export { SyncEngine, planAdditions, summarizeReport } from './sync/sync-engine';
