import type { ApiError, PlaysyncError } from '../utils/errors';

// Configuration types
export interface SyncRule {
  targetPlaylistId: string;
  title?: string | undefined;
  sourcePlaylistIds: string[];
}

export interface Configuration {
  oauth2CredentialsPath?: string | undefined;
  rules: SyncRule[];
}

// A single entry of a remote playlist
export interface VideoReference {
  videoId: string;
  playlistItemId: string;
  title: string;
}

export interface PlaylistClient {
  listItems(playlistId: string): Promise<VideoReference[]>;
  insertItem(playlistId: string, videoId: string): Promise<VideoReference>;
  getPlaylistTitle(playlistId: string): Promise<string>;
  getQuotaUsage(): QuotaUsage;
}

export interface QuotaUsage {
  quotaUsed: number;
  quotaLimit: number;
}

export type QuotaPolicy = 'abort' | 'retry';

export interface RateLimitingOptions {
  maxRetries: number;
  retryDelayMs: number;
  apiCallDelayMs: number;
  quotaPolicy: QuotaPolicy;
  quotaRetryDelayMs: number;
}

// Sync results
export interface AdditionPlan {
  toAdd: VideoReference[];
  skippedDuplicates: number;
}

export interface InsertionFailure {
  video: VideoReference;
  reason: string;
  error: ApiError;
}

export interface RuleSyncReport {
  rule: SyncRule;
  dryRun: boolean;
  toAdd: VideoReference[];
  added: VideoReference[];
  skippedDuplicates: number;
  failures: InsertionFailure[];
  // Quota exhaustion or lost authorization; stops this rule and the run
  abortedBy?: PlaysyncError | undefined;
}

export interface SyncRunResult {
  reports: RuleSyncReport[];
  fatalError?: Error | undefined;
}

export interface SyncOptions {
  dryRun: boolean;
}
