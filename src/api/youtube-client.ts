import { google, youtube_v3 } from 'googleapis';
import { OAuth2Client } from 'google-auth-library';
import {
  PlaylistClient,
  QuotaUsage,
  RateLimitingOptions,
  VideoReference
} from '../types/api-types';
import { ApiError, ValidationError, toApiError } from '../utils/errors';
import { getLogger, logVerbose } from '../utils/logger';

/**
 * The slice of the YouTube Data API the client needs. Each call resolves
 * with the response body.
 */
export interface YouTubeApi {
  listPlaylistItems(
    params: youtube_v3.Params$Resource$Playlistitems$List
  ): Promise<youtube_v3.Schema$PlaylistItemListResponse>;
  insertPlaylistItem(
    params: youtube_v3.Params$Resource$Playlistitems$Insert
  ): Promise<youtube_v3.Schema$PlaylistItem>;
  listPlaylists(
    params: youtube_v3.Params$Resource$Playlists$List
  ): Promise<youtube_v3.Schema$PlaylistListResponse>;
}

export function createYouTubeApi(auth: OAuth2Client): YouTubeApi {
  const youtube = google.youtube({ version: 'v3', auth });
  return {
    listPlaylistItems: async params => (await youtube.playlistItems.list(params)).data,
    insertPlaylistItem: async params => (await youtube.playlistItems.insert(params)).data,
    listPlaylists: async params => (await youtube.playlists.list(params)).data
  };
}

export const DEFAULT_RATE_LIMITING: RateLimitingOptions = {
  maxRetries: 3,
  retryDelayMs: 1000,
  apiCallDelayMs: 100,
  quotaPolicy: 'abort',
  quotaRetryDelayMs: 60000
};

// Quota units per call, from the YouTube Data API cost table
const LIST_COST = 1;
const INSERT_COST = 50;
const PAGE_SIZE = 50;

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function toVideoReference(
  item: youtube_v3.Schema$PlaylistItem
): VideoReference | null {
  const videoId = item.contentDetails?.videoId ?? item.snippet?.resourceId?.videoId;
  if (!videoId) {
    return null;
  }
  return {
    videoId,
    playlistItemId: item.id ?? '',
    title: item.snippet?.title ?? videoId
  };
}

export class YouTubeClient implements PlaylistClient {
  private readonly options: RateLimitingOptions;
  private readonly quota: QuotaUsage = {
    quotaUsed: 0,
    quotaLimit: 10000 // Default daily allocation
  };

  constructor(
    private readonly api: YouTubeApi,
    options: Partial<RateLimitingOptions> = {}
  ) {
    this.options = { ...DEFAULT_RATE_LIMITING, ...options };
  }

  /**
   * All items of a playlist, following page tokens until exhausted
   */
  async listItems(playlistId: string): Promise<VideoReference[]> {
    const videos: VideoReference[] = [];
    let pageToken: string | undefined;

    try {
      do {
        const token = pageToken;
        const response = await this.executeApiCall(
          () =>
            this.api.listPlaylistItems({
              part: ['snippet', 'contentDetails'],
              playlistId,
              maxResults: PAGE_SIZE,
              pageToken: token
            }),
          LIST_COST,
          `listItems(${playlistId})`
        );

        for (const item of response.items ?? []) {
          const video = toVideoReference(item);
          if (video) {
            videos.push(video);
          }
        }
        pageToken = response.nextPageToken ?? undefined;
      } while (pageToken);
    } catch (error) {
      if (error instanceof ApiError && error.notFound) {
        throw new ValidationError(`Playlist not found: ${playlistId}`, playlistId);
      }
      throw error;
    }

    logVerbose(`Playlist ${playlistId} has ${videos.length} videos`);
    return videos;
  }

  async insertItem(playlistId: string, videoId: string): Promise<VideoReference> {
    const item = await this.executeApiCall(
      () =>
        this.api.insertPlaylistItem({
          part: ['snippet'],
          requestBody: {
            snippet: {
              playlistId,
              resourceId: {
                kind: 'youtube#video',
                videoId
              }
            }
          }
        }),
      INSERT_COST,
      `insertItem(${playlistId}, ${videoId})`
    );

    return toVideoReference(item) ?? { videoId, playlistItemId: item.id ?? '', title: videoId };
  }

  async getPlaylistTitle(playlistId: string): Promise<string> {
    const response = await this.executeApiCall(
      () => this.api.listPlaylists({ part: ['snippet'], id: [playlistId] }),
      LIST_COST,
      `getPlaylistTitle(${playlistId})`
    );

    const playlist = response.items?.[0];
    if (!playlist) {
      throw new ValidationError(`Playlist not found: ${playlistId}`, playlistId);
    }
    return playlist.snippet?.title ?? playlistId;
  }

  getQuotaUsage(): QuotaUsage {
    return { ...this.quota };
  }

  private updateQuota(cost: number): void {
    this.quota.quotaUsed += cost;
    logVerbose(`API quota used: ${this.quota.quotaUsed}/${this.quota.quotaLimit}`);
  }

  /**
   * Wait between API calls to respect rate limits
   */
  private async delay(): Promise<void> {
    if (this.options.apiCallDelayMs > 0) {
      await sleep(this.options.apiCallDelayMs);
    }
  }

  /**
   * Execute API call with retry logic and error classification
   */
  private async executeApiCall<T>(
    apiCall: () => Promise<T>,
    cost: number,
    operation: string
  ): Promise<T> {
    const attempts = Math.max(1, this.options.maxRetries);
    let lastError: ApiError | null = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await this.delay();
        logVerbose(`Executing ${operation} (attempt ${attempt}/${attempts})`);

        const result = await apiCall();
        this.updateQuota(cost);
        return result;
      } catch (error) {
        lastError = toApiError(error, operation);
        // A rejected request still spends quota
        this.updateQuota(cost);

        if (lastError.quotaExceeded) {
          if (this.options.quotaPolicy === 'abort' || attempt === attempts) {
            getLogger().error(`Quota exceeded in ${operation}`, lastError);
            throw lastError;
          }
          getLogger().warning(
            `Quota exceeded in ${operation}, waiting ${this.options.quotaRetryDelayMs}ms before retrying`
          );
          await sleep(this.options.quotaRetryDelayMs);
          continue;
        }

        if (!lastError.retryable) {
          throw lastError;
        }

        getLogger().warning(`${operation} failed (attempt ${attempt}/${attempts}): ${lastError.message}`);
        if (attempt < attempts) {
          const wait = this.options.retryDelayMs * attempt;
          logVerbose(`Retrying in ${wait}ms...`);
          await sleep(wait);
        }
      }
    }

    if (!lastError) {
      throw new ApiError(`${operation} made no attempts`);
    }
    getLogger().error(`${operation} failed after ${attempts} attempts`, lastError);
    throw lastError;
  }
}
