import { PlaylistClient, QuotaUsage, VideoReference } from '../../src/types/api-types';
import { ApiError, ValidationError } from '../../src/utils/errors';

export function video(videoId: string): VideoReference {
  return { videoId, playlistItemId: `item-${videoId}`, title: `Video ${videoId}` };
}

export function quotaError(): ApiError {
  return new ApiError('insertItem failed: quota exhausted', { status: 403, reason: 'quotaExceeded' });
}

/**
 * In-memory playlists. Inserts append to the stored playlist so repeated
 * syncs see their own results.
 */
export class FakePlaylistClient implements PlaylistClient {
  readonly playlists = new Map<string, VideoReference[]>();
  readonly titles = new Map<string, string>();
  readonly insertFailures = new Map<string, ApiError>();
  readonly listFailures = new Map<string, Error>();
  readonly listCalls: string[] = [];
  readonly insertCalls: Array<{ playlistId: string; videoId: string }> = [];

  constructor(playlists: Record<string, string[]> = {}) {
    for (const [playlistId, videoIds] of Object.entries(playlists)) {
      this.playlists.set(playlistId, videoIds.map(video));
    }
  }

  async listItems(playlistId: string): Promise<VideoReference[]> {
    this.listCalls.push(playlistId);
    const failure = this.listFailures.get(playlistId);
    if (failure) throw failure;

    const items = this.playlists.get(playlistId);
    if (!items) {
      throw new ValidationError(`Playlist not found: ${playlistId}`, playlistId);
    }
    return items.map(item => ({ ...item }));
  }

  async insertItem(playlistId: string, videoId: string): Promise<VideoReference> {
    this.insertCalls.push({ playlistId, videoId });
    const failure = this.insertFailures.get(videoId);
    if (failure) throw failure;

    const items = this.playlists.get(playlistId);
    if (!items) {
      throw new ApiError(`insertItem failed: playlist ${playlistId} not found`, { status: 404 });
    }
    const inserted = video(videoId);
    items.push(inserted);
    return inserted;
  }

  async getPlaylistTitle(playlistId: string): Promise<string> {
    const title = this.titles.get(playlistId);
    if (!title) {
      throw new ValidationError(`Playlist not found: ${playlistId}`, playlistId);
    }
    return title;
  }

  getQuotaUsage(): QuotaUsage {
    return { quotaUsed: this.listCalls.length + this.insertCalls.length * 50, quotaLimit: 10000 };
  }

  videoIds(playlistId: string): string[] {
    return (this.playlists.get(playlistId) ?? []).map(item => item.videoId);
  }

  insertedIds(): string[] {
    return this.insertCalls.map(call => call.videoId);
  }
}
