// ABOUTME: Spotify Web API catalog reads: search, artists, albums, tracks, audio features.
// ABOUTME: Returns raw JSON; validation and model building happen behind the cache.

import { SPOTIFY_CONFIG } from '@tunescope/config';
import type { EntityType } from '@tunescope/shared';
import type { SpotifyAuth } from './auth';
import { spotifyFetch, type SpotifyRequest } from './fetch';

/**
 * The remote catalog operations the service consumes. Results are opaque
 * JSON until decoded.
 */
export interface CatalogApi {
  search(query: string, types: readonly EntityType[]): Promise<unknown>;
  getArtist(id: string): Promise<unknown>;
  getArtistAlbums(id: string): Promise<unknown>;
  getAlbum(id: string): Promise<unknown>;
  getAlbumTracks(id: string): Promise<unknown>;
  getTrack(id: string): Promise<unknown>;
  getTrackAudioFeatures(id: string): Promise<unknown>;
}

export class SpotifyCatalogApi implements CatalogApi {
  constructor(
    private auth: Pick<SpotifyAuth, 'getAccessToken' | 'invalidate'>,
    private apiBase: string = SPOTIFY_CONFIG.apiBase
  ) {}

  async search(query: string, types: readonly EntityType[]): Promise<unknown> {
    console.log(`[Spotify] Searching API: ${types.join(',')} "${query}"`);
    const params = new URLSearchParams({ q: query, type: types.join(',') });
    return this.get(`/search?${params}`, { operation: 'search' });
  }

  async getArtist(id: string): Promise<unknown> {
    return this.get(`/artists/${encodeURIComponent(id)}`, { operation: 'artist', resource: ['Artist', id] });
  }

  async getArtistAlbums(id: string): Promise<unknown> {
    return this.get(`/artists/${encodeURIComponent(id)}/albums`, {
      operation: 'artist_albums',
      resource: ['Artist', id],
    });
  }

  async getAlbum(id: string): Promise<unknown> {
    return this.get(`/albums/${encodeURIComponent(id)}`, { operation: 'album', resource: ['Album', id] });
  }

  async getAlbumTracks(id: string): Promise<unknown> {
    return this.get(`/albums/${encodeURIComponent(id)}/tracks`, {
      operation: 'album_tracks',
      resource: ['Album', id],
    });
  }

  async getTrack(id: string): Promise<unknown> {
    return this.get(`/tracks/${encodeURIComponent(id)}`, { operation: 'track', resource: ['Track', id] });
  }

  async getTrackAudioFeatures(id: string): Promise<unknown> {
    return this.get(`/audio-features/${encodeURIComponent(id)}`, {
      operation: 'track_audio_features',
      resource: ['Audio features', id],
    });
  }

  private async get(path: string, request: SpotifyRequest): Promise<unknown> {
    const accessToken = await this.auth.getAccessToken();
    return spotifyFetch(
      `${this.apiBase}${path}`,
      {
        headers: { Authorization: `Bearer ${accessToken}` },
        timeout: 'fast',
      },
      { ...request, onUnauthorized: () => this.auth.invalidate() }
    );
  }
}
