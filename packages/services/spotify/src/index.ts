// Spotify catalog service - memoized remote reads reduced to flat JSON records

import { CacheStore } from '@tunescope/cache';
import {
  ValidationError,
  type DetailEntityType,
  type EntityDetail,
  type EntityType,
  type SearchRecord,
  type TrackDetail,
} from '@tunescope/shared';
import { SpotifyAuth, type TokenRequester } from './auth';
import { SpotifyCatalogApi, type CatalogApi } from './client';
import { decoders, searchDecoder, type ItemModel, type PagingModel } from './models';
import { detailView, searchView } from './views';

export { SpotifyAuth, SpotifyTokenSchema, requestClientToken } from './auth';
export type { SpotifyAuthConfig, SpotifyToken, TokenLoadResult, TokenRequester, TokenState } from './auth';

export { SpotifyCatalogApi } from './client';
export type { CatalogApi } from './client';

export { spotifyFetch } from './fetch';
export type { SpotifyRequest } from './fetch';

export { flatten, itemReference } from './flatten';
export { VIEW_FIELDS, allowListFor, detailView, searchView } from './views';
export type { View } from './views';

export * from './models';
export type { ClientTokenResponse, Credentials } from './schemas';

export interface CatalogServiceOptions {
  cacheDir: string;
  tokenPath: string;
  credentialsPath: string;
  /** When false the cache root is removed and nothing is memoized */
  memoize?: boolean;
  /** Remote catalog; defaults to the Spotify Web API */
  api?: CatalogApi;
  requestToken?: TokenRequester;
}

/**
 * Read operations consumed by the HTTP layer. Every remote call is memoized
 * by call signature; results are reduced to flat search and detail records.
 */
export class CatalogService {
  private constructor(
    public readonly cache: CacheStore,
    public readonly auth: SpotifyAuth,
    private readonly api: CatalogApi
  ) {}

  /**
   * Open the cache, restore or acquire a token, and build the service.
   * Fails with CredentialsMissingError when no token can be obtained.
   */
  static async create(options: CatalogServiceOptions): Promise<CatalogService> {
    let cache: CacheStore;
    if (options.memoize === false) {
      cache = new CacheStore(options.cacheDir);
      await cache.clear();
    } else {
      cache = await CacheStore.open(options.cacheDir);
    }

    const auth = new SpotifyAuth({
      tokenPath: options.tokenPath,
      credentialsPath: options.credentialsPath,
      requestToken: options.requestToken,
    });
    await auth.initialize();

    return new CatalogService(cache, auth, options.api ?? new SpotifyCatalogApi(auth));
  }

  /**
   * Search for one entity type. The response must hold results for exactly
   * that type.
   */
  async search(entityType: EntityType, query: string): Promise<SearchRecord[]> {
    const results = await this.cache.cachedCall(
      'search',
      { query, types: [entityType] },
      () => this.api.search(query, [entityType]),
      searchDecoder(entityType)
    );
    return searchView(results);
  }

  /**
   * Artist with their albums, or album with its tracks.
   */
  async entityDetail(entityType: DetailEntityType, id: string): Promise<EntityDetail> {
    switch (entityType) {
      case 'artist': {
        const [artist, albums] = await Promise.all([this.artist(id), this.artistAlbums(id)]);
        return { primary: detailView(artist), related: searchView(albums) };
      }
      case 'album': {
        const [album, tracks] = await Promise.all([this.album(id), this.albumTracks(id)]);
        return { primary: detailView(album), related: searchView(tracks) };
      }
      default: {
        const unknown: string = entityType;
        throw new ValidationError(`No detail view for entity type: ${unknown}`);
      }
    }
  }

  /**
   * Track metadata stitched together with its audio features.
   */
  async trackDetail(id: string): Promise<TrackDetail> {
    const [track, audio] = await Promise.all([this.track(id), this.audioFeatures(id)]);
    return { track: detailView(track), audio: detailView(audio) };
  }

  /**
   * Remove every cached entry and stop memoizing for this session.
   */
  async clearCache(): Promise<void> {
    await this.cache.clear();
  }

  private artist(id: string): Promise<ItemModel> {
    return this.cache.cachedCall('artist', { artist_id: id }, () => this.api.getArtist(id), decoders.artist);
  }

  private artistAlbums(id: string): Promise<PagingModel> {
    return this.cache.cachedCall(
      'artist_albums',
      { artist_id: id },
      () => this.api.getArtistAlbums(id),
      decoders.artistAlbums
    );
  }

  private album(id: string): Promise<ItemModel> {
    return this.cache.cachedCall('album', { album_id: id }, () => this.api.getAlbum(id), decoders.album);
  }

  private albumTracks(id: string): Promise<PagingModel> {
    return this.cache.cachedCall(
      'album_tracks',
      { album_id: id },
      () => this.api.getAlbumTracks(id),
      decoders.albumTracks
    );
  }

  private track(id: string): Promise<ItemModel> {
    return this.cache.cachedCall('track', { track_id: id }, () => this.api.getTrack(id), decoders.track);
  }

  private audioFeatures(id: string): Promise<ItemModel> {
    return this.cache.cachedCall(
      'track_audio_features',
      { track_id: id },
      () => this.api.getTrackAudioFeatures(id),
      decoders.audioFeatures
    );
  }
}
