// ABOUTME: Tests for the catalog service - memoized search and detail reads end to end.

import { access, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { CredentialsMissingError, UnsupportedModelError } from '@tunescope/shared';
import { CatalogService, type CatalogServiceOptions, type TokenRequester } from '../src/index';
import { expectedRecords, spotifyFixtures } from './fixtures';
import { createMockCatalogApi } from './mocks';

describe('CatalogService', () => {
  let dir: string;
  let cacheDir: string;
  let credentialsPath: string;
  let api: ReturnType<typeof createMockCatalogApi>;
  let requestToken: Mock<TokenRequester>;

  const createService = (overrides: Partial<CatalogServiceOptions> = {}) =>
    CatalogService.create({
      cacheDir,
      tokenPath: join(cacheDir, 'token.json'),
      credentialsPath,
      api,
      requestToken,
      ...overrides,
    });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'catalog-service-'));
    cacheDir = join(dir, 'cache');
    credentialsPath = join(dir, 'credentials.json');
    requestToken = vi.fn<TokenRequester>(async () => spotifyFixtures.tokenResponse);
    await writeFile(credentialsPath, JSON.stringify(spotifyFixtures.credentials));
    api = createMockCatalogApi({
      search: spotifyFixtures.searchTracks,
      getArtist: spotifyFixtures.artist,
      getArtistAlbums: spotifyFixtures.artistAlbums,
      getAlbum: spotifyFixtures.fullAlbum,
      getAlbumTracks: spotifyFixtures.albumTracks,
      getTrack: spotifyFixtures.fullTrack,
      getTrackAudioFeatures: spotifyFixtures.audioFeatures,
    });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('create', () => {
    it('acquires a token and stores it under the cache root', async () => {
      const service = await createService();

      expect(service.auth.state).toBe('refreshed');
      await expect(access(join(cacheDir, 'token.json'))).resolves.toBeUndefined();
    });

    it('fails when no token can be obtained', async () => {
      await rm(credentialsPath);
      vi.spyOn(console, 'error').mockImplementation(() => {});

      await expect(createService()).rejects.toBeInstanceOf(CredentialsMissingError);
    });

    it('erases an existing cache when memoization is off', async () => {
      await mkdir(cacheDir, { recursive: true });
      await writeFile(join(cacheDir, 'stale-entry.json'), '{}');

      const service = await createService({ memoize: false });

      expect(service.cache.isEnabled).toBe(false);
      await expect(access(join(cacheDir, 'stale-entry.json'))).rejects.toThrow();
    });
  });

  describe('search', () => {
    it('calls the remote once and serves repeats from the cache', async () => {
      const service = await createService();

      const first = await service.search('track', 'Yesterday');
      expect(first).toEqual([expectedRecords.trackSearch]);
      expect(api.search).toHaveBeenCalledTimes(1);
      expect(api.search).toHaveBeenCalledWith('Yesterday', ['track']);
      expect(await service.cache.list()).toHaveLength(1);
      expect(service.cache.getStats()).toEqual({ hits: 0, misses: 1, corruptions: 0 });

      const second = await service.search('track', 'Yesterday');
      expect(second).toEqual(first);
      expect(api.search).toHaveBeenCalledTimes(1);
      expect(service.cache.getStats()).toEqual({ hits: 1, misses: 1, corruptions: 0 });
    });

    it('survives a restart through the cache directory', async () => {
      await (await createService()).search('track', 'Yesterday');

      const restarted = await createService();
      expect(await restarted.search('track', 'Yesterday')).toEqual([expectedRecords.trackSearch]);
      expect(api.search).toHaveBeenCalledTimes(1);
    });

    it('rejects a response that mixes result types and caches nothing', async () => {
      api.search.mockResolvedValue(spotifyFixtures.searchMixed);
      const service = await createService();

      await expect(service.search('track', 'Yesterday')).rejects.toBeInstanceOf(UnsupportedModelError);
      expect(await service.cache.list()).toEqual([]);
    });

    it('calls the remote every time once memoization is off', async () => {
      const service = await createService({ memoize: false });

      await service.search('track', 'Yesterday');
      await service.search('track', 'Yesterday');

      expect(api.search).toHaveBeenCalledTimes(2);
    });
  });

  describe('entityDetail', () => {
    it('returns an artist with their albums', async () => {
      const service = await createService();

      expect(await service.entityDetail('artist', 'artist-1')).toEqual({
        primary: expectedRecords.artistDetail,
        related: [expectedRecords.albumSearch],
      });
      expect(api.getArtist).toHaveBeenCalledWith('artist-1');
      expect(api.getArtistAlbums).toHaveBeenCalledWith('artist-1');
    });

    it('returns an album with its tracks', async () => {
      const service = await createService();

      expect(await service.entityDetail('album', 'album-1')).toEqual({
        primary: expectedRecords.albumDetail,
        related: expectedRecords.albumTrackSearch,
      });
    });

    it('memoizes each remote call separately', async () => {
      const service = await createService();

      await service.entityDetail('album', 'album-1');
      await service.entityDetail('album', 'album-1');

      expect(api.getAlbum).toHaveBeenCalledTimes(1);
      expect(api.getAlbumTracks).toHaveBeenCalledTimes(1);
      expect(await service.cache.list()).toHaveLength(2);
    });
  });

  describe('trackDetail', () => {
    it('stitches the track together with its audio features', async () => {
      const service = await createService();

      expect(await service.trackDetail('track-1')).toEqual({
        track: expectedRecords.trackDetail,
        audio: expectedRecords.audioDetail,
      });
      expect(api.getTrack).toHaveBeenCalledWith('track-1');
      expect(api.getTrackAudioFeatures).toHaveBeenCalledWith('track-1');
    });
  });

  describe('clearCache', () => {
    it('removes entries and stops memoizing', async () => {
      const service = await createService();
      await service.trackDetail('track-1');

      await service.clearCache();
      await service.trackDetail('track-1');

      expect(api.getTrack).toHaveBeenCalledTimes(2);
      expect(await service.cache.list()).toEqual([]);
    });
  });
});
