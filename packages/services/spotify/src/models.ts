// ABOUTME: Tagged model tree built from validated Spotify responses.
// ABOUTME: Each builder knows its fields' declared types, so variants are chosen by type, not by value.

import { z } from 'zod';
import type { Decoder } from '@tunescope/cache';
import {
  MalformedRemoteResultError,
  UnsupportedModelError,
  type EntityType,
  type JsonValue,
} from '@tunescope/shared';
import {
  AudioFeaturesSchema,
  FullAlbumSchema,
  FullArtistSchema,
  FullTrackSchema,
  SimpleAlbumSchema,
  SimpleTrackSchema,
  pagingSchema,
  type RawAudioFeatures,
  type RawFullAlbum,
  type RawFullArtist,
  type RawFullTrack,
  type RawImage,
  type RawItemRef,
  type RawSimpleAlbum,
  type RawSimpleTrack,
} from './schemas';

export type ModelName =
  | 'FullArtist'
  | 'SimpleArtist'
  | 'FullAlbum'
  | 'SimpleAlbum'
  | 'FullTrack'
  | 'SimpleTrack'
  | 'AudioFeatures';

/** Ordered page of items with a total and a cursor to the next page */
export interface PagingModel {
  kind: 'paging';
  items: ItemModel[];
  total: number;
  next: string | null;
}

/** Bare ordered container, e.g. an album's artists or images */
export interface CollectionModel {
  kind: 'collection';
  items: ModelVariant[];
}

export interface ImageModel {
  kind: 'image';
  url: string;
  width: number | null;
  height: number | null;
}

export type ModelFields = Readonly<Partial<Record<string, ModelVariant>>>;

/** A catalog object: top-level entity or a reference nested in another one */
export interface ItemModel {
  kind: 'item';
  model: ModelName;
  id: string;
  type?: string;
  name?: string;
  fields: ModelFields;
}

/** JSON leaf without a specialised rule (numbers, strings, genre lists) */
export interface ScalarModel {
  kind: 'scalar';
  value: JsonValue;
}

export type ModelVariant = PagingModel | CollectionModel | ImageModel | ItemModel | ScalarModel;

// Variant constructors

export function scalar(value: JsonValue): ScalarModel {
  return { kind: 'scalar', value };
}

export function image(raw: RawImage): ImageModel {
  return { kind: 'image', url: raw.url, width: raw.width ?? null, height: raw.height ?? null };
}

export function collection<T>(items: readonly T[], build: (item: T) => ModelVariant): CollectionModel {
  return { kind: 'collection', items: items.map(build) };
}

export function item(model: ModelName, ref: RawItemRef, fields: ModelFields = {}): ItemModel {
  return { kind: 'item', model, id: ref.id, type: ref.type, name: ref.name, fields };
}

export function paging<T>(
  raw: { items: T[]; total: number; next: string | null },
  build: (item: T) => ItemModel
): PagingModel {
  return { kind: 'paging', items: raw.items.map(build), total: raw.total, next: raw.next };
}

// Per-model builders

function artistRef(raw: RawItemRef): ItemModel {
  return item('SimpleArtist', raw);
}

export function fullArtistModel(raw: RawFullArtist): ItemModel {
  return item('FullArtist', raw, {
    id: scalar(raw.id),
    name: scalar(raw.name),
    popularity: scalar(raw.popularity),
    genres: scalar(raw.genres),
    images: collection(raw.images, image),
  });
}

export function simpleAlbumModel(raw: RawSimpleAlbum): ItemModel {
  return item('SimpleAlbum', raw, {
    id: scalar(raw.id),
    name: scalar(raw.name),
    artists: collection(raw.artists, artistRef),
    release_date: scalar(raw.release_date),
    images: collection(raw.images, image),
    ...(raw.album_type !== undefined && { album_type: scalar(raw.album_type) }),
    ...(raw.total_tracks !== undefined && { total_tracks: scalar(raw.total_tracks) }),
  });
}

export function fullAlbumModel(raw: RawFullAlbum): ItemModel {
  return item('FullAlbum', raw, {
    id: scalar(raw.id),
    name: scalar(raw.name),
    popularity: scalar(raw.popularity),
    genres: scalar(raw.genres),
    release_date: scalar(raw.release_date),
    total_tracks: scalar(raw.total_tracks),
    label: scalar(raw.label),
    artists: collection(raw.artists, artistRef),
    images: collection(raw.images, image),
  });
}

export function simpleTrackModel(raw: RawSimpleTrack): ItemModel {
  return item('SimpleTrack', raw, {
    id: scalar(raw.id),
    name: scalar(raw.name),
    artists: collection(raw.artists, artistRef),
    disc_number: scalar(raw.disc_number),
    track_number: scalar(raw.track_number),
    duration_ms: scalar(raw.duration_ms),
  });
}

export function fullTrackModel(raw: RawFullTrack): ItemModel {
  return item('FullTrack', raw, {
    ...simpleTrackModel(raw).fields,
    album: simpleAlbumModel(raw.album),
    popularity: scalar(raw.popularity),
  });
}

export function audioFeaturesModel(raw: RawAudioFeatures): ItemModel {
  return item('AudioFeatures', raw, {
    danceability: scalar(raw.danceability),
    energy: scalar(raw.energy),
    valence: scalar(raw.valence),
  });
}

// Decoders: validate a raw response, then build its model tree

function malformed(operation: string, error: z.ZodError): MalformedRemoteResultError {
  return new MalformedRemoteResultError(
    operation,
    error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
  );
}

export function decodeWith<Raw, M>(
  operation: string,
  schema: z.ZodType<Raw>,
  build: (raw: Raw) => M
): Decoder<M> {
  return (raw: unknown) => {
    const result = schema.safeParse(raw);
    if (!result.success) {
      throw malformed(operation, result.error);
    }
    return build(result.data);
  };
}

export const decoders = {
  artist: decodeWith('artist', FullArtistSchema, fullArtistModel),
  artistAlbums: decodeWith('artist_albums', pagingSchema(SimpleAlbumSchema), (raw) =>
    paging(raw, simpleAlbumModel)
  ),
  album: decodeWith('album', FullAlbumSchema, fullAlbumModel),
  albumTracks: decodeWith('album_tracks', pagingSchema(SimpleTrackSchema), (raw) =>
    paging(raw, simpleTrackModel)
  ),
  track: decodeWith('track', FullTrackSchema, fullTrackModel),
  audioFeatures: decodeWith('track_audio_features', AudioFeaturesSchema, audioFeaturesModel),
} satisfies Record<string, Decoder<ModelVariant>>;

/** Key each single-type search response is returned under */
export const SEARCH_RESULT_KEYS = {
  artist: 'artists',
  album: 'albums',
  track: 'tracks',
} as const satisfies Record<EntityType, string>;

const SearchEnvelopeSchema = z.record(z.string(), z.unknown());

const searchPageDecoders: Record<EntityType, Decoder<PagingModel>> = {
  artist: decodeWith('search', pagingSchema(FullArtistSchema), (raw) => paging(raw, fullArtistModel)),
  album: decodeWith('search', pagingSchema(SimpleAlbumSchema), (raw) => paging(raw, simpleAlbumModel)),
  track: decodeWith('search', pagingSchema(FullTrackSchema), (raw) => paging(raw, fullTrackModel)),
};

/**
 * Decoder for a search constrained to one entity type. A response carrying any
 * other result type, or more than one, violates that contract and is rejected.
 */
export function searchDecoder(entityType: EntityType): Decoder<PagingModel> {
  const key = SEARCH_RESULT_KEYS[entityType];
  const decodePage = searchPageDecoders[entityType];

  return (raw: unknown) => {
    const envelope = SearchEnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      throw malformed('search', envelope.error);
    }
    const keys = Object.keys(envelope.data);
    if (keys.length !== 1 || keys[0] !== key) {
      throw new UnsupportedModelError(
        `search result types [${keys.join(', ')}]`,
        `a search constrained to ${entityType}`
      );
    }
    return decodePage(envelope.data[key]);
  };
}
