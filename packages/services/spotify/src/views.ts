// ABOUTME: Search and detail records built from a fixed per-model field allow-list.
// ABOUTME: Models without an entry for the requested view are rejected, never half-rendered.

import {
  MalformedRemoteResultError,
  UnsupportedModelError,
  type DetailRecord,
  type FlattenedValue,
  type SearchRecord,
} from '@tunescope/shared';
import { flatten } from './flatten';
import type { ItemModel, ModelName, ModelVariant, PagingModel } from './models';

export type View = 'search' | 'detail';

type AllowList = Partial<Record<ModelName, readonly string[]>>;

export const VIEW_FIELDS = {
  search: {
    FullArtist: ['id', 'name', 'genres', 'images'],
    SimpleAlbum: ['id', 'name', 'artists', 'release_date', 'images'],
    FullTrack: ['id', 'name', 'artists', 'album'],
    SimpleTrack: ['id', 'name', 'disc_number', 'track_number', 'duration_ms'],
  },
  detail: {
    FullArtist: ['id', 'name', 'popularity', 'genres', 'images'],
    FullAlbum: [
      'id',
      'name',
      'popularity',
      'genres',
      'release_date',
      'total_tracks',
      'label',
      'artists',
      'images',
    ],
    FullTrack: [
      'id',
      'name',
      'popularity',
      'disc_number',
      'track_number',
      'artists',
      'album',
      'duration_ms',
    ],
    AudioFeatures: ['danceability', 'energy', 'valence'],
  },
} as const satisfies Record<View, AllowList>;

// Search records are linked by id and labelled by name
const REQUIRED_SEARCH_FIELDS = ['id', 'name'] as const;

export function allowListFor(view: View, model: ModelName): readonly string[] | undefined {
  const table: AllowList = VIEW_FIELDS[view];
  return table[model];
}

function buildRecord(view: View, item: ItemModel): Record<string, FlattenedValue> {
  const fields = allowListFor(view, item.model);
  if (!fields) {
    throw new UnsupportedModelError(item.model, `the ${view} view`);
  }

  const record: Record<string, FlattenedValue> = {};
  for (const field of fields) {
    const value = item.fields[field];
    record[field] = value === undefined ? null : flatten(value);
  }
  return record;
}

export function searchView(model: PagingModel): SearchRecord[];
export function searchView(model: ItemModel): SearchRecord;
export function searchView(model: ModelVariant): SearchRecord | SearchRecord[];
export function searchView(model: ModelVariant): SearchRecord | SearchRecord[] {
  switch (model.kind) {
    case 'paging':
      return model.items.map((item) => searchView(item));
    case 'item': {
      const record = buildRecord('search', model);
      const missing = REQUIRED_SEARCH_FIELDS.filter((field) => record[field] === null);
      if (missing.length > 0) {
        throw new MalformedRemoteResultError(
          `${model.model} search record`,
          missing.map((field) => `${field}: required`)
        );
      }
      return record;
    }
    default:
      throw new UnsupportedModelError(model.kind, 'the search view');
  }
}

export function detailView(model: ModelVariant): DetailRecord {
  if (model.kind !== 'item') {
    throw new UnsupportedModelError(model.kind, 'the detail view');
  }
  return buildRecord('detail', model);
}
