// Types for the flat records handed to the HTTP layer

import type { JsonValue } from './json';

export const ENTITY_TYPES = ['artist', 'album', 'track'] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

/** Entity types that have a primary-plus-related detail page */
export type DetailEntityType = Exclude<EntityType, 'track'>;

/**
 * Result of flattening a nested model: a primitive, a flat mapping,
 * an ordered list of those, or null.
 */
export type FlattenedValue = JsonValue;

/** Summary record for search results and related lists */
export type SearchRecord = Record<string, FlattenedValue>;

/** Single richer record for a detail page */
export type DetailRecord = Record<string, FlattenedValue>;

export interface EntityDetail {
  primary: DetailRecord;
  related: SearchRecord[];
}

export interface TrackDetail {
  track: DetailRecord;
  audio: DetailRecord;
}

export function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPES.some((type) => type === value);
}
