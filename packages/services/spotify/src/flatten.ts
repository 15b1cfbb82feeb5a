// ABOUTME: Reduces one model variant to a JSON-safe value.
// ABOUTME: Dispatch is on the variant's kind; nested catalog objects collapse to references.

import { UnsupportedModelError, type FlattenedValue, type JsonValue } from '@tunescope/shared';
import type { ItemModel, ModelVariant } from './models';

/**
 * Flatten a model variant:
 * - paging: every item flattened, in order
 * - collection: its first element (the lists nested in an entity are shown as
 *   one value); empty collections become null
 * - image: its url
 * - item: `{ id, type, name }` with whichever of type and name are present
 * - scalar: a serialized copy of the value
 */
export function flatten(variant: ModelVariant): FlattenedValue {
  switch (variant.kind) {
    case 'paging':
      return variant.items.map(flatten);
    case 'collection': {
      const [first] = variant.items;
      return first === undefined ? null : flatten(first);
    }
    case 'image':
      return variant.url;
    case 'item':
      return itemReference(variant);
    case 'scalar':
      return serializeLeaf(variant.value);
    default: {
      const unknown: { kind?: unknown } = variant;
      throw new UnsupportedModelError(String(unknown.kind), 'flatten');
    }
  }
}

export function itemReference(item: ItemModel): FlattenedValue {
  return {
    id: item.id,
    ...(item.type !== undefined && { type: item.type }),
    ...(item.name !== undefined && { name: item.name }),
  };
}

function serializeLeaf(value: JsonValue): FlattenedValue {
  if (value === null || typeof value !== 'object') {
    return value;
  }
  try {
    const copy: JsonValue = JSON.parse(JSON.stringify(value));
    return copy;
  } catch {
    // Values JSON cannot represent (cycles) are passed through as they are
    return value;
  }
}
