// ABOUTME: Tests for flattening model variants into JSON-safe values.

import { describe, it, expect } from 'vitest';
import { collection, flatten, image, item, paging, scalar } from '../src/index';

describe('flatten', () => {
  it('flattens every item of a page, in order', () => {
    const page = paging(
      {
        items: [
          { id: 'a', name: 'Alpha' },
          { id: 'b', name: 'Beta' },
          { id: 'c', name: 'Gamma' },
        ],
        total: 3,
        next: null,
      },
      (ref) => item('SimpleArtist', ref)
    );

    expect(flatten(page)).toEqual([
      { id: 'a', name: 'Alpha' },
      { id: 'b', name: 'Beta' },
      { id: 'c', name: 'Gamma' },
    ]);
  });

  it('returns an empty list for an empty page', () => {
    expect(flatten(paging({ items: [], total: 0, next: null }, (ref: { id: string }) => item('SimpleTrack', ref)))).toEqual(
      []
    );
  });

  it('reduces a collection to its first element', () => {
    const images = collection(
      [
        { url: 'https://img.example.com/large.jpg', width: 640, height: 640 },
        { url: 'https://img.example.com/small.jpg', width: 64, height: 64 },
      ],
      image
    );

    expect(flatten(images)).toBe('https://img.example.com/large.jpg');
  });

  it('reduces an empty collection to null', () => {
    expect(flatten(collection([], image))).toBeNull();
  });

  it('reduces an image to its url', () => {
    expect(flatten(image({ url: 'https://img.example.com/cover.jpg' }))).toBe('https://img.example.com/cover.jpg');
  });

  it('reduces a nested item to its reference', () => {
    const artist = item('SimpleArtist', { id: 'artist-1', type: 'artist', name: 'The Placeholders' }, {
      popularity: scalar(70),
    });

    expect(flatten(artist)).toEqual({ id: 'artist-1', type: 'artist', name: 'The Placeholders' });
  });

  it('leaves absent reference fields out', () => {
    expect(flatten(item('SimpleArtist', { id: 'artist-1' }))).toEqual({ id: 'artist-1' });
  });

  it('passes primitives through', () => {
    expect(flatten(scalar(42))).toBe(42);
    expect(flatten(scalar('2019-05-03'))).toBe('2019-05-03');
    expect(flatten(scalar(null))).toBeNull();
  });

  it('returns a copy of structured leaves', () => {
    const genres = ['indie rock', 'dream pop'];
    const flattened = flatten(scalar(genres));

    expect(flattened).toEqual(genres);
    expect(flattened).not.toBe(genres);
  });
});
