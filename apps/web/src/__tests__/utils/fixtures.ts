// Flat catalog records returned by the mock catalog (placeholder data)

const artistReference = { id: 'artist-1', type: 'artist', name: 'The Placeholders' };
const albumReference = { id: 'album-1', type: 'album', name: 'First Light' };

export const catalogFixtures = {
  trackResults: [{ id: 'track-1', name: 'Opening', artists: artistReference, album: albumReference }],
  albumResults: [
    {
      id: 'album-1',
      name: 'First Light',
      artists: artistReference,
      release_date: '2019-05-03',
      images: 'https://img.example.com/album-1.jpg',
    },
  ],
  artistDetail: {
    primary: {
      id: 'artist-1',
      name: 'The Placeholders',
      popularity: 61,
      genres: ['indie rock', 'dream pop'],
      images: 'https://img.example.com/artist-1-640.jpg',
    },
    related: [
      {
        id: 'album-1',
        name: 'First Light',
        artists: artistReference,
        release_date: '2019-05-03',
        images: 'https://img.example.com/album-1.jpg',
      },
    ],
  },
  albumDetail: {
    primary: {
      id: 'album-1',
      name: 'First Light',
      popularity: 48,
      genres: [],
      release_date: '2019-05-03',
      total_tracks: 1,
      label: 'Sample Records',
      artists: artistReference,
      images: 'https://img.example.com/album-1.jpg',
    },
    related: [{ id: 'track-1', name: 'Opening', disc_number: 1, track_number: 1, duration_ms: 201000 }],
  },
  trackDetail: {
    track: {
      id: 'track-1',
      name: 'Opening',
      popularity: 55,
      disc_number: 1,
      track_number: 1,
      artists: artistReference,
      album: albumReference,
      duration_ms: 201000,
    },
    audio: { danceability: 0.61, energy: 0.72, valence: 0.4 },
  },
};
