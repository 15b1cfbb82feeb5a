// Spotify Web API response fixtures (placeholder catalog data)

const artistRef = { id: 'artist-1', type: 'artist', name: 'The Placeholders' };

const artist = {
  id: 'artist-1',
  type: 'artist',
  name: 'The Placeholders',
  popularity: 61,
  genres: ['indie rock', 'dream pop'],
  images: [
    { url: 'https://img.example.com/artist-1-640.jpg', width: 640, height: 640 },
    { url: 'https://img.example.com/artist-1-160.jpg', width: 160, height: 160 },
  ],
  followers: { href: null, total: 1200 },
  href: 'https://api.example.com/v1/artists/artist-1',
};

const simpleAlbum = {
  id: 'album-1',
  type: 'album',
  name: 'First Light',
  album_type: 'album',
  artists: [artistRef],
  release_date: '2019-05-03',
  total_tracks: 2,
  images: [{ url: 'https://img.example.com/album-1.jpg', width: 300, height: 300 }],
};

const fullAlbum = {
  ...simpleAlbum,
  popularity: 48,
  genres: [],
  label: 'Sample Records',
  copyrights: [{ text: '2019 Sample Records', type: 'C' }],
};

const simpleTracks = [
  {
    id: 'track-1',
    type: 'track',
    name: 'Opening',
    artists: [artistRef],
    disc_number: 1,
    track_number: 1,
    duration_ms: 201000,
  },
  {
    id: 'track-2',
    type: 'track',
    name: 'Closing',
    artists: [artistRef],
    disc_number: 1,
    track_number: 2,
    duration_ms: 187000,
  },
];

const fullTrack = {
  ...simpleTracks[0],
  album: simpleAlbum,
  popularity: 55,
  explicit: false,
};

const audioFeatures = {
  id: 'track-1',
  type: 'audio_features',
  danceability: 0.61,
  energy: 0.72,
  valence: 0.4,
  tempo: 120.5,
};

function page<T>(items: T[]) {
  return { href: 'https://api.example.com/v1/page', items, limit: 20, offset: 0, total: items.length, next: null };
}

export const spotifyFixtures = {
  artistRef,
  artist,
  simpleAlbum,
  fullAlbum,
  simpleTracks,
  fullTrack,
  audioFeatures,
  artistAlbums: page([simpleAlbum]),
  albumTracks: page(simpleTracks),
  searchArtists: { artists: page([artist]) },
  searchAlbums: { albums: page([simpleAlbum]) },
  searchTracks: { tracks: page([fullTrack]) },
  searchMixed: { tracks: page([fullTrack]), artists: page([artist]) },
  tokenResponse: { access_token: 'test-access-token', token_type: 'Bearer', expires_in: 3600 },
  credentials: { client_id: 'test-client', client_secret: 'test-secret' },
};

// Flat records the views produce from the fixtures above

const artistReference = { id: 'artist-1', type: 'artist', name: 'The Placeholders' };
const albumReference = { id: 'album-1', type: 'album', name: 'First Light' };

export const expectedRecords = {
  artistSearch: {
    id: 'artist-1',
    name: 'The Placeholders',
    genres: ['indie rock', 'dream pop'],
    images: 'https://img.example.com/artist-1-640.jpg',
  },
  artistDetail: {
    id: 'artist-1',
    name: 'The Placeholders',
    popularity: 61,
    genres: ['indie rock', 'dream pop'],
    images: 'https://img.example.com/artist-1-640.jpg',
  },
  albumSearch: {
    id: 'album-1',
    name: 'First Light',
    artists: artistReference,
    release_date: '2019-05-03',
    images: 'https://img.example.com/album-1.jpg',
  },
  albumDetail: {
    id: 'album-1',
    name: 'First Light',
    popularity: 48,
    genres: [],
    release_date: '2019-05-03',
    total_tracks: 2,
    label: 'Sample Records',
    artists: artistReference,
    images: 'https://img.example.com/album-1.jpg',
  },
  trackSearch: {
    id: 'track-1',
    name: 'Opening',
    artists: artistReference,
    album: albumReference,
  },
  albumTrackSearch: [
    { id: 'track-1', name: 'Opening', disc_number: 1, track_number: 1, duration_ms: 201000 },
    { id: 'track-2', name: 'Closing', disc_number: 1, track_number: 2, duration_ms: 187000 },
  ],
  trackDetail: {
    id: 'track-1',
    name: 'Opening',
    popularity: 55,
    disc_number: 1,
    track_number: 1,
    artists: artistReference,
    album: albumReference,
    duration_ms: 201000,
  },
  audioDetail: { danceability: 0.61, energy: 0.72, valence: 0.4 },
};
