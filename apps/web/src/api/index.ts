// API Routes Index
// Provides the overview endpoint and exports all route groups

import { Hono } from 'hono';
import { SITE_CONFIG } from '@tunescope/config';
import type { AppEnv } from '../types';
import { searchRoutes } from './search';
import { albumRoutes, artistRoutes, trackRoutes } from './detail';
import { cacheRoutes } from './cache';

const app = new Hono<AppEnv>();

// Endpoint overview
app.get('/', (c) => {
  return c.json({
    message: `${SITE_CONFIG.name} API`,
    version: SITE_CONFIG.version,
    endpoints: {
      search: {
        description: 'Search the catalog for one entity type (artist, album, track)',
        endpoint: 'GET /search/:qtype/:query',
        alternate: 'GET /search?qtype=:qtype&query=:query',
      },
      artist: {
        description: 'Artist details with their albums',
        endpoint: 'GET /artist/:id',
      },
      album: {
        description: 'Album details with its tracks',
        endpoint: 'GET /album/:id',
      },
      track: {
        description: 'Track details with audio features',
        endpoint: 'GET /track/:id',
      },
      cache: {
        description: 'Erase memoized results and stop memoizing',
        endpoint: 'DELETE /cache',
      },
    },
  });
});

// Mount route groups
app.route('/search', searchRoutes);
app.route('/artist', artistRoutes);
app.route('/album', albumRoutes);
app.route('/track', trackRoutes);
app.route('/cache', cacheRoutes);

export const apiRoutes = app;
