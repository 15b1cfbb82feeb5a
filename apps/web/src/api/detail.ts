// Detail routes: /artist/:id, /album/:id, /track/:id (or ?item_id=)
// Payloads are keyed the way the UI reads them

import { Hono, type Context } from 'hono';
import { getCacheHeader } from '@tunescope/config';
import { ValidationError, errorResponse, toAppError, type JsonValue } from '@tunescope/shared';
import type { AppEnv, Catalog } from '../types';

type DetailLoader = (catalog: Catalog, id: string) => Promise<Record<string, JsonValue>>;

function detailRoutes(label: string, load: DetailLoader) {
  const handle = async (c: Context<AppEnv>, id: string | undefined) => {
    if (!id) {
      return errorResponse(new ValidationError('Missing required parameter: item_id'));
    }

    console.log(`[API] ${label} invoked with ${id}`);
    try {
      const payload = await load(c.get('catalog'), id);
      c.header('Cache-Control', getCacheHeader('dynamic'));
      return c.json(payload);
    } catch (error) {
      const appError = toAppError(error);
      console.error(`[API] ${label} error: ${appError.message}`);
      return errorResponse(appError);
    }
  };

  const app = new Hono<AppEnv>();
  app.get('/', (c) => handle(c, c.req.query('item_id')));
  app.get('/:id', (c) => handle(c, c.req.param('id')));
  return app;
}

export const artistRoutes = detailRoutes('artist', async (catalog, id) => {
  const { primary, related } = await catalog.entityDetail('artist', id);
  return { artist: primary, albums: related };
});

export const albumRoutes = detailRoutes('album', async (catalog, id) => {
  const { primary, related } = await catalog.entityDetail('album', id);
  return { album: primary, tracks: related };
});

export const trackRoutes = detailRoutes('track', async (catalog, id) => {
  const { track, audio } = await catalog.trackDetail(id);
  return { track, audio };
});
