// GET /search/:qtype/:query and GET /search?qtype=&query= - single-type catalog search

import { Hono, type Context } from 'hono';
import { getCacheHeader } from '@tunescope/config';
import { NotFoundError, ValidationError, errorResponse, isEntityType, toAppError } from '@tunescope/shared';
import type { AppEnv } from '../types';

const app = new Hono<AppEnv>();

async function handleSearch(c: Context<AppEnv>, qtype: string | undefined, query: string | undefined) {
  if (!qtype || !query) {
    return errorResponse(new ValidationError('Missing required parameters: qtype, query'));
  }
  if (!isEntityType(qtype)) {
    return errorResponse(new NotFoundError('Search type', qtype));
  }

  console.log(`[API] search invoked with ${qtype} "${query}"`);
  try {
    const results = await c.get('catalog').search(qtype, query);
    c.header('Cache-Control', getCacheHeader('dynamic'));
    return c.json({ [qtype]: results });
  } catch (error) {
    const appError = toAppError(error);
    console.error(`[API] search error: ${appError.message}`);
    return errorResponse(appError);
  }
}

app.get('/', (c) => handleSearch(c, c.req.query('qtype'), c.req.query('query')));

app.get('/:qtype/:query', (c) => handleSearch(c, c.req.param('qtype'), c.req.param('query')));

export const searchRoutes = app;
