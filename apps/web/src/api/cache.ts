// Admin endpoint for cache management
// DELETE /cache removes every entry and turns memoization off for this process

import { Hono } from 'hono';
import { getCacheHeader } from '@tunescope/config';
import { errorResponse, toAppError } from '@tunescope/shared';
import type { AppEnv } from '../types';

const app = new Hono<AppEnv>();

app.delete('/', async (c) => {
  try {
    await c.get('catalog').clearCache();
    c.header('Cache-Control', getCacheHeader('noCache'));
    return c.json({ message: 'Cache cleared', memoize: false });
  } catch (error) {
    const appError = toAppError(error);
    console.error(`[API] cache clear error: ${appError.message}`);
    return errorResponse(appError);
  }
});

export const cacheRoutes = app;
