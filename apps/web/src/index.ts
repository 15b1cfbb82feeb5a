// Main entry point for the Tunescope web application
// Built with Hono; served on Node by ./server

import { Hono } from 'hono';
import { NotFoundError, errorResponse, toAppError } from '@tunescope/shared';
import { apiRoutes } from './api';
import type { AppEnv, Catalog } from './types';

export type { AppEnv, Catalog } from './types';

/**
 * Build the HTTP application around a catalog façade.
 */
export function createApp(catalog: Catalog) {
  const app = new Hono<AppEnv>();

  // Make the façade available to every route
  app.use('*', async (c, next) => {
    c.set('catalog', catalog);
    await next();
  });

  app.get('/health', (c) => c.json({ status: 'ok', timestamp: new Date().toISOString() }));

  app.route('/', apiRoutes);

  app.notFound((c) => errorResponse(new NotFoundError('Route', c.req.path)));

  app.onError((err) => {
    const appError = toAppError(err);
    console.error(`[Web] Unhandled error: ${appError.message}`);
    return errorResponse(appError);
  });

  return app;
}
