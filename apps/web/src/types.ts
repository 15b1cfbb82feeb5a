// Shared type definitions for the Hono application
// Used across all route handlers to ensure type consistency

import type { CatalogService } from '@tunescope/spotify';

/** The façade operations the routes call */
export type Catalog = Pick<CatalogService, 'search' | 'entityDetail' | 'trackDetail' | 'clearCache'>;

// Context variables (set by middleware)
export type Variables = {
  catalog: Catalog;
};

export type AppEnv = { Variables: Variables };
