// Node entry point: tsx apps/web/src/server.ts [--port <port>] [--no-store]

import { serve } from '@hono/node-server';
import { loadConfig } from '@tunescope/config';
import { CatalogService } from '@tunescope/spotify';
import { describeError } from '@tunescope/shared';
import { createApp } from './index';
import { USAGE, parseCliArgs, type CliResult } from './cli';

async function main() {
  let parsed: CliResult;
  try {
    parsed = parseCliArgs(process.argv.slice(2), loadConfig(process.env));
  } catch (error) {
    console.error(`${describeError(error)}\n`);
    console.log(USAGE);
    process.exitCode = 2;
    return;
  }

  if (parsed.kind === 'help') {
    console.log(USAGE);
    return;
  }

  const { config } = parsed;
  if (!config.memoize) {
    console.log(`[Server] Memoization disabled; erasing ${config.cacheDir}`);
  }

  const catalog = await CatalogService.create({
    cacheDir: config.cacheDir,
    tokenPath: config.tokenPath,
    credentialsPath: config.credentialsPath,
    memoize: config.memoize,
  });

  const app = createApp(catalog);
  serve({ fetch: app.fetch, port: config.port }, (info) => {
    console.log(`[Server] Listening on http://localhost:${info.port}`);
  });
}

main().catch((error: unknown) => {
  console.error('[Server] Fatal error:', describeError(error));
  process.exit(1);
});
