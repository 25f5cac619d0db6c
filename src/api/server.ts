import fs from 'node:fs';
import path from 'node:path';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { Config } from '../shared/config.js';
import { resolvePath } from '../shared/utils.js';
import { logger } from '../shared/logger.js';
import { FeedScheduler } from '../schedule/scheduler.js';
import { runPipeline } from '../pipeline/run.js';

export interface AppContext {
  config: Config;
}

const NO_CACHE = 'no-store, no-cache, must-revalidate';

/**
 * Static host for the generated feed. `/` redirects to the artifact.
 */
export function createApp(ctx: AppContext): Hono {
  const app = new Hono();
  const feedFile = resolvePath(ctx.config.feed.output_path);
  const feedRoute = `/${path.basename(feedFile)}`;

  app.use('*', cors({ origin: '*', allowMethods: ['GET'] }));
  app.use('*', async (c, next) => {
    c.header('Cache-Control', NO_CACHE);
    await next();
  });

  app.get('/', (c) => c.redirect(feedRoute));

  app.get(feedRoute, (c) => {
    if (!fs.existsSync(feedFile)) {
      return c.json({ error: 'Feed has not been generated yet' }, 404);
    }
    const xml = fs.readFileSync(feedFile, 'utf-8');
    return c.body(xml, 200, { 'Content-Type': 'application/rss+xml; charset=utf-8' });
  });

  app.get('/health', (c) => {
    return c.json({ status: 'ok', uptime: process.uptime() });
  });

  app.onError((err, c) => {
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  return app;
}

export interface ServeOptions {
  port?: number;
  /** Also run the update scheduler in this process. */
  schedule?: boolean;
}

export function startServer(config: Config, opts: ServeOptions = {}): void {
  const port = opts.port ?? config.server.port;
  const host = config.server.host;
  const app = createApp({ config });

  const controller = new AbortController();
  const scheduler = opts.schedule
    ? new FeedScheduler({
        cron: config.schedule.update_cron,
        run: () => runPipeline(config),
        signal: controller.signal,
      })
    : null;

  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ port: info.port, host }, 'Serving NPO RSS feed');
  });

  scheduler?.start();

  const shutdown = () => {
    logger.info('Shutting down...');
    controller.abort();
    server.close();
    void (scheduler?.idle() ?? Promise.resolve()).then(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
