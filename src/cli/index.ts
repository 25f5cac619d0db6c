#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import Parser from 'rss-parser';
import { CONFIG_FILE_NAME, loadConfig, writeDefaultConfig } from '../shared/config.js';
import { FeedError } from '../shared/errors.js';
import { resolvePath } from '../shared/utils.js';
import { CacheStore } from '../cache/store.js';
import { runPipeline } from '../pipeline/run.js';
import { FeedScheduler } from '../schedule/scheduler.js';
import { startServer } from '../api/server.js';

const program = new Command();

program
  .name('npo-feed')
  .description('RSS feed of new and recent programs on NPO')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description(`Write a default ${CONFIG_FILE_NAME} in the current directory`)
  .action(() => {
    const configPath = path.join(process.cwd(), CONFIG_FILE_NAME);
    if (fs.existsSync(configPath)) {
      log(`✓ ${CONFIG_FILE_NAME} already exists`);
      return;
    }
    writeDefaultConfig(configPath);
    log(`✓ ${CONFIG_FILE_NAME} created`);
  });

// === generate ===
program
  .command('generate')
  .description('Scrape (or reuse the cache) and write the RSS feed once')
  .option('-f, --force', 'ignore the cache and scrape the website', false)
  .action(async (opts: { force: boolean }) => {
    const config = await loadConfig();
    const result = await runPipeline(config, { force: opts.force });

    if (!result.outputPath) {
      log('No programs found, feed left unchanged');
      process.exitCode = 1;
      return;
    }

    const newCount = result.items.filter((p) => p.isNew).length;
    log(`✓ ${result.items.length} programs (${newCount} new) from ${result.origin}`);
    log(`  Feed:     ${result.outputPath}`);
    log(`  Duration: ${result.durationMs}ms`);
  });

// === show ===
program
  .command('show')
  .description('Print the entries of the generated feed')
  .action(async () => {
    const config = await loadConfig();
    const feedPath = resolvePath(config.feed.output_path);
    if (!fs.existsSync(feedPath)) {
      log(`Feed not found: ${feedPath}. Run: npo-feed generate`);
      process.exitCode = 1;
      return;
    }

    const parser = new Parser();
    const feed = await parser.parseString(fs.readFileSync(feedPath, 'utf-8'));
    log(`${feed.title ?? ''} (${feed.items.length} items)`);
    for (const item of feed.items) {
      log(`  ${item.isoDate?.slice(0, 10) ?? '          '}  ${item.title ?? ''}`);
      if (item.link) log(`              ${item.link}`);
    }
  });

// === cache ===
const cacheCmd = program.command('cache').description('Inspect or clear the program cache');

cacheCmd
  .command('status')
  .description('Show cache age and size')
  .action(async () => {
    const config = await loadConfig();
    const status = CacheStore.fromConfig(config.cache).inspect();
    if (!status.exists || status.ageSeconds === null) {
      log(`No cache at ${status.path}`);
      return;
    }
    log(`Cache:    ${status.path}`);
    log(`Programs: ${status.count}`);
    log(`Age:      ${Math.round(status.ageSeconds)}s (${status.fresh ? 'fresh' : 'expired'})`);
  });

cacheCmd
  .command('clear')
  .description('Delete the cache file')
  .action(async () => {
    const config = await loadConfig();
    const store = CacheStore.fromConfig(config.cache);
    log(store.clear() ? `✓ Removed ${store.path}` : `No cache at ${store.path}`);
  });

// === serve ===
program
  .command('serve')
  .description('Serve the feed over HTTP')
  .option('-p, --port <port>', 'port to listen on', (v: string) => parseInt(v, 10))
  .option('--schedule', 'also regenerate the feed on the update schedule', false)
  .action(async (opts: { port?: number; schedule: boolean }) => {
    const config = await loadConfig();
    startServer(config, { port: opts.port, schedule: opts.schedule });
  });

// === schedule ===
program
  .command('schedule')
  .description('Regenerate the feed periodically until interrupted')
  .action(async () => {
    const config = await loadConfig();
    const controller = new AbortController();
    const scheduler = new FeedScheduler({
      cron: config.schedule.update_cron,
      run: () => runPipeline(config),
      signal: controller.signal,
    });

    const shutdown = () => {
      controller.abort();
      void scheduler.idle().then(() => process.exit(0));
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    scheduler.start();
  });

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  if (err instanceof FeedError) {
    log(`${err.code}: ${err.message}`);
  } else {
    log(err instanceof Error ? err.message : String(err));
  }
  process.exitCode = 1;
});
