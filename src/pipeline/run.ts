import type { Config } from '../shared/config.js';
import type { FallbackCatalog } from '../shared/catalog.js';
import { logger } from '../shared/logger.js';
import { CacheStore } from '../cache/store.js';
import { PageFetcher } from '../source/fetcher.js';
import { scrapePrograms } from '../source/scrape.js';
import type { DescriptionClassifier, ProgramItem } from '../source/program.js';
import { assembleFeed, writeFeed } from '../feed/assemble.js';

export type ProgramOrigin = 'cache' | 'website' | 'fallback';

export interface PipelineOptions {
  /** Skip the cache read and always scrape. */
  force?: boolean;
  classifier?: DescriptionClassifier;
  catalog?: FallbackCatalog;
  now?: Date;
}

export interface PipelineResult {
  origin: ProgramOrigin;
  items: ProgramItem[];
  /** Absolute artifact path, or null when nothing was published. */
  outputPath: string | null;
  durationMs: number;
}

/**
 * cache → (fetch → extract → cache) → assemble → write.
 */
export async function runPipeline(
  config: Config,
  options: PipelineOptions = {},
): Promise<PipelineResult> {
  const startTime = Date.now();
  const now = options.now ?? new Date();
  const cache = CacheStore.fromConfig(config.cache);

  let origin: ProgramOrigin = 'cache';
  let items = options.force ? [] : cache.load(now);

  if (items.length === 0) {
    const scraped = await scrapePrograms(PageFetcher.fromConfig(config.source), {
      extract: config.extract,
      maxItems: config.feed.max_items,
      classifier: options.classifier,
      catalog: options.catalog,
      now,
    });
    items = scraped.items;
    origin = scraped.fallback ? 'fallback' : 'website';

    if (items.length > 0) {
      cache.save(items, now);
    }
  }

  if (items.length === 0) {
    logger.warn('No programs found, keeping previous feed');
    return { origin, items, outputPath: null, durationMs: Date.now() - startTime };
  }

  const outputPath = writeFeed(config.feed.output_path, assembleFeed(items, config.feed, now));
  logger.info({ origin, count: items.length }, 'Successfully processed programs');

  return { origin, items, outputPath, durationMs: Date.now() - startTime };
}
