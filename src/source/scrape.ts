import type { ExtractConfig, FeedConfig } from '../shared/config.js';
import { loadFallbackCatalog, fallbackPrograms, type FallbackCatalog } from '../shared/catalog.js';
import { logger } from '../shared/logger.js';
import { extractPrograms } from './extract.js';
import { ClassTokenClassifier } from './classifier.js';
import type { PageFetcher } from './fetcher.js';
import type { DescriptionClassifier, ProgramItem, ScrapeResult } from './program.js';

export interface ScrapeOptions {
  extract: ExtractConfig;
  maxItems: FeedConfig['max_items'];
  classifier?: DescriptionClassifier;
  catalog?: FallbackCatalog;
  now?: Date;
}

/**
 * Fetch the start page and extract programs, substituting the seed catalog
 * when nothing usable comes out. Never throws for network or markup problems.
 */
export async function scrapePrograms(
  fetcher: PageFetcher,
  options: ScrapeOptions,
): Promise<ScrapeResult> {
  const now = options.now ?? new Date();
  const catalog = options.catalog ?? loadFallbackCatalog();

  let html: string;
  try {
    html = await fetcher.fetch();
  } catch (err) {
    logger.error(
      { url: fetcher.url, error: err instanceof Error ? err.message : String(err) },
      'Error fetching programs from website, using fallback catalog',
    );
    return { items: fallbackPrograms(catalog, 'fetch_failed', now), fallback: 'fetch_failed' };
  }

  logger.info({ url: fetcher.url }, 'Scraping start page for programs');

  let items: ProgramItem[];
  try {
    items = extractPrograms(html, {
      baseUrl: fetcher.url,
      maxItems: options.maxItems,
      newMarker: options.extract.new_marker,
      defaultDescription: options.extract.default_description,
      classifier: options.classifier ?? new ClassTokenClassifier(options.extract.description_tokens),
      now,
    });
  } catch (err) {
    logger.error(
      { error: err instanceof Error ? err.message : String(err) },
      'Error parsing start page, using fallback catalog',
    );
    return { items: fallbackPrograms(catalog, 'fetch_failed', now), fallback: 'fetch_failed' };
  }

  logger.info(
    { found: items.length, new: items.filter((p) => p.isNew).length },
    'Programs extracted from website',
  );

  if (items.length === 0) {
    logger.warn('No programs found, using full fallback catalog');
    return {
      items: fallbackPrograms(catalog, 'nothing_extracted', now),
      fallback: 'nothing_extracted',
    };
  }

  return { items, fallback: null };
}
