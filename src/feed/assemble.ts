import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import type { FeedConfig } from '../shared/config.js';
import { FeedWriteError } from '../shared/errors.js';
import { resolvePath } from '../shared/utils.js';
import { logger } from '../shared/logger.js';
import type { ProgramItem } from '../source/program.js';
import { buildRssXml, type RssEntry } from './rss.js';

const GENERATOR = 'npo-programs-feed';

// `new Date()` accepts free text such as "Seizoen 2", so only ISO forms get that far.
const IsoDateSchema = z.union([z.string().datetime({ offset: true }), z.string().date()]);

/**
 * Parse a stored ISO-8601 publication date. Anything unusable becomes `now`.
 */
export function parsePublishedDate(value: unknown, now: Date = new Date()): Date {
  if (typeof value !== 'string' || value.trim() === '') {
    return now;
  }
  const iso = IsoDateSchema.safeParse(value.trim());
  const date = iso.success ? new Date(iso.data) : null;
  if (!date || Number.isNaN(date.getTime())) {
    logger.warn({ value }, 'Date parsing error, using current time');
    return now;
  }
  return date;
}

export function toRssEntry(item: ProgramItem, feed: FeedConfig, now: Date = new Date()): RssEntry {
  const entry: RssEntry = {
    title: item.isNew ? `${feed.new_prefix}${item.title}` : item.title,
    link: item.link,
    description: item.description,
    pubDate: parsePublishedDate(item.publishedDate, now),
  };
  if (item.image) {
    entry.enclosure = { url: item.image, type: feed.image_type, length: 0 };
  }
  return entry;
}

export function assembleFeed(items: ProgramItem[], feed: FeedConfig, now: Date = new Date()): string {
  return buildRssXml(
    {
      title: feed.title,
      link: feed.link,
      description: feed.description,
      language: feed.language,
      generator: GENERATOR,
    },
    items.map((item) => toRssEntry(item, feed, now)),
    now,
  );
}

/**
 * Replace the artifact at `outputPath` with `xml`. Returns the absolute path written.
 */
export function writeFeed(outputPath: string, xml: string): string {
  const resolved = resolvePath(outputPath);
  try {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, xml, 'utf-8');
  } catch (err) {
    throw new FeedWriteError(
      `Could not write feed: ${err instanceof Error ? err.message : String(err)}`,
      { path: resolved },
    );
  }
  logger.info({ path: resolved }, 'RSS feed generated');
  return resolved;
}
