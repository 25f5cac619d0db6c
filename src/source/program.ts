import { z } from 'zod';

/**
 * One program scraped from the start page (or seeded from the fallback catalog).
 * This is also the shape persisted in the cache file.
 */
export const ProgramItemSchema = z.object({
  title: z.string(),
  link: z.string(),
  description: z.string(),
  isNew: z.boolean(),
  /** ISO-8601; reparsed by the feed assembler, which tolerates junk. */
  publishedDate: z.string(),
  image: z.string().optional(),
});

export type ProgramItem = z.infer<typeof ProgramItemSchema>;

/**
 * Why the seed catalog was used instead of scraped programs.
 */
export type FallbackReason = 'fetch_failed' | 'nothing_extracted';

/**
 * Result of one scrape attempt, before caching.
 */
export interface ScrapeResult {
  items: ProgramItem[];
  fallback: FallbackReason | null;
}

/**
 * Turns an anchor element into a description, or nothing.
 * Swappable so extraction strategies can change without touching the pipeline.
 */
export interface DescriptionClassifier {
  classify(node: Element): string | undefined;
}
