import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import { parse as yamlParse } from 'yaml';
import { getPackageRoot } from './utils.js';
import { CatalogError } from './errors.js';
import type { FallbackReason, ProgramItem } from '../source/program.js';

const CatalogProgramSchema = z.object({
  title: z.string().min(3),
  link: z.string().url(),
  description: z.string(),
  is_new: z.boolean(),
  canonical: z.boolean().default(false),
});

export const FallbackCatalogSchema = z.object({
  name: z.string(),
  programs: z.array(CatalogProgramSchema).min(1),
});

export type FallbackCatalog = z.infer<typeof FallbackCatalogSchema>;

export const FALLBACK_CATALOG_PATH = path.join(getPackageRoot(), 'catalog', 'fallback.yaml');

let cachedCatalog: FallbackCatalog | null = null;

export function loadFallbackCatalog(filePath: string = FALLBACK_CATALOG_PATH): FallbackCatalog {
  if (cachedCatalog && filePath === FALLBACK_CATALOG_PATH) return cachedCatalog;

  if (!fs.existsSync(filePath)) {
    throw new CatalogError(`Fallback catalog not found: ${filePath}`);
  }

  const raw = yamlParse(fs.readFileSync(filePath, 'utf-8')) as unknown;
  const parsed = FallbackCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CatalogError(`Invalid fallback catalog: ${filePath}`, {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  if (filePath === FALLBACK_CATALOG_PATH) cachedCatalog = parsed.data;
  return parsed.data;
}

/**
 * Materialize seed programs for a failed scrape, stamped with the run time.
 * A failed fetch only gets the canonical entries; an empty page gets them all.
 */
export function fallbackPrograms(
  catalog: FallbackCatalog,
  reason: FallbackReason,
  now: Date = new Date(),
): ProgramItem[] {
  const selected =
    reason === 'fetch_failed' ? catalog.programs.filter((p) => p.canonical) : catalog.programs;

  return selected.map((p) => ({
    title: p.title,
    link: p.link,
    description: p.description,
    isNew: p.is_new,
    publishedDate: now.toISOString(),
  }));
}
