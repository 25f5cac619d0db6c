import { describe, it, expect, vi, afterEach } from 'vitest';
import { scrapePrograms } from '../scrape.js';
import { PageFetcher } from '../fetcher.js';
import { ConfigSchema } from '../../shared/config.js';
import { loadFallbackCatalog, fallbackPrograms } from '../../shared/catalog.js';

const NOW = new Date('2024-03-01T12:00:00.000Z');
const config = ConfigSchema.parse({});
const options = { extract: config.extract, maxItems: config.feed.max_items, now: NOW };

describe('scrapePrograms', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  function fetcher(): PageFetcher {
    return new PageFetcher('https://npo.nl/', 'test-agent');
  }

  it('returns extracted programs when the page has tiles', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(
      new Response('<a href="/start/test-show"><h3>Test Show</h3><span>Nieuw!</span></a>', { status: 200 }),
    );

    const result = await scrapePrograms(fetcher(), options);

    expect(result.fallback).toBeNull();
    expect(result.items).toEqual([
      {
        title: 'Test Show',
        link: 'https://npo.nl/start/test-show',
        description: 'Programma op NPO',
        isNew: true,
        publishedDate: '2024-03-01T12:00:00.000Z',
      },
    ]);
  });

  it('keeps the scraped programs when the page also has a broken link', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(
      new Response('<a href="/start/goede-show"><h3>Goede Show</h3></a><a href="//"><h3>Kapotte Link</h3></a>', {
        status: 200,
      }),
    );

    const result = await scrapePrograms(fetcher(), options);

    expect(result.fallback).toBeNull();
    expect(result.items.map((p) => p.title)).toEqual(['Goede Show']);
  });

  it('uses the canonical seed programs when the fetch fails', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new Error('ECONNREFUSED'));

    const result = await scrapePrograms(fetcher(), options);

    expect(result.fallback).toBe('fetch_failed');
    expect(result.items).toEqual(fallbackPrograms(loadFallbackCatalog(), 'fetch_failed', NOW));
    expect(result.items.map((p) => p.title)).toEqual(['Chateau Promenade', 'Date On Stage']);
  });

  it('treats a non-2xx response as a failed fetch', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('Forbidden', { status: 403 }));

    const result = await scrapePrograms(fetcher(), options);

    expect(result.fallback).toBe('fetch_failed');
    expect(result.items).toHaveLength(2);
  });

  it('uses the full seed catalog when nothing is extracted', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('<p>Onderhoud</p>', { status: 200 }));

    const result = await scrapePrograms(fetcher(), options);

    expect(result.fallback).toBe('nothing_extracted');
    expect(result.items.map((p) => p.title)).toEqual([
      'Chateau Promenade',
      'Date On Stage',
      'Boer zoekt vrouw',
      'Week van de Lentekriebels',
    ]);
  });

  it('uses the configured description tokens', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(
      new Response('<a href="/start/x"><h3>Serie X</h3><p class="blurb">Over X</p></a>', { status: 200 }),
    );

    const extract = { ...config.extract, description_tokens: ['blurb'] };
    const result = await scrapePrograms(fetcher(), { ...options, extract });

    expect(result.items[0]?.description).toBe('Over X');
  });
});
