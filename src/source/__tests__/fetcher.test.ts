import { describe, it, expect, vi, afterEach } from 'vitest';
import { PageFetcher } from '../fetcher.js';
import { FetchError } from '../../shared/errors.js';
import { ConfigSchema } from '../../shared/config.js';

describe('PageFetcher', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  it('returns the body of a 2xx response', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('<html>ok</html>', { status: 200 }));

    const fetcher = new PageFetcher('https://npo.nl/', 'test-agent');
    await expect(fetcher.fetch()).resolves.toBe('<html>ok</html>');
  });

  it('sends the configured User-Agent', async () => {
    const mockFetch = vi.fn().mockResolvedValue(new Response('', { status: 200 }));
    globalThis.fetch = mockFetch;

    await new PageFetcher('https://npo.nl/', 'test-agent').fetch();

    expect(mockFetch).toHaveBeenCalledWith(
      'https://npo.nl/',
      expect.objectContaining({
        headers: expect.objectContaining({ 'User-Agent': 'test-agent' }),
      }),
    );
  });

  it('throws FetchError on non-2xx status', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('Unavailable', { status: 503 }));

    const fetcher = new PageFetcher('https://npo.nl/', 'test-agent');
    await expect(fetcher.fetch()).rejects.toThrow('Page fetch failed: 503 from https://npo.nl/');
    await expect(fetcher.fetch()).rejects.toBeInstanceOf(FetchError);
  });

  it('throws FetchError on network error', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new Error('ECONNREFUSED'));

    const fetcher = new PageFetcher('https://npo.nl/', 'test-agent');
    await expect(fetcher.fetch()).rejects.toThrow('Page fetch failed: ECONNREFUSED');
  });

  it('aborts after the timeout when one is configured', async () => {
    globalThis.fetch = vi.fn().mockImplementation((_url: string, opts?: RequestInit) => {
      return new Promise<Response>((_resolve, reject) => {
        opts?.signal?.addEventListener('abort', () => {
          reject(Object.assign(new Error('The operation was aborted'), { name: 'AbortError' }));
        });
      });
    });

    const fetcher = new PageFetcher('https://npo.nl/', 'test-agent', 50);
    await expect(fetcher.fetch()).rejects.toThrow('Page fetch timed out after 50ms: https://npo.nl/');
  });

  it('builds from config', () => {
    const config = ConfigSchema.parse({ source: { url: 'https://npo.nl/start' } });
    expect(PageFetcher.fromConfig(config.source).url).toBe('https://npo.nl/start');
  });
});
