import type { SourceConfig } from '../shared/config.js';
import { FetchError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/**
 * Single GET against the start page. No retries: callers treat any failure
 * the same as an empty page.
 */
export class PageFetcher {
  constructor(
    readonly url: string,
    private readonly userAgent: string,
    private readonly timeoutMs: number = 0,
  ) {}

  static fromConfig(source: SourceConfig): PageFetcher {
    return new PageFetcher(source.url, source.user_agent, source.timeout_ms);
  }

  async fetch(): Promise<string> {
    const controller = new AbortController();
    const timer =
      this.timeoutMs > 0 ? setTimeout(() => controller.abort(), this.timeoutMs) : undefined;

    try {
      const response = await fetch(this.url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml',
        },
        signal: controller.signal,
        redirect: 'follow',
      });

      if (!response.ok) {
        throw new FetchError(`Page fetch failed: ${response.status} from ${this.url}`, {
          url: this.url,
          status: response.status,
        });
      }

      const html = await response.text();
      logger.debug({ url: this.url, bytes: html.length }, 'Start page fetched');
      return html;
    } catch (err) {
      if (err instanceof FetchError) throw err;
      if (err instanceof Error && err.name === 'AbortError') {
        throw new FetchError(`Page fetch timed out after ${this.timeoutMs}ms: ${this.url}`, {
          url: this.url,
          timeout: this.timeoutMs,
        });
      }
      throw new FetchError(
        `Page fetch failed: ${err instanceof Error ? err.message : String(err)}`,
        { url: this.url },
      );
    } finally {
      clearTimeout(timer);
    }
  }
}
