export class FeedError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'FeedError';
  }
}

export class ConfigError extends FeedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class CatalogError extends FeedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CATALOG_ERROR', details);
    this.name = 'CatalogError';
  }
}

export class FetchError extends FeedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FETCH_ERROR', details);
    this.name = 'FetchError';
  }
}

export class FeedWriteError extends FeedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FEED_WRITE_ERROR', details);
    this.name = 'FeedWriteError';
  }
}
