import { createPageFetcher, pickUserAgent } from './api/client';
import { HtmlPageParser } from './parse/html';
import { requestProfile, DEFAULT_RETRIES } from './ingestion/request';
import { collectTimeline, paginate, type Emission } from './ingestion/paginator';
import { runParallelSearch, DEFAULT_POOL_SIZE, EARLIEST_DATE } from './ingestion/orchestrator';
import { DEFAULT_BASE_URL } from './api/urls';
import { createLogger } from './logger';
import type { ScraperConfig } from './config';
import type { Cursor, PageFetcher, PageParser, Post, Profile, ScrapeContext, ScrapedRecord } from './api/types';

const logger = createLogger('scraper');

export interface ScraperDeps<T extends ScrapedRecord> {
  fetcher: PageFetcher;
  parser: PageParser<T>;
  baseUrl?: string;
  retries?: number;
  poolSize?: number;
  beginDate?: Date;
}

interface CallOptions {
  signal?: AbortSignal;
}

export interface SearchOptions extends CallOptions {
  lang?: string;
  cursor?: Cursor | null;
  limit?: number;
}

export interface ParallelOptions extends CallOptions {
  lang?: string;
  limit?: number;
  poolSize?: number;
  begin?: Date;
  end?: Date;
}

/**
 * Caller-facing operations. None of them throws: failures are logged and
 * whatever was collected (or null/empty) is returned.
 */
export class Scraper<T extends ScrapedRecord = Post> {
  constructor(private readonly deps: ScraperDeps<T>) {}

  private context(signal?: AbortSignal): ScrapeContext<T> {
    return {
      fetcher: this.deps.fetcher,
      parser: this.deps.parser,
      baseUrl: this.deps.baseUrl ?? DEFAULT_BASE_URL,
      retries: this.deps.retries ?? DEFAULT_RETRIES,
      signal,
    };
  }

  async queryUser(user: string, options: CallOptions = {}): Promise<Profile | null> {
    logger.info({ user }, `querying ${user}'s profile...`);
    try {
      const profile = await requestProfile(this.context(options.signal), user);
      logger.info({ user }, profile ? 'success' : 'failure');
      return profile;
    } catch (err) {
      logger.error({ err, user }, 'Profile query failed');
      return null;
    }
  }

  async queryUserTimeline(user: string, options: CallOptions & { limit?: number } = {}): Promise<T[]> {
    logger.info({ user, limit: options.limit }, `querying ${user}'s timeline...`);
    return collectTimeline(this.context(options.signal), user, options.limit);
  }

  async *querySearch(query: string, options: SearchOptions = {}): AsyncGenerator<Emission<T>> {
    logger.info({ query, lang: options.lang, limit: options.limit }, `querying ${query}`);
    yield* paginate(this.context(options.signal), query, options);
  }

  async querySearchParallel(query: string, options: ParallelOptions = {}): Promise<T[]> {
    try {
      return await runParallelSearch(this.context(options.signal), query, {
        lang: options.lang,
        limit: options.limit,
        poolSize: options.poolSize ?? this.deps.poolSize ?? DEFAULT_POOL_SIZE,
        begin: options.begin ?? this.deps.beginDate ?? EARLIEST_DATE,
        end: options.end,
      });
    } catch (err) {
      logger.error({ err, query }, 'Parallel search failed');
      return [];
    }
  }
}

export function createScraper(config: ScraperConfig): Scraper<Post> {
  return new Scraper({
    fetcher: createPageFetcher({ userAgent: config.userAgent ?? pickUserAgent(), timeoutMs: config.timeoutMs }),
    parser: new HtmlPageParser(),
    baseUrl: config.baseUrl,
    retries: config.retries,
    poolSize: config.poolSize,
    beginDate: config.beginDate,
  });
}

export { loadConfig, ConfigError } from './config';
export type { ScraperConfig } from './config';
export { HttpPageFetcher, TransportError } from './api/client';
export { ParseError } from './parse/envelope';
export { HtmlPageParser } from './parse/html';
export { partitionDateRange, partitionLimit } from './ingestion/partitioner';
export type { DateRangePartition } from './ingestion/partitioner';
export type { Emission } from './ingestion/paginator';
export type { Cursor, PageFetcher, PageParser, Post, Profile, ScrapedRecord } from './api/types';
