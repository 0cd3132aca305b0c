import { requestPage } from './request';
import { createLogger } from '../logger';
import type { Cursor, PageResult, ScrapeContext, ScrapedRecord } from '../api/types';

const logger = createLogger('paginator');

export interface PaginatorOptions {
  lang?: string;
  cursor?: Cursor | null;
  /** Stop once at least this many records were emitted; the last page is not truncated. */
  limit?: number;
}

export interface Emission<T extends ScrapedRecord> {
  record: T;
  /** Cursor the record's page was requested with. */
  cursor: Cursor | null;
}

function reachedLimit(count: number, limit: number | undefined): boolean {
  return limit !== undefined && limit > 0 && count >= limit;
}

/**
 * Compares two cursors as integers. Returns null when either is not a
 * plain run of digits, so opaque tokens never look reversed.
 */
export function compareCursors(a: Cursor, b: Cursor): number | null {
  if (!/^\d+$/.test(a) || !/^\d+$/.test(b)) return null;
  const x = BigInt(a);
  const y = BigInt(b);
  return x === y ? 0 : x > y ? 1 : -1;
}

export async function* paginate<T extends ScrapedRecord>(
  ctx: ScrapeContext<T>,
  query: string,
  options: PaginatorOptions = {}
): AsyncGenerator<Emission<T>> {
  // an empty resume cursor means the first page
  let cursor: Cursor | null = options.cursor || null;
  let count = 0;
  let pageCount = 0;

  try {
    while (!ctx.signal?.aborted) {
      const page: PageResult<T> = await requestPage(ctx, { query, lang: options.lang ?? '', cursor, fromUser: false });
      if (page.records.length === 0 || ctx.signal?.aborted) break;

      pageCount++;
      logger.debug({ query, pageCount, count: page.records.length, cursor: page.cursor }, 'Page fetched');

      for (const record of page.records) {
        count++;
        yield { record, cursor };
      }
      cursor = page.cursor;

      if (reachedLimit(count, options.limit)) break;
    }
    if (ctx.signal?.aborted) logger.info({ query }, 'Search interrupted');
  } catch (err) {
    logger.error({ err, query }, 'Search aborted by unexpected error');
  } finally {
    logger.info({ query, count, pageCount }, `got ${count} records for ${query}`);
  }
}

/**
 * Walks one user's timeline into an ordered list.
 *
 * Near the oldest reachable content the upstream can hand back a cursor
 * numerically greater than the previous one. That page is tail-merged
 * (only records older than the current last one are kept) and the walk
 * stops. Only the first such reversal is handled.
 */
export async function collectTimeline<T extends ScrapedRecord>(
  ctx: ScrapeContext<T>,
  user: string,
  limit?: number
): Promise<T[]> {
  const records: T[] = [];
  let cursor: Cursor | null = null;

  try {
    while (!ctx.signal?.aborted) {
      const page: PageResult<T> = await requestPage(ctx, { query: user, lang: '', cursor, fromUser: true });
      if (page.records.length === 0 || ctx.signal?.aborted) break;

      if (cursor !== null && page.cursor !== null && compareCursors(page.cursor, cursor) === 1) {
        logger.info({ user, previous: cursor, next: page.cursor }, 'Cursor reversed, merging tail');
        for (const record of page.records) {
          const last: T | undefined = records[records.length - 1];
          if (last === undefined || last.timestamp.getTime() > record.timestamp.getTime()) {
            records.push(record);
          }
        }
        break;
      }

      cursor = page.cursor;
      records.push(...page.records);

      if (reachedLimit(records.length, limit)) break;
    }
    if (ctx.signal?.aborted) logger.info({ user }, 'Timeline interrupted');
  } catch (err) {
    logger.error({ err, user }, 'Timeline aborted by unexpected error');
  }

  logger.info({ user, count: records.length }, `got ${records.length} records from ${user}`);
  return records;
}
