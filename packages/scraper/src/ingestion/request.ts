import { buildProfileUrl, buildUrl } from '../api/urls';
import { ParseError, unwrapEnvelope } from '../parse/envelope';
import { createLogger } from '../logger';
import type { Cursor, PageRequest, PageResult, Profile, ScrapeContext, ScrapedRecord } from '../api/types';

const logger = createLogger('request');

export const DEFAULT_RETRIES = 10;

function emptyPage<T extends ScrapedRecord>(): PageResult<T> {
  return { records: [], cursor: null };
}

/**
 * Fetches and parses one page, retrying up to `ctx.retries` times.
 *
 * An empty page is not trusted as end-of-stream: the attempt is retried
 * from the envelope's `min_position` (when it reported one). Only an
 * exhausted budget produces the empty result the paginator stops on.
 * The returned cursor is the id of the last record on the page.
 */
export async function requestPage<T extends ScrapedRecord>(
  ctx: ScrapeContext<T>,
  request: PageRequest
): Promise<PageResult<T>> {
  const retries = ctx.retries;
  let cursor: Cursor | null = request.cursor || null;

  for (let attempt = 0; attempt < retries; attempt++) {
    if (ctx.signal?.aborted) return emptyPage();

    const url = buildUrl({ ...request, cursor }, ctx.baseUrl);
    let body: string;
    try {
      body = await ctx.fetcher.fetchPage(url, ctx.signal);
    } catch (err) {
      if (ctx.signal?.aborted) return emptyPage();
      logger.error({ err, url, attempt: attempt + 1 }, 'Page request failed');
      logger.info(`retry... (${retries - (attempt + 1)} left)`);
      continue;
    }
    // A response that lands after abort is discarded.
    if (ctx.signal?.aborted) return emptyPage();

    let html = body;
    let minPosition: Cursor | null = null;
    if (cursor !== null) {
      try {
        const envelope = unwrapEnvelope(body);
        html = envelope.itemsHtml;
        minPosition = envelope.minPosition;
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        logger.error({ err, url, attempt: attempt + 1 }, 'Could not unwrap continuation page');
        html = '';
      }
    }

    const records = ctx.parser.parseRecords(html);
    if (records.length === 0) {
      cursor = minPosition ?? cursor;
      logger.warn({ url, nextCursor: cursor }, `Empty page, retry... (${retries - (attempt + 1)} left)`);
      continue;
    }

    return { records, cursor: records[records.length - 1].id };
  }

  logger.error({ query: request.query, retries }, `No success within ${retries} attempts`);
  return emptyPage();
}

/** Profile pages are not paginated; only transport failures are retried. */
export async function requestProfile<T extends ScrapedRecord>(
  ctx: ScrapeContext<T>,
  user: string
): Promise<Profile | null> {
  const retries = ctx.retries;
  const url = buildProfileUrl(user, ctx.baseUrl);

  for (let attempt = 0; attempt < retries; attempt++) {
    if (ctx.signal?.aborted) return null;
    let html: string;
    try {
      html = await ctx.fetcher.fetchPage(url, ctx.signal);
    } catch (err) {
      if (ctx.signal?.aborted) return null;
      logger.error({ err, url, attempt: attempt + 1 }, 'Profile request failed');
      logger.info(`retry... (${retries - (attempt + 1)} left)`);
      continue;
    }
    return ctx.parser.parseProfile(html);
  }

  logger.error({ user, retries }, `No success within ${retries} attempts`);
  return null;
}
