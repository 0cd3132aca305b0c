import pLimit from 'p-limit';
import { runWorker } from './worker';
import { ProgressTracker } from './progress';
import { partitionDateRange, partitionLimit, toDateString } from './partitioner';
import { createLogger } from '../logger';
import type { ScrapeContext, ScrapedRecord } from '../api/types';

const logger = createLogger('orchestrator');

export const DEFAULT_POOL_SIZE = 20;
export const EARLIEST_DATE = new Date(Date.UTC(2006, 2, 21));

export interface ParallelSearchOptions {
  lang?: string;
  limit?: number;
  poolSize?: number;
  begin?: Date;
  end?: Date;
}

/**
 * Fans a search out over date partitions, one paginator per partition on a
 * pool of at most `poolSize` workers. Records are merged in completion
 * order. After abort no queued partition starts and no late result is
 * accepted; in-flight workers are still awaited before returning.
 */
export async function runParallelSearch<T extends ScrapedRecord>(
  ctx: ScrapeContext<T>,
  query: string,
  options: ParallelSearchOptions = {}
): Promise<T[]> {
  const begin = options.begin ?? EARLIEST_DATE;
  const end = options.end ?? new Date();
  const partitions = partitionDateRange(query, begin, end, options.poolSize ?? DEFAULT_POOL_SIZE);
  const limitPerPartition = partitionLimit(options.limit, partitions.length);

  const pool = pLimit(partitions.length);
  const tracker = new ProgressTracker(partitions.length);
  const records: T[] = [];

  logger.info(
    { query, begin: toDateString(begin), end: toDateString(end), poolSize: partitions.length, limitPerPartition },
    'Starting parallel search'
  );
  logger.debug({ queries: partitions.map((p) => p.query) }, 'Partition queries');
  tracker.start();

  const tasks = partitions.map((partition) =>
    pool(async () => {
      if (ctx.signal?.aborted) return;
      const found = await runWorker(ctx, { partition, lang: options.lang, limit: limitPerPartition });
      if (ctx.signal?.aborted) return;
      records.push(...found);
      tracker.complete(partition.partitionId, found.length);
    })
  );

  try {
    await Promise.all(tasks);
  } catch (err) {
    logger.error({ err, query }, 'Parallel search failed');
    await Promise.allSettled(tasks);
  } finally {
    tracker.stop();
  }

  if (ctx.signal?.aborted) logger.info({ query, collected: records.length }, 'Parallel search interrupted');
  logger.info({ query, total: records.length, partitions: tracker.done }, 'Parallel search complete');
  return records;
}
