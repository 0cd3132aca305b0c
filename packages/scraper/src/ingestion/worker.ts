import { paginate } from './paginator';
import { createLogger } from '../logger';
import type { DateRangePartition } from './partitioner';
import type { ScrapeContext, ScrapedRecord } from '../api/types';

const logger = createLogger('worker');

interface WorkerOptions {
  partition: DateRangePartition;
  lang?: string;
  limit?: number;
}

/**
 * Drains one partition's search stream. Never rejects: a failing partition
 * resolves with whatever it collected.
 */
export async function runWorker<T extends ScrapedRecord>(
  ctx: ScrapeContext<T>,
  options: WorkerOptions
): Promise<T[]> {
  const { partition } = options;
  const records: T[] = [];

  try {
    for await (const { record } of paginate(ctx, partition.query, { lang: options.lang, limit: options.limit })) {
      records.push(record);
    }
  } catch (err) {
    logger.error({ err, partitionId: partition.partitionId }, 'Worker failed');
  }

  logger.debug({ partitionId: partition.partitionId, collected: records.length }, 'Worker finished');
  return records;
}
