#!/usr/bin/env node
import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { createScraper, loadConfig, type Scraper, type ScraperConfig } from './scraper';
import { createLogger } from './logger';
import { emitResult } from './output';
import type { Post } from './api/types';

const logger = createLogger('pagewalk', true);

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('must be a positive integer');
  return n;
}

function parseDate(value: string): Date {
  const date = new Date(`${value}T00:00:00.000Z`);
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value) || isNaN(date.getTime())) {
    throw new InvalidArgumentError('must be a YYYY-MM-DD date');
  }
  return date;
}

/** Runs one operation with SIGINT wired to an abort signal. */
async function interruptible<R>(run: (signal: AbortSignal) => Promise<R>): Promise<R> {
  const controller = new AbortController();
  const onSigint = () => {
    logger.info('program interrupted by user.');
    controller.abort();
  };
  process.once('SIGINT', onSigint);
  try {
    return await run(controller.signal);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

function buildProgram(config: ScraperConfig, scraper: Scraper<Post>): Command {
  const program = new Command('pagewalk')
    .description('Scrape paginated search results and user timelines')
    .option('-o, --output <file>', 'write the JSON result to this file');

  const output = () => program.opts<{ output?: string }>().output;

  program
    .command('user <name>')
    .description("fetch one user's profile")
    .action(async (name: string) => {
      const profile = await interruptible((signal) => scraper.queryUser(name, { signal }));
      await emitResult(profile, output());
    });

  program
    .command('timeline <name>')
    .description("fetch one user's timeline")
    .option('-l, --limit <n>', 'stop after at least n records', parsePositiveInt)
    .action(async (name: string, opts: { limit?: number }) => {
      const posts = await interruptible((signal) => scraper.queryUserTimeline(name, { limit: opts.limit, signal }));
      await emitResult(posts, output());
    });

  program
    .command('search <query>')
    .description('stream search results')
    .option('--lang <lang>', 'language tag', '')
    .option('--cursor <cursor>', 'resume from this cursor')
    .option('-l, --limit <n>', 'stop after at least n records', parsePositiveInt)
    .action(async (query: string, opts: { lang: string; cursor?: string; limit?: number }) => {
      const posts = await interruptible(async (signal) => {
        const collected: Post[] = [];
        for await (const { record } of scraper.querySearch(query, { ...opts, signal })) {
          collected.push(record);
        }
        return collected;
      });
      await emitResult(posts, output());
    });

  program
    .command('parallel <query>')
    .description('search a date range across a worker pool')
    .option('--lang <lang>', 'language tag', '')
    .option('-l, --limit <n>', 'stop after at least n records', parsePositiveInt)
    .option('-p, --pool-size <n>', 'number of partitions and workers', parsePositiveInt, config.poolSize)
    .option('-b, --begin <date>', 'first day (YYYY-MM-DD)', parseDate, config.beginDate)
    .option('-e, --end <date>', 'day after the last one (YYYY-MM-DD), default today', parseDate)
    .action(async (query: string, opts: { lang: string; limit?: number; poolSize: number; begin: Date; end?: Date }) => {
      const posts = await interruptible((signal) => scraper.querySearchParallel(query, { ...opts, signal }));
      await emitResult(posts, output());
    });

  return program;
}

async function main() {
  let config: ScraperConfig;
  try {
    config = loadConfig();
  } catch (err) {
    logger.error(err, 'Configuration error');
    process.exitCode = 1;
    return;
  }

  const scraper = createScraper(config);
  await buildProgram(config, scraper).parseAsync(process.argv);
}

main().catch((err) => {
  logger.error(err, 'Fatal error');
  process.exitCode = 1;
});
