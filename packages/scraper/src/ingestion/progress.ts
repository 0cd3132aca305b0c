import { createLogger } from '../logger';

const logger = createLogger('progress');

export class ProgressTracker {
  private readonly startTime = Date.now();
  private recordsCollected = 0;
  private partitionsDone = 0;
  private intervalId?: ReturnType<typeof setInterval>;

  constructor(private readonly totalPartitions: number) {}

  complete(partitionId: string, count: number): void {
    this.recordsCollected += count;
    this.partitionsDone++;
    logger.info(
      { partitionId, total: this.recordsCollected, count, done: this.partitionsDone, of: this.totalPartitions },
      `got ${this.recordsCollected} records (${count} new)`
    );
  }

  get total(): number {
    return this.recordsCollected;
  }

  get done(): number {
    return this.partitionsDone;
  }

  start(intervalMs = 5000): void {
    this.intervalId = setInterval(() => this.log(), intervalMs);
    this.intervalId.unref();
  }

  stop(): void {
    if (this.intervalId) clearInterval(this.intervalId);
    this.intervalId = undefined;
    this.log();
  }

  private log(): void {
    const elapsedSec = (Date.now() - this.startTime) / 1000;
    const avgRps = Math.round(this.recordsCollected / Math.max(elapsedSec, 0.001));

    logger.info(
      { collected: this.recordsCollected, done: this.partitionsDone, of: this.totalPartitions, avgRps },
      `Progress: ${this.partitionsDone} / ${this.totalPartitions} partitions | ${this.recordsCollected.toLocaleString()} records | avg ${avgRps.toLocaleString()} rec/s`
    );
  }
}
