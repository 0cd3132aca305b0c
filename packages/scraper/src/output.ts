import { writeFile } from 'fs/promises';
import { createLogger } from './logger';

const logger = createLogger('output');

export interface TextSink {
  write(chunk: string): unknown;
}

export function formatResult(result: unknown): string {
  return `${JSON.stringify(result, null, 2)}\n`;
}

/** Writes the result as JSON to `output`, or to `sink` (stdout) without one. */
export async function emitResult(result: unknown, output: string | undefined, sink: TextSink = process.stdout): Promise<void> {
  if (!output) {
    sink.write(formatResult(result));
    return;
  }
  await writeFile(output, formatResult(result), 'utf-8');
  logger.info({ output }, 'Results written');
}
