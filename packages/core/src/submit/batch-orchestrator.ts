import pLimit from 'p-limit';
import { type ProgressReporter, silentProgressReporter } from '../progress/reporter.js';
import type { DomainObject } from '../types.js';
import { getLogger } from '../utils/logging.js';
import type { ChunkSubmitter } from './chunk-submitter.js';

const logger = getLogger('batch');

export type SubmitAllOptions = {
  edit?: boolean;
  chunkSize?: number;
  progress?: ProgressReporter;
};

export type BatchOrchestratorOptions = {
  chunkSize: number;
  maxConcurrentChunks: number;
};

type ScheduledChunk<T> = {
  objectType: string;
  objects: T[];
};

/**
 * Groups a heterogeneous batch by type, chunks each group and drains every
 * chunk through one shared concurrency limit. Results come back in
 * completion order.
 */
export class BatchOrchestrator<T extends DomainObject> {
  constructor(
    private readonly chunkSubmitter: ChunkSubmitter<T>,
    private readonly options: BatchOrchestratorOptions
  ) {}

  async submitAll(objects: Iterable<T>, options: SubmitAllOptions = {}): Promise<unknown[]> {
    const items = Array.from(objects);
    if (items.length === 0) {
      return [];
    }

    const edit = options.edit ?? false;
    const chunkSize = options.chunkSize ?? this.options.chunkSize;
    const progress = options.progress ?? silentProgressReporter;
    const chunks: ScheduledChunk<T>[] = groupByType(items).flatMap(([objectType, group]) =>
      chunked(group, chunkSize).map((chunk) => ({ objectType, objects: chunk }))
    );
    logger.debug(`Scheduling ${chunks.length} chunk(s) for ${items.length} object(s)`);

    const limit = pLimit(this.options.maxConcurrentChunks);
    const tasks = chunks.map((chunk) =>
      limit(async () => {
        const results = await this.chunkSubmitter.submitChunk(chunk.objects, edit);
        return { chunk, results };
      })
    );

    progress.start(items.length);
    try {
      const results: unknown[] = [];
      for await (const { chunk, results: chunkResults } of inCompletionOrder(tasks)) {
        results.push(...chunkResults);
        progress.setLabel(`Uploading ${chunk.objectType}`);
        progress.advance(chunk.objects.length);
      }
      return results;
    } catch (error) {
      // Chunks still in flight settle on their own; queued ones never start.
      limit.clearQueue();
      throw error;
    } finally {
      progress.stop();
    }
  }
}

/**
 * Buckets objects by type tag regardless of their position in the input.
 * Types keep the order in which they were first seen.
 */
export function groupByType<T extends DomainObject>(objects: readonly T[]): Array<[string, T[]]> {
  const groups = new Map<string, T[]>();
  for (const obj of objects) {
    const group = groups.get(obj.type);
    if (group) {
      group.push(obj);
    } else {
      groups.set(obj.type, [obj]);
    }
  }
  return Array.from(groups.entries());
}

export function chunked<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }

  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
}

/**
 * Yields task results as they settle. The first rejection is rethrown; the
 * remaining tasks keep a handler attached so they cannot surface as
 * unhandled rejections.
 */
export async function* inCompletionOrder<R>(tasks: readonly Promise<R>[]): AsyncGenerator<R> {
  const pending = new Map<number, Promise<{ index: number; value: R }>>(
    tasks.map((task, index) => [index, task.then((value) => ({ index, value }))])
  );

  while (pending.size > 0) {
    const { index, value } = await Promise.race(pending.values());
    pending.delete(index);
    yield value;
  }
}
