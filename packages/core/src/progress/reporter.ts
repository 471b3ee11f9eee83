import { getLogger } from '../utils/logging.js';

/**
 * Receives batch progress: `start` once with the object count, then a label
 * and an advance per completed chunk, and `stop` however the batch ends.
 */
export interface ProgressReporter {
  start(total: number): void;
  setLabel(label: string): void;
  advance(count: number): void;
  stop(): void;
}

export const silentProgressReporter: ProgressReporter = {
  start: () => {},
  setLabel: () => {},
  advance: () => {},
  stop: () => {},
};

/**
 * Reports progress through the `progress` logger at info level.
 */
export function createLoggerProgressReporter(): ProgressReporter {
  const logger = getLogger('progress');
  let total = 0;
  let completed = 0;
  let label = '';

  return {
    start(count) {
      total = count;
      completed = 0;
      logger.info(`Uploading ${count} objects`);
    },
    setLabel(next) {
      label = next;
    },
    advance(count) {
      completed += count;
      logger.info(`${label}: ${completed}/${total} objs`);
    },
    stop() {
      logger.debug(`Finished after ${completed}/${total} objs`);
    },
  };
}
