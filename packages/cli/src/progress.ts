import type { ProgressReporter } from '@batch-uploader/core';
import ora, { type Ora } from 'ora';

/**
 * Terminal spinner showing `<label> <done>/<total> objs`.
 */
export function createSpinnerProgressReporter(): ProgressReporter {
  let spinner: Ora | null = null;
  let total = 0;
  let completed = 0;
  let label = 'Uploading';

  const render = (): void => {
    if (spinner) {
      spinner.text = `${label} ${completed}/${total} objs`;
    }
  };

  return {
    start(count) {
      total = count;
      completed = 0;
      spinner = ora(`${label} 0/${count} objs`).start();
    },
    setLabel(next) {
      label = next;
      render();
    },
    advance(count) {
      completed += count;
      render();
    },
    stop() {
      spinner?.stopAndPersist({ symbol: completed === total ? '✔' : '✖' });
      spinner = null;
    },
  };
}
