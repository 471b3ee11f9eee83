export { createCli, runCli } from './cli.js';
export { createSpinnerProgressReporter } from './progress.js';
export { formatCliError } from './report-error.js';
