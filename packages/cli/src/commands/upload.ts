import type { ProgressReporter } from '@batch-uploader/core';
import type { Command } from 'commander';
import { createSpinnerProgressReporter } from '../progress.js';
import {
  type CliDependencies,
  createClient,
  parsePositiveInteger,
  readObjectsFile,
  writeJsonFile,
} from './shared.js';

type UploadCommandOptions = {
  chunkSize?: number;
  edit?: boolean;
  progress: boolean;
  output?: string;
};

export type UploadCommandDependencies = CliDependencies & {
  createProgress?: () => ProgressReporter;
};

export function registerUploadCommand(
  program: Command,
  dependencies: UploadCommandDependencies
): void {
  program
    .command('upload <file>')
    .description('Upload a JSON array of objects, grouped by their "type" field')
    .option('--chunk-size <size>', 'Objects per chunk', parsePositiveInteger)
    .option('--edit', 'Edit existing objects instead of creating them')
    .option('--no-progress', 'Disable the progress display')
    .option('--output <file>', 'Write the backend responses to a JSON file')
    .action(async function (this: Command, file: string) {
      const options = this.opts<UploadCommandOptions>();
      const objects = await readObjectsFile(file);
      const client = createClient(this, { chunkSize: options.chunkSize }, dependencies);
      const progress = options.progress
        ? (dependencies.createProgress ?? createSpinnerProgressReporter)()
        : undefined;

      const results = await client.withSession(() =>
        client.upload(objects, { edit: options.edit ?? false, progress })
      );

      if (options.output) {
        await writeJsonFile(options.output, results);
      }
      console.log(`${options.edit ? 'Edited' : 'Uploaded'} ${results.length} objects.`);
    });
}
