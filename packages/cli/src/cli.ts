import { readFile } from 'node:fs/promises';
import { Command } from 'commander';
import { registerHealthCommand } from './commands/health.js';
import { registerUploadCommand, type UploadCommandDependencies } from './commands/upload.js';

async function loadVersion(): Promise<string> {
  try {
    const packageJsonPath = new URL('../package.json', import.meta.url);
    const packageJsonContents = await readFile(packageJsonPath, 'utf8');
    const packageJson: unknown = JSON.parse(packageJsonContents);

    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch {
    return '0.0.0';
  }

  return '0.0.0';
}

export function createCli(version: string, dependencies: UploadCommandDependencies = {}): Command {
  const program = new Command()
    .name('batch-upload')
    .description('Upload batches of objects to a create/edit REST backend')
    .version(version)
    .showHelpAfterError('(run with --help for usage)')
    .showSuggestionAfterError(true);

  program
    .option('--base-url <url>', 'Backend base URL (env: BATCH_UPLOADER_BASE_URL)')
    .option('--token <token>', 'Bearer token (env: BATCH_UPLOADER_TOKEN)')
    .option('--session-token <token>', 'Legacy SESSION header token')
    .option('--force', 'Ask the backend to skip validation');

  program.addHelpText(
    'after',
    [
      '',
      'Examples:',
      '  batch-upload health --base-url http://localhost:5000',
      '  batch-upload upload employees.json --chunk-size 50',
      '  batch-upload --force upload addresses.json --edit --output results.json',
    ].join('\n')
  );

  registerUploadCommand(program, dependencies);
  registerHealthCommand(program, dependencies);

  return program;
}

export async function runCli(argv: string[]): Promise<void> {
  const version = await loadVersion();
  const program = createCli(version);
  await program.parseAsync(argv);
}
