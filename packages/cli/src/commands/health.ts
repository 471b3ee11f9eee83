import type { Command } from 'commander';
import { type CliDependencies, createClient } from './shared.js';

export function registerHealthCommand(program: Command, dependencies: CliDependencies): void {
  program
    .command('health')
    .description('Check that the backend is reachable and ready')
    .action(async function (this: Command) {
      const client = createClient(this, {}, dependencies);
      await client.withSession(async () => undefined);
      console.log(`Backend at ${client.config.baseUrl} is healthy.`);
    });
}
