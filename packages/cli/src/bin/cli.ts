#!/usr/bin/env node

import { configureLogging } from '@batch-uploader/core';
import { runCli } from '../cli.js';
import { formatCliError } from '../report-error.js';

configureLogging();

runCli(process.argv).catch((error: unknown) => {
  for (const line of formatCliError(error)) {
    console.error(line);
  }
  process.exitCode = 1;
});
