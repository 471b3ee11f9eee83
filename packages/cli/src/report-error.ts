import { inspect } from 'node:util';
import { BackendValidationError, ConnectivityError } from '@batch-uploader/core';
import { ZodError } from 'zod';

/**
 * Lines printed to stderr for an error that ended a command.
 */
export function formatCliError(error: unknown): string[] {
  if (error instanceof BackendValidationError) {
    return [
      `${error.message} (HTTP ${error.status} from ${error.url})`,
      ...formatBody(error.responseBody),
    ];
  }

  if (error instanceof ConnectivityError) {
    return [error.message, 'Check --base-url and that the backend is running.'];
  }

  if (error instanceof ZodError) {
    return [
      'Invalid configuration:',
      ...error.issues.map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`),
    ];
  }

  return [error instanceof Error ? error.message : String(error)];
}

function formatBody(body: unknown): string[] {
  if (body === undefined || body === null) {
    return [];
  }
  if (typeof body === 'string') {
    return [body];
  }

  try {
    return [JSON.stringify(body, null, 2)];
  } catch {
    return [inspect(body)];
  }
}
