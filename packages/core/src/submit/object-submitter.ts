import type { UploaderConfig } from '../config.js';
import { BackendValidationError, NotInitializedError, TransientRequestError } from '../errors.js';
import type { PathResolver } from '../routing/path-resolver.js';
import { type HttpSession, isSuccessStatus, type SessionResponse } from '../session/session.js';
import type { DomainObject, SerializeOptions } from '../types.js';
import { getLogger } from '../utils/logging.js';
import { calculateRetryDelay } from './retry-policy.js';

const logger = getLogger('submit');

export type ObjectSerializer<T extends DomainObject> = (obj: T, options: SerializeOptions) => unknown;

export type ObjectSubmitterOptions<T extends DomainObject> = {
  acquireSession: () => HttpSession;
  resolver: PathResolver;
  serialize: ObjectSerializer<T>;
  config: Pick<
    UploaderConfig,
    'maxSubmitAttempts' | 'initialRetryDelay' | 'minRetryDelay' | 'maxRetryDelay' | 'retryMultiplier'
  >;
  sleep: (delayMs: number) => Promise<void>;
};

/**
 * Posts one object. Failures below the HTTP layer are retried with
 * exponential backoff; HTTP error statuses are final. Retries stop as soon
 * as the session they were issued on is no longer the open one.
 */
export class ObjectSubmitter<T extends DomainObject> {
  constructor(private readonly options: ObjectSubmitterOptions<T>) {}

  async submitOne(obj: T, edit = false): Promise<unknown> {
    const session = this.options.acquireSession();
    const { url, method } = this.options.resolver.resolve(obj, edit);
    const body = this.options.serialize(obj, { edit });
    const maxAttempts = this.options.config.maxSubmitAttempts;

    let attempt = 1;
    while (true) {
      let response: SessionResponse;
      try {
        response = await session.request({ method, url, body });
      } catch (error) {
        if (attempt >= maxAttempts) {
          throw new TransientRequestError(url, attempt, { cause: error });
        }

        this.assertStillOpen(session, url, error);
        const delayMs = calculateRetryDelay(attempt, this.options.config);
        logger.warn(
          `POST ${url} failed (attempt ${attempt}/${maxAttempts}), retrying in ${delayMs}ms:`,
          error instanceof Error ? error.message : error
        );
        await this.options.sleep(delayMs);
        this.assertStillOpen(session, url, error);
        attempt += 1;
        continue;
      }

      if (isSuccessStatus(response.status)) {
        logger.debug(`POST ${url} -> ${response.status}`);
        return response.body;
      }

      throw toBackendError(url, response);
    }
  }

  private assertStillOpen(session: HttpSession, url: string, lastError: unknown): void {
    let current: HttpSession | undefined;
    try {
      current = this.options.acquireSession();
    } catch (error) {
      if (!(error instanceof NotInitializedError)) {
        throw error;
      }
    }

    if (current !== session) {
      throw new NotInitializedError(`Client session closed while retrying POST ${url}`, {
        cause: lastError,
      });
    }
  }
}

function toBackendError(url: string, response: SessionResponse): BackendValidationError {
  const description = extractDescription(response.body);
  const message = description ?? `HTTP request failed with status ${response.status}`;
  return new BackendValidationError(message, {
    status: response.status,
    url,
    responseBody: response.body,
  });
}

function extractDescription(body: unknown): string | undefined {
  if (body === null || typeof body !== 'object' || Array.isArray(body)) {
    return undefined;
  }

  if ('description' in body && typeof body.description === 'string') {
    return body.description;
  }
  return undefined;
}
