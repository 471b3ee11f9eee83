import { ConnectivityError } from '../errors.js';
import { getLogger } from '../utils/logging.js';
import { type HttpSession, isSuccessStatus } from './session.js';

const logger = getLogger('health');

export type HealthcheckEndpoint = {
  /** Absolute URL to poll */
  url: string;
  /** Key, element or substring the response body must contain */
  marker: string;
};

export type ProbeOptions = {
  attempts?: number;
  delayMs?: number;
  sleep?: (delayMs: number) => Promise<void>;
};

const DEFAULT_ATTEMPTS = 100;
const DEFAULT_DELAY_MS = 1000;

export const defaultSleep = (delayMs: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, delayMs));

/**
 * Polls every endpoint concurrently until its body contains the marker.
 * Rejects with {@link ConnectivityError} as soon as one endpoint runs out of
 * attempts.
 */
export async function probeHealth(
  session: HttpSession,
  endpoints: HealthcheckEndpoint[],
  options: ProbeOptions = {}
): Promise<void> {
  const attempts = options.attempts ?? DEFAULT_ATTEMPTS;
  const delayMs = options.delayMs ?? DEFAULT_DELAY_MS;
  const sleep = options.sleep ?? defaultSleep;
  let aborted = false;

  const checkEndpoint = async (endpoint: HealthcheckEndpoint): Promise<void> => {
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      if (aborted) {
        return;
      }

      try {
        const response = await session.request({ method: 'GET', url: endpoint.url });
        if (!isSuccessStatus(response.status)) {
          throw new Error(`Health check returned status ${response.status}`);
        }
        if (bodyContainsMarker(response.body, endpoint.marker)) {
          logger.debug(`${endpoint.url} healthy after ${attempt} attempt(s)`);
          return;
        }
        throw new Error(`Health check response is missing '${endpoint.marker}'`);
      } catch (error) {
        lastError = error;
        logger.warn(
          `Health check ${attempt}/${attempts} for ${endpoint.url} failed:`,
          error instanceof Error ? error.message : error
        );
      }

      if (attempt < attempts) {
        await sleep(delayMs);
      }
    }

    throw new ConnectivityError(endpoint.url, attempts, { cause: lastError });
  };

  try {
    await Promise.all(endpoints.map(checkEndpoint));
  } catch (error) {
    // stop the sibling pollers
    aborted = true;
    throw error;
  }
}

export function bodyContainsMarker(body: unknown, marker: string): boolean {
  if (typeof body === 'string') {
    return body.includes(marker);
  }

  if (Array.isArray(body)) {
    return body.includes(marker);
  }

  if (body !== null && typeof body === 'object') {
    return Object.prototype.hasOwnProperty.call(body, marker);
  }

  return false;
}
