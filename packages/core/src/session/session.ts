import { Agent, type Dispatcher } from 'undici';
import { MalformedResponseError } from '../errors.js';

export type HttpMethod = 'GET' | 'POST';

export type SessionRequest = {
  method: HttpMethod;
  url: string;
  body?: unknown;
};

export type SessionResponse = {
  status: number;
  body: unknown;
};

/**
 * One open network session. Requests that fail below the HTTP layer reject;
 * any HTTP status, including errors, resolves.
 */
export interface HttpSession {
  request(request: SessionRequest): Promise<SessionResponse>;
  close(): Promise<void>;
}

export type SessionOptions = {
  maxConnections: number;
  requestTimeout: number;
  headers: Record<string, string>;
};

export type SessionFactory = (options: SessionOptions) => HttpSession | Promise<HttpSession>;

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Default session backed by an undici connection pool capped at
 * `maxConnections` sockets per origin. Requests beyond the cap queue inside
 * the dispatcher.
 */
export class PooledHttpSession implements HttpSession {
  private readonly dispatcher: Dispatcher;
  private closed = false;

  /**
   * @param dispatcher - Replaces the pooled agent; `maxConnections` and
   * `requestTimeout` are then up to the caller's dispatcher.
   */
  constructor(
    private readonly options: SessionOptions,
    dispatcher?: Dispatcher
  ) {
    this.dispatcher =
      dispatcher ??
      new Agent({
        connections: options.maxConnections,
        headersTimeout: options.requestTimeout,
        bodyTimeout: options.requestTimeout,
      });
  }

  async request(request: SessionRequest): Promise<SessionResponse> {
    if (this.closed) {
      throw new Error('Session is closed');
    }

    const target = new URL(request.url);
    const headers: Record<string, string> = {
      accept: 'application/json',
      ...this.options.headers,
    };
    if (request.body !== undefined) {
      headers['content-type'] = 'application/json';
    }

    const response = await this.dispatcher.request({
      origin: target.origin,
      path: `${target.pathname}${target.search}`,
      method: request.method,
      headers,
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
    });

    const bodyText = await response.body.text();
    const status = response.statusCode;
    return { status, body: parseResponseBody(bodyText, request.url, status) };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    await this.dispatcher.close();
  }
}

export const createPooledSession: SessionFactory = (options) => new PooledHttpSession(options);

/**
 * Success bodies must be JSON. Error bodies fall back to their text so the
 * caller can still report them.
 */
function parseResponseBody(bodyText: string, url: string, status: number): unknown {
  if (!bodyText) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(bodyText);
    return parsed;
  } catch (error) {
    if (isSuccessStatus(status)) {
      throw new MalformedResponseError(url, status, { cause: error });
    }
    return bodyText;
  }
}
