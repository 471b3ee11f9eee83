import { NotInitializedError, SessionAlreadyOpenError } from '../errors.js';
import { getLogger } from '../utils/logging.js';
import { type HealthcheckEndpoint, type ProbeOptions, probeHealth } from './health-prober.js';
import type { HttpSession, SessionFactory, SessionOptions } from './session.js';

const logger = getLogger('session');

export type SessionManagerOptions = {
  factory: SessionFactory;
  sessionOptions: SessionOptions;
  healthcheckEndpoints: HealthcheckEndpoint[];
  probe?: ProbeOptions;
};

/**
 * Owns the single shared session of a client. Only this class creates or
 * closes it; everything else borrows it through {@link acquireSession}.
 *
 * The handle is published only once the health probe has passed, and
 * callers arriving while an open is in flight wait on that same open.
 */
export class SessionManager {
  private session: HttpSession | null = null;
  private opening: Promise<HttpSession> | null = null;
  private activeScopes = 0;
  private ownedByScopes = false;

  constructor(private readonly options: SessionManagerOptions) {}

  get isOpen(): boolean {
    return this.session !== null;
  }

  /**
   * Returns the open session without ever opening one.
   *
   * @throws {NotInitializedError} When no session is open
   */
  acquireSession(): HttpSession {
    if (!this.session) {
      throw new NotInitializedError();
    }
    return this.session;
  }

  /**
   * Creates the session and waits for the backend to report healthy. A failed
   * health probe closes the session again before the error propagates.
   *
   * @throws {SessionAlreadyOpenError} When a session is open or opening
   */
  async open(): Promise<HttpSession> {
    if (this.session || this.opening) {
      throw new SessionAlreadyOpenError();
    }
    return this.startOpening();
  }

  async close(): Promise<void> {
    if (this.opening) {
      await Promise.allSettled([this.opening]);
    }

    const session = this.session;
    if (!session) {
      return;
    }

    this.session = null;
    await session.close();
    logger.debug('Session closed');
  }

  /**
   * Runs `fn` with an open session. Scopes that overlap, nested or
   * concurrent, share one session; it is closed when the last scope exits,
   * unless it was opened explicitly through {@link open}.
   */
  async withSession<T>(fn: (session: HttpSession) => Promise<T>): Promise<T> {
    this.activeScopes += 1;
    try {
      const session = await this.sessionForScope();
      return await fn(session);
    } finally {
      this.activeScopes -= 1;
      if (this.activeScopes === 0 && this.ownedByScopes) {
        this.ownedByScopes = false;
        await this.close();
      }
    }
  }

  private sessionForScope(): Promise<HttpSession> {
    if (this.session) {
      return Promise.resolve(this.session);
    }
    if (this.opening) {
      return this.opening;
    }

    this.ownedByScopes = true;
    return this.startOpening();
  }

  private startOpening(): Promise<HttpSession> {
    const opening = this.createProbedSession().finally(() => {
      this.opening = null;
    });
    this.opening = opening;
    return opening;
  }

  private async createProbedSession(): Promise<HttpSession> {
    const session = await this.options.factory(this.options.sessionOptions);
    logger.debug('Session created, probing backend health');

    try {
      await probeHealth(session, this.options.healthcheckEndpoints, this.options.probe);
    } catch (error) {
      await session.close();
      throw error;
    }

    this.session = session;
    return session;
  }
}
