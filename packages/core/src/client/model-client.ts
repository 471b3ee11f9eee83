import { createConfig, type UploaderConfig, type UploaderConfigInput } from '../config.js';
import type { ProgressReporter } from '../progress/reporter.js';
import { type PathMap, PathResolver, type QueryParameters } from '../routing/path-resolver.js';
import { defaultSleep } from '../session/health-prober.js';
import { createPooledSession, type HttpSession, type SessionFactory } from '../session/session.js';
import { SessionManager } from '../session/session-manager.js';
import { BatchOrchestrator } from '../submit/batch-orchestrator.js';
import { ChunkSubmitter } from '../submit/chunk-submitter.js';
import { ObjectSubmitter } from '../submit/object-submitter.js';
import type { DomainObject, SerializeOptions } from '../types.js';

/**
 * Everything that differs between backends. The engine depends on this
 * contract only.
 */
export interface UploadBackend<T extends DomainObject = DomainObject> {
  /** Paths polled on session open, with the marker each body must contain */
  readonly healthcheckEndpoints: ReadonlyArray<{ path: string; marker: string }>;
  readonly createPaths: PathMap;
  readonly editPaths: PathMap;
  queryParameters(config: UploaderConfig): QueryParameters;
  serialize(obj: T, options: SerializeOptions): unknown;
}

export type ModelClientDependencies = {
  sessionFactory?: SessionFactory;
  sleep?: (delayMs: number) => Promise<void>;
};

export type UploadOptions = {
  edit?: boolean;
  chunkSize?: number;
  progress?: ProgressReporter;
};

/**
 * Batching uploader bound to one backend.
 *
 * @example
 * ```typescript
 * const client = new ModelClient(backend, { baseUrl: 'http://registry.internal:5000' });
 * const results = await client.withSession(() => client.upload(objects));
 * ```
 */
export class ModelClient<T extends DomainObject = DomainObject> {
  readonly config: UploaderConfig;
  private readonly sessions: SessionManager;
  private readonly submitter: ObjectSubmitter<T>;
  private readonly orchestrator: BatchOrchestrator<T>;

  constructor(
    backend: UploadBackend<T>,
    config: UploaderConfigInput = {},
    dependencies: ModelClientDependencies = {}
  ) {
    this.config = createConfig(config);
    const baseUrl = this.config.baseUrl.replace(/\/+$/, '');
    const sleep = dependencies.sleep ?? defaultSleep;

    this.sessions = new SessionManager({
      factory: dependencies.sessionFactory ?? createPooledSession,
      sessionOptions: {
        maxConnections: this.config.maxConnections,
        requestTimeout: this.config.requestTimeout,
        headers: this.config.headers,
      },
      healthcheckEndpoints: backend.healthcheckEndpoints.map(({ path, marker }) => ({
        url: `${baseUrl}${path}`,
        marker,
      })),
      probe: {
        attempts: this.config.healthcheckAttempts,
        delayMs: this.config.healthcheckDelayMs,
        sleep,
      },
    });

    const resolver = new PathResolver({
      baseUrl,
      createPaths: backend.createPaths,
      editPaths: backend.editPaths,
      queryParameters: backend.queryParameters(this.config),
    });
    this.submitter = new ObjectSubmitter<T>({
      acquireSession: () => this.sessions.acquireSession(),
      resolver,
      serialize: (obj, options) => backend.serialize(obj, options),
      config: this.config,
      sleep,
    });
    this.orchestrator = new BatchOrchestrator(new ChunkSubmitter(this.submitter, resolver), {
      chunkSize: this.config.chunkSize,
      maxConcurrentChunks: this.config.maxConcurrentChunks,
    });
  }

  get isOpen(): boolean {
    return this.sessions.isOpen;
  }

  open(): Promise<HttpSession> {
    return this.sessions.open();
  }

  close(): Promise<void> {
    return this.sessions.close();
  }

  acquireSession(): HttpSession {
    return this.sessions.acquireSession();
  }

  withSession<R>(fn: (session: HttpSession) => Promise<R>): Promise<R> {
    return this.sessions.withSession(fn);
  }

  /**
   * Submits every object and returns the parsed responses in completion
   * order. Requires an open session.
   */
  upload(objects: Iterable<T>, options: UploadOptions = {}): Promise<unknown[]> {
    return this.orchestrator.submitAll(objects, options);
  }

  edit(objects: Iterable<T>, options: Omit<UploadOptions, 'edit'> = {}): Promise<unknown[]> {
    return this.upload(objects, { ...options, edit: true });
  }

  submitOne(obj: T, edit = false): Promise<unknown> {
    return this.submitter.submitOne(obj, edit);
  }
}
