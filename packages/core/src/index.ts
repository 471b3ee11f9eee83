/**
 * Batching uploader for create/edit REST backends.
 *
 * ## What this package is
 *
 * `@batch-uploader/core` submits large, mixed collections of domain objects to a
 * backend that exposes one POST endpoint per object type. It groups objects by type,
 * chunks each group, posts every chunk member concurrently, retries network failures
 * and hands back the decoded responses.
 *
 * ## What you can do with it
 *
 * - create validated config from env + code (`createConfig`)
 * - open a health-checked shared session (`ModelClient.withSession`, `open`/`close`)
 * - upload or edit batches (`ModelClient.upload`, `ModelClient.edit`)
 * - plug in another backend by implementing `UploadBackend`
 *
 * ## Example
 *
 * ```ts
 * import { createOrganisationClient } from '@batch-uploader/core';
 *
 * const client = createOrganisationClient({
 *   baseUrl: 'http://registry.internal:5000',
 *   headers: { Authorization: `Bearer ${token}` },
 * });
 *
 * const results = await client.withSession(() =>
 *   client.upload([
 *     { type: 'org_unit', uuid: '...', name: 'Finance' },
 *     { type: 'employee', uuid: '...', givenname: 'Ada' },
 *   ])
 * );
 * ```
 *
 * @module @batch-uploader/core
 * @packageDocumentation
 */

// Backends
export {
  createOrganisationClient,
  ORGANISATION_CREATE_PATHS,
  ORGANISATION_EDIT_PATHS,
  type OrganisationObject,
  OrganisationObjectType,
  organisationBackend,
  serializeOrganisationObject,
  toJsonValue,
} from './backends/organisation.js';
// Client
export {
  ModelClient,
  type ModelClientDependencies,
  type UploadBackend,
  type UploadOptions,
} from './client/model-client.js';
// Config
export {
  createConfig,
  DEFAULT_BASE_URL,
  type UploaderConfig,
  type UploaderConfigInput,
  UploaderConfigSchema,
} from './config.js';
// Errors
export {
  BackendValidationError,
  ConnectivityError,
  MalformedResponseError,
  NotInitializedError,
  PathTemplateError,
  SessionAlreadyOpenError,
  TransientRequestError,
  UnknownTypeError,
  UploaderError,
} from './errors.js';
// Progress
export {
  createLoggerProgressReporter,
  type ProgressReporter,
  silentProgressReporter,
} from './progress/reporter.js';
// Routing
export {
  type PathMap,
  PathResolver,
  type QueryParameters,
  type ResolvedTarget,
} from './routing/path-resolver.js';
// Session
export { type HealthcheckEndpoint, probeHealth } from './session/health-prober.js';
export {
  createPooledSession,
  type HttpSession,
  PooledHttpSession,
  type SessionFactory,
  type SessionOptions,
  type SessionRequest,
  type SessionResponse,
} from './session/session.js';
export { SessionManager } from './session/session-manager.js';
// Submission
export {
  BatchOrchestrator,
  chunked,
  groupByType,
  type SubmitAllOptions,
} from './submit/batch-orchestrator.js';
export { ChunkSubmitter } from './submit/chunk-submitter.js';
export { ObjectSubmitter } from './submit/object-submitter.js';
export { calculateRetryDelay } from './submit/retry-policy.js';
export type { DomainObject, SerializeOptions } from './types.js';

// Utilities
export {
  configureLogging,
  getLogger,
  isLogLevelName,
  Logger,
  type LogLevelName,
} from './utils/logging.js';
