/**
 * Base class for every error raised by the uploader.
 */
export class UploaderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A network operation was attempted without an open session.
 */
export class NotInitializedError extends UploaderError {
  constructor(message = 'Need to initialize client session', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class SessionAlreadyOpenError extends UploaderError {
  constructor(message = 'Client session is already open') {
    super(message);
  }
}

/**
 * The backend did not report itself healthy within the probe budget.
 */
export class ConnectivityError extends UploaderError {
  readonly url: string;
  readonly attempts: number;

  constructor(url: string, attempts: number, options?: { cause?: unknown }) {
    super(`Unable to connect to ${url} after ${attempts} attempts`, options);
    this.url = url;
    this.attempts = attempts;
  }
}

export class UnknownTypeError extends UploaderError {
  readonly objectType: string;

  constructor(objectType: string) {
    super(`Unknown type: ${objectType}`);
    this.objectType = objectType;
  }
}

export class PathTemplateError extends UploaderError {
  readonly template: string;
  readonly field: string;

  constructor(template: string, field: string) {
    super(`Cannot fill placeholder {${field}} in path template ${template}`);
    this.template = template;
    this.field = field;
  }
}

/**
 * A single request failed below the HTTP layer (connection refused, reset, timeout).
 */
export class TransientRequestError extends UploaderError {
  readonly url: string;
  readonly attempts: number;

  constructor(url: string, attempts: number, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Request to ${url} failed after ${attempts} attempts${reason}`, options);
    this.url = url;
    this.attempts = attempts;
  }
}

/**
 * A successful response whose body is not valid JSON.
 */
export class MalformedResponseError extends UploaderError {
  readonly url: string;
  readonly status: number;

  constructor(url: string, status: number, options?: { cause?: unknown }) {
    super(`Response from ${url} (status ${status}) is not valid JSON`, options);
    this.url = url;
    this.status = status;
  }
}

type BackendValidationErrorOptions = {
  status: number;
  url: string;
  responseBody: unknown;
};

/**
 * The backend answered with a non-2xx status. The message is the backend's
 * `description` when it sent one.
 */
export class BackendValidationError extends UploaderError {
  readonly status: number;
  readonly url: string;
  readonly responseBody: unknown;

  constructor(message: string, options: BackendValidationErrorOptions) {
    super(message);
    this.status = options.status;
    this.url = options.url;
    this.responseBody = options.responseBody;
  }
}
