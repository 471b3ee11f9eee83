import { describe, expect, test } from 'vitest';
import {
  BackendValidationError,
  MalformedResponseError,
  NotInitializedError,
  TransientRequestError,
} from '../../src/errors.js';
import { PathResolver } from '../../src/routing/path-resolver.js';
import type { HttpSession } from '../../src/session/session.js';
import { ObjectSubmitter } from '../../src/submit/object-submitter.js';
import type { DomainObject } from '../../src/types.js';
import { type FakeHandler, FakeSession } from '../helpers/fake-session.js';

const resolver = new PathResolver({
  baseUrl: 'http://backend.test',
  createPaths: { employee: '/service/e/create' },
  editPaths: { employee: '/service/details/edit' },
  queryParameters: { force: 0 },
});

const retryConfig = {
  maxSubmitAttempts: 7,
  initialRetryDelay: 1000,
  minRetryDelay: 1000,
  maxRetryDelay: 60000,
  retryMultiplier: 2,
};

function createSubmitter(handler: FakeHandler) {
  const session = new FakeSession(handler);
  const sleepCalls: number[] = [];
  const submitter = new ObjectSubmitter<DomainObject>({
    acquireSession: () => session,
    resolver,
    serialize: (obj, { edit }) => (edit ? { data: obj } : obj),
    config: retryConfig,
    sleep: async (delayMs) => {
      sleepCalls.push(delayMs);
    },
  });
  return { session, submitter, sleepCalls };
}

const employee = { type: 'employee', uuid: 'e-1', name: 'Ada' };

describe('ObjectSubmitter', () => {
  test('posts the serialized object and returns the parsed body', async () => {
    const { session, submitter } = createSubmitter(() => ({ status: 201, body: 'e-1' }));

    await expect(submitter.submitOne(employee)).resolves.toBe('e-1');
    expect(session.requests).toEqual([
      { method: 'POST', url: 'http://backend.test/service/e/create?force=0', body: employee },
    ]);
  });

  test('routes and serializes for edit mode', async () => {
    const { session, submitter } = createSubmitter(() => ({ status: 200, body: 'e-1' }));

    await submitter.submitOne(employee, true);

    expect(session.requests[0]).toEqual({
      method: 'POST',
      url: 'http://backend.test/service/details/edit?force=0',
      body: { data: employee },
    });
  });

  test('retries transient failures with growing delays', async () => {
    let attempts = 0;
    const { submitter, sleepCalls } = createSubmitter(() => {
      attempts += 1;
      if (attempts < 3) {
        throw new TypeError('socket hang up');
      }
      return { status: 201, body: { uuid: 'e-1' } };
    });

    await expect(submitter.submitOne(employee)).resolves.toEqual({ uuid: 'e-1' });
    expect(attempts).toBe(3);
    expect(sleepCalls).toEqual([1000, 2000]);
  });

  test('gives up after seven attempts', async () => {
    const { session, submitter, sleepCalls } = createSubmitter(() => {
      throw new TypeError('connection refused');
    });

    const result = submitter.submitOne(employee);

    await expect(result).rejects.toBeInstanceOf(TransientRequestError);
    await expect(result).rejects.toMatchObject({
      attempts: 7,
      url: 'http://backend.test/service/e/create?force=0',
    });
    expect(session.requests).toHaveLength(7);
    expect(sleepCalls).toEqual([1000, 2000, 4000, 8000, 16000, 32000]);
  });

  test('uses the backend description as the error message', async () => {
    const { session, submitter } = createSubmitter(() => ({
      status: 422,
      body: { error: true, description: 'invalid uuid', status: 422 },
    }));

    const result = submitter.submitOne(employee);

    await expect(result).rejects.toBeInstanceOf(BackendValidationError);
    await expect(result).rejects.toThrow('invalid uuid');
    await expect(result).rejects.toMatchObject({ status: 422 });
    expect(session.requests).toHaveLength(1);
  });

  test('falls back to a status message without a description', async () => {
    const { submitter } = createSubmitter(() => ({ status: 500, body: 'Internal Server Error' }));

    await expect(submitter.submitOne(employee)).rejects.toThrow(
      'HTTP request failed with status 500'
    );
  });

  test('fails without an open session', async () => {
    const submitter = new ObjectSubmitter<DomainObject>({
      acquireSession: (): HttpSession => {
        throw new NotInitializedError();
      },
      resolver,
      serialize: (obj) => obj,
      config: retryConfig,
      sleep: async () => {},
    });

    await expect(submitter.submitOne(employee)).rejects.toBeInstanceOf(NotInitializedError);
  });

  test('stops retrying once the session has been closed', async () => {
    let open = true;
    const session = new FakeSession(() => {
      open = false;
      throw new TypeError('socket hang up');
    });
    const sleepCalls: number[] = [];
    const submitter = new ObjectSubmitter<DomainObject>({
      acquireSession: (): HttpSession => {
        if (!open) {
          throw new NotInitializedError();
        }
        return session;
      },
      resolver,
      serialize: (obj) => obj,
      config: retryConfig,
      sleep: async (delayMs) => {
        sleepCalls.push(delayMs);
      },
    });

    const result = submitter.submitOne(employee);

    await expect(result).rejects.toBeInstanceOf(NotInitializedError);
    await expect(result).rejects.toThrow(
      'Client session closed while retrying POST http://backend.test/service/e/create?force=0'
    );
    expect(session.requests).toHaveLength(1);
    expect(sleepCalls).toEqual([]);
  });

  test('does not retry on a session replaced during the backoff', async () => {
    const first = new FakeSession(() => {
      throw new TypeError('connection reset');
    });
    const second = new FakeSession(() => ({ status: 201, body: 'e-1' }));
    let current: HttpSession = first;
    const submitter = new ObjectSubmitter<DomainObject>({
      acquireSession: () => current,
      resolver,
      serialize: (obj) => obj,
      config: retryConfig,
      sleep: async () => {
        current = second;
      },
    });

    await expect(submitter.submitOne(employee)).rejects.toBeInstanceOf(NotInitializedError);
    expect(first.requests).toHaveLength(1);
    expect(second.requests).toHaveLength(0);
  });

  test('retries a success response that was not valid JSON', async () => {
    let attempts = 0;
    const { submitter, sleepCalls } = createSubmitter(() => {
      attempts += 1;
      if (attempts === 1) {
        throw new MalformedResponseError('http://backend.test/service/e/create?force=0', 200);
      }
      return { status: 201, body: 'e-1' };
    });

    await expect(submitter.submitOne(employee)).resolves.toBe('e-1');
    expect(sleepCalls).toEqual([1000]);
  });
});
