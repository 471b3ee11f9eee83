import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { MalformedResponseError } from '../../src/errors.js';
import { PooledHttpSession } from '../../src/session/session.js';

describe('PooledHttpSession', () => {
  let mockAgent: MockAgent;
  let session: PooledHttpSession;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    session = new PooledHttpSession(
      { maxConnections: 20, requestTimeout: 1_000, headers: { SESSION: 'test-session' } },
      mockAgent
    );
  });

  afterEach(async () => {
    await session.close();
  });

  test('parses JSON bodies and sends credentials', async () => {
    mockAgent
      .get('http://backend.test')
      .intercept({ path: '/version/', method: 'GET', headers: { session: 'test-session' } })
      .reply(200, { mo_version: '1.2.3' });

    await expect(
      session.request({ method: 'GET', url: 'http://backend.test/version/' })
    ).resolves.toEqual({ status: 200, body: { mo_version: '1.2.3' } });
  });

  test('serializes POST bodies as JSON', async () => {
    mockAgent
      .get('http://backend.test')
      .intercept({
        path: '/service/e/create?force=0',
        method: 'POST',
        body: JSON.stringify({ type: 'employee', uuid: 'e-1' }),
        headers: { 'content-type': 'application/json' },
      })
      .reply(201, '"e-1"');

    await expect(
      session.request({
        method: 'POST',
        url: 'http://backend.test/service/e/create?force=0',
        body: { type: 'employee', uuid: 'e-1' },
      })
    ).resolves.toEqual({ status: 201, body: 'e-1' });
  });

  test('resolves HTTP errors and keeps non-JSON bodies as text', async () => {
    mockAgent
      .get('http://backend.test')
      .intercept({ path: '/broken', method: 'GET' })
      .reply(502, 'Bad Gateway');

    await expect(
      session.request({ method: 'GET', url: 'http://backend.test/broken' })
    ).resolves.toEqual({ status: 502, body: 'Bad Gateway' });
  });

  test('rejects a success response whose body is not JSON', async () => {
    mockAgent
      .get('http://backend.test')
      .intercept({ path: '/service/e/create?force=0', method: 'POST' })
      .reply(200, '<html>maintenance</html>');

    const result = session.request({
      method: 'POST',
      url: 'http://backend.test/service/e/create?force=0',
      body: { type: 'employee' },
    });

    await expect(result).rejects.toBeInstanceOf(MalformedResponseError);
    await expect(result).rejects.toMatchObject({
      status: 200,
      url: 'http://backend.test/service/e/create?force=0',
    });
  });

  test('returns null for an empty success body', async () => {
    mockAgent
      .get('http://backend.test')
      .intercept({ path: '/service/details/edit?force=0', method: 'POST' })
      .reply(204, '');

    await expect(
      session.request({
        method: 'POST',
        url: 'http://backend.test/service/details/edit?force=0',
        body: { type: 'address' },
      })
    ).resolves.toEqual({ status: 204, body: null });
  });

  test('rejects requests after close', async () => {
    await session.close();

    await expect(
      session.request({ method: 'GET', url: 'http://backend.test/version/' })
    ).rejects.toThrow('Session is closed');
  });
});
