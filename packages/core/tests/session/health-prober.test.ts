import { describe, expect, test } from 'vitest';
import { ConnectivityError } from '../../src/errors.js';
import { bodyContainsMarker, probeHealth } from '../../src/session/health-prober.js';
import { FakeSession, healthy } from '../helpers/fake-session.js';

describe('probeHealth', () => {
  test('succeeds on the attempt that returns the marker', async () => {
    let attempts = 0;
    const sleepCalls: number[] = [];
    const session = new FakeSession(() => {
      attempts += 1;
      if (attempts < 3) {
        return { status: 503, body: { error: 'starting' } };
      }
      return healthy;
    });

    await probeHealth(session, [{ url: 'http://backend.test/version/', marker: 'mo_version' }], {
      attempts: 100,
      delayMs: 1000,
      sleep: async (delayMs) => {
        sleepCalls.push(delayMs);
      },
    });

    expect(attempts).toBe(3);
    expect(sleepCalls).toEqual([1000, 1000]);
  });

  test('treats thrown errors and missing markers as failed attempts', async () => {
    let attempts = 0;
    const session = new FakeSession(() => {
      attempts += 1;
      if (attempts === 1) {
        throw new TypeError('connection refused');
      }
      if (attempts === 2) {
        return { status: 200, body: { status: 'ok' } };
      }
      return healthy;
    });

    await probeHealth(session, [{ url: 'http://backend.test/version/', marker: 'mo_version' }], {
      sleep: async () => {},
    });

    expect(attempts).toBe(3);
  });

  test('fails with ConnectivityError when attempts run out', async () => {
    const sleepCalls: number[] = [];
    const session = new FakeSession(() => ({ status: 500, body: null }));

    const probe = probeHealth(
      session,
      [{ url: 'http://backend.test/version/', marker: 'mo_version' }],
      {
        attempts: 4,
        delayMs: 10,
        sleep: async (delayMs) => {
          sleepCalls.push(delayMs);
        },
      }
    );

    await expect(probe).rejects.toBeInstanceOf(ConnectivityError);
    await expect(probe).rejects.toMatchObject({
      url: 'http://backend.test/version/',
      attempts: 4,
    });
    expect(session.requests).toHaveLength(4);
    expect(sleepCalls).toEqual([10, 10, 10]);
  });

  test('checks every endpoint concurrently', async () => {
    const session = new FakeSession((request) =>
      request.url.endsWith('/version/')
        ? healthy
        : { status: 200, body: ['lora_version', 'other'] }
    );

    await probeHealth(
      session,
      [
        { url: 'http://backend.test/version/', marker: 'mo_version' },
        { url: 'http://backend.test/lora/version', marker: 'lora_version' },
      ],
      { sleep: async () => {} }
    );

    expect(session.requests.map((request) => request.url).sort()).toEqual([
      'http://backend.test/lora/version',
      'http://backend.test/version/',
    ]);
  });

  test('one exhausted endpoint aborts the whole probe', async () => {
    const session = new FakeSession((request) =>
      request.url.endsWith('/down') ? { status: 502, body: null } : healthy
    );

    await expect(
      probeHealth(
        session,
        [
          { url: 'http://backend.test/version/', marker: 'mo_version' },
          { url: 'http://backend.test/down', marker: 'mo_version' },
        ],
        { attempts: 2, sleep: async () => {} }
      )
    ).rejects.toMatchObject({ name: 'ConnectivityError', url: 'http://backend.test/down' });
  });
});

describe('bodyContainsMarker', () => {
  test('matches object keys, array elements and substrings', () => {
    expect(bodyContainsMarker({ mo_version: '1' }, 'mo_version')).toBe(true);
    expect(bodyContainsMarker({ version: 'mo_version' }, 'mo_version')).toBe(false);
    expect(bodyContainsMarker(['a', 'mo_version'], 'mo_version')).toBe(true);
    expect(bodyContainsMarker('running mo_version 1', 'mo_version')).toBe(true);
    expect(bodyContainsMarker(null, 'mo_version')).toBe(false);
    expect(bodyContainsMarker(42, 'mo_version')).toBe(false);
  });
});
