import pino from 'pino';
import { describe, expect, it, vi } from 'vitest';
import { DEFAULT_API_URL, DEFAULT_TIMEOUT_MS, resolveClientOptions } from './config.js';

describe('resolveClientOptions', () => {
  const logger = pino({ enabled: false });

  it('falls back to defaults with an empty environment', () => {
    const resolved = resolveClientOptions({ logger }, {});

    expect(resolved.baseUrl).toBe(DEFAULT_API_URL);
    expect(resolved.timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
    expect(resolved.headers).toEqual({});
  });

  it('reads url, timeout and token from the environment', () => {
    const resolved = resolveClientOptions(
      { logger },
      {
        TASKSYNC_API_URL: 'https://agent.example/api//',
        TASKSYNC_TIMEOUT_MS: '5000',
        TASKSYNC_API_TOKEN: 'test-token',
      }
    );

    expect(resolved.baseUrl).toBe('https://agent.example/api');
    expect(resolved.timeoutMs).toBe(5000);
    expect(resolved.headers).toEqual({ Authorization: 'Bearer test-token' });
  });

  it('ignores an invalid timeout', () => {
    expect(resolveClientOptions({ logger }, { TASKSYNC_TIMEOUT_MS: 'soon' }).timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
  });

  it('prefers explicit options over the environment', () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const resolved = resolveClientOptions(
      { baseUrl: 'http://local/api', timeoutMs: 10, fetch: fetchImpl, headers: { Authorization: 'Bearer override' }, logger },
      { TASKSYNC_API_URL: 'http://env/api', TASKSYNC_API_TOKEN: 'test-token' }
    );

    expect(resolved).toMatchObject({ baseUrl: 'http://local/api', timeoutMs: 10, fetch: fetchImpl });
    expect(resolved.headers).toEqual({ Authorization: 'Bearer override' });
  });
});
