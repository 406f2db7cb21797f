/**
 * Client configuration
 *
 * Explicit options win; anything left out is read from the environment:
 * - TASKSYNC_API_URL: API root (default: http://localhost:8000/api)
 * - TASKSYNC_TIMEOUT_MS: per-request timeout (default: 30000)
 * - TASKSYNC_API_TOKEN: sent as a bearer token when set
 */

import type { Logger } from 'pino';
import { createLogger } from './logger.js';
import type { TaskClientOptions } from './types.js';

export const DEFAULT_API_URL = 'http://localhost:8000/api';
export const DEFAULT_TIMEOUT_MS = 30_000;

export interface ResolvedClientOptions {
  baseUrl: string;
  fetch: typeof fetch;
  headers: Record<string, string>;
  timeoutMs: number;
  logger: Logger;
}

type Env = Record<string, string | undefined>;

function readPositiveInt(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

export function resolveClientOptions(options: TaskClientOptions = {}, env: Env = process.env): ResolvedClientOptions {
  const baseUrl = (options.baseUrl ?? env.TASKSYNC_API_URL ?? DEFAULT_API_URL).replace(/\/+$/, '');

  const headers: Record<string, string> = {};
  if (env.TASKSYNC_API_TOKEN) {
    headers.Authorization = `Bearer ${env.TASKSYNC_API_TOKEN}`;
  }
  Object.assign(headers, options.headers);

  return {
    baseUrl,
    fetch: options.fetch ?? globalThis.fetch,
    headers,
    timeoutMs: options.timeoutMs ?? readPositiveInt(env.TASKSYNC_TIMEOUT_MS) ?? DEFAULT_TIMEOUT_MS,
    logger: options.logger ?? createLogger('tasksync:client'),
  };
}
