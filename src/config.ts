/**
 * Configuration
 * Layer: infra
 *
 * Provided ports:
 *   - config.load
 *
 * Builds server configuration from environment variables.
 */

import type { Config } from './types';
import {
  DEFAULT_DATA_FILE,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DOCKERHUB_RATE_LIMIT_URL,
  DOCKERHUB_TOKEN_URL,
  FETCH_TIMEOUT_MS,
} from './types';
import { parseUnsignedInteger } from './utils';

type Env = Record<string, string | undefined>;

/**
 * Reads configuration from the environment.
 *
 * @throws Error naming the variable when a value is invalid
 */
export function loadConfig(env: Env = process.env): Config {
  return {
    port: readInteger(env, 'PORT', DEFAULT_PORT, { min: 1, max: 65535 }),
    host: readString(env, 'HOST') ?? DEFAULT_HOST,
    data_file: readString(env, 'DATA_FILE') ?? DEFAULT_DATA_FILE,
    timeout_ms: readInteger(env, 'DOCKERHUB_TIMEOUT_MS', FETCH_TIMEOUT_MS, { min: 1 }),
    urls: {
      token_url: readUrl(env, 'DOCKERHUB_TOKEN_URL') ?? DOCKERHUB_TOKEN_URL,
      rate_limit_url: readUrl(env, 'DOCKERHUB_RATE_LIMIT_URL') ?? DOCKERHUB_RATE_LIMIT_URL,
    },
  };
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readInteger(
  env: Env,
  name: string,
  fallback: number,
  bounds: { min: number; max?: number },
): number {
  const raw = readString(env, name);
  if (raw === undefined) {
    return fallback;
  }
  const parsed = parseUnsignedInteger(raw);
  if (parsed === null || parsed < bounds.min || (bounds.max !== undefined && parsed > bounds.max)) {
    throw new Error(`Invalid ${name}: "${raw}" is not an integer in range`);
  }
  return parsed;
}

function readUrl(env: Env, name: string): string | undefined {
  const raw = readString(env, name);
  if (raw === undefined) {
    return undefined;
  }
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new Error(`Invalid ${name}: "${raw}" is not a URL`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`Invalid ${name}: only http and https URLs are supported`);
  }
  return raw;
}
