/**
 * DockerHub Client
 * Layer: infra
 *
 * Provided ports:
 *   - dockerhub.fetchToken
 *   - dockerhub.fetchRateLimits
 *   - dockerhub.getStatus
 *
 * Reads the image-pull rate limit DockerHub applies to this host. A pull-scoped
 * token for the ratelimitpreview/test repository is exchanged first, then a HEAD
 * on its manifest returns the RateLimit-* headers without consuming quota.
 */

import * as core from '@actions/core';
import type {
  DockerHubCredentials,
  DockerHubUrls,
  RateLimitStatus,
  UpstreamFailureCause,
} from './types';
import {
  DOCKERHUB_RATE_LIMIT_URL,
  DOCKERHUB_TOKEN_URL,
  FETCH_TIMEOUT_MS,
  RATE_LIMIT_LIMIT_HEADER,
  RATE_LIMIT_REMAINING_HEADER,
} from './types';
import { isARealObject, parseUnsignedInteger } from './utils';

// -----------------------------------------------------------------------------
// Options
// -----------------------------------------------------------------------------

/** Anything shaped like fetch. Must be safe for concurrent use. */
export type Transport = (url: string, init: RequestInit) => Promise<Response>;

export interface DockerHubRequestOptions {
  transport?: Transport;
  urls?: DockerHubUrls;
  timeoutMs?: number;
  /** Cancels both outbound calls when aborted */
  signal?: AbortSignal;
}

export const DEFAULT_DOCKERHUB_URLS: DockerHubUrls = {
  token_url: DOCKERHUB_TOKEN_URL,
  rate_limit_url: DOCKERHUB_RATE_LIMIT_URL,
};

// -----------------------------------------------------------------------------
// Outcomes
// -----------------------------------------------------------------------------

export type UpstreamErrorKind = 'upstream_auth' | 'upstream_rate_limit' | 'upstream_protocol';

export interface DockerHubFailure {
  success: false;
  kind: UpstreamErrorKind;
  cause: UpstreamFailureCause;
  error: string;
  /** HTTP status when a response was received */
  status: number | null;
  /** True when the token service refused the stored credentials (401/403) */
  credentials_rejected: boolean;
}

export interface FetchTokenResult {
  success: true;
  token: string;
}

export type FetchTokenOutcome = FetchTokenResult | DockerHubFailure;

export interface FetchRateLimitsResult {
  success: true;
  status: RateLimitStatus;
}

export type FetchRateLimitsOutcome = FetchRateLimitsResult | DockerHubFailure;

export interface ParseHeaderResult {
  success: true;
  value: number;
}

export interface ParseHeaderError {
  success: false;
  cause: 'missing_header' | 'malformed_header';
  error: string;
}

export type ParseHeaderOutcome = ParseHeaderResult | ParseHeaderError;

// -----------------------------------------------------------------------------
// Port: dockerhub.fetchToken
// -----------------------------------------------------------------------------

/**
 * Exchanges optional basic-auth credentials for a pull-scoped bearer token.
 * Any status other than 200 is a failure; the body is discarded.
 */
export async function fetchToken(
  credentials: DockerHubCredentials,
  options: DockerHubRequestOptions = {},
): Promise<FetchTokenOutcome> {
  const transport = options.transport ?? fetch;
  const urls = options.urls ?? DEFAULT_DOCKERHUB_URLS;
  const timeoutMs = options.timeoutMs ?? FETCH_TIMEOUT_MS;

  const headers: Record<string, string> = { Accept: 'application/json' };
  if (credentials.authentication) {
    headers['Authorization'] = basicAuthorization(credentials.username, credentials.password);
  }

  const deadline = startDeadline(timeoutMs, options.signal);
  let response: Response | null = null;

  try {
    response = await transport(urls.token_url, {
      method: 'GET',
      headers,
      signal: deadline.signal,
    });

    if (response.status !== 200) {
      return tokenFailure('unexpected_status', 'failed fetching dockerhub token', response.status);
    }

    const token = parseTokenResponse(await response.text());
    if (token === null) {
      return tokenFailure('decode', 'failed decoding dockerhub token response', response.status);
    }

    return { success: true, token };
  } catch (err) {
    const { cause, error } = describeRequestError(err, deadline, timeoutMs);
    return tokenFailure(cause, error, response?.status ?? null);
  } finally {
    deadline.clear();
    if (response) {
      await releaseBody(response);
    }
  }
}

// -----------------------------------------------------------------------------
// Port: dockerhub.fetchRateLimits
// -----------------------------------------------------------------------------

/**
 * Issues an authenticated HEAD against the sentinel manifest and reads the
 * RateLimit-Limit and RateLimit-Remaining headers. Both must parse.
 */
export async function fetchRateLimits(
  token: string,
  options: DockerHubRequestOptions = {},
): Promise<FetchRateLimitsOutcome> {
  const transport = options.transport ?? fetch;
  const urls = options.urls ?? DEFAULT_DOCKERHUB_URLS;
  const timeoutMs = options.timeoutMs ?? FETCH_TIMEOUT_MS;

  const deadline = startDeadline(timeoutMs, options.signal);
  let response: Response | null = null;

  try {
    response = await transport(urls.rate_limit_url, {
      method: 'HEAD',
      headers: { Authorization: `Bearer ${token}` },
      signal: deadline.signal,
    });

    if (response.status !== 200) {
      return limitsFailure('unexpected_status', 'failed fetching dockerhub limits', response.status);
    }

    const limit = parseNumericHeader(response.headers, RATE_LIMIT_LIMIT_HEADER);
    if (!limit.success) {
      return headerFailure(RATE_LIMIT_LIMIT_HEADER, limit);
    }

    const remaining = parseNumericHeader(response.headers, RATE_LIMIT_REMAINING_HEADER);
    if (!remaining.success) {
      return headerFailure(RATE_LIMIT_REMAINING_HEADER, remaining);
    }

    return {
      success: true,
      status: { limit: limit.value, remaining: remaining.value },
    };
  } catch (err) {
    const { cause, error } = describeRequestError(err, deadline, timeoutMs);
    return limitsFailure(cause, error, response?.status ?? null);
  } finally {
    deadline.clear();
    if (response) {
      await releaseBody(response);
    }
  }
}

// -----------------------------------------------------------------------------
// Port: dockerhub.getStatus
// -----------------------------------------------------------------------------

/**
 * Token first, then limits. A token failure never reaches the registry.
 */
export async function getDockerHubStatus(
  credentials: DockerHubCredentials,
  options: DockerHubRequestOptions = {},
): Promise<FetchRateLimitsOutcome> {
  core.debug(
    `Requesting DockerHub token (${credentials.authentication ? 'authenticated' : 'anonymous'})`,
  );
  const tokenResult = await fetchToken(credentials, options);
  if (!tokenResult.success) {
    return tokenResult;
  }

  core.debug('Received DockerHub token');

  const limitsResult = await fetchRateLimits(tokenResult.token, options);
  if (limitsResult.success) {
    const { remaining, limit } = limitsResult.status;
    core.debug(`DockerHub rate limit: ${remaining}/${limit} remaining`);
  }
  return limitsResult;
}

// -----------------------------------------------------------------------------
// Header parsing
// -----------------------------------------------------------------------------

/**
 * Parses a rate-limit header such as "100;w=21600". Only the segment before
 * the first ';' is read. Failures are not prefixed with the header name.
 */
export function parseNumericHeader(headers: Headers, key: string): ParseHeaderOutcome {
  const value = headers.get(key);
  if (!value) {
    return { success: false, cause: 'missing_header', error: `Missing ${key} header` };
  }

  const [first = ''] = value.split(';');
  const parsed = parseUnsignedInteger(first);
  if (parsed === null) {
    return { success: false, cause: 'malformed_header', error: `invalid integer "${first}"` };
  }

  return { success: true, value: parsed };
}

/**
 * Extracts the token from a token service body.
 * Returns null unless the body is a JSON object with a non-empty string token.
 */
export function parseTokenResponse(body: string): string | null {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    return null;
  }
  if (!isARealObject(raw)) {
    return null;
  }
  const token = raw['token'];
  return typeof token === 'string' && token.length > 0 ? token : null;
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

interface Deadline {
  signal: AbortSignal;
  expired: () => boolean;
  clear: () => void;
}

function startDeadline(timeoutMs: number, parent: AbortSignal | undefined): Deadline {
  const controller = new AbortController();
  let expired = false;
  const timeoutId = setTimeout(() => {
    expired = true;
    controller.abort();
  }, timeoutMs);

  const onParentAbort = (): void => controller.abort();
  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    expired: () => expired,
    clear: () => {
      clearTimeout(timeoutId);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

function describeRequestError(
  err: unknown,
  deadline: Deadline,
  timeoutMs: number,
): { cause: 'transport' | 'timeout'; error: string } {
  if (deadline.expired()) {
    return {
      cause: 'timeout',
      error: `Request timeout: DockerHub did not respond within ${timeoutMs}ms`,
    };
  }
  if (err instanceof Error && err.name === 'AbortError') {
    return { cause: 'transport', error: 'Request aborted' };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { cause: 'transport', error: `Network error: ${message}` };
}

async function releaseBody(response: Response): Promise<void> {
  if (!response.body || response.bodyUsed) {
    return;
  }
  try {
    await response.body.cancel();
  } catch {
    // Stream already errored; nothing left to release
  }
}

function basicAuthorization(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}

function tokenFailure(
  cause: UpstreamFailureCause,
  error: string,
  status: number | null,
): DockerHubFailure {
  return {
    success: false,
    kind: 'upstream_auth',
    cause,
    error,
    status,
    credentials_rejected: status === 401 || status === 403,
  };
}

function limitsFailure(
  cause: UpstreamFailureCause,
  error: string,
  status: number | null,
): DockerHubFailure {
  return {
    success: false,
    kind: 'upstream_rate_limit',
    cause,
    error,
    status,
    credentials_rejected: false,
  };
}

function headerFailure(key: string, result: ParseHeaderError): DockerHubFailure {
  return {
    success: false,
    kind: 'upstream_protocol',
    cause: result.cause,
    error: `Failed fetching ${key} header: ${result.error}`,
    status: 200,
    credentials_rejected: false,
  };
}
