/**
 * Status Handler
 * Layer: http
 *
 * Provided ports:
 *   - handler.resolveEndpointStatus
 *   - handler.createApp
 *
 * GET /api/endpoints/:id/dockerhub/status
 *
 * Required ports:
 *   - store.getEndpoint
 *   - store.getDockerHubCredentials
 *   - gate.isSupported
 *   - dockerhub.getStatus
 */

import * as core from '@actions/core';
import { Hono } from 'hono';
import type { RateLimitStatus, StatusErrorKind } from './types';
import type { DataStore } from './store';
import type { DockerHubFailure, DockerHubRequestOptions } from './dockerhub';
import { getDockerHubStatus } from './dockerhub';
import { isSupportedEndpoint } from './endpoint-gate';
import { parseUnsignedInteger } from './utils';

export const STATUS_ROUTE = '/api/endpoints/:id/dockerhub/status';

export interface StatusHandlerDeps {
  store: DataStore;
  dockerhub?: DockerHubRequestOptions;
}

// -----------------------------------------------------------------------------
// Port: handler.resolveEndpointStatus
// -----------------------------------------------------------------------------

export interface HandlerError {
  kind: StatusErrorKind;
  /** Client-facing summary */
  message: string;
  /** Underlying cause */
  details: string;
}

export interface ResolveStatusResult {
  success: true;
  status: RateLimitStatus;
}

export interface ResolveStatusError {
  success: false;
  failure: HandlerError;
}

export type ResolveStatusOutcome = ResolveStatusResult | ResolveStatusError;

/**
 * Validates the route id, gates the endpoint and runs the DockerHub pipeline.
 * No outbound call is made unless every local check passes.
 */
export async function resolveEndpointStatus(
  rawId: string,
  deps: StatusHandlerDeps,
): Promise<ResolveStatusOutcome> {
  const id = parseUnsignedInteger(rawId);
  if (id === null || id === 0) {
    return fail(
      'invalid_input',
      'Invalid endpoint identifier route variable',
      `Expected a positive integer, got "${rawId}"`,
    );
  }

  const endpointResult = await deps.store.getEndpoint(id);
  if (!endpointResult.success) {
    return fail(
      endpointResult.notFound ? 'not_found' : 'storage',
      'Unable to find an endpoint with the specified identifier inside the database',
      endpointResult.error,
    );
  }

  const support = isSupportedEndpoint(endpointResult.endpoint);
  if (!support.supported) {
    return fail(
      'unsupported_endpoint_type',
      'Invalid environment type',
      support.reason ?? 'Invalid environment type',
    );
  }

  const credentialsResult = await deps.store.getDockerHubCredentials();
  if (!credentialsResult.success) {
    return fail(
      'storage',
      'Unable to retrieve DockerHub details from the database',
      credentialsResult.error,
    );
  }

  const result = await getDockerHubStatus(credentialsResult.credentials, deps.dockerhub);
  if (!result.success) {
    return fail(result.kind, upstreamMessage(result), upstreamDetails(result));
  }

  return { success: true, status: result.status };
}

/**
 * Maps an error kind to the HTTP status returned to the client.
 */
export function httpStatusFor(kind: StatusErrorKind): 400 | 404 | 500 {
  switch (kind) {
    case 'invalid_input':
    case 'unsupported_endpoint_type':
      return 400;
    case 'not_found':
      return 404;
    case 'storage':
    case 'upstream_auth':
    case 'upstream_rate_limit':
    case 'upstream_protocol':
      return 500;
  }
}

// -----------------------------------------------------------------------------
// Port: handler.createApp
// -----------------------------------------------------------------------------

/**
 * Builds the HTTP application.
 */
export function createApp(deps: StatusHandlerDeps): Hono {
  const app = new Hono();

  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.get(STATUS_ROUTE, async (c) => {
    const rawId = c.req.param('id');
    const result = await resolveEndpointStatus(rawId, deps);

    if (!result.success) {
      const { kind, message, details } = result.failure;
      const status = httpStatusFor(kind);
      if (status === 500) {
        core.error(`[dockerhub-status] endpoint=${rawId} kind=${kind}: ${details}`);
      } else {
        core.warning(`[dockerhub-status] endpoint=${rawId} kind=${kind}: ${details}`);
      }
      return c.json({ message, details }, status);
    }

    const { remaining, limit } = result.status;
    return c.json({ remaining, limit });
  });

  return app;
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function fail(kind: StatusErrorKind, message: string, details: string): ResolveStatusError {
  return { success: false, failure: { kind, message, details } };
}

function upstreamMessage(failure: DockerHubFailure): string {
  switch (failure.kind) {
    case 'upstream_auth':
      return 'Unable to retrieve DockerHub token from DockerHub';
    case 'upstream_rate_limit':
    case 'upstream_protocol':
      return 'Unable to retrieve DockerHub rate limits from DockerHub';
  }
}

function upstreamDetails(failure: DockerHubFailure): string {
  if (failure.credentials_rejected) {
    return `DockerHub rejected the stored credentials (HTTP ${failure.status ?? 'unknown'})`;
  }
  if (failure.cause === 'unexpected_status' && failure.status !== null) {
    return `${failure.error} (HTTP ${failure.status})`;
  }
  return failure.error;
}
