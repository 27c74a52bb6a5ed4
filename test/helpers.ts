/**
 * Shared test helpers: fake transport and DockerHub responses.
 */

import { vi } from 'vitest';
import type { DockerHubCredentials, DockerHubUrls, Endpoint } from '../src/types';

export const TEST_URLS: DockerHubUrls = {
  token_url: 'http://auth.dockerhub.test/token?scope=repository:ratelimitpreview/test:pull',
  rate_limit_url: 'http://registry.dockerhub.test/v2/ratelimitpreview/test/manifests/latest',
};

export const ANONYMOUS: DockerHubCredentials = {
  authentication: false,
  username: '',
  password: '',
};

export const AUTHENTICATED: DockerHubCredentials = {
  authentication: true,
  username: 'test-user',
  password: 'test-secret',
};

type Responder = () => Response | Promise<Response>;

/**
 * Builds a transport that answers by exact URL and throws on anything else.
 */
export function makeTransport(routes: Record<string, Responder>) {
  return vi.fn(async (url: string, _init: RequestInit): Promise<Response> => {
    const responder = routes[url];
    if (!responder) {
      throw new Error(`Unexpected request to ${url}`);
    }
    return responder();
  });
}

export function tokenResponse(token: string): Response {
  return new Response(JSON.stringify({ token }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function limitsResponse(headers: Record<string, string>, status = 200): Response {
  return new Response(null, { status, headers });
}

/**
 * Transport for the happy path: token abc123, 100 limit, given remaining.
 */
export function makeHealthyTransport(remaining = 17) {
  return makeTransport({
    [TEST_URLS.token_url]: () => tokenResponse('abc123'),
    [TEST_URLS.rate_limit_url]: () =>
      limitsResponse({
        'RateLimit-Limit': '100;w=21600',
        'RateLimit-Remaining': `${remaining};w=21600`,
      }),
  });
}

export function makeEndpoint(overrides: Partial<Endpoint> = {}): Endpoint {
  return {
    id: 1,
    name: 'local',
    url: 'unix:///var/run/docker.sock',
    type: 'docker',
    ...overrides,
  };
}
