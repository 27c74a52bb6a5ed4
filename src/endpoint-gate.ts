/**
 * Endpoint Gate
 * Layer: core
 *
 * Provided ports:
 *   - gate.isSupported
 *
 * Decides whether this server's own view of DockerHub applies to an endpoint.
 * Only runtimes managed through a local socket or pipe, and the local
 * Kubernetes environment, share this server's egress.
 */

import type { Endpoint, EndpointSupportInfo } from './types';

const LOCAL_URL_PREFIXES = ['unix://', 'npipe://'] as const;

// -----------------------------------------------------------------------------
// Port: gate.isSupported
// -----------------------------------------------------------------------------

/**
 * Checks if DockerHub status can be reported for the endpoint.
 * Returns detailed info including reason if unsupported.
 */
export function isSupportedEndpoint(endpoint: Endpoint): EndpointSupportInfo {
  if (LOCAL_URL_PREFIXES.some((prefix) => endpoint.url.startsWith(prefix))) {
    return { supported: true };
  }

  if (endpoint.type === 'kubernetes-local') {
    return { supported: true };
  }

  return {
    supported: false,
    reason: `Endpoint ${endpoint.id} (${endpoint.type}) is not managed through a local socket`,
  };
}

