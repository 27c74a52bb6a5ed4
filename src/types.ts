/**
 * Boundary types for dockerhub-rate-limit-status
 *
 * These types define the contracts between modules.
 */

// -----------------------------------------------------------------------------
// DockerHubCredentials
// Stored DockerHub account details (supplied by the data store)
// -----------------------------------------------------------------------------

export interface DockerHubCredentials {
  /** Whether basic auth should be sent to the token service */
  authentication: boolean;
  username: string;
  password: string;
}

// -----------------------------------------------------------------------------
// RateLimitStatus
// Pull quota as reported by the registry
// -----------------------------------------------------------------------------

export interface RateLimitStatus {
  /** Maximum pulls allowed per rolling window */
  limit: number;
  /** Pulls left in the current window */
  remaining: number;
}

// -----------------------------------------------------------------------------
// Endpoint
// Managed container runtime environment
// -----------------------------------------------------------------------------

export type EnvironmentType =
  | 'docker'
  | 'agent-docker'
  | 'azure'
  | 'edge-agent-docker'
  | 'kubernetes-local'
  | 'agent-kubernetes'
  | 'edge-agent-kubernetes';

export const ENVIRONMENT_TYPES: readonly EnvironmentType[] = [
  'docker',
  'agent-docker',
  'azure',
  'edge-agent-docker',
  'kubernetes-local',
  'agent-kubernetes',
  'edge-agent-kubernetes',
];

export interface Endpoint {
  id: number;
  name: string;
  /** Connection address, e.g. unix:///var/run/docker.sock or tcp://10.0.0.5:2375 */
  url: string;
  type: EnvironmentType;
}

export interface EndpointSupportInfo {
  supported: boolean;
  reason?: string;
}

// -----------------------------------------------------------------------------
// Error taxonomy
// -----------------------------------------------------------------------------

export type StatusErrorKind =
  | 'invalid_input'
  | 'not_found'
  | 'unsupported_endpoint_type'
  | 'storage'
  | 'upstream_auth'
  | 'upstream_rate_limit'
  | 'upstream_protocol';

/** Low-level reason an outbound DockerHub call failed */
export type UpstreamFailureCause =
  | 'transport'
  | 'timeout'
  | 'unexpected_status'
  | 'decode'
  | 'missing_header'
  | 'malformed_header';

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export interface DockerHubUrls {
  token_url: string;
  rate_limit_url: string;
}

export interface Config {
  port: number;
  host: string;
  /** Path to the JSON data store */
  data_file: string;
  /** Per-call timeout for DockerHub requests (milliseconds) */
  timeout_ms: number;
  urls: DockerHubUrls;
}

// -----------------------------------------------------------------------------
// SummaryData
// Data passed to output renderer in Action mode
// -----------------------------------------------------------------------------

export interface SummaryData {
  status: RateLimitStatus;
  /** Whether the probe used stored credentials */
  authenticated: boolean;
  warnings: string[];
}

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

export const DOCKERHUB_TOKEN_URL =
  'https://auth.docker.io/token?service=registry.docker.io&scope=repository:ratelimitpreview/test:pull';
export const DOCKERHUB_RATE_LIMIT_URL =
  'https://registry-1.docker.io/v2/ratelimitpreview/test/manifests/latest';

export const RATE_LIMIT_LIMIT_HEADER = 'RateLimit-Limit';
export const RATE_LIMIT_REMAINING_HEADER = 'RateLimit-Remaining';

/** Timeout for each request to DockerHub (milliseconds) */
export const FETCH_TIMEOUT_MS = 10000;

export const DEFAULT_PORT = 9000;
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_DATA_FILE = './data/datastore.json';

/** Remaining pulls at or below which Action mode warns */
export const DEFAULT_WARN_THRESHOLD = 10;
