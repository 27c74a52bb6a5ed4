/**
 * Data Store
 * Layer: infra
 *
 * Provided ports:
 *   - store.getEndpoint
 *   - store.getDockerHubCredentials
 *
 * Read-only access to managed endpoints and the stored DockerHub account.
 * The file-backed store re-reads its JSON document on every call.
 */

import * as fs from 'fs';
import type { DockerHubCredentials, Endpoint, EnvironmentType } from './types';
import { ENVIRONMENT_TYPES } from './types';
import { isARealObject } from './utils';

// -----------------------------------------------------------------------------
// Port: store.getEndpoint
// -----------------------------------------------------------------------------

export interface GetEndpointResult {
  success: true;
  endpoint: Endpoint;
}

export interface GetEndpointError {
  success: false;
  error: string;
  /** True if no endpoint has the requested id */
  notFound: boolean;
}

export type GetEndpointOutcome = GetEndpointResult | GetEndpointError;

// -----------------------------------------------------------------------------
// Port: store.getDockerHubCredentials
// -----------------------------------------------------------------------------

export interface GetCredentialsResult {
  success: true;
  credentials: DockerHubCredentials;
}

export interface GetCredentialsError {
  success: false;
  error: string;
}

export type GetCredentialsOutcome = GetCredentialsResult | GetCredentialsError;

export interface DataStore {
  getEndpoint(id: number): Promise<GetEndpointOutcome>;
  getDockerHubCredentials(): Promise<GetCredentialsOutcome>;
}

// -----------------------------------------------------------------------------
// File-backed implementation
// -----------------------------------------------------------------------------

export interface DataDocument {
  endpoints: Endpoint[];
  dockerhub: DockerHubCredentials;
}

type ReadDocumentOutcome = { success: true; document: DataDocument } | { success: false; error: string };

/** Used when the document has no dockerhub section */
export const ANONYMOUS_CREDENTIALS: DockerHubCredentials = {
  authentication: false,
  username: '',
  password: '',
};

/**
 * Creates a store over a JSON document shaped as
 * `{ "endpoints": Endpoint[], "dockerhub": DockerHubCredentials }`.
 */
export function createFileDataStore(filePath: string): DataStore {
  return {
    async getEndpoint(id: number): Promise<GetEndpointOutcome> {
      const result = await readDocument(filePath);
      if (!result.success) {
        return { success: false, error: result.error, notFound: false };
      }

      const endpoint = result.document.endpoints.find((candidate) => candidate.id === id);
      if (!endpoint) {
        return { success: false, error: `Endpoint ${id} not found`, notFound: true };
      }

      return { success: true, endpoint };
    },

    async getDockerHubCredentials(): Promise<GetCredentialsOutcome> {
      const result = await readDocument(filePath);
      if (!result.success) {
        return { success: false, error: result.error };
      }
      return { success: true, credentials: result.document.dockerhub };
    },
  };
}

async function readDocument(filePath: string): Promise<ReadDocumentOutcome> {
  let parsed: unknown;
  try {
    const content = await fs.promises.readFile(filePath, 'utf-8');
    parsed = JSON.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: `Failed to read data store: ${message}` };
  }

  const document = parseDataDocument(parsed);
  if (!document) {
    return { success: false, error: 'Invalid data store structure' };
  }
  return { success: true, document };
}

// -----------------------------------------------------------------------------
// Validation
// -----------------------------------------------------------------------------

/**
 * Validates parsed JSON as a data document.
 * A missing dockerhub section means anonymous access.
 */
export function parseDataDocument(value: unknown): DataDocument | null {
  if (!isARealObject(value) || !Array.isArray(value['endpoints'])) {
    return null;
  }

  const endpoints: Endpoint[] = [];
  for (const entry of value['endpoints']) {
    if (!isValidEndpoint(entry)) {
      return null;
    }
    endpoints.push(entry);
  }

  const rawCredentials = value['dockerhub'];
  if (rawCredentials === undefined) {
    return { endpoints, dockerhub: ANONYMOUS_CREDENTIALS };
  }
  if (!isValidCredentials(rawCredentials)) {
    return null;
  }

  return { endpoints, dockerhub: rawCredentials };
}

export function isValidEndpoint(value: unknown): value is Endpoint {
  if (!isARealObject(value)) {
    return false;
  }
  const id = value['id'];
  return (
    typeof id === 'number' &&
    Number.isSafeInteger(id) &&
    id > 0 &&
    typeof value['name'] === 'string' &&
    typeof value['url'] === 'string' &&
    isEnvironmentType(value['type'])
  );
}

export function isValidCredentials(value: unknown): value is DockerHubCredentials {
  if (!isARealObject(value)) {
    return false;
  }
  return (
    typeof value['authentication'] === 'boolean' &&
    typeof value['username'] === 'string' &&
    typeof value['password'] === 'string'
  );
}

function isEnvironmentType(value: unknown): value is EnvironmentType {
  return ENVIRONMENT_TYPES.some((type) => type === value);
}
