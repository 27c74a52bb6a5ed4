/**
 * Server Entry
 * Layer: http
 *
 * Serves the status API over @hono/node-server.
 */

import * as core from '@actions/core';
import { serve } from '@hono/node-server';
import { loadConfig } from './config';
import { createFileDataStore } from './store';
import { createApp } from './handler';

function main(): void {
  const config = loadConfig();
  const app = createApp({
    store: createFileDataStore(config.data_file),
    dockerhub: { urls: config.urls, timeoutMs: config.timeout_ms },
  });

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    core.info(`DockerHub status API listening on ${config.host}:${info.port}`);
  });

  const shutdown = (signal: string): void => {
    core.info(`Received ${signal}, shutting down`);
    server.close();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (error) {
  const message = error instanceof Error ? error.message : String(error);
  core.setFailed(message);
}
