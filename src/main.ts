/**
 * Main Entry
 * Layer: action
 *
 * GitHub Action entry point for a one-shot DockerHub quota probe.
 *
 * Required ports:
 *   - probe.run
 */

import * as core from '@actions/core';
import { DEFAULT_WARN_THRESHOLD } from './types';
import { parseUnsignedInteger } from './utils';
import { probeDockerHub } from './probe';

// -----------------------------------------------------------------------------
// Action entry point
// -----------------------------------------------------------------------------

async function run(): Promise<void> {
  try {
    const username = core.getInput('username');
    const password = core.getInput('password');
    const rawThreshold = core.getInput('warn-threshold');

    if (username && !password) {
      throw new Error('A password is required when username is set.');
    }

    // Mask password to prevent accidental exposure
    if (password) {
      core.setSecret(password);
    }

    const threshold = rawThreshold ? parseUnsignedInteger(rawThreshold) : DEFAULT_WARN_THRESHOLD;
    if (threshold === null) {
      throw new Error(`Invalid warn-threshold: ${rawThreshold}. Must be a non-negative integer.`);
    }

    await probeDockerHub({ username, password, warn_threshold: threshold });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    core.setFailed(message);
  }
}

// -----------------------------------------------------------------------------
// Run
// -----------------------------------------------------------------------------

void run();
