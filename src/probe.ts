/**
 * Probe handler
 * Layer: action
 *
 * Reads the runner's own DockerHub quota and reports it as step outputs and
 * a step summary. The runner talks to DockerHub directly, so no endpoint
 * gate applies here.
 */

import * as core from '@actions/core';
import type { DockerHubCredentials, SummaryData } from './types';
import { getDockerHubStatus } from './dockerhub';
import { render, writeStepSummary, generateWarnings } from './output';

export interface ProbeInputs {
  username: string;
  password: string;
  /** Remaining pulls at or below which a warning is emitted */
  warn_threshold: number;
}

export async function probeDockerHub(inputs: ProbeInputs): Promise<void> {
  const credentials: DockerHubCredentials = {
    authentication: inputs.username.length > 0,
    username: inputs.username,
    password: inputs.password,
  };

  core.info(
    `Checking DockerHub pull rate limit (${credentials.authentication ? `as ${inputs.username}` : 'anonymous'})...`,
  );

  const result = await getDockerHubStatus(credentials);
  if (!result.success) {
    const hint = result.credentials_rejected ? ' (check username and password)' : '';
    throw new Error(`DockerHub status check failed: ${result.error}${hint}`);
  }

  const { status } = result;
  core.setOutput('limit', status.limit);
  core.setOutput('remaining', status.remaining);

  const warnings = generateWarnings(status, inputs.warn_threshold);
  for (const warning of warnings) {
    core.warning(warning);
  }

  const summaryData: SummaryData = {
    status,
    authenticated: credentials.authentication,
    warnings,
  };
  const { markdown, console: consoleText } = render(summaryData);

  core.info(consoleText);
  writeStepSummary(markdown);
}
