/**
 * Output Renderer
 * Layer: infra
 *
 * Provided ports:
 *   - output.render
 *
 * Generates the DockerHub quota summary for the step summary and console.
 */

import * as fs from 'fs';
import type { RateLimitStatus, SummaryData } from './types';

// -----------------------------------------------------------------------------
// Port: output.render
// -----------------------------------------------------------------------------

export interface RenderResult {
  /** Markdown for step summary */
  markdown: string;
  /** Plain text for console */
  console: string;
}

/**
 * Renders the summary data to markdown and console formats.
 */
export function render(data: SummaryData): RenderResult {
  const markdown = renderMarkdown(data);
  const consoleText = renderConsole(data);
  return { markdown, console: consoleText };
}

// -----------------------------------------------------------------------------
// Markdown rendering
// -----------------------------------------------------------------------------

/**
 * Renders full markdown summary for $GITHUB_STEP_SUMMARY.
 */
export function renderMarkdown(data: SummaryData): string {
  const { status, authenticated, warnings } = data;

  const lines: string[] = [];

  lines.push('## DockerHub Pull Rate Limit');
  lines.push('');
  lines.push(`**Access:** ${authenticated ? 'authenticated' : 'anonymous'}`);
  lines.push('');

  lines.push('| Limit | Remaining | Used |');
  lines.push('|------:|----------:|-----:|');
  lines.push(`| ${status.limit} | ${status.remaining} | ${usedPulls(status)} |`);
  lines.push('');
  lines.push(`*${formatPercentUsed(status)} of the current window used.*`);
  lines.push('');

  if (warnings.length > 0) {
    lines.push('### Warnings');
    lines.push('');
    for (const warning of warnings) {
      lines.push(`- ${warning}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

// -----------------------------------------------------------------------------
// Console rendering
// -----------------------------------------------------------------------------

/**
 * Renders concise console output.
 */
export function renderConsole(data: SummaryData): string {
  const { status, warnings } = data;

  const lines: string[] = [];
  lines.push(
    `DockerHub pulls: ${status.remaining}/${status.limit} remaining (${formatPercentUsed(status)} used)`,
  );

  if (warnings.length > 0) {
    lines.push(`Warnings: ${warnings.length}`);
  }

  return lines.join('\n');
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function usedPulls(status: RateLimitStatus): number {
  return Math.max(0, status.limit - status.remaining);
}

/**
 * Formats used share as a whole percentage. A zero limit reads as 100%.
 */
export function formatPercentUsed(status: RateLimitStatus): string {
  if (status.limit === 0) {
    return '100%';
  }
  return `${Math.round((usedPulls(status) / status.limit) * 100)}%`;
}

// -----------------------------------------------------------------------------
// GitHub Step Summary
// -----------------------------------------------------------------------------

/**
 * Writes markdown to GitHub step summary.
 */
export function writeStepSummary(markdown: string): void {
  const summaryPath = process.env['GITHUB_STEP_SUMMARY'];
  if (summaryPath) {
    fs.appendFileSync(summaryPath, markdown + '\n');
  }
}

// -----------------------------------------------------------------------------
// Warning generation
// -----------------------------------------------------------------------------

/**
 * Generates warnings for a low or exhausted quota.
 */
export function generateWarnings(status: RateLimitStatus, threshold: number): string[] {
  const warnings: string[] = [];

  if (status.remaining === 0) {
    warnings.push('DockerHub pull quota exhausted; pulls will fail until the window resets');
  } else if (status.remaining <= threshold) {
    warnings.push(`Only ${status.remaining} DockerHub pull(s) left in the current window`);
  }

  if (status.remaining > status.limit) {
    warnings.push(
      `Registry reported more remaining pulls (${status.remaining}) than the limit (${status.limit})`,
    );
  }

  return warnings;
}
