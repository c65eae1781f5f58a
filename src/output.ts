/**
 * Output Renderer
 * Layer: infra
 *
 * Provided ports:
 *   - output.render
 *   - output.messages
 *   - output.publish
 *
 * Generates the step summary and console report, and hands the ChangeSet
 * to downstream steps through action outputs.
 */

import * as core from '@actions/core';
import * as fs from 'fs';
import type { ProjectId, SessionState, SummaryData } from './types';

// -----------------------------------------------------------------------------
// Port: output.messages
// -----------------------------------------------------------------------------

export interface ChangeMessage {
  /** JSON-encoded project id */
  key: string;
  /** JSON payload `{"changed_repo_id": <id>}` */
  value: string;
}

/**
 * Builds one message per changed project, keyed by that project.
 */
export function buildChangeMessages(changedRepos: readonly ProjectId[]): ChangeMessage[] {
  return changedRepos.map((projectId) => ({
    key: JSON.stringify(projectId),
    value: JSON.stringify({ changed_repo_id: projectId }),
  }));
}

// -----------------------------------------------------------------------------
// Port: output.publish
// -----------------------------------------------------------------------------

export interface ChangeOutputs {
  changed_repos: readonly ProjectId[];
  /** Cycles run (1 for a one-shot check) */
  cycles: number;
  /** Output name carrying the ChangeSet */
  outputKey: string;
}

/**
 * Sets the action outputs consumed by downstream steps.
 */
export function publishChanges(outputs: ChangeOutputs): void {
  core.setOutput(outputs.outputKey, JSON.stringify(outputs.changed_repos));
  core.setOutput('changed', outputs.changed_repos.length > 0 ? 'true' : 'false');
  core.setOutput('cycles', String(outputs.cycles));
  core.setOutput('messages', JSON.stringify(buildChangeMessages(outputs.changed_repos)));
}

// -----------------------------------------------------------------------------
// Port: output.render
// -----------------------------------------------------------------------------

export interface RenderResult {
  /** Markdown for step summary */
  markdown: string;
  /** Plain text for console */
  console: string;
}

export function render(data: SummaryData): RenderResult {
  return { markdown: renderMarkdown(data), console: renderConsole(data) };
}

/**
 * Renders full markdown summary for $GITHUB_STEP_SUMMARY.
 */
export function renderMarkdown(data: SummaryData): string {
  const { state, duration_seconds, warnings } = data;
  const lines: string[] = [];

  lines.push('## GitLab Change Monitor: Session Summary');
  lines.push('');
  lines.push(
    `**Duration:** ${formatDuration(duration_seconds)} | ` +
      `**Cycles:** ${state.runs}/${state.check_runs} | ` +
      `**Failed queries:** ${state.query_failures}`,
  );
  lines.push('');

  if (state.targets.length > 0) {
    lines.push('| Project | Branch | Changed |');
    lines.push('|---------|--------|:-------:|');
    for (const target of state.targets) {
      const changed = state.changed_repos.includes(target.project_id) ? 'yes' : 'no';
      lines.push(`| ${target.project_id} | ${target.branch} | ${changed} |`);
    }
    lines.push('');
  } else {
    lines.push('*No projects were configured.*');
    lines.push('');
  }

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

/**
 * Renders concise console output.
 */
export function renderConsole(data: SummaryData): string {
  const { state, duration_seconds, warnings } = data;
  const lines: string[] = [];

  const changed = state.changed_repos.length;
  lines.push(
    `GitLab changes: ${changed} of ${state.targets.length} project(s) changed ` +
      `in ${formatDuration(duration_seconds)} (${state.runs} cycle(s))`,
  );
  if (changed > 0) {
    lines.push(`Changed: ${state.changed_repos.join(', ')}`);
  }
  if (warnings.length > 0) {
    lines.push(`Warnings: ${warnings.length}`);
  }

  return lines.join('\n');
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

/**
 * Formats duration in human-readable form.
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const secs = seconds % 60;
  if (minutes < 60) {
    return secs > 0 ? `${minutes}m ${secs}s` : `${minutes}m`;
  }
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return mins > 0 ? `${hours}h ${mins}m` : `${hours}h`;
}

/**
 * Seconds between session start and its last cycle (or `nowMs`).
 */
export function sessionDurationSeconds(state: SessionState, nowMs: number): number {
  const start = new Date(state.started_at_ts).getTime();
  const end = state.last_cycle_ts ? new Date(state.last_cycle_ts).getTime() : nowMs;
  return Math.max(0, Math.floor((end - start) / 1000));
}

// -----------------------------------------------------------------------------
// GitHub Step Summary
// -----------------------------------------------------------------------------

/**
 * Appends markdown to the GitHub step summary, when the runner provides one.
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
 * Generates warnings based on state analysis.
 */
export function generateWarnings(state: SessionState): string[] {
  const warnings: string[] = [];

  if (state.since === null) {
    warnings.push('No since timestamp was set; full branch history counts as new commits');
  }
  if (state.query_failures > 0) {
    warnings.push(`${state.query_failures} query(ies) failed during the session`);
  }
  if (state.changed_repos.length === 0 && state.runs >= state.check_runs) {
    warnings.push(`No changes observed within ${state.check_runs} cycle(s)`);
  }
  if (state.last_error) {
    warnings.push(`Last error: ${state.last_error}`);
  }

  return warnings;
}
