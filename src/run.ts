/**
 * Run handler
 * Layer: action
 *
 * Reads the configuration and dispatches await/check modes.
 * Every failure ends in core.setFailed; cancellation only warns.
 *
 * Required ports:
 *   - config.read
 *   - gitlab.createClient
 *   - poller.startSession
 *   - poller.checkOnce
 *   - output.publish
 */

import * as core from '@actions/core';
import type { Config } from './types';
import { MAX_LIFETIME_MS } from './types';
import { readConfig } from './config';
import type { GitlabClient } from './gitlab';
import { createGitlabClient } from './gitlab';
import {
  actionsLogger,
  checkOnce,
  createSessionCancellation,
  createSessionDeps,
  startSession,
} from './poller';
import { SessionCancelledError, errorMessage } from './errors';
import {
  generateWarnings,
  publishChanges,
  render,
  sessionDurationSeconds,
  writeStepSummary,
} from './output';

// -----------------------------------------------------------------------------
// Action entry point
// -----------------------------------------------------------------------------

export async function run(): Promise<void> {
  try {
    const config = readConfig();

    // Mask token to prevent accidental exposure
    if (config.connection.token) {
      core.setSecret(config.connection.token);
    }

    const client = createGitlabClient(config.connection);
    core.info(`GitLab client initialized for ${client.apiUrl}`);

    if (config.session.since === null) {
      core.warning('No since timestamp set: every branch with history will count as changed.');
    }

    switch (config.mode) {
      case 'await':
        await handleAwait(config, client);
        break;
      case 'check':
        await handleCheck(config, client);
        break;
    }
  } catch (error) {
    if (error instanceof SessionCancelledError) {
      core.warning(
        `${error.message}. No result was published; ` +
          'a later step of this job that runs the action again resumes the session.',
      );
      return;
    }
    core.setFailed(errorMessage(error));
  }
}

// -----------------------------------------------------------------------------
// Await mode
// -----------------------------------------------------------------------------

async function handleAwait(config: Config, client: GitlabClient): Promise<void> {
  const cancellation = createSessionCancellation(MAX_LIFETIME_MS);

  try {
    const deps = createSessionDeps(client, {
      diagnostics: config.diagnostics,
      signal: cancellation.signal,
    });
    const { event, state } = await startSession(config.session, deps);

    publishChanges({
      changed_repos: event.changed_repos,
      cycles: state.runs,
      outputKey: config.output_key,
    });

    const { markdown, console: consoleText } = render({
      state,
      duration_seconds: sessionDurationSeconds(state, Date.now()),
      warnings: generateWarnings(state),
    });
    core.info(consoleText);
    writeStepSummary(markdown);
  } finally {
    cancellation.dispose();
  }
}

// -----------------------------------------------------------------------------
// Check mode
// -----------------------------------------------------------------------------

async function handleCheck(config: Config, client: GitlabClient): Promise<void> {
  const { changed_repos } = await checkOnce(
    config.session.targets,
    config.session.since,
    client,
    actionsLogger,
  );

  publishChanges({ changed_repos, cycles: 1, outputKey: config.output_key });
  core.info(
    changed_repos.length > 0
      ? `Changed repositories: ${changed_repos.join(', ')}`
      : 'No changed repositories',
  );
}
