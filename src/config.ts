/**
 * Action Configuration
 * Layer: action
 *
 * Provided ports:
 *   - config.read
 *
 * Reads action inputs (with environment fallbacks for the connection)
 * and validates them before anything touches the network.
 */

import * as core from '@actions/core';
import type { ActionMode, Config } from './types';
import {
  DEFAULT_CHECK_INTERVAL_SECONDS,
  DEFAULT_CHECK_RUNS,
  DEFAULT_CONNECTION_TIMEOUT_SECONDS,
  DEFAULT_OUTPUT_KEY,
} from './types';
import { ConfigurationError } from './errors';
import { resolveConnection } from './connection';
import { parseTargets } from './targets';
import { validateParams } from './session';
import { parseBooleanFlag, parseNonNegativeInt } from './utils';

// -----------------------------------------------------------------------------
// Port: config.read
// -----------------------------------------------------------------------------

/**
 * @throws ConfigurationError for missing or invalid inputs
 */
export function readConfig(): Config {
  const mode = parseMode(core.getInput('mode'));

  const connection = resolveConnection({
    host: core.getInput('gitlab_url') || process.env['GITLAB_URL'],
    token: core.getInput('token') || process.env['GITLAB_TOKEN'],
    timeout_seconds: readNumberInput('connection_timeout', DEFAULT_CONNECTION_TIMEOUT_SECONDS),
  });
  if (connection.timeout_seconds === 0) {
    throw new ConfigurationError('connection_timeout must be at least 1 second');
  }

  const session = {
    targets: parseTargets(core.getInput('projects', { required: true })),
    since: core.getInput('since') || null,
    check_runs: readNumberInput('check_runs', DEFAULT_CHECK_RUNS),
    check_interval_seconds: readNumberInput('check_interval', DEFAULT_CHECK_INTERVAL_SECONDS),
  };
  validateParams(session);

  return {
    mode,
    connection,
    session,
    output_key: core.getInput('output_key') || DEFAULT_OUTPUT_KEY,
    diagnostics: parseBooleanFlag(core.getInput('diagnostics')),
  };
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function parseMode(raw: string): ActionMode {
  const mode = raw.trim().toLowerCase() || 'await';
  if (mode === 'await' || mode === 'check') {
    return mode;
  }
  throw new ConfigurationError(`Invalid mode: ${raw}. Must be 'await' or 'check'.`);
}

function readNumberInput(name: string, fallback: number): number {
  const raw = core.getInput(name);
  if (!raw) return fallback;
  const parsed = parseNonNegativeInt(raw);
  if (parsed === null) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got '${raw}'`);
  }
  return parsed;
}
