/**
 * State Manager
 * Layer: core
 *
 * Provided ports:
 *   - state.read
 *   - state.write
 *
 * Persists the polling session in $RUNNER_TEMP so an interrupted session
 * can be resumed by a later step of the same job. Uses atomic rename for
 * safe writes.
 */

import * as fs from 'fs';
import type { RepositoryTarget, SessionState, SessionStatus } from './types';
import { getStateDir, sessionFilePath } from './paths';
import { errorMessage } from './errors';
import { isARealObject, isProjectId, isStringOrNull } from './utils';

// -----------------------------------------------------------------------------
// Port: state.read
// -----------------------------------------------------------------------------

export interface ReadStateResult {
  success: true;
  state: SessionState;
}

export interface ReadStateError {
  success: false;
  error: string;
  /** True if file doesn't exist (expected for a fresh session) */
  notFound: boolean;
}

export type ReadStateOutcome = ReadStateResult | ReadStateError;

/**
 * Reads the persisted session from disk.
 *
 * @returns State or error with details
 */
export function readState(): ReadStateOutcome {
  try {
    const content = fs.readFileSync(sessionFilePath('session'), 'utf-8');
    const parsed = JSON.parse(content) as unknown;

    if (!isValidState(parsed)) {
      return {
        success: false,
        error: 'Invalid state structure',
        notFound: false,
      };
    }

    return { success: true, state: parsed };
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return {
        success: false,
        error: 'State file not found',
        notFound: true,
      };
    }
    return {
      success: false,
      error: `Failed to read state: ${errorMessage(err)}`,
      notFound: false,
    };
  }
}

// -----------------------------------------------------------------------------
// Port: state.write
// -----------------------------------------------------------------------------

export interface WriteStateResult {
  success: true;
}

export interface WriteStateError {
  success: false;
  error: string;
}

export type WriteStateOutcome = WriteStateResult | WriteStateError;

/**
 * Writes the session to disk atomically.
 * Creates state directory if it doesn't exist.
 * Cleans up temp file on failure to prevent orphaned files.
 */
export function writeState(state: SessionState): WriteStateOutcome {
  try {
    const tmpPath = sessionFilePath('sessionTmp');
    fs.mkdirSync(getStateDir(), { recursive: true });

    try {
      fs.writeFileSync(tmpPath, JSON.stringify(state, null, 2), 'utf-8');
      fs.renameSync(tmpPath, sessionFilePath('session'));
    } catch (err) {
      fs.rmSync(tmpPath, { force: true });
      throw err;
    }

    return { success: true };
  } catch (err) {
    return {
      success: false,
      error: `Failed to write state: ${errorMessage(err)}`,
    };
  }
}

// -----------------------------------------------------------------------------
// Validation
// -----------------------------------------------------------------------------

const STATUSES: readonly SessionStatus[] = ['idle', 'cycling', 'terminated'];

/**
 * Validates that parsed JSON has the SessionState shape.
 * All fields are required: a resumed session must be complete.
 */
export function isValidState(value: unknown): value is SessionState {
  if (!isARealObject(value)) {
    return false;
  }

  const status = value['status'];
  if (typeof status !== 'string' || !STATUSES.some((s) => s === status)) {
    return false;
  }

  const targets = value['targets'];
  if (!Array.isArray(targets) || !targets.every(isValidTarget)) {
    return false;
  }

  const changed = value['changed_repos'];
  if (!Array.isArray(changed) || !changed.every(isProjectId)) {
    return false;
  }

  const counters = ['check_runs', 'check_interval_seconds', 'runs', 'query_failures'];
  if (!counters.every((field) => typeof value[field] === 'number')) {
    return false;
  }

  if (typeof value['started_at_ts'] !== 'string') {
    return false;
  }

  return (
    isStringOrNull(value['since']) &&
    isStringOrNull(value['last_cycle_ts']) &&
    isStringOrNull(value['last_error'])
  );
}

function isValidTarget(value: unknown): value is RepositoryTarget {
  return isARealObject(value) && isProjectId(value['project_id']) && typeof value['branch'] === 'string';
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
