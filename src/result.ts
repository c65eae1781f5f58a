/**
 * Result Model
 * Layer: core
 *
 * Provided ports:
 *   - result.create
 *   - result.fromRecord
 *
 * Immutable outcome of one commit query. A result distinguishes transport
 * success from API-level failure, and carries the commit payload.
 */

import type { CommitRecord, CommitResult, QueryOutcome } from './types';
import { STATUS_ERROR } from './types';
import { ResultShapeError } from './errors';
import { isARealObject, isStringOrNull } from './utils';

const OUTCOMES: readonly QueryOutcome[] = ['success', 'api_error', 'transport_error'];

export interface CommitResultFields {
  outcome: QueryOutcome;
  status: number;
  message: string | null;
  commits: readonly CommitRecord[];
}

// -----------------------------------------------------------------------------
// Port: result.create
// -----------------------------------------------------------------------------

/**
 * Builds a frozen CommitResult. Non-success outcomes never carry commits.
 */
export function createCommitResult(fields: CommitResultFields): CommitResult {
  const success = fields.outcome === 'success';
  return Object.freeze({
    outcome: fields.outcome,
    success,
    status: fields.status,
    message: fields.message,
    commits: Object.freeze(success ? [...fields.commits] : []),
  });
}

export function apiErrorResult(status: number, message: string): CommitResult {
  return createCommitResult({ outcome: 'api_error', status, message, commits: [] });
}

export function transportErrorResult(message: string): CommitResult {
  return createCommitResult({
    outcome: 'transport_error',
    status: STATUS_ERROR,
    message,
    commits: [],
  });
}

// -----------------------------------------------------------------------------
// Port: result.fromRecord
// -----------------------------------------------------------------------------

/**
 * Rehydrates a CommitResult from a transport payload (e.g. parsed JSON).
 * Every field must be present; a missing or mistyped field throws
 * ResultShapeError instead of falling back to a default.
 */
export function resultFromRecord(record: unknown): CommitResult {
  if (!isARealObject(record)) {
    throw new ResultShapeError('<root>', 'Commit result record must be an object');
  }

  for (const field of ['outcome', 'success', 'status', 'message', 'commits']) {
    if (!(field in record)) {
      throw new ResultShapeError(field, `Commit result record is missing field: ${field}`);
    }
  }

  const { outcome, success, status, message, commits } = record;

  if (typeof outcome !== 'string' || !isOutcome(outcome)) {
    throw new ResultShapeError('outcome', `Invalid outcome: ${String(outcome)}`);
  }
  if (typeof success !== 'boolean') {
    throw new ResultShapeError('success', 'Field success must be a boolean');
  }
  if (typeof status !== 'number' || !Number.isInteger(status)) {
    throw new ResultShapeError('status', 'Field status must be an integer');
  }
  if (!isStringOrNull(message)) {
    throw new ResultShapeError('message', 'Field message must be a string or null');
  }
  if (!Array.isArray(commits)) {
    throw new ResultShapeError('commits', 'Field commits must be an array');
  }
  if (success !== (outcome === 'success')) {
    throw new ResultShapeError('success', `Field success contradicts outcome ${outcome}`);
  }

  return createCommitResult({ outcome, status, message, commits });
}

function isOutcome(value: string): value is QueryOutcome {
  return OUTCOMES.some((outcome) => outcome === value);
}

/**
 * True when the result proves new commits on the branch.
 */
export function hasChanges(result: CommitResult): boolean {
  return result.success && result.commits.length > 0;
}
