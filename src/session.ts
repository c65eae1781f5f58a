/**
 * Session Reducer
 * Layer: core
 *
 * Provided ports:
 *   - session.create
 *   - session.beginCycle
 *   - session.foldCycle
 *
 * Pure transitions of the polling session state.
 *
 * Algorithm (per cycle):
 *   runs += 1, status = cycling
 *   query every target (outside this module)
 *   for each target, in configuration order:
 *     if result is success with commits and project not yet in changed_repos:
 *       append project to changed_repos
 *     else if result failed:
 *       query_failures += 1, last_error = message
 *   terminated = changed_repos non-empty OR runs >= check_runs
 */

import type {
  ChangeDetectedEvent,
  CommitResult,
  ProjectId,
  RepositoryTarget,
  SessionParams,
  SessionState,
} from './types';
import { ConfigurationError } from './errors';
import { MAX_TIMER_DELAY_MS } from './types';
import { hasChanges } from './result';

// -----------------------------------------------------------------------------
// Port: session.create
// -----------------------------------------------------------------------------

/**
 * Creates an idle session.
 *
 * @throws ConfigurationError for a budget below 1 or a negative interval
 */
export function createSession(
  params: SessionParams,
  timestamp: string = new Date().toISOString(),
): SessionState {
  validateParams(params);
  return {
    status: 'idle',
    targets: params.targets.map((t) => ({ project_id: t.project_id, branch: t.branch })),
    since: params.since,
    check_runs: params.check_runs,
    check_interval_seconds: params.check_interval_seconds,
    runs: 0,
    changed_repos: [],
    started_at_ts: timestamp,
    last_cycle_ts: null,
    query_failures: 0,
    last_error: null,
  };
}

export function validateParams(params: SessionParams): void {
  if (!Number.isInteger(params.check_runs) || params.check_runs < 1) {
    throw new ConfigurationError(
      `check_runs must be an integer of at least 1, got ${params.check_runs}`,
    );
  }
  if (!Number.isFinite(params.check_interval_seconds) || params.check_interval_seconds < 0) {
    throw new ConfigurationError(
      `check_interval must be a non-negative number of seconds, got ${params.check_interval_seconds}`,
    );
  }
  if (params.check_interval_seconds * 1000 > MAX_TIMER_DELAY_MS) {
    throw new ConfigurationError(
      `check_interval must be at most ${Math.floor(MAX_TIMER_DELAY_MS / 1000)} seconds, ` +
        `got ${params.check_interval_seconds}`,
    );
  }
  for (const target of params.targets) {
    if (!target.branch) {
      throw new ConfigurationError(`Branch is required for project ${target.project_id}`);
    }
  }
}

// -----------------------------------------------------------------------------
// Port: session.beginCycle
// -----------------------------------------------------------------------------

/**
 * Counts a new attempt.
 */
export function beginCycle(state: SessionState): SessionState {
  return {
    ...state,
    status: 'cycling',
    runs: state.runs + 1,
  };
}

// -----------------------------------------------------------------------------
// Port: session.foldCycle
// -----------------------------------------------------------------------------

export interface TargetResult {
  target: RepositoryTarget;
  result: CommitResult;
}

export interface FoldResult {
  /** Updated session state */
  state: SessionState;
  /** Projects first detected in this cycle */
  detected: ProjectId[];
  /** Targets whose query failed in this cycle */
  failures: TargetResult[];
}

/**
 * Merges one cycle's results into the session.
 * Pure function - returns new state without mutating input.
 *
 * @param results - One entry per target, in configuration order
 * @param timestamp - ISO timestamp of the fan-in
 */
export function foldCycle(
  state: SessionState,
  results: readonly TargetResult[],
  timestamp: string,
): FoldResult {
  const changed = [...state.changed_repos];
  const detected: ProjectId[] = [];
  const failures: TargetResult[] = [];

  for (const entry of results) {
    if (!entry.result.success) {
      failures.push(entry);
      continue;
    }
    const projectId = entry.target.project_id;
    if (hasChanges(entry.result) && !changed.includes(projectId)) {
      changed.push(projectId);
      detected.push(projectId);
    }
  }

  const lastFailure = failures[failures.length - 1];
  const next: SessionState = {
    ...state,
    changed_repos: changed,
    last_cycle_ts: timestamp,
    query_failures: state.query_failures + failures.length,
    last_error: lastFailure ? lastFailure.result.message : state.last_error,
  };

  return {
    state: { ...next, status: isTerminal(next) ? 'terminated' : 'cycling' },
    detected,
    failures,
  };
}

// -----------------------------------------------------------------------------
// Terminal decision
// -----------------------------------------------------------------------------

/**
 * True once a change was found or the cycle budget is used up.
 */
export function isTerminal(state: SessionState): boolean {
  return state.changed_repos.length > 0 || state.runs >= state.check_runs;
}

export function toEvent(state: SessionState): ChangeDetectedEvent {
  return { changed_repos: [...state.changed_repos] };
}

/**
 * True when a persisted session was started with the same parameters,
 * so it can be resumed instead of starting over.
 */
export function matchesParams(state: SessionState, params: SessionParams): boolean {
  if (
    state.since !== params.since ||
    state.check_runs !== params.check_runs ||
    state.check_interval_seconds !== params.check_interval_seconds ||
    state.targets.length !== params.targets.length
  ) {
    return false;
  }
  return state.targets.every((target, index) => {
    const other = params.targets[index];
    return (
      other !== undefined &&
      other.project_id === target.project_id &&
      other.branch === target.branch
    );
  });
}
