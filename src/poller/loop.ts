/**
 * Session Loop
 *
 * Drives cycles until the session terminates: a change was detected or the
 * cycle budget is used up. Waits between cycles with an abortable sleep, so
 * the event loop stays free and the host can cancel at any suspension point.
 * Collaborators come in through SessionDeps so tests can replace them.
 */

import * as core from '@actions/core';
import type { ChangeDetectedEvent, Logger, SessionParams, SessionState } from '../types';
import type { GitlabClient } from '../gitlab';
import { createSession, matchesParams, toEvent } from '../session';
import type { ReadStateOutcome } from '../state';
import { readState, writeState } from '../state';
import type { AppendOutcome } from '../cycle-log';
import { appendCycleLogEntry, resetCycleLog } from '../cycle-log';
import { SessionCancelledError } from '../errors';
import { sleep as sleepImpl } from '../utils';
import type { CycleDeps } from './cycle';
import { runCycle } from './cycle';

/**
 * Terminal event plus the final state it was derived from.
 */
export interface SessionOutcome {
  event: ChangeDetectedEvent;
  state: SessionState;
}

/**
 * Dependency injection interface for the session loop.
 * Production defaults come from createSessionDeps.
 */
export interface SessionDeps extends CycleDeps {
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  load: () => ReadStateOutcome;
  /** Clears diagnostics left by an earlier session */
  resetLog: () => AppendOutcome;
  signal?: AbortSignal;
}

export const actionsLogger: Logger = {
  debug: (message) => core.debug(message),
  info: (message) => core.info(message),
  warning: (message) => core.warning(message),
};

export interface SessionDepsOptions {
  diagnostics: boolean;
  signal?: AbortSignal;
  log?: Logger;
}

export function createSessionDeps(client: GitlabClient, options: SessionDepsOptions): SessionDeps {
  return {
    client,
    log: options.log ?? actionsLogger,
    now: () => new Date().toISOString(),
    persist: writeState,
    appendLog: options.diagnostics ? appendCycleLogEntry : null,
    sleep: sleepImpl,
    load: readState,
    resetLog: resetCycleLog,
    signal: options.signal,
  };
}

// -----------------------------------------------------------------------------
// Host boundary
// -----------------------------------------------------------------------------

/**
 * Starts a session, or resumes the persisted one when it was started with
 * the same parameters and has not terminated yet.
 *
 * @throws ConfigurationError for invalid parameters (before any query)
 * @throws SessionCancelledError when deps.signal aborts
 */
export async function startSession(
  params: SessionParams,
  deps: SessionDeps,
): Promise<SessionOutcome> {
  const stored = deps.load();

  let state: SessionState;
  if (stored.success && stored.state.status !== 'terminated' && matchesParams(stored.state, params)) {
    state = stored.state;
    deps.log.info(
      `Resuming session started at ${state.started_at_ts} after ${state.runs} cycle(s)`,
    );
  } else {
    state = createSession(params, deps.now());
    const writeResult = deps.persist(state);
    if (!writeResult.success) {
      deps.log.warning(writeResult.error);
    }
    const resetResult = deps.resetLog();
    if (!resetResult.success) {
      deps.log.warning(resetResult.error);
    }
    deps.log.info(
      `Tracking ${state.targets.length} target(s), up to ${state.check_runs} cycle(s) ` +
        `every ${state.check_interval_seconds}s`,
    );
  }

  return runSession(state, deps);
}

// -----------------------------------------------------------------------------
// Session loop
// -----------------------------------------------------------------------------

/**
 * Runs cycles until the session terminates and returns the terminal event.
 * A session that is already terminated returns its event without querying.
 * Cycles run strictly one after another.
 *
 * Cancellation (deps.signal) abandons in-flight queries, skips the rest of
 * the session and rejects; a partial ChangeSet is never emitted.
 */
export async function runSession(
  initial: SessionState,
  deps: SessionDeps,
): Promise<SessionOutcome> {
  let state = initial;

  while (state.status !== 'terminated') {
    if (deps.signal?.aborted) {
      throw new SessionCancelledError();
    }

    const outcome = await runCycle(state, deps, deps.signal);
    state = outcome.state;

    if (state.status === 'terminated') {
      break;
    }

    await deps.sleep(state.check_interval_seconds * 1000, deps.signal);
  }

  if (state.changed_repos.length > 0) {
    deps.log.info(`Session finished after ${state.runs} cycle(s): changes detected`);
  } else {
    deps.log.info(`Session finished after ${state.runs} cycle(s): no changes within budget`);
  }

  return { event: toEvent(state), state };
}

// -----------------------------------------------------------------------------
// Cancellation
// -----------------------------------------------------------------------------

export interface CancellationHooks {
  registerSignal: (event: NodeJS.Signals, handler: () => void) => void;
  unregisterSignal: (event: NodeJS.Signals, handler: () => void) => void;
}

const defaultHooks: CancellationHooks = {
  registerSignal: (event, handler) => {
    process.on(event, handler);
  },
  unregisterSignal: (event, handler) => {
    process.off(event, handler);
  },
};

export interface SessionCancellation {
  signal: AbortSignal;
  /** Removes signal handlers and the lifetime timer */
  dispose: () => void;
}

/**
 * Aborts the session on SIGTERM/SIGINT or when the maximum lifetime
 * elapses.
 */
export function createSessionCancellation(
  maxLifetimeMs: number,
  hooks: CancellationHooks = defaultHooks,
): SessionCancellation {
  const controller = new AbortController();
  const abort = (): void => controller.abort();

  hooks.registerSignal('SIGTERM', abort);
  hooks.registerSignal('SIGINT', abort);
  const lifetimeTimer = setTimeout(abort, maxLifetimeMs);
  lifetimeTimer.unref();

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(lifetimeTimer);
      hooks.unregisterSignal('SIGTERM', abort);
      hooks.unregisterSignal('SIGINT', abort);
    },
  };
}
