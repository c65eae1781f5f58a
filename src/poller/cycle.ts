/**
 * Single Cycle Orchestration
 *
 * Performs one cycle: count the attempt, query every target concurrently,
 * fold the results, persist the session and optionally append diagnostics.
 */

import type { CommitResult, CycleLogEntry, Logger, SessionState } from '../types';
import type { GitlabClient } from '../gitlab';
import type { FoldResult, TargetResult } from '../session';
import { beginCycle, foldCycle } from '../session';
import type { WriteStateOutcome } from '../state';
import type { AppendOutcome } from '../cycle-log';
import { buildCycleLogEntry } from '../cycle-log';
import { SessionCancelledError } from '../errors';

export interface CycleDeps {
  client: GitlabClient;
  log: Logger;
  /** ISO timestamp source */
  now: () => string;
  persist: (state: SessionState) => WriteStateOutcome;
  /** Diagnostics sink; null when diagnostics are disabled */
  appendLog: ((entry: CycleLogEntry) => AppendOutcome) | null;
}

export interface CycleOutcome extends FoldResult {
  results: TargetResult[];
}

/**
 * Runs one fan-out/fan-in round.
 *
 * Results are collected per query and folded only after every query has
 * returned, in configuration order, so completion order never affects
 * the ChangeSet. If `signal` aborts during the fan-out the cycle is
 * discarded: nothing is folded or persisted.
 *
 * @throws SessionCancelledError when the signal aborts
 */
export async function runCycle(
  state: SessionState,
  deps: CycleDeps,
  signal?: AbortSignal,
): Promise<CycleOutcome> {
  const started = beginCycle(state);
  const { log, client } = deps;

  log.info(
    `Cycle ${started.runs}/${started.check_runs}: checking ${started.targets.length} target(s) ` +
      `since ${started.since ?? 'the beginning of history'}`,
  );

  const results: TargetResult[] = await Promise.all(
    started.targets.map(async (target) => {
      log.debug(`Checking branch ${target.branch} of project ${target.project_id}`);
      const result: CommitResult = await client.fetchCommits(target, started.since, signal);
      return { target, result };
    }),
  );

  if (signal?.aborted) {
    throw new SessionCancelledError();
  }

  const timestamp = deps.now();
  const fold = foldCycle(started, results, timestamp);

  for (const { target, result } of fold.failures) {
    const detail = result.message ? ` ${result.message}` : '';
    log.warning(
      `Project ${target.project_id} (${target.branch}): ${result.outcome} [${result.status}]${detail}`,
    );
  }
  for (const projectId of fold.detected) {
    log.info(`Changes detected for project ${projectId}`);
  }
  log.info(`Changed repositories: ${fold.state.changed_repos.length}`);

  const writeResult = deps.persist(fold.state);
  if (!writeResult.success) {
    log.warning(writeResult.error);
  }

  if (deps.appendLog) {
    const appendResult = deps.appendLog(buildCycleLogEntry(fold.state, results, timestamp));
    if (!appendResult.success) {
      log.warning(appendResult.error);
    }
  }

  return { ...fold, results };
}
