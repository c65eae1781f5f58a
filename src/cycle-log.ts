/**
 * Cycle Log
 * Layer: infra
 *
 * Provided ports:
 *   - cycleLog.append
 *   - cycleLog.reset
 *   - cycleLog.read
 *
 * Append-only JSONL diagnostic log of per-cycle outcomes.
 * Each line is a self-contained JSON object (CycleLogEntry).
 * Uploaded by the post step when diagnostics are enabled.
 */

import * as fs from 'fs';
import type { CycleLogEntry, CycleLogTargetSnapshot, SessionState } from './types';
import type { TargetResult } from './session';
import { getStateDir, sessionFilePath } from './paths';
import { errorMessage } from './errors';

// -----------------------------------------------------------------------------
// Entry building
// -----------------------------------------------------------------------------

/**
 * Builds a cycle log entry from the folded state and the raw results.
 * Pure function.
 */
export function buildCycleLogEntry(
  state: SessionState,
  results: readonly TargetResult[],
  timestamp: string,
): CycleLogEntry {
  const targets: Record<string, CycleLogTargetSnapshot> = {};
  for (const { target, result } of results) {
    targets[String(target.project_id)] = {
      branch: target.branch,
      outcome: result.outcome,
      status: result.status,
      commit_count: result.commits.length,
      message: result.message,
    };
  }
  return {
    timestamp,
    cycle_number: state.runs,
    targets,
    changed_repos: [...state.changed_repos],
    terminated: state.status === 'terminated',
  };
}

// -----------------------------------------------------------------------------
// Port: cycleLog.append
// -----------------------------------------------------------------------------

export type AppendOutcome = { success: true } | { success: false; error: string };

/**
 * Appends a single entry as a JSON line. Creates the file if it does not exist.
 * Failures are reported, not thrown: diagnostics never stop the poller.
 */
export function appendCycleLogEntry(entry: CycleLogEntry): AppendOutcome {
  try {
    fs.mkdirSync(getStateDir(), { recursive: true });
    fs.appendFileSync(sessionFilePath('cycleLog'), JSON.stringify(entry) + '\n', 'utf-8');
    return { success: true };
  } catch (err) {
    return { success: false, error: `Failed to append cycle log: ${errorMessage(err)}` };
  }
}

// -----------------------------------------------------------------------------
// Port: cycleLog.reset
// -----------------------------------------------------------------------------

/**
 * Empties the log so a new session does not inherit an earlier one's
 * entries. A missing file is not an error.
 */
export function resetCycleLog(): AppendOutcome {
  try {
    fs.rmSync(sessionFilePath('cycleLog'), { force: true });
    return { success: true };
  } catch (err) {
    return { success: false, error: `Failed to reset cycle log: ${errorMessage(err)}` };
  }
}

// -----------------------------------------------------------------------------
// Port: cycleLog.read
// -----------------------------------------------------------------------------

/**
 * Reads all entries from the JSONL file.
 * Returns an empty array if the file does not exist; skips corrupt lines.
 */
export function readCycleLog(): CycleLogEntry[] {
  let content: string;
  try {
    content = fs.readFileSync(sessionFilePath('cycleLog'), 'utf-8');
  } catch {
    return [];
  }

  const entries: CycleLogEntry[] = [];
  for (const line of content.split('\n')) {
    if (!line) continue;
    try {
      entries.push(JSON.parse(line) as CycleLogEntry);
    } catch {
      continue; // Partial line from an interrupted write
    }
  }
  return entries;
}
