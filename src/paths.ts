/**
 * Session files, all under `$RUNNER_TEMP/gitlab-change-monitor/`.
 * The runner empties $RUNNER_TEMP around every job, so these files only
 * outlive a step, never the job.
 */

import * as path from 'path';
import { CYCLE_LOG_FILE_NAME, STATE_DIR_NAME, STATE_FILE_NAME } from './types';

const SESSION_FILES = {
  session: STATE_FILE_NAME,
  sessionTmp: `${STATE_FILE_NAME}.tmp`,
  cycleLog: CYCLE_LOG_FILE_NAME,
  /** Cycle log re-encoded as one JSON array for the artifact */
  cycleLogJson: 'cycle-log.json',
} as const;

export type SessionFile = keyof typeof SESSION_FILES;

/**
 * @throws Error if RUNNER_TEMP is not set
 */
export function getStateDir(): string {
  const runnerTemp = process.env['RUNNER_TEMP'];
  if (!runnerTemp) {
    throw new Error('RUNNER_TEMP environment variable is not set');
  }
  return path.join(runnerTemp, STATE_DIR_NAME);
}

export function sessionFilePath(file: SessionFile): string {
  return path.join(getStateDir(), SESSION_FILES[file]);
}
