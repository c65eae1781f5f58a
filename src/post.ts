/**
 * Post Entry
 * Layer: action
 *
 * GitHub Action post entry point for reporting and diagnostics.
 * Runs automatically after the job (via action.yml post-if: always()).
 *
 * Required ports:
 *   - state.read
 *   - cycleLog.read
 *   - diagnostics.upload
 */

import * as core from '@actions/core';
import { readState } from './state';
import { readCycleLog } from './cycle-log';
import { sessionFilePath } from './paths';
import { getArtifactName, uploadDiagnosticsArtifact } from './diagnostics';
import { errorMessage } from './errors';
import { parseBooleanFlag } from './utils';

async function run(): Promise<void> {
  try {
    await handlePost();
  } catch (error) {
    core.setFailed(errorMessage(error));
  }
}

async function handlePost(): Promise<void> {
  const diagnosticsEnabled = parseBooleanFlag(core.getInput('diagnostics'));

  core.info(`State path: ${sessionFilePath('session')}`);

  const stateResult = readState();
  if (stateResult.success) {
    const { state } = stateResult;
    if (state.status !== 'terminated') {
      core.warning(
        `Session did not finish (${state.runs}/${state.check_runs} cycles). ` +
          'A later step of this job that runs the action again resumes it.',
      );
    }
    core.debug(
      `Session: status=${state.status}, runs=${state.runs}, ` +
        `changed=${JSON.stringify(state.changed_repos)}, failures=${state.query_failures}`,
    );
  } else if (stateResult.notFound) {
    core.info('No session file found (check mode, or the session never started).');
  } else {
    core.warning(stateResult.error);
  }

  if (!diagnosticsEnabled) {
    core.info('Diagnostics disabled; skipping artifact upload.');
    return;
  }

  core.info(`Cycle log path: ${sessionFilePath('cycleLog')}`);
  const stateJson = JSON.stringify(stateResult.success ? stateResult.state : {});
  const cycleLogJson = JSON.stringify(readCycleLog());
  const artifactName = getArtifactName(core.getInput('artifact_name'), process.env['GITHUB_JOB']);

  const uploadResult = await uploadDiagnosticsArtifact(artifactName, { stateJson, cycleLogJson });
  if (uploadResult.success) {
    core.info(
      `Diagnostics artifact uploaded: ${uploadResult.name} (${uploadResult.files.length} files)`,
    );
  } else {
    core.warning(`Diagnostics artifact upload failed: ${uploadResult.error}`);
  }
}

void run();
