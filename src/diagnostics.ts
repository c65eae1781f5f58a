/**
 * Diagnostics Artifact
 * Layer: infra
 *
 * Provided ports:
 *   - diagnostics.upload
 *
 * Uploads the session file and the cycle log as a workflow artifact.
 */

import { DefaultArtifactClient } from '@actions/artifact';
import * as fs from 'fs';
import { getStateDir, sessionFilePath } from './paths';
import { errorMessage } from './errors';

const ARTIFACT_PREFIX = 'gitlab-change-monitor';

export interface ArtifactPayload {
  /** Written as session.json only when no session file exists */
  stateJson: string;
  cycleLogJson: string;
}

export type UploadOutcome =
  | { success: true; name: string; files: string[] }
  | { success: false; name: string; error: string };

/**
 * Artifact name: the explicit input if set, else one per job.
 */
export function getArtifactName(custom: string, jobId: string | undefined): string {
  if (custom) return custom;
  return `${ARTIFACT_PREFIX}-${jobId ?? 'job'}`;
}

export async function uploadDiagnosticsArtifact(
  artifactName: string,
  payload: ArtifactPayload,
): Promise<UploadOutcome> {
  try {
    const stateDir = getStateDir();
    fs.mkdirSync(stateDir, { recursive: true });

    const statePath = sessionFilePath('session');
    if (!fs.existsSync(statePath)) {
      fs.writeFileSync(statePath, payload.stateJson, 'utf-8');
    }

    const cycleLogJsonPath = sessionFilePath('cycleLogJson');
    fs.writeFileSync(cycleLogJsonPath, payload.cycleLogJson, 'utf-8');

    const files = [statePath, cycleLogJsonPath];
    const client = new DefaultArtifactClient();
    await client.uploadArtifact(artifactName, files, stateDir);

    return { success: true, name: artifactName, files };
  } catch (err) {
    return { success: false, name: artifactName, error: errorMessage(err) };
  }
}
