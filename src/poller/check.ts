/**
 * One-shot Check
 *
 * Queries every target once, one after another, without sleeping or
 * persisting anything. Used by the `check` action mode.
 */

import type { Logger, ProjectId, RepositoryTarget } from '../types';
import type { GitlabClient } from '../gitlab';
import type { TargetResult } from '../session';
import { hasChanges } from '../result';

export interface CheckResult {
  /** Changed projects in configuration order, without duplicates */
  changed_repos: ProjectId[];
  results: TargetResult[];
}

export async function checkOnce(
  targets: readonly RepositoryTarget[],
  since: string | null,
  client: GitlabClient,
  log: Logger,
  signal?: AbortSignal,
): Promise<CheckResult> {
  log.info(`Checking ${targets.length} target(s) since ${since ?? 'the beginning of history'}`);

  const changed: ProjectId[] = [];
  const results: TargetResult[] = [];

  for (const target of targets) {
    const result = await client.fetchCommits(target, since, signal);
    results.push({ target, result });

    if (hasChanges(result)) {
      if (!changed.includes(target.project_id)) {
        changed.push(target.project_id);
      }
    } else if (!result.success) {
      log.warning(
        `Project ${target.project_id} (${target.branch}): ${result.outcome} [${result.status}]` +
          (result.message ? ` ${result.message}` : ''),
      );
    }
  }

  return { changed_repos: changed, results };
}
