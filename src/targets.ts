/**
 * Target Parsing
 * Layer: action
 *
 * Provided ports:
 *   - targets.parse
 *
 * Accepted formats for the `projects` input:
 *
 *   JSON object   {"101": "main", "group/app": "develop"}
 *   Lines         101=main
 *                 group/app=develop
 *
 * Numeric keys become numeric project ids; anything else is kept as a
 * project path. In JSON objects, integer keys are enumerated in ascending
 * order before other keys.
 */

import type { ProjectId, RepositoryTarget } from './types';
import { ConfigurationError, errorMessage } from './errors';
import { isARealObject, parseNonNegativeInt } from './utils';

// -----------------------------------------------------------------------------
// Port: targets.parse
// -----------------------------------------------------------------------------

/**
 * @throws ConfigurationError for malformed input or duplicate projects
 */
export function parseTargets(raw: string): RepositoryTarget[] {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new ConfigurationError('No projects configured. Set the projects input.');
  }

  const pairs = trimmed.startsWith('{') ? parseJsonPairs(trimmed) : parseLinePairs(trimmed);

  const targets: RepositoryTarget[] = [];
  for (const [key, branch] of pairs) {
    const projectId = toProjectId(key);
    if (targets.some((t) => t.project_id === projectId)) {
      throw new ConfigurationError(`Project ${projectId} is configured more than once`);
    }
    targets.push({ project_id: projectId, branch });
  }
  return targets;
}

/**
 * Numeric strings become numbers; other keys are project paths. Digit
 * strings beyond the safe integer range stay strings so no digit is lost.
 */
export function toProjectId(key: string): ProjectId {
  const trimmed = key.trim();
  if (!trimmed) {
    throw new ConfigurationError('Project id must not be empty');
  }
  return parseNonNegativeInt(trimmed) ?? trimmed;
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function parseJsonPairs(text: string): [string, string][] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`projects is not valid JSON: ${errorMessage(err)}`);
  }

  if (!isARealObject(parsed)) {
    throw new ConfigurationError('projects must be a JSON object of project id to branch');
  }

  return Object.entries(parsed).map(([key, value]): [string, string] => {
    if (typeof value !== 'string' || !value.trim()) {
      throw new ConfigurationError(`Branch for project ${key} must be a non-empty string`);
    }
    return [key, value.trim()];
  });
}

function parseLinePairs(text: string): [string, string][] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'))
    .map((line): [string, string] => {
      const separator = line.indexOf('=');
      const key = separator === -1 ? '' : line.slice(0, separator).trim();
      const branch = separator === -1 ? '' : line.slice(separator + 1).trim();
      if (!key || !branch) {
        throw new ConfigurationError(`Invalid projects line "${line}": expected <project>=<branch>`);
      }
      return [key, branch];
    });
}
