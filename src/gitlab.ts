/**
 * GitLab API Client
 * Layer: infra
 *
 * Provided ports:
 *   - gitlab.createClient
 *   - gitlab.fetchCommits
 *
 * Lists commits on a branch since a timestamp and normalizes every outcome
 * (success, API failure, transport failure) into a CommitResult.
 * The client never rejects for a failed or unreachable remote and never
 * retries; retry policy belongs to the poller.
 */

import type { CommitResult, GitlabConnection, ProjectId, RepositoryTarget } from './types';
import { API_VERSION, STATUS_ERROR, STATUS_OK } from './types';
import { ConfigurationError, ResultShapeError, errorMessage } from './errors';
import { apiErrorResult, resultFromRecord, transportErrorResult } from './result';

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

const USER_AGENT = 'gitlab-change-monitor';
const NON_OK_MESSAGE = 'GitLab response is not successful';

// -----------------------------------------------------------------------------
// Port: gitlab.createClient
// -----------------------------------------------------------------------------

export interface GitlabClient {
  /** Resolved `{host}/api/v4/` base */
  readonly apiUrl: string;
  fetchCommits(
    target: RepositoryTarget,
    since: string | null,
    signal?: AbortSignal,
  ): Promise<CommitResult>;
}

/**
 * Creates a client bound to one connection. The connection is copied;
 * the client holds no other state and is safe to share between
 * concurrent queries.
 *
 * @throws ConfigurationError if the host is not an http(s) URL or the timeout is not positive
 */
export function createGitlabClient(connection: GitlabConnection): GitlabClient {
  const apiUrl = buildApiUrl(connection.host);
  const token = connection.token;
  const timeoutSeconds = connection.timeout_seconds;

  if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0) {
    throw new ConfigurationError(`Connection timeout must be positive, got ${timeoutSeconds}`);
  }
  const timeoutMs = timeoutSeconds * 1000;

  return {
    apiUrl,
    fetchCommits: (target, since, signal) =>
      fetchCommits(buildCommitsUrl(apiUrl, target, since, token), timeoutMs, signal),
  };
}

// -----------------------------------------------------------------------------
// Port: gitlab.fetchCommits
// -----------------------------------------------------------------------------

async function fetchCommits(
  url: string,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<CommitResult> {
  // Set up abort controller with timeout to prevent indefinite hangs
  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  // Session cancellation abandons the in-flight request
  const onAbort = (): void => controller.abort();
  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      method: 'GET',
      headers: {
        Accept: 'application/json',
        'User-Agent': USER_AGENT,
      },
    });
    const text = await response.text();
    return processCommitResponse(response.status, text);
  } catch (err) {
    if (timedOut) {
      return transportErrorResult(
        `Request timeout: GitLab API did not respond within ${timeoutMs}ms`,
      );
    }
    return transportErrorResult(errorMessage(err));
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onAbort);
  }
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

/**
 * Resolves `/api/v4/` against the host, replacing any path the host carries.
 *
 * @throws ConfigurationError for a malformed or non-http(s) host
 */
export function buildApiUrl(host: string): string {
  let url: URL;
  try {
    url = new URL(`/api/${API_VERSION}/`, host);
  } catch {
    throw new ConfigurationError(`Invalid GitLab URL: ${host}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError(`GitLab URL must use http or https: ${host}`);
  }
  return url.toString();
}

/**
 * Builds the "list repository commits" URL for one target.
 * `since` is sent as given; an empty or null value omits the filter.
 */
export function buildCommitsUrl(
  apiUrl: string,
  target: RepositoryTarget,
  since: string | null,
  token: string | null,
): string {
  const url = new URL(`projects/${encodeProjectId(target.project_id)}/repository/commits`, apiUrl);
  url.searchParams.set('ref_name', target.branch);
  if (since) {
    url.searchParams.set('since', since);
  }
  if (token) {
    url.searchParams.set('private_token', token);
  }
  return url.toString();
}

function encodeProjectId(projectId: ProjectId): string {
  return typeof projectId === 'number' ? String(projectId) : encodeURIComponent(projectId);
}

/**
 * Classifies an HTTP response.
 *
 * Any status other than 200 is flattened to STATUS_ERROR: the provider's
 * status is not kept.
 */
export function processCommitResponse(status: number, text: string): CommitResult {
  if (status !== STATUS_OK) {
    return apiErrorResult(STATUS_ERROR, NON_OK_MESSAGE);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return apiErrorResult(status, `result is not valid JSON: ${errorMessage(err)}`);
  }

  try {
    return resultFromRecord({
      outcome: 'success',
      success: true,
      status,
      message: null,
      commits: parsed,
    });
  } catch (err) {
    if (err instanceof ResultShapeError) {
      return apiErrorResult(status, `result is not valid. result: ${JSON.stringify(parsed)}`);
    }
    throw err;
  }
}
