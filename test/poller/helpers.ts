/**
 * Shared test helpers for poller test modules.
 */

import { vi } from 'vitest';
import type {
  CommitResult,
  Logger,
  ProjectId,
  RepositoryTarget,
  SessionState,
} from '../../src/types';
import type { GitlabClient } from '../../src/gitlab';
import type { SessionDeps } from '../../src/poller';
import type { WriteStateOutcome } from '../../src/state';
import type { AppendOutcome } from '../../src/cycle-log';
import { createCommitResult } from '../../src/result';

export const SINCE = '2024-01-01T00:00:00Z';
export const FIXED_NOW = '2024-01-02T00:00:00.000Z';

export function makeState(overrides: Partial<SessionState> = {}): SessionState {
  return {
    status: 'idle',
    targets: [{ project_id: 101, branch: 'main' }],
    since: SINCE,
    check_runs: 3,
    check_interval_seconds: 60,
    runs: 0,
    changed_repos: [],
    started_at_ts: '2024-01-01T12:00:00.000Z',
    last_cycle_ts: null,
    query_failures: 0,
    last_error: null,
    ...overrides,
  };
}

export function makeCommits(count: number): { id: string }[] {
  return Array.from({ length: count }, (_, i) => ({ id: `commit-${i + 1}` }));
}

export function successResult(commits: readonly unknown[]): CommitResult {
  return createCommitResult({ outcome: 'success', status: 200, message: null, commits });
}

export const noCommits = (): CommitResult => successResult([]);

// -----------------------------------------------------------------------------
// Fake GitLab client
// -----------------------------------------------------------------------------

export interface FakeClient extends GitlabClient {
  calls: { target: RepositoryTarget; since: string | null; signal?: AbortSignal }[];
}

/**
 * `respond` receives the target and how many times that project has been
 * queried so far (1-based), which equals the cycle number in a session.
 */
export function createFakeClient(
  respond: (target: RepositoryTarget, attempt: number) => CommitResult | Promise<CommitResult>,
): FakeClient {
  const calls: FakeClient['calls'] = [];
  const attempts = new Map<ProjectId, number>();
  return {
    apiUrl: 'https://gitlab.example.com/api/v4/',
    calls,
    fetchCommits: async (target, since, signal) => {
      calls.push({ target, since, signal });
      const attempt = (attempts.get(target.project_id) ?? 0) + 1;
      attempts.set(target.project_id, attempt);
      return respond(target, attempt);
    },
  };
}

// -----------------------------------------------------------------------------
// Mock logger
// -----------------------------------------------------------------------------

export interface MockLogMessage {
  level: 'debug' | 'info' | 'warning';
  message: string;
}

export interface MockLoggerResult {
  logger: Logger;
  messages: MockLogMessage[];
}

export function createMockLogger(): MockLoggerResult {
  const messages: MockLogMessage[] = [];
  const logger: Logger = {
    debug: vi.fn((message: string) => {
      messages.push({ level: 'debug', message });
    }),
    info: vi.fn((message: string) => {
      messages.push({ level: 'info', message });
    }),
    warning: vi.fn((message: string) => {
      messages.push({ level: 'warning', message });
    }),
  };
  return { logger, messages };
}

// -----------------------------------------------------------------------------
// Session deps
// -----------------------------------------------------------------------------

export interface TestDeps extends SessionDeps {
  /** Every state handed to persist, in order */
  persisted: SessionState[];
  messages: MockLogMessage[];
}

export function makeDeps(client: GitlabClient, overrides: Partial<SessionDeps> = {}): TestDeps {
  const persisted: SessionState[] = [];
  const { logger, messages } = createMockLogger();
  return {
    client,
    log: logger,
    now: () => FIXED_NOW,
    persist: vi.fn((state: SessionState): WriteStateOutcome => {
      persisted.push(state);
      return { success: true };
    }),
    appendLog: null,
    sleep: vi.fn(async (_ms: number, _signal?: AbortSignal): Promise<void> => {}),
    load: () => ({ success: false, error: 'State file not found', notFound: true }),
    resetLog: vi.fn((): AppendOutcome => ({ success: true })),
    ...overrides,
    persisted,
    messages,
  };
}
