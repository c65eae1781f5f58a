/**
 * Boundary types for gitlab-change-monitor
 *
 * These types define the contracts between modules.
 * Everything reachable from SessionState must stay JSON-serializable:
 * the session is persisted between cycles and resumed from disk.
 */

// -----------------------------------------------------------------------------
// RepositoryTarget
// One (project, branch) pair under observation
// -----------------------------------------------------------------------------

/** Numeric GitLab project id, or a `namespace/project` path */
export type ProjectId = number | string;

export interface RepositoryTarget {
  /** Project to query */
  project_id: ProjectId;
  /** Branch passed as `ref_name` */
  branch: string;
}

// -----------------------------------------------------------------------------
// CommitResult
// Normalized outcome of a single "list commits" query
// -----------------------------------------------------------------------------

export type QueryOutcome = 'success' | 'api_error' | 'transport_error';

/** Commit payloads are opaque: only their count matters */
export type CommitRecord = unknown;

export interface CommitResult {
  readonly outcome: QueryOutcome;
  /** True only when outcome is 'success' */
  readonly success: boolean;
  /** HTTP status, or STATUS_ERROR for flattened failures */
  readonly status: number;
  /** Error description (null on success) */
  readonly message: string | null;
  readonly commits: readonly CommitRecord[];
}

// -----------------------------------------------------------------------------
// SessionState
// Persisted poller state (one polling session)
// -----------------------------------------------------------------------------

export type SessionStatus = 'idle' | 'cycling' | 'terminated';

export interface SessionState {
  status: SessionStatus;
  /** Targets in configuration order */
  targets: RepositoryTarget[];
  /** ISO-8601 lower bound, passed to the API verbatim (null = full history) */
  since: string | null;
  /** Cycle budget */
  check_runs: number;
  /** Seconds to wait between cycles */
  check_interval_seconds: number;
  /** Cycles completed so far */
  runs: number;
  /** Accumulated ChangeSet, in detection order */
  changed_repos: ProjectId[];
  /** ISO timestamp when the session was created */
  started_at_ts: string;
  /** ISO timestamp of the last completed cycle */
  last_cycle_ts: string | null;
  /** Total failed queries across all cycles */
  query_failures: number;
  /** Last query error message (null if no errors) */
  last_error: string | null;
}

/** Parameters that identify a session */
export interface SessionParams {
  targets: RepositoryTarget[];
  since: string | null;
  check_runs: number;
  check_interval_seconds: number;
}

/** Terminal event: the ChangeSet is its only payload */
export interface ChangeDetectedEvent {
  changed_repos: ProjectId[];
}

// -----------------------------------------------------------------------------
// Connection
// -----------------------------------------------------------------------------

export interface GitlabConnection {
  /** Base URL of the GitLab server */
  host: string;
  /** Personal access token (null = anonymous) */
  token: string | null;
  /** Per-request timeout in seconds */
  timeout_seconds: number;
}

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export type ActionMode = 'await' | 'check';

export interface Config {
  mode: ActionMode;
  connection: GitlabConnection;
  session: SessionParams;
  /** Name of the output carrying the ChangeSet */
  output_key: string;
  diagnostics: boolean;
}

// -----------------------------------------------------------------------------
// Logging
// -----------------------------------------------------------------------------

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warning: (message: string) => void;
}

// -----------------------------------------------------------------------------
// CycleLogEntry
// Diagnostic per-cycle snapshot for the JSONL cycle log
// -----------------------------------------------------------------------------

export interface CycleLogTargetSnapshot {
  branch: string;
  outcome: QueryOutcome;
  status: number;
  commit_count: number;
  message: string | null;
}

export interface CycleLogEntry {
  /** ISO timestamp of the fan-in */
  timestamp: string;
  /** Sequential cycle number (1-based) */
  cycle_number: number;
  /** Per-target snapshot keyed by project id */
  targets: Record<string, CycleLogTargetSnapshot>;
  /** ChangeSet after this cycle */
  changed_repos: ProjectId[];
  terminated: boolean;
}

// -----------------------------------------------------------------------------
// Summary
// -----------------------------------------------------------------------------

export interface SummaryData {
  state: SessionState;
  duration_seconds: number;
  warnings: string[];
}

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

/** The only status GitLab documents for a successful commit listing */
export const STATUS_OK = 200;
/** Sentinel status for transport failures and non-OK responses */
export const STATUS_ERROR = 600;

export const API_VERSION = 'v4';

export const DEFAULT_CHECK_RUNS = 10;
export const DEFAULT_CHECK_INTERVAL_SECONDS = 60;
export const DEFAULT_CONNECTION_TIMEOUT_SECONDS = 10;
export const DEFAULT_OUTPUT_KEY = 'changed_repos';

export const STATE_DIR_NAME = 'gitlab-change-monitor';
export const STATE_FILE_NAME = 'session.json';
export const CYCLE_LOG_FILE_NAME = 'cycle-log.jsonl';

/** Longest delay setTimeout honours; larger values fire after 1ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/** Maximum session lifetime as defense-in-depth (6 hours in milliseconds) */
export const MAX_LIFETIME_MS = 6 * 60 * 60 * 1000;
