/**
 * State Manager Tests
 *
 * Tests for session persistence, including temp file cleanup on failure.
 *
 * Exit criteria:
 *   - A written session reads back unchanged
 *   - writeState never leaves a temp file behind
 *   - Corrupt or partial files are rejected, not resumed
 */

import { describe, it, expect, beforeEach, afterEach, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { isValidState, readState, writeState } from '../src/state';
import { sessionFilePath } from '../src/paths';
import { makeState } from './poller/helpers';

// -----------------------------------------------------------------------------
// Filesystem tests
//
// These use real temporary directories as RUNNER_TEMP.
// -----------------------------------------------------------------------------

describe('state persistence', () => {
  let testDir: string;
  let originalRunnerTemp: string | undefined;

  beforeAll(() => {
    originalRunnerTemp = process.env['RUNNER_TEMP'];
  });

  afterAll(() => {
    if (originalRunnerTemp !== undefined) {
      process.env['RUNNER_TEMP'] = originalRunnerTemp;
    } else {
      delete process.env['RUNNER_TEMP'];
    }
  });

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'state-test-'));
    process.env['RUNNER_TEMP'] = testDir;
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe('readState', () => {
    it('returns notFound when file does not exist', () => {
      expect(readState()).toEqual({
        success: false,
        error: 'State file not found',
        notFound: true,
      });
    });

    it('reads back what writeState stored', () => {
      const state = makeState({
        status: 'cycling',
        runs: 2,
        changed_repos: ['group/app'],
        targets: [
          { project_id: 101, branch: 'main' },
          { project_id: 'group/app', branch: 'develop' },
        ],
        last_cycle_ts: '2024-01-02T00:00:00.000Z',
        query_failures: 1,
        last_error: 'fetch failed',
      });

      expect(writeState(state)).toEqual({ success: true });
      expect(readState()).toEqual({ success: true, state });
    });

    it('returns error for invalid JSON', () => {
      fs.mkdirSync(path.dirname(sessionFilePath('session')), { recursive: true });
      fs.writeFileSync(sessionFilePath('session'), '{"status": ');

      const result = readState();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.notFound).toBe(false);
        expect(result.error.startsWith('Failed to read state: ')).toBe(true);
      }
    });

    it('returns error for invalid state structure', () => {
      fs.mkdirSync(path.dirname(sessionFilePath('session')), { recursive: true });
      fs.writeFileSync(sessionFilePath('session'), JSON.stringify({ status: 'idle' }));

      expect(readState()).toEqual({
        success: false,
        error: 'Invalid state structure',
        notFound: false,
      });
    });

    it('reports a missing RUNNER_TEMP as a read failure', () => {
      delete process.env['RUNNER_TEMP'];

      expect(readState()).toEqual({
        success: false,
        error: 'Failed to read state: RUNNER_TEMP environment variable is not set',
        notFound: false,
      });
    });
  });

  describe('writeState', () => {
    it('creates the state directory', () => {
      expect(writeState(makeState()).success).toBe(true);
      expect(fs.existsSync(sessionFilePath('session'))).toBe(true);
    });

    it('leaves no temp file after a successful write', () => {
      writeState(makeState());

      expect(fs.existsSync(sessionFilePath('sessionTmp'))).toBe(false);
    });

    it('overwrites the previous session', () => {
      writeState(makeState({ runs: 1 }));
      writeState(makeState({ runs: 2 }));

      const result = readState();
      expect(result.success && result.state.runs).toBe(2);
    });

    it('returns an error when the state directory cannot be created', () => {
      const blocker = path.join(testDir, 'not-a-dir');
      fs.writeFileSync(blocker, '');
      process.env['RUNNER_TEMP'] = blocker;

      const result = writeState(makeState());

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.startsWith('Failed to write state: ')).toBe(true);
      }
    });

    it('cleans up the temp file when the rename fails', () => {
      // A directory at the target path makes renameSync fail after the temp write
      fs.mkdirSync(sessionFilePath('session'), { recursive: true });

      const result = writeState(makeState());

      expect(result.success).toBe(false);
      expect(fs.existsSync(sessionFilePath('sessionTmp'))).toBe(false);
    });
  });
});

// -----------------------------------------------------------------------------
// isValidState
// -----------------------------------------------------------------------------

describe('isValidState', () => {
  it('returns true for a complete session', () => {
    expect(isValidState(makeState())).toBe(true);
  });

  it('returns false for null and non-objects', () => {
    expect(isValidState(null)).toBe(false);
    expect(isValidState('session')).toBe(false);
    expect(isValidState([])).toBe(false);
  });

  it('rejects an unknown status', () => {
    expect(isValidState({ ...makeState(), status: 'running' })).toBe(false);
  });

  it.each(['check_runs', 'check_interval_seconds', 'runs', 'query_failures', 'started_at_ts'])(
    'rejects a session without %s',
    (field) => {
      const record: Record<string, unknown> = { ...makeState() };
      delete record[field];

      expect(isValidState(record)).toBe(false);
    },
  );

  it('rejects malformed targets', () => {
    expect(isValidState({ ...makeState(), targets: [{ project_id: 101 }] })).toBe(false);
    expect(isValidState({ ...makeState(), targets: [{ project_id: 1.5, branch: 'main' }] })).toBe(
      false,
    );
  });

  it('rejects malformed changed_repos', () => {
    expect(isValidState({ ...makeState(), changed_repos: [null] })).toBe(false);
    expect(isValidState({ ...makeState(), changed_repos: '101' })).toBe(false);
  });

  it('accepts null for since, last_cycle_ts and last_error', () => {
    expect(
      isValidState(makeState({ since: null, last_cycle_ts: null, last_error: null })),
    ).toBe(true);
  });

  it('rejects non-string optional fields', () => {
    expect(isValidState({ ...makeState(), since: 0 })).toBe(false);
    expect(isValidState({ ...makeState(), last_error: {} })).toBe(false);
    expect(isValidState({ ...makeState(), last_cycle_ts: undefined })).toBe(false);
  });
});
