/**
 * Result Model Tests
 *
 * Exit criteria:
 *   - Results are immutable and never carry commits on failure
 *   - Rehydration from a record is strict and idempotent
 */

import { describe, it, expect } from 'vitest';
import {
  apiErrorResult,
  createCommitResult,
  hasChanges,
  resultFromRecord,
  transportErrorResult,
} from '../src/result';
import { ResultShapeError } from '../src/errors';
import { successResult } from './poller/helpers';

import twoCommits from './fixtures/commits_two.json';

function shapeErrorField(fn: () => unknown): string | null {
  try {
    fn();
  } catch (err) {
    return err instanceof ResultShapeError ? err.field : null;
  }
  return null;
}

// -----------------------------------------------------------------------------
// createCommitResult
// -----------------------------------------------------------------------------

describe('createCommitResult', () => {
  it('derives success from the outcome', () => {
    const result = createCommitResult({
      outcome: 'success',
      status: 200,
      message: null,
      commits: twoCommits,
    });

    expect(result.success).toBe(true);
    expect(result.commits).toHaveLength(2);
  });

  it('freezes the result and its commits', () => {
    const result = successResult(twoCommits);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.commits)).toBe(true);
  });

  it('copies the commit list', () => {
    const commits: unknown[] = [{ id: 'a' }];
    const result = successResult(commits);
    commits.push({ id: 'b' });

    expect(result.commits).toHaveLength(1);
  });

  it('drops commits from non-success outcomes', () => {
    const result = createCommitResult({
      outcome: 'api_error',
      status: 200,
      message: 'broken',
      commits: [{ id: 'a' }],
    });

    expect(result.success).toBe(false);
    expect(result.commits).toEqual([]);
  });
});

describe('result constructors', () => {
  it('apiErrorResult keeps the given status and message', () => {
    expect(apiErrorResult(600, 'GitLab response is not successful')).toEqual({
      outcome: 'api_error',
      success: false,
      status: 600,
      message: 'GitLab response is not successful',
      commits: [],
    });
  });

  it('transportErrorResult uses status 600', () => {
    expect(transportErrorResult('fetch failed')).toEqual({
      outcome: 'transport_error',
      success: false,
      status: 600,
      message: 'fetch failed',
      commits: [],
    });
  });
});

// -----------------------------------------------------------------------------
// resultFromRecord
// -----------------------------------------------------------------------------

describe('resultFromRecord', () => {
  it('rebuilds an equal result from its JSON form', () => {
    const original = successResult(twoCommits);
    const record: unknown = JSON.parse(JSON.stringify(original));

    expect(resultFromRecord(record)).toEqual(original);
  });

  it('is idempotent', () => {
    const once = resultFromRecord(JSON.parse(JSON.stringify(apiErrorResult(600, 'x'))));
    const twice = resultFromRecord(JSON.parse(JSON.stringify(once)));

    expect(twice).toEqual(once);
  });

  it('rejects a non-object record', () => {
    expect(() => resultFromRecord(null)).toThrow(ResultShapeError);
    expect(shapeErrorField(() => resultFromRecord([]))).toBe('<root>');
  });

  it.each(['outcome', 'success', 'status', 'message', 'commits'])(
    'names the missing field %s',
    (field) => {
      const record: Record<string, unknown> = {
        outcome: 'success',
        success: true,
        status: 200,
        message: null,
        commits: [],
      };
      delete record[field];

      expect(shapeErrorField(() => resultFromRecord(record))).toBe(field);
    },
  );

  it('reports the missing field message', () => {
    expect(() => resultFromRecord({ outcome: 'success', success: true, status: 200, message: null })).toThrow(
      'Commit result record is missing field: commits',
    );
  });

  it('treats an explicit null message as present', () => {
    const result = resultFromRecord({
      outcome: 'success',
      success: true,
      status: 200,
      message: null,
      commits: [],
    });

    expect(result.message).toBeNull();
  });

  it('rejects an unknown outcome', () => {
    expect(
      shapeErrorField(() =>
        resultFromRecord({ outcome: 'maybe', success: false, status: 600, message: null, commits: [] }),
      ),
    ).toBe('outcome');
  });

  it('rejects a non-integer status', () => {
    expect(
      shapeErrorField(() =>
        resultFromRecord({ outcome: 'success', success: true, status: '200', message: null, commits: [] }),
      ),
    ).toBe('status');
  });

  it('rejects commits that are not an array', () => {
    expect(
      shapeErrorField(() =>
        resultFromRecord({ outcome: 'success', success: true, status: 200, message: null, commits: {} }),
      ),
    ).toBe('commits');
  });

  it('rejects success that contradicts the outcome', () => {
    expect(
      shapeErrorField(() =>
        resultFromRecord({ outcome: 'api_error', success: true, status: 600, message: 'x', commits: [] }),
      ),
    ).toBe('success');
  });
});

// -----------------------------------------------------------------------------
// hasChanges
// -----------------------------------------------------------------------------

describe('hasChanges', () => {
  it('is true only for a successful result with commits', () => {
    expect(hasChanges(successResult(twoCommits))).toBe(true);
    expect(hasChanges(successResult([]))).toBe(false);
    expect(hasChanges(apiErrorResult(200, 'result is not valid. result: {}'))).toBe(false);
    expect(hasChanges(transportErrorResult('fetch failed'))).toBe(false);
  });
});
