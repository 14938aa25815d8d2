import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { RetryExhaustedError, RetryPolicy, type SleepFn } from '../../src/utils/retry.js';

function recordingSleep(): { sleep: SleepFn; waits: number[] } {
  const waits: number[] = [];
  return {
    waits,
    sleep: async ms => {
      waits.push(ms);
    }
  };
}

describe('RetryPolicy.delayFor', () => {
  it('doubles from the base delay and caps at the maximum', () => {
    const policy = new RetryPolicy({ baseDelayMs: 100, maxDelayMs: 1000, jitter: 0.5 }, undefined, () => 0);
    assert.deepEqual([1, 2, 3, 4, 5].map(attempt => policy.delayFor(attempt)), [100, 200, 400, 800, 1000]);
  });

  it('takes off at most the jitter share', () => {
    const policy = new RetryPolicy({ baseDelayMs: 100, maxDelayMs: 1000, jitter: 0.5 }, undefined, () => 1);
    assert.equal(policy.delayFor(1), 50);
    assert.equal(policy.delayFor(3), 200);
  });

  it('clamps out-of-range settings', () => {
    const policy = new RetryPolicy({ maxAttempts: 0, jitter: 5, baseDelayMs: 300, maxDelayMs: 10 });
    assert.equal(policy.maxAttempts, 1);
    assert.equal(policy.jitter, 1);
    assert.equal(policy.maxDelayMs, 300);
  });
});

describe('RetryPolicy.run', () => {
  it('returns the first successful result', async () => {
    const { sleep, waits } = recordingSleep();
    const policy = new RetryPolicy({ maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 1000 }, sleep, () => 0);
    const attempts: number[] = [];

    const result = await policy.run(async attempt => {
      attempts.push(attempt);
      if (attempt < 3) throw new Error(`failure ${attempt}`);
      return 'done';
    });

    assert.equal(result, 'done');
    assert.deepEqual(attempts, [1, 2, 3]);
    assert.deepEqual(waits, [100, 200]);
  });

  it('gives up after maxAttempts with the last error', async () => {
    const { sleep, waits } = recordingSleep();
    const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000 }, sleep, () => 0);

    await assert.rejects(
      policy.run(async attempt => {
        throw new Error(`boom ${attempt}`);
      }),
      (error: unknown) => {
        assert.ok(error instanceof RetryExhaustedError);
        assert.equal(error.attempts, 3);
        assert.ok(error.lastError instanceof Error);
        assert.equal(error.lastError.message, 'boom 3');
        return true;
      }
    );
    assert.deepEqual(waits, [100, 200]);
  });

  it('stops at once when shouldRetry declines', async () => {
    const { sleep, waits } = recordingSleep();
    const policy = new RetryPolicy({ maxAttempts: 5 }, sleep, () => 0);
    const permanent = new Error('permanent');
    let calls = 0;

    await assert.rejects(
      policy.run(
        async () => {
          calls++;
          throw permanent;
        },
        { shouldRetry: () => false }
      ),
      permanent
    );
    assert.equal(calls, 1);
    assert.deepEqual(waits, []);
  });

  it('reports each retry', async () => {
    const { sleep } = recordingSleep();
    const policy = new RetryPolicy({ maxAttempts: 2, baseDelayMs: 10, maxDelayMs: 10 }, sleep, () => 0);
    const retries: Array<[number, number]> = [];

    await policy.run(
      async attempt => {
        if (attempt === 1) throw new Error('transient');
        return attempt;
      },
      { onRetry: (_error, attempt, delayMs) => retries.push([attempt, delayMs]) }
    );
    assert.deepEqual(retries, [[1, 10]]);
  });

  it('does not start when the signal is already aborted', async () => {
    const policy = new RetryPolicy({}, recordingSleep().sleep);
    const controller = new AbortController();
    controller.abort();
    let calls = 0;

    await assert.rejects(
      policy.run(
        async () => {
          calls++;
          return 1;
        },
        { signal: controller.signal }
      ),
      { name: 'AbortError' }
    );
    assert.equal(calls, 0);
  });

  it('does not retry once the signal aborts mid-attempt', async () => {
    const { sleep, waits } = recordingSleep();
    const policy = new RetryPolicy({ maxAttempts: 5 }, sleep, () => 0);
    const controller = new AbortController();
    const failure = new Error('interrupted');

    await assert.rejects(
      policy.run(
        async () => {
          controller.abort();
          throw failure;
        },
        { signal: controller.signal }
      ),
      failure
    );
    assert.deepEqual(waits, []);
  });
});
