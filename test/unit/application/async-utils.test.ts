/**
 * Async Utilities Tests
 */

import { describe, it, expect, jest } from '@jest/globals';
import { pollUntil } from '../../../src/application/utils/async-utils';
import { FakeClock } from '../../__support__/utilities/fakes';

describe('pollUntil', () => {
  it('should return the first ready value without sleeping', async () => {
    const clock = new FakeClock();

    const result = await pollUntil(async () => 'up', { intervalMs: 1000, maxAttempts: 5, clock });

    expect(result).toEqual({ status: 'ready', value: 'up', attempts: 1 });
    expect(clock.sleeps).toEqual([]);
  });

  it('should sleep only between attempts', async () => {
    const clock = new FakeClock();
    const probe = jest.fn(async (attempt: number) => attempt === 3);

    const result = await pollUntil(probe, { intervalMs: 250, maxAttempts: 5, clock });

    expect(result).toEqual({ status: 'ready', value: true, attempts: 3 });
    expect(probe).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([250, 250]);
  });

  it('should report exhaustion after maxAttempts checks and maxAttempts - 1 pauses', async () => {
    const clock = new FakeClock();

    const result = await pollUntil(async () => undefined, {
      intervalMs: 2000,
      maxAttempts: 4,
      clock,
    });

    expect(result).toEqual({ status: 'exhausted', attempts: 4 });
    expect(clock.sleeps).toEqual([2000, 2000, 2000]);
  });

  it('should treat a throwing probe as not ready and keep the last error', async () => {
    const clock = new FakeClock();
    let calls = 0;

    const result = await pollUntil(
      async () => {
        calls++;
        throw new Error(`failure ${calls}`);
      },
      { intervalMs: 10, maxAttempts: 2, clock },
    );

    expect(result.status).toBe('exhausted');
    if (result.status === 'exhausted') {
      expect(result.lastError?.message).toBe('failure 2');
    }
  });

  it('should call onAttempt after each unsuccessful attempt', async () => {
    const seen: Array<[number, number]> = [];

    await pollUntil(async (attempt) => attempt === 3, {
      intervalMs: 1,
      maxAttempts: 3,
      clock: new FakeClock(),
      onAttempt: (attempt, max) => seen.push([attempt, max]),
    });

    expect(seen).toEqual([
      [1, 3],
      [2, 3],
    ]);
  });
});
