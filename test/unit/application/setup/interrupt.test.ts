/**
 * Interrupt Cleanup Tests
 */

import { describe, it, expect, jest } from '@jest/globals';
import { EventEmitter } from 'node:events';
import { installInterruptCleanup } from '../../../../src/application/setup/interrupt';
import { createSilentLogger } from '../../../../src/lib/logger';
import { RecordingReporter } from '../../../__support__/utilities/fakes';

function setup(stopAll: () => Promise<void>) {
  const signals = new EventEmitter();
  const reporter = new RecordingReporter();
  let exit: (code: number) => void = () => {};
  const exited = new Promise<number>((resolve) => {
    exit = resolve;
  });
  const dispose = installInterruptCleanup({
    stopAll,
    reporter,
    logger: createSilentLogger(),
    signals,
    exit: (code) => exit(code),
  });
  return { signals, reporter, exited, dispose };
}

describe('installInterruptCleanup', () => {
  it('should stop every tunnel and exit 1 on SIGINT', async () => {
    const stopAll = jest.fn(async () => {});
    const { signals, reporter, exited } = setup(stopAll);

    signals.emit('SIGINT');

    await expect(exited).resolves.toBe(1);
    expect(stopAll).toHaveBeenCalledTimes(1);
    expect(reporter.messages('warn')).toEqual([
      'Interrupted, cleaning up background processes...',
    ]);
  });

  it('should still exit when cleanup fails', async () => {
    const { signals, exited } = setup(async () => {
      throw new Error('pkill missing');
    });

    signals.emit('SIGTERM');

    await expect(exited).resolves.toBe(1);
  });

  it('should run cleanup once for repeated signals', async () => {
    const stopAll = jest.fn(async () => {});
    const { signals, exited } = setup(stopAll);

    signals.emit('SIGINT');
    signals.emit('SIGTERM');
    await exited;

    expect(stopAll).toHaveBeenCalledTimes(1);
  });

  it('should keep swallowing signals until cleanup has finished', async () => {
    let release: () => void = () => {};
    const stopAll = jest.fn(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
    );
    const { signals, exited } = setup(stopAll);

    signals.emit('SIGINT');
    expect(signals.listenerCount('SIGINT')).toBe(1);
    signals.emit('SIGINT');
    expect(stopAll).toHaveBeenCalledTimes(1);

    release();
    await exited;
    expect(signals.listenerCount('SIGINT')).toBe(0);
    expect(signals.listenerCount('SIGTERM')).toBe(0);
  });

  it('should remove its handlers when disposed', () => {
    const { signals, dispose } = setup(async () => {});

    expect(signals.listenerCount('SIGINT')).toBe(1);
    dispose();

    expect(signals.listenerCount('SIGINT')).toBe(0);
    expect(signals.listenerCount('SIGTERM')).toBe(0);
  });
});
