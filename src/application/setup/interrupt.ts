/**
 * Interrupt cleanup
 *
 * SIGINT/SIGTERM during a setup run stops every tunnel before the process exits.
 * A normal exit leaves tunnels running so the operator can keep using them.
 */

import type { Logger } from 'pino';
import { errorMessage } from '../../errors';
import type { Reporter } from '../../lib/reporter';

export interface SignalSource {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  removeListener(event: NodeJS.Signals, listener: () => void): unknown;
}

export interface InterruptCleanupOptions {
  stopAll: () => Promise<void>;
  reporter: Reporter;
  logger: Logger;
  signals?: SignalSource;
  exit?: (code: number) => void;
}

const SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Install the handlers; the returned function removes them again
 */
export function installInterruptCleanup(options: InterruptCleanupOptions): () => void {
  const { stopAll, reporter, logger, signals = process, exit = (code) => process.exit(code) } =
    options;
  let running = false;

  const dispose = (): void => {
    for (const signal of SIGNALS) signals.removeListener(signal, handler);
  };

  const cleanup = async (): Promise<void> => {
    reporter.warn('Interrupted, cleaning up background processes...');
    try {
      await stopAll();
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Tunnel cleanup failed');
    } finally {
      dispose();
      exit(1);
    }
  };

  // stays attached during cleanup so a repeated signal is swallowed
  function handler(): void {
    if (running) return;
    running = true;
    void cleanup();
  }

  for (const signal of SIGNALS) signals.on(signal, handler);
  return dispose;
}
