import type { HostLifecycle, ShutdownListener } from '@/types/lifecycle';
import { createLogger } from '@/utils/logger';

const log = createLogger('lifecycle');

export interface ProcessLifecycle extends HostLifecycle {
  /** Run every shutdown listener once. Later calls return the first run's promise. */
  shutdown(reason: string): Promise<void>;
  /** Stop listening to process signals. */
  detach(): void;
}

/** The part of `process` the lifecycle listens on. */
export interface SignalTarget {
  once(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  exit(code: number): void;
}

/**
 * Host lifecycle driven by process signals.
 */
export function createProcessLifecycle(
  signals: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'],
  target: SignalTarget = process
): ProcessLifecycle {
  const listeners: ShutdownListener[] = [];
  let running: Promise<void> | null = null;

  const shutdown = (reason: string): Promise<void> => {
    if (!running) {
      log.info(`Shutting down (${reason})`);
      running = runListeners(listeners);
    }
    return running;
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).then(
      () => target.exit(0),
      (error: unknown) => {
        log.error('Shutdown failed:', error);
        target.exit(1);
      }
    );
  };

  for (const signal of signals) {
    target.once(signal, onSignal);
  }

  return {
    onShutdown(listener) {
      listeners.push(listener);
    },
    shutdown,
    detach() {
      for (const signal of signals) {
        target.off(signal, onSignal);
      }
    },
  };
}

async function runListeners(listeners: readonly ShutdownListener[]): Promise<void> {
  const failures: unknown[] = [];
  // In registration order
  for (const listener of listeners) {
    try {
      await listener();
    } catch (error) {
      failures.push(error);
    }
  }
  if (failures.length > 0) {
    throw new AggregateError(failures, `${failures.length} shutdown listener(s) failed`);
  }
}
