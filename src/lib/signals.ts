import type { EventEmitter } from 'events';
import { INTERRUPTED_EXIT_CODE } from './errors';
import logger from './logger';

const log = logger.child('signals');

const SIGNALS = ['SIGINT', 'SIGTERM'] as const;

export type InterruptOptions = {
  target?: EventEmitter;
  forceExit?: (code: number) => void;
};

/**
 * Routes SIGINT/SIGTERM into `abort` so the run can stop at a stage boundary
 * and roll back. A second signal exits at once. Returns the uninstaller.
 */
export function abortOnSignals(abort: AbortController, options: InterruptOptions = {}): () => void {
  const target = options.target ?? process;
  const forceExit = options.forceExit ?? ((code: number) => process.exit(code));

  const handler = (signal: string) => {
    if (abort.signal.aborted) {
      log.warn(`Received ${signal} again; exiting without cleanup.`);
      forceExit(INTERRUPTED_EXIT_CODE);
      return;
    }
    log.warn(`Received ${signal}; stopping after the current step and rolling back.`);
    abort.abort();
  };

  for (const signal of SIGNALS) target.on(signal, handler);
  return () => {
    for (const signal of SIGNALS) target.off(signal, handler);
  };
}
