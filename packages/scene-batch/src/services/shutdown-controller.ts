/**
 * Two-stage shutdown on interrupt
 *
 * First SIGINT/SIGTERM: stop submitting new scenes and let running ones
 * finish. Second: exit immediately.
 *
 * @module services/shutdown-controller
 */

import { createSilentLogger, type Logger } from '../cli/lib/logger.js';
import type { CancellationToken } from './worker-pool.js';

/**
 * Exit code for a shutdown forced by a second interrupt
 */
export const FORCED_EXIT_CODE = 1;

/**
 * Exit code for a run that stopped after a graceful shutdown
 */
export const GRACEFUL_EXIT_CODE = 130;

export interface ShutdownControllerOptions {
  readonly logger?: Logger;
  /** Called on the second interrupt */
  readonly exit?: (code: number) => void;
}

/**
 * Process that signals can be wired to
 */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export class ShutdownController implements CancellationToken {
  private requested = false;
  private interrupts = 0;
  private readonly logger: Logger;
  private readonly exit: (code: number) => void;

  constructor(options: ShutdownControllerOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
    this.exit = options.exit ?? ((code: number) => process.exit(code));
  }

  get cancelled(): boolean {
    return this.requested;
  }

  /**
   * Signal handler; the only way the shutdown flag is set
   */
  handleSignal(signal: NodeJS.Signals = 'SIGINT'): void {
    this.interrupts++;

    if (this.interrupts === 1) {
      this.requested = true;
      this.logger.warn(`Received ${signal}: finishing running scenes, no new scenes will start`);
      this.logger.warn('Press Ctrl+C again to exit immediately');
      return;
    }

    this.logger.error(`Received ${signal} again: exiting immediately`);
    this.exit(FORCED_EXIT_CODE);
  }

  /**
   * Wire SIGINT and SIGTERM; returns a function that unwires them
   */
  install(target: SignalSource = process): () => void {
    const listener = (signal: NodeJS.Signals): void => this.handleSignal(signal);
    target.on('SIGINT', listener);
    target.on('SIGTERM', listener);
    return () => {
      target.off('SIGINT', listener);
      target.off('SIGTERM', listener);
    };
  }
}
