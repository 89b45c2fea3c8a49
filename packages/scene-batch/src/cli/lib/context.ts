/**
 * Shared state of one CLI invocation
 *
 * @module cli/lib/context
 */

import { GRACEFUL_EXIT_CODE } from '../../services/shutdown-controller.js';
import { loadConfig, type CLIConfig } from './config.js';
import { createCLILogger, type CLILogger } from './logger.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Fatal error, forced quit, or an incomplete scene for `inspect` */
  FAILURE: 1,
  CONFIG_ERROR: 3,
  INPUT_NOT_FOUND: 4,
  /** Stopped after a graceful shutdown */
  INTERRUPTED: GRACEFUL_EXIT_CODE,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// Global Context
// ============================================================================

export interface GlobalContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  readonly startTime: number;
}

export interface GlobalOptions {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

/**
 * Load configuration and build the console logger for this invocation
 */
export async function initializeContext(options: GlobalOptions): Promise<GlobalContext> {
  const startTime = Date.now();

  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = { config, logger, startTime };
  return globalContext;
}
