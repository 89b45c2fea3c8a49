/**
 * Command Registration
 *
 * - run: reconcile scenes against the download directory
 * - inspect: frame-level integrity of one scene
 * - logs: list or clean run logs
 */

import type { Command } from 'commander';
import { registerRunCommand } from './run.js';
import { registerInspectCommand } from './inspect.js';
import { registerLogsCommand } from './logs.js';

export function registerCommands(program: Command): void {
  registerRunCommand(program);
  registerInspectCommand(program);
  registerLogsCommand(program);
}
