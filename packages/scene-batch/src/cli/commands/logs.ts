/**
 * Logs Command
 *
 * List run logs, delete the ones older than a given age, or follow one
 * while an unattended run writes it.
 *
 * Usage:
 *   scene-batch logs [--clean <days>] [--limit <n>]
 *   scene-batch logs --tail [file] [--lines <n>]
 */

import { existsSync } from 'node:fs';
import { open, readFile, readdir, rm, stat } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import type { Command } from 'commander';

import { resolvePath, type CLIConfig } from '../lib/config.js';
import { EXIT_CODES, getGlobalContext, type ExitCode } from '../lib/context.js';
import { formatJson, formatTable } from '../lib/output.js';

interface LogsOptions {
  readonly clean?: string;
  readonly limit: string;
  /** true when given without a file name */
  readonly tail?: string | true;
  readonly lines: string;
}

export interface RunLogFile {
  readonly name: string;
  readonly path: string;
  readonly sizeBytes: number;
  readonly modifiedAt: Date;
}

const RUN_LOG_PATTERN = /^scene_batch_\d{8}_\d{6}\.log$/;

export function registerLogsCommand(program: Command): void {
  program
    .command('logs')
    .description('List run logs or remove old ones')
    .option('--clean <days>', 'Delete logs older than this many days')
    .option('-l, --limit <n>', 'Maximum logs to list', '20')
    .option('--tail [file]', 'Follow a run log (the latest when no file is given)')
    .option('-n, --lines <n>', 'Lines to show before following', '10')
    .action(async (options: LogsOptions) => {
      const exitCode = await executeLogs(options);
      if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
    });
}

/**
 * Run logs in a directory, newest first
 */
export async function listRunLogs(logDir: string): Promise<RunLogFile[]> {
  if (!existsSync(logDir)) {
    return [];
  }

  const logs: RunLogFile[] = [];
  for (const name of await readdir(logDir)) {
    if (!RUN_LOG_PATTERN.test(name)) continue;
    const path = join(logDir, name);
    const info = await stat(path);
    logs.push({ name, path, sizeBytes: info.size, modifiedAt: info.mtime });
  }

  return logs.sort((a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime());
}

/**
 * Delete run logs last modified before the cutoff
 */
export async function cleanRunLogs(logDir: string, olderThan: Date): Promise<RunLogFile[]> {
  const stale = (await listRunLogs(logDir)).filter((log) => log.modifiedAt < olderThan);
  await Promise.all(stale.map((log) => rm(log.path, { force: true })));
  return stale;
}

/**
 * Last `count` lines of a file, and the byte offset following would resume from
 */
export async function readLastLines(
  path: string,
  count: number
): Promise<{ lines: string[]; offset: number }> {
  const content = await readFile(path);
  const lines = content.toString('utf-8').split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return { lines: count > 0 ? lines.slice(-count) : [], offset: content.length };
}

/**
 * Text appended since `offset`; a file that shrank is read from the start
 */
export async function readAppended(path: string, offset: number): Promise<{ text: string; offset: number }> {
  const { size } = await stat(path);
  const start = size < offset ? 0 : offset;
  if (size === start) {
    return { text: '', offset: start };
  }

  const handle = await open(path, 'r');
  try {
    const buffer = Buffer.alloc(size - start);
    const { bytesRead } = await handle.read(buffer, 0, buffer.length, start);
    return { text: buffer.subarray(0, bytesRead).toString('utf-8'), offset: start + bytesRead };
  } finally {
    await handle.close();
  }
}

/**
 * Poll a file and hand over whatever is appended until the signal aborts
 */
export async function followLog(
  path: string,
  offset: number,
  write: (text: string) => void,
  signal: AbortSignal,
  intervalMs = 500
): Promise<void> {
  let position = offset;
  while (!signal.aborted) {
    try {
      await sleep(intervalMs, undefined, { signal });
    } catch (error) {
      if (signal.aborted) return;
      throw error;
    }
    const next = await readAppended(path, position);
    if (next.text !== '') {
      write(next.text);
    }
    position = next.offset;
  }
}

async function resolveTailTarget(logDir: string, tail: string | true): Promise<string | null> {
  if (tail === true) {
    const [latest] = await listRunLogs(logDir);
    return latest?.path ?? null;
  }
  const path = isAbsolute(tail) || existsSync(tail) ? tail : join(logDir, tail);
  return existsSync(path) ? path : null;
}

async function tailLog(logDir: string, options: LogsOptions & { readonly tail: string | true }): Promise<ExitCode> {
  const path = await resolveTailTarget(logDir, options.tail);
  if (path === null) {
    console.error(options.tail === true ? `No run logs in ${logDir}` : `Log file not found: ${options.tail}`);
    return EXIT_CODES.INPUT_NOT_FOUND;
  }

  const lines = parseInt(options.lines, 10);
  const { lines: recent, offset } = await readLastLines(path, isNaN(lines) ? 10 : lines);
  console.log(`==> ${path} <==`);
  for (const line of recent) {
    console.log(line);
  }

  const controller = new AbortController();
  const stop = (): void => controller.abort();
  process.once('SIGINT', stop);
  try {
    await followLog(path, offset, (text) => process.stdout.write(text), controller.signal);
  } finally {
    process.off('SIGINT', stop);
  }
  return EXIT_CODES.SUCCESS;
}

async function executeLogs(
  options: LogsOptions,
  config: CLIConfig = getGlobalContext().config
): Promise<ExitCode> {
  const logDir = resolvePath(config, 'logDir');

  if (options.tail !== undefined) {
    return tailLog(logDir, { ...options, tail: options.tail });
  }

  if (options.clean !== undefined) {
    const days = parseInt(options.clean, 10);
    if (isNaN(days) || days < 0) {
      console.error(`Invalid --clean value: ${options.clean}`);
      return EXIT_CODES.FAILURE;
    }
    const removed = await cleanRunLogs(logDir, new Date(Date.now() - days * 86_400_000));
    console.log(
      config.json
        ? formatJson({ removed: removed.map((l) => l.name) })
        : `Removed ${removed.length} log files older than ${days} days`
    );
    return EXIT_CODES.SUCCESS;
  }

  const limit = parseInt(options.limit, 10);
  const logs = (await listRunLogs(logDir)).slice(0, isNaN(limit) ? undefined : limit);

  if (config.json) {
    console.log(formatJson(logs));
    return EXIT_CODES.SUCCESS;
  }

  console.log(
    formatTable(logs, [
      { header: 'Log', value: (l) => l.name },
      { header: 'Size (KB)', value: (l) => (l.sizeBytes / 1024).toFixed(1), align: 'right' },
      { header: 'Modified', value: (l) => l.modifiedAt.toISOString() },
    ])
  );
  return EXIT_CODES.SUCCESS;
}
