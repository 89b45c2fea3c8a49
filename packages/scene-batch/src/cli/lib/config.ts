/**
 * Scene Batch CLI Configuration Management
 *
 * Loads configuration from .scene-batchrc (YAML) with environment variable
 * overrides and defaults. Provides the typed configuration every command
 * reads.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (SCENE_BATCH_*)
 * 3. Config file (.scene-batchrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { DEFAULT_ASSETS, DEFAULT_THRESHOLDS, type SceneThresholds } from '../../core/assets.js';
import { ConfigError } from '../../core/errors.js';
import { errorMessage } from '../../core/types.js';
import { DEFAULT_SCENE_LIST } from '../../catalog/scene-catalog.js';
import { DEFAULT_DOWNLOAD_COMMAND, type DownloadCommandConfig } from '../../services/download-runner.js';
import {
  DEFAULT_FAILURE_LIST_LIMIT,
  DEFAULT_LOG_INTERVAL_MS,
  DEFAULT_UPDATE_INTERVAL_MS,
} from '../../services/progress-tracker.js';
import { DEFAULT_MAX_CONCURRENT_ASSET_DOWNLOADS } from '../../services/task-executor.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Paths configuration
 */
export interface PathsConfig {
  /** Root of the local dataset copy */
  readonly downloadDir: string;
  /** Scene list CSV (video_id, fold) */
  readonly sceneList: string;
  /** Directory for run logs */
  readonly logDir: string;
}

/**
 * Default run settings
 */
export interface DefaultsConfig {
  /** Keep every Nth frame */
  readonly subsample: number;
  /** Tasks in flight; all cores when null */
  readonly workers: number | null;
  readonly assets: readonly string[];
}

export interface DownloaderConfig extends DownloadCommandConfig {
  /** Concurrent asset downloads within one scene */
  readonly maxConcurrentAssets: number;
}

export interface ProgressConfig {
  readonly updateIntervalMs: number;
  readonly logIntervalMs: number;
  readonly failureListLimit: number;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  readonly version: number;
  readonly paths: PathsConfig;
  readonly defaults: DefaultsConfig;
  readonly downloader: DownloaderConfig;
  readonly thresholds: SceneThresholds;
  readonly progress: ProgressConfig;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

// ============================================================================
// Config File Schema
// ============================================================================

const number = () =>
  z.number({ invalid_type_error: 'must be a number' }).finite('must be a number').nullish();

const string = () => z.string({ invalid_type_error: 'must be a string' }).nullish();

const stringList = () =>
  z
    .array(z.string({ invalid_type_error: 'must be a list of strings' }), {
      invalid_type_error: 'must be a list of strings',
    })
    .nullish();

const section = <T extends z.ZodRawShape>(shape: T) =>
  z.object(shape, { invalid_type_error: 'must be a mapping' }).nullish();

/**
 * Config file structure
 *
 * Every key is optional; a null value falls back like an absent one,
 * except `defaults.workers`, where null means every core.
 */
export const ConfigFileSchema = z.object(
  {
    version: number(),
    paths: section({
      downloadDir: string(),
      sceneList: string(),
      logDir: string(),
    }),
    defaults: section({
      subsample: number(),
      workers: number(),
      assets: stringList(),
    }),
    downloader: section({
      command: string(),
      args: stringList(),
      timeoutMs: number(),
      cwd: string(),
      maxConcurrentAssets: number(),
    }),
    thresholds: section({
      minFilesPerDirectory: number(),
      subsampleDetectionThreshold: number(),
    }),
    progress: section({
      updateIntervalMs: number(),
      logIntervalMs: number(),
      failureListLimit: number(),
    }),
  },
  { invalid_type_error: 'must contain a mapping' }
);

export type ConfigFileSchema = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,

  paths: {
    downloadDir: './data',
    sceneList: DEFAULT_SCENE_LIST,
    logDir: './logs',
  },

  defaults: {
    subsample: 10,
    workers: null,
    assets: DEFAULT_ASSETS,
  },

  downloader: {
    ...DEFAULT_DOWNLOAD_COMMAND,
    maxConcurrentAssets: DEFAULT_MAX_CONCURRENT_ASSET_DOWNLOADS,
  },

  thresholds: DEFAULT_THRESHOLDS,

  progress: {
    updateIntervalMs: DEFAULT_UPDATE_INTERVAL_MS,
    logIntervalMs: DEFAULT_LOG_INTERVAL_MS,
    failureListLimit: DEFAULT_FAILURE_LIST_LIMIT,
  },
};

// ============================================================================
// Config File Parsing
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.scene-batchrc',
  '.scene-batchrc.yaml',
  '.scene-batchrc.yml',
  '.scene-batchrc.json',
];

/**
 * Find config file in current directory or parent directories
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  const root = resolve('/');

  while (dir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    dir = resolve(dir, '..');
  }

  return null;
}

function describeIssue(issue: z.ZodIssue): string {
  const keys = issue.path.filter((key): key is string => typeof key === 'string');
  return keys.length === 0 ? `Config file ${issue.message}` : `config.${keys.join('.')} ${issue.message}`;
}

/**
 * Parse and validate a config file
 */
export function parseConfigFile(filePath: string): ConfigFileSchema {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    // YAML is a superset of JSON, so one parser covers every file name
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Cannot parse config file: ${errorMessage(error)}`, filePath);
  }

  if (raw === null || raw === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(describeIssue).join('; '), filePath);
  }
  return result.data;
}

// ============================================================================
// Environment
// ============================================================================

/**
 * Get environment variable with prefix
 */
function getEnvVar(name: string): string | undefined {
  const value = process.env[`SCENE_BATCH_${name}`];
  return value === '' ? undefined : value;
}

/**
 * Get boolean environment variable
 */
function getEnvBool(name: string): boolean | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Get numeric environment variable
 */
function getEnvNumber(name: string): number | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from */
  cwd?: string;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    downloadDir?: string;
    workers?: number;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError for a missing explicit file or a malformed one
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  let configPath: string | null = null;
  let fileConfig: ConfigFileSchema = {};

  if (options.configPath) {
    configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar('CONFIG');
    if (envConfigPath) {
      configPath = resolve(envConfigPath);
      if (existsSync(configPath)) {
        fileConfig = parseConfigFile(configPath);
      }
    } else {
      configPath = findConfigFile(options.cwd ?? process.cwd());
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const config: CLIConfig = {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    paths: {
      downloadDir:
        options.overrides?.downloadDir ??
        getEnvVar('DOWNLOAD_DIR') ??
        fileConfig.paths?.downloadDir ??
        DEFAULT_CONFIG.paths.downloadDir,
      sceneList:
        getEnvVar('SCENE_LIST') ?? fileConfig.paths?.sceneList ?? DEFAULT_CONFIG.paths.sceneList,
      logDir: getEnvVar('LOG_DIR') ?? fileConfig.paths?.logDir ?? DEFAULT_CONFIG.paths.logDir,
    },

    defaults: {
      subsample:
        getEnvNumber('SUBSAMPLE') ?? fileConfig.defaults?.subsample ?? DEFAULT_CONFIG.defaults.subsample,
      workers:
        options.overrides?.workers ??
        getEnvNumber('WORKERS') ??
        (fileConfig.defaults?.workers !== undefined
          ? fileConfig.defaults.workers
          : DEFAULT_CONFIG.defaults.workers),
      assets: fileConfig.defaults?.assets ?? DEFAULT_CONFIG.defaults.assets,
    },

    downloader: {
      command: fileConfig.downloader?.command ?? DEFAULT_CONFIG.downloader.command,
      args: fileConfig.downloader?.args ?? DEFAULT_CONFIG.downloader.args,
      timeoutMs:
        getEnvNumber('DOWNLOAD_TIMEOUT') ??
        fileConfig.downloader?.timeoutMs ??
        DEFAULT_CONFIG.downloader.timeoutMs,
      cwd: fileConfig.downloader?.cwd ?? DEFAULT_CONFIG.downloader.cwd,
      maxConcurrentAssets:
        fileConfig.downloader?.maxConcurrentAssets ?? DEFAULT_CONFIG.downloader.maxConcurrentAssets,
    },

    thresholds: {
      minFilesPerDirectory:
        fileConfig.thresholds?.minFilesPerDirectory ?? DEFAULT_CONFIG.thresholds.minFilesPerDirectory,
      subsampleDetectionThreshold:
        fileConfig.thresholds?.subsampleDetectionThreshold ??
        DEFAULT_CONFIG.thresholds.subsampleDetectionThreshold,
    },

    progress: {
      updateIntervalMs:
        fileConfig.progress?.updateIntervalMs ?? DEFAULT_CONFIG.progress.updateIntervalMs,
      logIntervalMs: fileConfig.progress?.logIntervalMs ?? DEFAULT_CONFIG.progress.logIntervalMs,
      failureListLimit:
        fileConfig.progress?.failureListLimit ?? DEFAULT_CONFIG.progress.failureListLimit,
    },

    verbose: options.overrides?.verbose ?? getEnvBool('VERBOSE') ?? false,
    json: options.overrides?.json ?? getEnvBool('JSON') ?? false,
    configPath,
  };

  validateConfig(config);
  return config;
}

/**
 * Resolve a configured path against the config file's directory
 */
export function resolvePath(config: CLIConfig, pathKey: keyof PathsConfig): string {
  const basePath = config.configPath ? resolve(config.configPath, '..') : process.cwd();
  return resolve(basePath, config.paths[pathKey]);
}

/**
 * Validate configuration
 *
 * @throws ConfigError if configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  const fail = (message: string): never => {
    throw new ConfigError(message, config.configPath);
  };

  if (config.version !== 1) {
    fail(`Unsupported config version: ${config.version}. Expected 1.`);
  }

  if (!Number.isInteger(config.defaults.subsample) || config.defaults.subsample < 1) {
    fail('Subsample factor must be a positive integer');
  }

  if (config.defaults.workers !== null && (!Number.isInteger(config.defaults.workers) || config.defaults.workers < 1)) {
    fail('Workers must be a positive integer');
  }

  const malformed = config.defaults.assets.filter((asset) => !/^[a-z_]+$/.test(asset));
  if (config.defaults.assets.length === 0 || malformed.length > 0) {
    fail(`Invalid asset list: ${config.defaults.assets.join(', ') || '(empty)'}`);
  }

  if (config.downloader.command.trim() === '') {
    fail('Downloader command must not be empty');
  }

  if (config.downloader.timeoutMs <= 0) {
    fail('Downloader timeout must be a positive number');
  }

  if (config.downloader.maxConcurrentAssets < 1) {
    fail('Downloader maxConcurrentAssets must be at least 1');
  }

  if (config.thresholds.minFilesPerDirectory < 0 || config.thresholds.subsampleDetectionThreshold < 0) {
    fail('Thresholds must not be negative');
  }

  if (config.progress.updateIntervalMs <= 0 || config.progress.logIntervalMs <= 0) {
    fail('Progress intervals must be positive');
  }
}
