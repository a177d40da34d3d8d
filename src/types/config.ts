/**
 * Configuration types for the Memory Sync MCP Server
 */

import { homedir } from 'os';
import * as path from 'path';
import type { LogLevel } from '../utils/logger.js';

export const MEMORY_FILES_SUBDIR = 'files';

export interface Config {
  /** Root of the memory store; also the working tree of the git repository */
  repoDir: string;
  /** Commit and push memories to git (default: true) */
  enableSync: boolean;
  /** Remote that receives pushed memories (optional) */
  remoteUrl?: string;
  /** Attempts per git command, including the first (default: 3) */
  retryAttempts: number;
  /** Backoff base between git attempts in ms (default: 1000) */
  retryDelayMs: number;
  /** Maximum results returned by the think tool (default: 25) */
  maxSearchResults: number;
  logLevel: LogLevel;
}

function expandHome(dir: string): string {
  if (dir === '~') return homedir();
  if (dir.startsWith('~/')) return path.join(homedir(), dir.slice(2));
  return dir;
}

function parseLogLevel(value: string | undefined): LogLevel {
  switch ((value || 'info').toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'warn':
    case 'warning':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return 'info';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const remoteUrl = env.MEMORY_GIT_REMOTE?.trim();

  return {
    repoDir: path.resolve(expandHome(env.MEMORY_DIR || '~/.memory-sync')),
    enableSync: (env.MEMORY_ENABLE_SYNC || 'true').toLowerCase() !== 'false',
    remoteUrl: remoteUrl || undefined,
    retryAttempts: parseInt(env.MEMORY_GIT_RETRY_ATTEMPTS || '3', 10),
    retryDelayMs: parseInt(env.MEMORY_GIT_RETRY_DELAY_MS || '1000', 10),
    maxSearchResults: parseInt(env.MEMORY_MAX_SEARCH_RESULTS || '25', 10),
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}

const REMOTE_URL_PATTERNS = [
  /^(https?|ssh|git|file):\/\/\S+$/,
  /^[\w.-]+@[\w.-]+:\S+$/,
];

/**
 * Returns human-readable problems; an empty list means the config is usable.
 */
export function validateConfig(config: Config): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.retryAttempts) || config.retryAttempts < 1) {
    errors.push(`MEMORY_GIT_RETRY_ATTEMPTS must be an integer >= 1 (got ${config.retryAttempts})`);
  }
  if (!Number.isFinite(config.retryDelayMs) || config.retryDelayMs < 0) {
    errors.push(`MEMORY_GIT_RETRY_DELAY_MS must be >= 0 (got ${config.retryDelayMs})`);
  }
  if (!Number.isInteger(config.maxSearchResults) || config.maxSearchResults <= 0) {
    errors.push(`MEMORY_MAX_SEARCH_RESULTS must be positive (got ${config.maxSearchResults})`);
  }
  if (config.remoteUrl) {
    const url = config.remoteUrl;
    const valid = path.isAbsolute(url) || REMOTE_URL_PATTERNS.some(pattern => pattern.test(url));
    if (!valid) {
      errors.push(`MEMORY_GIT_REMOTE is not a recognised git URL: ${url}`);
    }
  }

  return errors;
}
