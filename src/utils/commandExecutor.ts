/**
 * Git command execution with bounded retries and exponential backoff
 */

import type { SyncResult } from '../types/index.js';
import { GitCommandError, GitRunner, GitTimeoutError } from './gitRunner.js';
import { errorMessage, failed, succeeded } from './syncResult.js';
import { logger } from './logger.js';

export const DEFAULT_TIMEOUT_MS = 30_000;
/** push, clone and gc talk to the network or rewrite packs */
export const LONG_TIMEOUT_MS = 60_000;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface CommandOptions {
  cwd?: string;
  maxAttempts?: number;
  baseDelayMs?: number;
  timeoutMs?: number;
}

export interface ExecutorDefaults {
  cwd: string;
  maxAttempts: number;
  baseDelayMs: number;
}

export type ProbeResult =
  | { ok: true; output: string }
  | { ok: false; timedOut: boolean; error: string };

export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * Math.pow(2, attempt - 1);
}

function classifyFailure(error: unknown, timeoutMs: number): { code: string; message: string } {
  if (error instanceof GitTimeoutError) {
    return { code: 'GIT_COMMAND_TIMEOUT', message: `timed out after ${timeoutMs}ms` };
  }
  if (error instanceof GitCommandError) {
    return { code: 'GIT_COMMAND_FAILED', message: error.message };
  }
  return { code: 'GIT_COMMAND_UNEXPECTED_ERROR', message: `unexpected error: ${errorMessage(error)}` };
}

export class CommandExecutor {
  private runner: GitRunner;
  private defaults: ExecutorDefaults;
  private sleep: Sleep;

  constructor(runner: GitRunner, defaults: ExecutorDefaults, sleepFn: Sleep = sleep) {
    this.runner = runner;
    this.defaults = defaults;
    this.sleep = sleepFn;
  }

  get workingDir(): string {
    return this.defaults.cwd;
  }

  /**
   * Run a git command, retrying failures and timeouts with backoff.
   * Never rejects; the outcome is always a SyncResult.
   */
  async run(args: string[], operation: string, options: CommandOptions = {}): Promise<SyncResult> {
    const cwd = options.cwd ?? this.defaults.cwd;
    const maxAttempts = Math.max(1, options.maxAttempts ?? this.defaults.maxAttempts);
    const baseDelayMs = options.baseDelayMs ?? this.defaults.baseDelayMs;
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      logger.debug('CommandExecutor', `${operation}: git ${args.join(' ')} (attempt ${attempt}/${maxAttempts})`);

      try {
        const output = await this.runner.run(args, { cwd, timeoutMs });
        return succeeded(operation, `${operation} completed successfully`, { attempts: attempt, output });
      } catch (error) {
        const failure = classifyFailure(error, timeoutMs);
        const message = `${operation} failed (attempt ${attempt}/${maxAttempts}): ${failure.message}`;

        if (attempt === maxAttempts) {
          logger.error('CommandExecutor', message);
          return failed(operation, message, failure.code, { attempts: attempt });
        }

        const delay = backoffDelay(baseDelayMs, attempt);
        logger.warn('CommandExecutor', `${message}, retrying in ${delay}ms`);
        await this.sleep(delay);
      }
    }

    // maxAttempts is clamped to >= 1, so the loop always returns
    return failed(operation, `${operation} failed after ${maxAttempts} attempts`, 'GIT_COMMAND_MAX_RETRIES_EXCEEDED', {
      attempts: maxAttempts,
    });
  }

  /**
   * Single attempt for probes and state queries where a failure is an answer.
   */
  async probe(args: string[], options: Omit<CommandOptions, 'maxAttempts' | 'baseDelayMs'> = {}): Promise<ProbeResult> {
    const cwd = options.cwd ?? this.defaults.cwd;
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    try {
      const output = await this.runner.run(args, { cwd, timeoutMs });
      return { ok: true, output };
    } catch (error) {
      return { ok: false, timedOut: error instanceof GitTimeoutError, error: errorMessage(error) };
    }
  }
}
