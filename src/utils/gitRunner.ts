/**
 * Git process execution using simple-git
 */

import { simpleGit, GitError, GitPluginError } from 'simple-git';

export interface GitRunOptions {
  cwd: string;
  timeoutMs: number;
}

/**
 * Runs a single git invocation and resolves with its stdout.
 *
 * Implementations reject with GitCommandError when git exits non-zero and
 * with GitTimeoutError when the time limit is hit; any other rejection is
 * treated as unexpected by callers.
 */
export interface GitRunner {
  run(args: string[], options: GitRunOptions): Promise<string>;
}

export class GitCommandError extends Error {
  readonly args: string[];

  constructor(args: string[], message: string) {
    super(message);
    this.name = 'GitCommandError';
    this.args = args;
  }
}

export class GitTimeoutError extends Error {
  readonly args: string[];
  readonly timeoutMs: number;

  constructor(args: string[], timeoutMs: number) {
    super(`git ${args.join(' ')} timed out after ${timeoutMs}ms`);
    this.name = 'GitTimeoutError';
    this.args = args;
    this.timeoutMs = timeoutMs;
  }
}

/** simple-git reports both the abort signal and the block timeout as plugin errors */
export function isTimeoutError(error: unknown): boolean {
  return error instanceof GitPluginError && (error.plugin === 'abort' || error.plugin === 'timeout');
}

export class SimpleGitRunner implements GitRunner {
  async run(args: string[], options: GitRunOptions): Promise<string> {
    // abort bounds total run time; block only fires after a silent period
    const git = simpleGit({
      baseDir: options.cwd,
      abort: AbortSignal.timeout(options.timeoutMs),
      timeout: { block: options.timeoutMs },
    });

    try {
      return await git.raw(args);
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new GitTimeoutError(args, options.timeoutMs);
      }
      if (error instanceof GitError) {
        throw new GitCommandError(args, error.message.trim());
      }
      throw error;
    }
  }
}
