/**
 * Default branch detection for a remote repository
 */

import { CommandExecutor, DEFAULT_TIMEOUT_MS } from '../utils/commandExecutor.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_BRANCH = 'main';
export const FALLBACK_BRANCH_PROBES = ['main', 'master'] as const;

const SYMREF_PATTERN = /^ref: refs\/heads\/(\S+)\tHEAD$/;

/**
 * Extract the branch name from `git ls-remote --symref <url> HEAD` output
 */
export function parseSymbolicHead(output: string): string | undefined {
  for (const line of output.split('\n')) {
    const match = line.trim().match(SYMREF_PATTERN);
    if (match) {
      return match[1];
    }
  }
  return undefined;
}

export class BranchDetector {
  private executor: CommandExecutor;

  constructor(executor: CommandExecutor) {
    this.executor = executor;
  }

  /**
   * Resolve the remote's default branch. Always yields a usable name.
   */
  async detect(remoteUrl: string, repoDir: string): Promise<string> {
    logger.debug('BranchDetector', `Detecting default branch for ${remoteUrl}`);

    const symref = await this.executor.probe(['ls-remote', '--symref', remoteUrl, 'HEAD'], {
      cwd: repoDir,
      timeoutMs: DEFAULT_TIMEOUT_MS,
    });
    if (symref.ok) {
      const branch = parseSymbolicHead(symref.output);
      if (branch) {
        logger.info('BranchDetector', `Detected default branch via symbolic HEAD: ${branch}`);
        return branch;
      }
      logger.debug('BranchDetector', 'Symbolic HEAD response had no branch reference');
    } else {
      logger.warn('BranchDetector', `Symbolic HEAD query failed${symref.timedOut ? ' (timeout)' : ''}: ${symref.error}`);
    }

    for (const candidate of FALLBACK_BRANCH_PROBES) {
      const probe = await this.executor.probe(['ls-remote', '--heads', remoteUrl, candidate], {
        cwd: repoDir,
        timeoutMs: DEFAULT_TIMEOUT_MS,
      });
      if (probe.ok && probe.output.trim()) {
        logger.info('BranchDetector', `Found existing branch on remote: ${candidate}`);
        return candidate;
      }
      if (!probe.ok) {
        logger.debug('BranchDetector', `Probe for '${candidate}' failed: ${probe.error}`);
      }
    }

    logger.warn('BranchDetector', `Could not detect default branch, falling back to: ${DEFAULT_BRANCH}`);
    return DEFAULT_BRANCH;
  }
}
