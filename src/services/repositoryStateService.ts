/**
 * Repository state detection, cloning, tracking setup and reconciliation
 */

import { existsSync } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { Config, RepositoryInfo, RepositoryState, SyncResult } from '../types/index.js';
import { CommandExecutor, LONG_TIMEOUT_MS } from '../utils/commandExecutor.js';
import { errorMessage, failed, succeeded } from '../utils/syncResult.js';
import { logger } from '../utils/logger.js';
import { BranchDetector, DEFAULT_BRANCH } from './branchDetector.js';

export const GIT_IDENTITY = {
  'user.name': 'Memory Sync',
  'user.email': 'memory-sync@localhost',
} as const;

/** Files that may sit in the target directory before a clone */
const CLONE_ALLOWED_FILES = new Set(['.gitignore', 'README.md', 'README.txt', 'LICENSE', 'LICENSE.txt']);

export interface StateInputs {
  localExists: boolean;
  remoteExists: boolean;
  trackingConfigured: boolean;
  needsSync: boolean;
}

export function classifyRepositoryState(inputs: StateInputs): RepositoryState {
  if (!inputs.localExists) {
    return inputs.remoteExists ? RepositoryState.EXISTING_REMOTE : RepositoryState.NEW_LOCAL;
  }
  if (inputs.trackingConfigured && inputs.remoteExists && !inputs.needsSync) {
    return RepositoryState.SYNCHRONIZED;
  }
  return RepositoryState.EXISTING_LOCAL;
}

function unquotePath(value: string): string {
  if (value.length < 2 || !value.startsWith('"') || !value.endsWith('"')) {
    return value;
  }
  return value.slice(1, -1).replace(/\\(["\\])/g, '$1');
}

/**
 * Paths reported by `git status --porcelain`. Renames report the new path.
 */
export function parsePorcelainPaths(output: string): string[] {
  return output
    .split('\n')
    .filter(line => line.trim().length > 0)
    .map(line => {
      const entry = line.slice(3).trim();
      const arrow = entry.lastIndexOf(' -> ');
      return unquotePath(arrow === -1 ? entry : entry.slice(arrow + 4));
    });
}

export class RepositoryStateService {
  private config: Config;
  private executor: CommandExecutor;
  private branchDetector: BranchDetector;
  private cachedInfo: RepositoryInfo | null = null;
  private cachedDefaultBranch: string | null = null;

  constructor(config: Config, executor: CommandExecutor, branchDetector: BranchDetector) {
    this.config = config;
    this.executor = executor;
    this.branchDetector = branchDetector;
  }

  get repoDir(): string {
    return this.config.repoDir;
  }

  get gitDir(): string {
    return path.join(this.config.repoDir, '.git');
  }

  localRepositoryExists(): boolean {
    return existsSync(this.gitDir);
  }

  clearCache(): void {
    this.cachedInfo = null;
    this.cachedDefaultBranch = null;
    logger.debug('RepositoryState', 'Repository info cache cleared');
  }

  /**
   * Snapshot of the local/remote pair. Cached until clearCache().
   */
  async getRepositoryInfo(): Promise<RepositoryInfo> {
    if (this.cachedInfo) {
      return this.cachedInfo;
    }

    const remoteUrl = this.config.remoteUrl;

    try {
      const localExists = this.localRepositoryExists();
      const remoteExists = remoteUrl ? await this.isRemoteAccessible(remoteUrl) : false;
      const defaultBranch = await this.getDefaultBranch(remoteExists);
      const localBranch = localExists ? await this.getCurrentBranch() : undefined;
      const trackingConfigured = localBranch ? await this.hasUpstreamTracking(localBranch) : false;
      const needsSync =
        localExists && remoteExists && remoteUrl ? await this.tipsDiffer(remoteUrl, defaultBranch) : false;

      const info: RepositoryInfo = Object.freeze({
        state: classifyRepositoryState({ localExists, remoteExists, trackingConfigured, needsSync }),
        localExists,
        remoteExists,
        remoteUrl,
        defaultBranch,
        localBranch,
        trackingConfigured,
        needsSync,
      });

      this.cachedInfo = info;
      logger.debug('RepositoryState', `Repository info: ${JSON.stringify(info)}`);
      return info;
    } catch (error) {
      logger.error('RepositoryState', 'Error getting repository info', error);
      return Object.freeze({
        state: RepositoryState.NEW_LOCAL,
        localExists: false,
        remoteExists: false,
        remoteUrl,
        defaultBranch: DEFAULT_BRANCH,
        trackingConfigured: false,
        needsSync: false,
      });
    }
  }

  async getDefaultBranch(remoteExists: boolean): Promise<string> {
    if (this.cachedDefaultBranch) {
      return this.cachedDefaultBranch;
    }

    let branch: string | undefined;
    if (this.config.remoteUrl && remoteExists) {
      branch = await this.branchDetector.detect(this.config.remoteUrl, this.probeDir());
    } else if (this.localRepositoryExists()) {
      branch = await this.getCurrentBranch();
    }

    this.cachedDefaultBranch = branch || DEFAULT_BRANCH;
    return this.cachedDefaultBranch;
  }

  async isRemoteAccessible(remoteUrl: string): Promise<boolean> {
    const result = await this.executor.probe(['ls-remote', '--heads', remoteUrl], { cwd: this.probeDir() });
    if (!result.ok) {
      logger.debug('RepositoryState', `Remote ${remoteUrl} is not accessible: ${result.error}`);
    }
    return result.ok;
  }

  async getCurrentBranch(): Promise<string | undefined> {
    const result = await this.executor.probe(['branch', '--show-current']);
    return result.ok && result.output.trim() ? result.output.trim() : undefined;
  }

  async hasUpstreamTracking(branch: string): Promise<boolean> {
    const result = await this.executor.probe(['config', '--get', `branch.${branch}.remote`]);
    return result.ok && result.output.trim().length > 0;
  }

  async getOriginUrl(): Promise<string | null> {
    if (!this.localRepositoryExists()) {
      return null;
    }
    const result = await this.executor.probe(['remote', 'get-url', 'origin']);
    return result.ok && result.output.trim() ? result.output.trim() : null;
  }

  /**
   * Create an empty repository with the identity memories are committed under
   */
  async initializeRepository(branch: string = DEFAULT_BRANCH): Promise<SyncResult> {
    const init = await this.executor.run(['init'], 'git_init');
    if (!init.success) {
      return init;
    }

    const head = await this.executor.run(['symbolic-ref', 'HEAD', `refs/heads/${branch}`], 'set_initial_branch');
    if (!head.success) {
      logger.warn('RepositoryState', `Could not set initial branch to ${branch}: ${head.message}`);
    }

    await this.ensureIdentity();
    this.clearCache();

    logger.info('RepositoryState', `Initialized repository in ${this.repoDir} on branch ${branch}`);
    return succeeded('initialize_repository', `Initialized new repository on branch '${branch}'`, {
      attempts: init.attempts,
      branchUsed: branch,
    });
  }

  async ensureIdentity(): Promise<void> {
    for (const [key, value] of Object.entries(GIT_IDENTITY)) {
      const current = await this.executor.probe(['config', '--get', key]);
      if (current.ok && current.output.trim()) {
        continue;
      }
      const result = await this.executor.run(['config', key, value], `set_${key}`);
      if (!result.success) {
        logger.warn('RepositoryState', `Failed to set ${key}: ${result.message}`);
      }
    }
  }

  async configureRemote(): Promise<SyncResult> {
    const remoteUrl = this.config.remoteUrl;
    if (!remoteUrl) {
      return failed('configure_remote', 'Cannot configure remote: no remote URL configured', 'NO_REMOTE_URL');
    }

    const current = await this.getOriginUrl();
    if (current === remoteUrl) {
      return succeeded('configure_remote', 'Remote origin already configured');
    }

    const args = current === null ? ['remote', 'add', 'origin', remoteUrl] : ['remote', 'set-url', 'origin', remoteUrl];
    const result = await this.executor.run(args, 'configure_remote');
    if (!result.success) {
      return result;
    }

    this.clearCache();
    const verb = current === null ? 'added' : 'updated';
    logger.info('RepositoryState', `Remote origin ${verb}: ${remoteUrl}`);
    return succeeded('configure_remote', `Remote origin ${verb}: ${remoteUrl}`, { attempts: result.attempts });
  }

  async validateConfiguration(): Promise<SyncResult> {
    if (!this.localRepositoryExists()) {
      return failed('validate_config', 'Git configuration validation failed: repository not initialized', 'GIT_CONFIG_VALIDATION_FAILED');
    }

    const issues: string[] = [];
    for (const key of Object.keys(GIT_IDENTITY)) {
      const value = await this.executor.probe(['config', '--get', key]);
      if (!value.ok || !value.output.trim()) {
        issues.push(`Git ${key} not configured`);
      }
    }

    if (this.config.remoteUrl) {
      const origin = await this.getOriginUrl();
      if (origin === null) {
        issues.push("Git remote 'origin' not configured");
      } else if (origin !== this.config.remoteUrl) {
        issues.push(`Git remote URL mismatch: expected ${this.config.remoteUrl}, got ${origin}`);
      }
    }

    if (issues.length > 0) {
      return failed('validate_config', `Git configuration validation failed: ${issues.join('; ')}`, 'GIT_CONFIG_VALIDATION_FAILED');
    }
    return succeeded('validate_config', 'Git configuration validation passed');
  }

  /**
   * Clone the configured remote into repoDir.
   *
   * The target may already hold a few housekeeping files (README, LICENSE,
   * dotfiles); they are set aside during the clone and put back unless the
   * clone brought a file with the same name.
   */
  async cloneExistingRepository(): Promise<SyncResult> {
    const remoteUrl = this.config.remoteUrl;
    if (!remoteUrl) {
      return failed('clone_repository', 'Cannot clone repository: no remote URL configured', 'NO_REMOTE_URL');
    }
    if (this.localRepositoryExists()) {
      return failed('clone_repository', 'Cannot clone repository: local Git repository already exists', 'LOCAL_REPO_EXISTS');
    }

    const repoDir = this.repoDir;
    const parentDir = path.dirname(repoDir);
    const backupDir = `${repoDir}_clone_backup`;
    const displaced: string[] = [];

    try {
      await fs.mkdir(parentDir, { recursive: true });

      if (existsSync(repoDir)) {
        const entries = await fs.readdir(repoDir);
        const blocking = entries.filter(name => !CLONE_ALLOWED_FILES.has(name) && !name.startsWith('.'));
        if (blocking.length > 0) {
          return failed(
            'clone_repository',
            `Cannot clone repository: target directory contains files: ${blocking.join(', ')}`,
            'LOCAL_FILES_PRESENT'
          );
        }

        if (entries.length > 0) {
          await fs.mkdir(backupDir, { recursive: true });
          for (const name of entries) {
            await fs.rename(path.join(repoDir, name), path.join(backupDir, name));
            displaced.push(name);
          }
        }
      }

      logger.info('RepositoryState', `Cloning ${remoteUrl} into ${repoDir}`);
      const clone = await this.executor.run(['clone', '--origin', 'origin', remoteUrl, repoDir], 'clone_repository', {
        cwd: parentDir,
        timeoutMs: LONG_TIMEOUT_MS,
      });

      const kept = await this.restoreDisplaced(displaced, backupDir);
      this.clearCache();

      if (!clone.success) {
        return clone;
      }

      const branch = await this.getCurrentBranch();
      const keptNote = kept.length > 0 ? ` (kept remote versions of ${kept.join(', ')}; local copies left in ${backupDir})` : '';
      return succeeded('clone_repository', `Cloned ${remoteUrl} into ${repoDir}${keptNote}`, {
        attempts: clone.attempts,
        branchUsed: branch,
      });
    } catch (error) {
      logger.error('RepositoryState', 'Unexpected error during clone', error);
      return failed('clone_repository', `Unexpected error during repository clone: ${errorMessage(error)}`, 'CLONE_UNEXPECTED_ERROR');
    }
  }

  private async restoreDisplaced(names: string[], backupDir: string): Promise<string[]> {
    if (names.length === 0) {
      return [];
    }

    await fs.mkdir(this.repoDir, { recursive: true });
    const kept: string[] = [];
    for (const name of names) {
      const target = path.join(this.repoDir, name);
      if (existsSync(target)) {
        kept.push(name);
      } else {
        await fs.rename(path.join(backupDir, name), target);
      }
    }

    if (kept.length === 0) {
      await fs.rm(backupDir, { recursive: true, force: true });
    }
    return kept;
  }

  /**
   * Make the local branch track origin/<branch>, creating it when missing
   */
  async setupUpstreamTracking(branch: string): Promise<SyncResult> {
    const operation = 'setup_upstream_tracking';
    const precondition = await this.checkRemotePreconditions(operation);
    if (precondition) {
      return precondition;
    }

    const fetch = await this.executor.run(['fetch', 'origin'], 'fetch_origin', { timeoutMs: LONG_TIMEOUT_MS });
    if (!fetch.success) {
      return failed(operation, `Failed to fetch from origin: ${fetch.message}`, fetch.errorCode, { attempts: fetch.attempts });
    }

    const remoteRef = await this.executor.probe(['rev-parse', '--verify', '--quiet', `refs/remotes/origin/${branch}`]);
    if (!remoteRef.ok) {
      return failed(
        operation,
        `Cannot set up upstream tracking: remote branch 'origin/${branch}' does not exist`,
        'REMOTE_BRANCH_NOT_FOUND'
      );
    }

    const localRef = await this.executor.probe(['rev-parse', '--verify', '--quiet', `refs/heads/${branch}`]);
    if (!localRef.ok) {
      const create = await this.executor.run(['checkout', '-B', branch, '--track', `origin/${branch}`], 'create_tracking_branch');
      if (!create.success) {
        return failed(operation, `Failed to create local branch '${branch}': ${create.message}`, 'BRANCH_CREATION_FAILED', {
          attempts: create.attempts,
        });
      }
      this.clearCache();
      logger.info('RepositoryState', `Created branch ${branch} tracking origin/${branch}`);
      return succeeded(operation, `Created branch '${branch}' with upstream tracking`, { branchUsed: branch });
    }

    if (await this.hasUpstreamTracking(branch)) {
      return succeeded(operation, `Upstream tracking already configured for branch '${branch}'`, { branchUsed: branch });
    }

    const track = await this.executor.run(['branch', `--set-upstream-to=origin/${branch}`, branch], 'set_upstream');
    if (!track.success) {
      return failed(operation, `Failed to set upstream for '${branch}': ${track.message}`, 'TRACKING_SETUP_FAILED', {
        attempts: track.attempts,
      });
    }

    if (!(await this.hasUpstreamTracking(branch))) {
      return failed(operation, `Upstream tracking for '${branch}' could not be verified`, 'TRACKING_VERIFICATION_FAILED');
    }

    this.clearCache();
    logger.info('RepositoryState', `Branch ${branch} now tracks origin/${branch}`);
    return succeeded(operation, `Upstream tracking configured: ${branch} -> origin/${branch}`, {
      attempts: track.attempts,
      branchUsed: branch,
    });
  }

  /**
   * Bring the local repository in line with the remote.
   *
   * Remote content wins: uncommitted local changes are stashed and conflicting
   * files take the remote version. Both are spelled out in the result message.
   */
  async synchronizeWithRemote(): Promise<SyncResult> {
    const operation = 'synchronize_with_remote';
    const precondition = await this.checkRemotePreconditions(operation);
    if (precondition) {
      return precondition;
    }

    const remoteUrl = this.config.remoteUrl ?? '';
    if (!(await this.isRemoteAccessible(remoteUrl))) {
      return failed(operation, `Cannot synchronize: remote repository is not accessible: ${remoteUrl}`, 'REMOTE_NOT_ACCESSIBLE');
    }

    const branch = await this.getDefaultBranch(true);
    const fetch = await this.executor.run(['fetch', 'origin'], 'fetch_origin', { timeoutMs: LONG_TIMEOUT_MS });
    if (!fetch.success) {
      return failed(operation, `Failed to fetch from remote: ${fetch.message}`, 'FETCH_FAILED', { attempts: fetch.attempts });
    }

    const remoteRef = await this.executor.probe(['rev-parse', '--verify', '--quiet', `refs/remotes/origin/${branch}`]);
    if (!remoteRef.ok) {
      return this.publishLocalBranch(branch);
    }

    const current = await this.getCurrentBranch();
    if (current !== branch) {
      const localRef = await this.executor.probe(['rev-parse', '--verify', '--quiet', `refs/heads/${branch}`]);
      const args = localRef.ok ? ['checkout', branch] : ['checkout', '-B', branch, '--track', `origin/${branch}`];
      const checkout = await this.executor.run(args, 'checkout_default_branch');
      if (!checkout.success) {
        return failed(operation, `Failed to switch to branch '${branch}': ${checkout.message}`, 'BRANCH_CHECKOUT_FAILED');
      }
    }

    if (!(await this.hasUpstreamTracking(branch))) {
      const tracking = await this.setupUpstreamTracking(branch);
      if (!tracking.success) {
        logger.warn('RepositoryState', `Failed to set up upstream tracking, continuing: ${tracking.message}`);
      }
    }

    const localHead = await this.executor.probe(['rev-parse', '--verify', 'HEAD']);
    const remoteHead = await this.executor.probe(['rev-parse', '--verify', `refs/remotes/origin/${branch}`]);
    if (localHead.ok && remoteHead.ok && localHead.output.trim() === remoteHead.output.trim()) {
      logger.info('RepositoryState', 'Repository is already up to date with remote');
      return succeeded(operation, 'Repository is already synchronized with remote', { branchUsed: branch });
    }

    const status = await this.executor.probe(['status', '--porcelain']);
    const dirtyPaths = status.ok ? parsePorcelainPaths(status.output) : [];
    if (dirtyPaths.length > 0) {
      logger.warn('RepositoryState', `Stashing ${dirtyPaths.length} uncommitted change(s) before merging remote content`);
      const stash = await this.executor.run(
        ['stash', 'push', '--include-untracked', '-m', `memory-sync: set aside before merging origin/${branch}`],
        'stash_local_changes',
        { maxAttempts: 1 }
      );
      if (!stash.success) {
        return failed(operation, `Failed to set aside uncommitted changes: ${stash.message}`, 'STASH_FAILED');
      }
    }

    const merge = await this.executor.run(
      ['merge', '--no-edit', '--allow-unrelated-histories', '-X', 'theirs', `origin/${branch}`],
      'merge_remote',
      { maxAttempts: 1 }
    );

    let conflictsResolved = false;
    if (!merge.success) {
      if (!/conflict/i.test(merge.message)) {
        await this.executor.probe(['merge', '--abort']);
        const message = `Failed to merge changes from remote: ${merge.message}`;
        return failed(operation, await this.restoreStashedChanges(message, dirtyPaths), 'MERGE_FAILED');
      }
      const resolution = await this.resolveConflictsWithRemote(branch);
      if (!resolution.success) {
        return failed(operation, await this.restoreStashedChanges(resolution.message, dirtyPaths), resolution.errorCode);
      }
      conflictsResolved = true;
    }

    this.clearCache();

    const notes = [`Synchronized with origin/${branch}; remote content took precedence over local state.`];
    if (dirtyPaths.length > 0) {
      notes.push(
        `${dirtyPaths.length} uncommitted local change(s) were moved to the git stash and are not in the working tree: ${dirtyPaths.join(', ')}.`
      );
    }
    if (conflictsResolved) {
      notes.push('Conflicting files were replaced with the remote version.');
    }

    logger.info('RepositoryState', notes.join(' '));
    return succeeded(operation, notes.join(' '), { branchUsed: branch });
  }

  /**
   * After an aborted merge, put stashed changes back into the working tree.
   * Returns the failure message extended with where the changes are now.
   */
  private async restoreStashedChanges(message: string, dirtyPaths: string[]): Promise<string> {
    if (dirtyPaths.length === 0) {
      return message;
    }

    const pop = await this.executor.run(['stash', 'pop'], 'restore_local_changes', { maxAttempts: 1 });
    if (pop.success) {
      logger.info('RepositoryState', `Restored ${dirtyPaths.length} stashed change(s) after failed merge`);
      return `${message}. Uncommitted local changes were restored from the git stash: ${dirtyPaths.join(', ')}.`;
    }

    logger.error('RepositoryState', `Failed to restore stashed changes: ${pop.message}`);
    return (
      `${message}. ${dirtyPaths.length} uncommitted local change(s) remain in the git stash ` +
      `and are not in the working tree (run 'git stash pop' to restore them): ${dirtyPaths.join(', ')}.`
    );
  }

  private async resolveConflictsWithRemote(branch: string): Promise<SyncResult> {
    const operation = 'synchronize_with_remote';
    logger.warn('RepositoryState', 'Merge conflicts detected, resolving with remote content');

    const steps: Array<[string[], string]> = [
      [['checkout', '--theirs', '--', '.'], 'checkout_theirs'],
      [['add', '-A'], 'stage_resolution'],
      [['commit', '--no-edit'], 'commit_resolution'],
    ];

    for (const [args, name] of steps) {
      const result = await this.executor.run(args, name, { maxAttempts: 1 });
      if (!result.success) {
        await this.executor.probe(['merge', '--abort']);
        return failed(
          operation,
          `Merge conflict with origin/${branch} could not be resolved automatically: ${result.message}`,
          'MERGE_CONFLICT_UNRESOLVED'
        );
      }
    }

    return succeeded(operation, 'Merge conflicts resolved using remote content', { branchUsed: branch });
  }

  private async publishLocalBranch(branch: string): Promise<SyncResult> {
    const operation = 'synchronize_with_remote';
    const localHead = await this.executor.probe(['rev-parse', '--verify', 'HEAD']);
    if (!localHead.ok) {
      return succeeded(operation, 'Nothing to synchronize: neither local nor remote has commits', { branchUsed: branch });
    }

    const push = await this.executor.run(['push', '--set-upstream', 'origin', `HEAD:refs/heads/${branch}`], 'publish_branch', {
      timeoutMs: LONG_TIMEOUT_MS,
    });
    if (!push.success) {
      return failed(operation, `Failed to create remote branch '${branch}': ${push.message}`, 'PUSH_FAILED', {
        attempts: push.attempts,
      });
    }

    this.clearCache();
    return succeeded(operation, `Remote branch '${branch}' created from local history`, {
      attempts: push.attempts,
      branchUsed: branch,
    });
  }

  private async checkRemotePreconditions(operation: string): Promise<SyncResult | null> {
    if (!this.localRepositoryExists()) {
      return failed(operation, `Cannot run ${operation}: local Git repository does not exist`, 'NO_LOCAL_REPO');
    }
    if (!this.config.remoteUrl) {
      return failed(operation, `Cannot run ${operation}: no remote URL configured`, 'NO_REMOTE_URL');
    }
    if ((await this.getOriginUrl()) === null) {
      return failed(operation, `Cannot run ${operation}: remote 'origin' not configured in local repository`, 'NO_LOCAL_REMOTE');
    }
    return null;
  }

  private async tipsDiffer(remoteUrl: string, branch: string): Promise<boolean> {
    const remote = await this.executor.probe(['ls-remote', remoteUrl, `refs/heads/${branch}`]);
    if (!remote.ok) {
      logger.debug('RepositoryState', `Could not read remote tip: ${remote.error}`);
      return false;
    }
    const local = await this.executor.probe(['rev-parse', '--verify', 'HEAD']);

    const remoteTip = remote.output.trim().split(/\s+/)[0] || null;
    const localTip = local.ok ? local.output.trim() || null : null;
    return remoteTip !== localTip;
  }

  /** ls-remote needs an existing working directory, not a repository */
  private probeDir(): string {
    return existsSync(this.repoDir) ? this.repoDir : path.dirname(this.repoDir);
  }
}
