import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { existsSync } from 'fs';
import { mkdir } from 'fs/promises';
import * as path from 'path';
import { RepositoryState } from '../../src/types/index.js';
import { SyncManager } from '../../src/services/syncManager.js';
import { GitCommandError } from '../../src/utils/gitRunner.js';
import { failed } from '../../src/utils/syncResult.js';
import { FakeGitRunner } from '../helpers/fakeGitRunner.js';
import { initCreatesGitDir, makeConfig, makeTempDir, removeTempDir, REMOTE_URL } from '../helpers/fixtures.js';

const MEMORY_ID = 'ab12cd34';
const FILENAME = '20240101_120000_ab12cd34.md';

describe('SyncManager', () => {
  let tempDir: string;
  let sleeps: number[];
  const sleep = async (ms: number) => {
    sleeps.push(ms);
  };

  beforeEach(async () => {
    tempDir = await makeTempDir();
    sleeps = [];
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  /** Existing local repository on main whose remote cannot be reached */
  function offlineRemoteRunner(): FakeGitRunner {
    return new FakeGitRunner()
      .fail('ls-remote', 'fatal: unable to access: Could not resolve host')
      .on('branch --show-current', 'main\n')
      .on('remote get-url', `${REMOTE_URL}\n`);
  }

  describe('with sync disabled', () => {
    it('fails fast with no filesystem or git side effects', async () => {
      const repoDir = path.join(tempDir, 'store');
      const runner = new FakeGitRunner();
      const manager = await SyncManager.create(makeConfig(repoDir, { enableSync: false }), { runner, sleep });

      const result = await manager.syncMemoryWithRetry(MEMORY_ID, FILENAME);

      expect(result.success).toBe(false);
      expect(result.success ? undefined : result.errorCode).toBe('GIT_SYNC_DISABLED');
      expect(manager.syncMemoryBackground(MEMORY_ID, FILENAME)).toBeNull();
      expect(runner.calls).toHaveLength(0);
      expect(existsSync(repoDir)).toBe(false);
    });

    it('reports status without touching git', async () => {
      const runner = new FakeGitRunner();
      const manager = await SyncManager.create(makeConfig(tempDir, { enableSync: false }), { runner, sleep });

      expect(await manager.getRepositoryStatus()).toEqual({
        initialized: false,
        syncEnabled: false,
        repositoryExists: false,
        remoteConfigured: false,
        remoteUrl: undefined,
        actualRemoteUrl: undefined,
        lastError: null,
        pendingSyncs: 0,
      });
      expect(runner.calls).toHaveLength(0);
    });
  });

  describe('initialize', () => {
    it('creates a fresh repository with identity for an empty directory and no remote', async () => {
      const runner = new FakeGitRunner().on('init', initCreatesGitDir());

      const manager = await SyncManager.create(makeConfig(tempDir), { runner, sleep });

      expect(manager.isInitialized()).toBe(true);
      expect(runner.commands()).toEqual([
        'init',
        'symbolic-ref HEAD refs/heads/main',
        'config --get user.name',
        'config user.name Memory Sync',
        'config --get user.email',
        'config user.email memory-sync@localhost',
        'branch --show-current',
        'branch --show-current',
      ]);

      const status = await manager.getRepositoryStatus();
      expect(status.initialized).toBe(true);
      expect(status.repositoryExists).toBe(true);
      expect(status.lastError).toBeNull();
    });

    it('returns the NEW_LOCAL result when called directly', async () => {
      const runner = new FakeGitRunner().on('init', initCreatesGitDir());
      const manager = new SyncManager(makeConfig(path.join(tempDir, 'store')), { runner, sleep });

      const result = await manager.initialize();

      expect(result.success).toBe(true);
      expect(result.message).toBe(`Initialized new memory repository in ${path.join(tempDir, 'store')}`);
      expect(result.branchUsed).toBe('main');
      expect(result.repositoryInfo?.state).toBe(RepositoryState.EXISTING_LOCAL);
    });

    it('configures origin for a new repository when a remote is set but unreachable', async () => {
      const runner = new FakeGitRunner()
        .on('init', initCreatesGitDir())
        .fail('ls-remote', 'fatal: unable to access: Could not resolve host')
        .fail('remote get-url', "error: No such remote 'origin'");

      const manager = await SyncManager.create(makeConfig(tempDir, { remoteUrl: REMOTE_URL }), { runner, sleep });

      expect(manager.isInitialized()).toBe(true);
      expect(runner.commands()).toContain(`remote add origin ${REMOTE_URL}`);
    });

    it('records the failure and stays uninitialized when git init fails', async () => {
      const runner = new FakeGitRunner().fail('init', 'fatal: cannot mkdir .git: Permission denied');

      const manager = await SyncManager.create(makeConfig(tempDir), { runner, sleep });

      expect(manager.isInitialized()).toBe(false);
      const status = await manager.getRepositoryStatus();
      expect(status.lastError).toBe('git_init failed (attempt 1/1): fatal: cannot mkdir .git: Permission denied');
    });

    it('clones an existing remote and sets up tracking', async () => {
      const runner = new FakeGitRunner()
        .on('ls-remote --symref', 'ref: refs/heads/main\tHEAD\n')
        .on('clone', async args => {
          await mkdir(path.join(args[4], '.git'), { recursive: true });
          return '';
        })
        .on('remote get-url', `${REMOTE_URL}\n`)
        .on('config --get branch.main.remote', 'origin\n');

      const manager = await SyncManager.create(makeConfig(tempDir, { remoteUrl: REMOTE_URL }), { runner, sleep });

      expect(manager.isInitialized()).toBe(true);
      expect(runner.commands()).toContain(`clone --origin origin ${REMOTE_URL} ${tempDir}`);
      expect(runner.commands()).toContain('fetch origin');
    });
  });

  describe('initialize with an existing local repository', () => {
    function reachableRemoteRunner(remoteTip: string): FakeGitRunner {
      return new FakeGitRunner()
        .on('ls-remote --symref', 'ref: refs/heads/main\tHEAD\n')
        .on(['ls-remote', REMOTE_URL], `${remoteTip}\trefs/heads/main\n`)
        .on('branch --show-current', 'main\n')
        .on('rev-parse --verify HEAD', 'aaa111\n')
        .on('rev-parse --verify refs/remotes/origin/main', `${remoteTip}\n`);
    }

    it('adds origin, merges diverged remote history and sets up tracking', async () => {
      await mkdir(path.join(tempDir, '.git'));
      const missingOrigin = new GitCommandError(['remote', 'get-url', 'origin'], 'error: No such remote');
      const runner = reachableRemoteRunner('bbb222')
        .on('remote get-url', missingOrigin, missingOrigin, `${REMOTE_URL}\n`)
        .on('config --get branch.main.remote', '', '', '', 'origin\n');
      const manager = new SyncManager(makeConfig(tempDir, { remoteUrl: REMOTE_URL }), { runner, sleep });

      const result = await manager.initialize();

      expect(result.success).toBe(true);
      expect(result.branchUsed).toBe('main');
      expect(result.message).toBe(
        `Existing memory repository ready: Remote origin added: ${REMOTE_URL}; ` +
          'Synchronized with origin/main; remote content took precedence over local state.'
      );
      expect(manager.isInitialized()).toBe(true);
      const commands = runner.commands();
      expect(commands).toContain(`remote add origin ${REMOTE_URL}`);
      expect(commands).toContain('merge --no-edit --allow-unrelated-histories -X theirs origin/main');
      expect(commands).toContain('branch --set-upstream-to=origin/main main');
    });

    it('stays usable when synchronization and tracking setup fail', async () => {
      await mkdir(path.join(tempDir, '.git'));
      const runner = reachableRemoteRunner('bbb222')
        .on('remote get-url', `${REMOTE_URL}\n`)
        .fail('fetch', 'fatal: early EOF');
      const manager = new SyncManager(makeConfig(tempDir, { remoteUrl: REMOTE_URL }), { runner, sleep });

      const result = await manager.initialize();

      expect(result.success).toBe(true);
      expect(result.message).toBe(
        'Existing memory repository ready: ' +
          'Failed to fetch from remote: fetch_origin failed (attempt 1/1): fatal: early EOF; ' +
          'Failed to fetch from origin: fetch_origin failed (attempt 1/1): fatal: early EOF'
      );
      expect(manager.isInitialized()).toBe(true);
      expect(runner.commands().some(command => command.startsWith('merge'))).toBe(false);
    });

    it('validates configuration of an already synchronized repository without fetching', async () => {
      await mkdir(path.join(tempDir, '.git'));
      const runner = reachableRemoteRunner('aaa111')
        .on('remote get-url', `${REMOTE_URL}\n`)
        .on('config --get branch.main.remote', 'origin\n')
        .on('config --get user.name', 'Memory Sync\n');
      const manager = new SyncManager(makeConfig(tempDir, { remoteUrl: REMOTE_URL }), { runner, sleep });

      const result = await manager.initialize();

      expect(result.success).toBe(true);
      expect(result.repositoryInfo?.state).toBe(RepositoryState.SYNCHRONIZED);
      expect(result.message).toBe(
        'Repository already synchronized with remote (Git configuration validation failed: Git user.email not configured)'
      );
      const commands = runner.commands();
      expect(commands.some(command => command.startsWith('fetch') || command.startsWith('merge'))).toBe(false);
      expect(commands).not.toContain('config user.email memory-sync@localhost');
    });
  });

  describe('syncMemoryWithRetry', () => {
    it('stages the memory file, commits and pushes to the default branch', async () => {
      await mkdir(path.join(tempDir, '.git'));
      const runner = offlineRemoteRunner();
      const manager = await SyncManager.create(makeConfig(tempDir, { remoteUrl: REMOTE_URL }), { runner, sleep });
      const before = runner.calls.length;

      const result = await manager.syncMemoryWithRetry(MEMORY_ID, FILENAME);

      expect(result.success).toBe(true);
      expect(result.message).toBe(`Memory ${MEMORY_ID} synced to origin/main`);
      expect(result.branchUsed).toBe('main');
      expect(runner.calls.slice(before)).toEqual([
        { args: ['add', '--', `files/${FILENAME}`], cwd: tempDir, timeoutMs: 30_000 },
        { args: ['commit', '-m', `Add memory ${MEMORY_ID}`], cwd: tempDir, timeoutMs: 30_000 },
        { args: ['push', 'origin', 'HEAD:main'], cwd: tempDir, timeoutMs: 60_000 },
      ]);
    });

    it('reports a soft success when the push fails after a local commit', async () => {
      await mkdir(path.join(tempDir, '.git'));
      const runner = offlineRemoteRunner().fail('push', 'fatal: unable to access remote');
      const config = makeConfig(tempDir, { remoteUrl: REMOTE_URL, retryAttempts: 2, retryDelayMs: 10 });
      const manager = await SyncManager.create(config, { runner, sleep });

      const result = await manager.syncMemoryWithRetry(MEMORY_ID, FILENAME);

      expect(result.success).toBe(true);
      expect(result.attempts).toBe(2);
      expect(result.message).toBe(
        `Memory ${MEMORY_ID} committed locally (push failed: git_push failed (attempt 2/2): fatal: unable to access remote)`
      );
      expect(sleeps).toEqual([10]);
    });

    it('returns a commit failure as-is and does not push', async () => {
      await mkdir(path.join(tempDir, '.git'));
      const runner = offlineRemoteRunner().fail('commit', 'nothing to commit, working tree clean');
      const manager = await SyncManager.create(makeConfig(tempDir, { remoteUrl: REMOTE_URL }), { runner, sleep });

      const result = await manager.syncMemoryWithRetry(MEMORY_ID, FILENAME);

      expect(result.success).toBe(false);
      expect(result.operation).toBe('git_commit');
      expect(result.success ? undefined : result.errorCode).toBe('GIT_COMMAND_FAILED');
      expect(runner.commands().some(command => command.startsWith('push'))).toBe(false);
    });

    it('commits locally without pushing when no remote is configured', async () => {
      await mkdir(path.join(tempDir, '.git'));
      const runner = new FakeGitRunner();
      const manager = await SyncManager.create(makeConfig(tempDir), { runner, sleep });

      const result = await manager.syncMemoryWithRetry(MEMORY_ID, FILENAME);

      expect(result.message).toBe(`Memory ${MEMORY_ID} committed locally`);
      expect(runner.commands().some(command => command.startsWith('push'))).toBe(false);
    });

    it('initializes first when the repository is not ready', async () => {
      const runner = new FakeGitRunner().on('init', initCreatesGitDir());
      const manager = new SyncManager(makeConfig(tempDir), { runner, sleep });

      const result = await manager.syncMemoryWithRetry(MEMORY_ID, FILENAME);

      expect(result.success).toBe(true);
      expect(runner.commands()[0]).toBe('init');
      expect(manager.isInitialized()).toBe(true);
    });

    it('shares one initialization between concurrent syncs', async () => {
      const createGitDir = initCreatesGitDir();
      const runner = new FakeGitRunner().on('init', async (args, options) => {
        await new Promise(resolve => setTimeout(resolve, 10));
        return createGitDir(args, options);
      });
      const manager = new SyncManager(makeConfig(tempDir), { runner, sleep });

      const results = await Promise.all([
        manager.syncMemoryWithRetry('aaaaaaaa', '20240101_120000_aaaaaaaa.md'),
        manager.syncMemoryWithRetry('bbbbbbbb', '20240101_120001_bbbbbbbb.md'),
      ]);

      expect(results.map(result => result.success)).toEqual([true, true]);
      expect(runner.commands().filter(command => command === 'init')).toHaveLength(1);
    });

    it('returns a staging failure unchanged and does not commit', async () => {
      await mkdir(path.join(tempDir, '.git'));
      const runner = new FakeGitRunner().fail('add', 'fatal: pathspec did not match any files');
      const manager = await SyncManager.create(makeConfig(tempDir), { runner, sleep });

      const result = await manager.syncMemoryWithRetry(MEMORY_ID, FILENAME);

      expect(result).toEqual({
        success: false,
        operation: 'git_add',
        message: 'git_add failed (attempt 1/1): fatal: pathspec did not match any files',
        errorCode: 'GIT_COMMAND_FAILED',
        attempts: 1,
        repositoryInfo: undefined,
        branchUsed: undefined,
        output: undefined,
      });
      expect(runner.commands().some(command => command.startsWith('commit'))).toBe(false);
    });

    it('runs concurrent syncs one after another', async () => {
      await mkdir(path.join(tempDir, '.git'));
      const runner = new FakeGitRunner().on('add', async () => {
        await new Promise(resolve => setTimeout(resolve, 5));
        return '';
      });
      const manager = await SyncManager.create(makeConfig(tempDir), { runner, sleep });
      const before = runner.calls.length;

      await Promise.all([
        manager.syncMemoryWithRetry('aaaaaaaa', '20240101_120000_aaaaaaaa.md'),
        manager.syncMemoryWithRetry('bbbbbbbb', '20240101_120001_bbbbbbbb.md'),
      ]);

      expect(runner.commands().slice(before)).toEqual([
        'add -- files/20240101_120000_aaaaaaaa.md',
        'commit -m Add memory aaaaaaaa',
        'add -- files/20240101_120001_bbbbbbbb.md',
        'commit -m Add memory bbbbbbbb',
      ]);
    });
  });

  describe('syncMemoryBackground', () => {
    it('returns a handle that completes after the commit', async () => {
      await mkdir(path.join(tempDir, '.git'));
      const runner = new FakeGitRunner();
      const manager = await SyncManager.create(makeConfig(tempDir), { runner, sleep });

      const task = manager.syncMemoryBackground(MEMORY_ID, FILENAME);
      expect(task?.name).toBe(`sync:${MEMORY_ID}`);
      await task?.done;

      expect(runner.commands()).toContain(`commit -m Add memory ${MEMORY_ID}`);
    });

    it('swallows failures and whenIdle() still resolves', async () => {
      await mkdir(path.join(tempDir, '.git'));
      const runner = new FakeGitRunner().fail('add', 'fatal: pathspec did not match any files');
      const manager = await SyncManager.create(makeConfig(tempDir), { runner, sleep });

      manager.syncMemoryBackground(MEMORY_ID, FILENAME);
      await manager.whenIdle();

      expect(runner.commands()).toContain(`add -- files/${FILENAME}`);
      expect((await manager.getRepositoryStatus()).pendingSyncs).toBe(0);
    });
  });

  describe('recoverFromError', () => {
    it('does not attempt recovery for authentication failures', async () => {
      await mkdir(path.join(tempDir, '.git'));
      const runner = new FakeGitRunner();
      const manager = await SyncManager.create(makeConfig(tempDir), { runner, sleep });
      const before = runner.calls.length;

      const result = await manager.recoverFromError(
        failed('git_push', 'remote: Permission denied to user', 'GIT_COMMAND_FAILED')
      );

      expect(result.success ? undefined : result.errorCode).toBe('USER_ACTION_REQUIRED');
      expect(runner.calls.length).toBe(before);
    });

    it('reinitializes after a network failure', async () => {
      await mkdir(path.join(tempDir, '.git'));
      const runner = new FakeGitRunner();
      const manager = await SyncManager.create(makeConfig(tempDir), { runner, sleep });

      const result = await manager.recoverFromError(
        failed('git_push', 'fatal: Connection refused', 'GIT_COMMAND_FAILED')
      );

      expect(result.success).toBe(true);
      expect(result.operation).toBe('initialize');
      expect(sleeps).toEqual([]);
    });
    it('clears cached repository state before reinitializing after a branch failure', async () => {
      await mkdir(path.join(tempDir, '.git'));
      const runner = new FakeGitRunner();
      const manager = await SyncManager.create(makeConfig(tempDir), { runner, sleep });
      const clearCache = vi.spyOn(manager.repositoryState, 'clearCache');
      const before = runner.calls.length;

      const result = await manager.recoverFromError(
        failed('checkout_default_branch', "fatal: ambiguous argument 'origin/trunk': unknown revision", 'GIT_COMMAND_FAILED')
      );

      expect(result.success).toBe(true);
      expect(result.operation).toBe('initialize');
      expect(clearCache).toHaveBeenCalled();
      expect(runner.commands().slice(before)).toContain('branch --show-current');
    });

    it('repairs the repository after a corruption failure', async () => {
      await mkdir(path.join(tempDir, '.git'));
      const runner = new FakeGitRunner();
      const manager = await SyncManager.create(makeConfig(tempDir), { runner, sleep });
      const before = runner.calls.length;

      const result = await manager.recoverFromError(
        failed('git_commit', 'fatal: loose object abcd1234 is corrupt', 'GIT_COMMAND_FAILED')
      );

      expect(result.success).toBe(true);
      expect(result.operation).toBe('repair_repository');
      expect(result.message).toBe(
        'Repository corruption repaired by garbage collection. Existing memory repository ready'
      );
      expect(runner.commands().slice(before, before + 2)).toEqual(['gc --prune=now', 'fsck --quiet']);
    });
  });

  describe('validateAndRecover', () => {
    it('passes through a healthy repository', async () => {
      await mkdir(path.join(tempDir, '.git'));
      const manager = await SyncManager.create(makeConfig(tempDir), { runner: new FakeGitRunner(), sleep });

      const result = await manager.validateAndRecover();

      expect(result.message).toBe('Repository integrity check passed');
    });

    it('reinitializes a repository that gc cannot repair', async () => {
      await mkdir(path.join(tempDir, '.git'));
      const runner = new FakeGitRunner().fail('fsck', 'error: corrupt loose object').on('init', initCreatesGitDir());
      const manager = await SyncManager.create(makeConfig(tempDir), { runner, sleep });

      const result = await manager.validateAndRecover();

      expect(result.success).toBe(true);
      expect(result.operation).toBe('repair_repository');
      expect(result.message).toBe(
        'Repository reinitialized after corruption: local Git history was removed, working files were preserved. ' +
          'Existing memory repository ready'
      );
      expect(runner.commands()).toContain('gc --prune=now');
      expect(manager.isInitialized()).toBe(true);
    });
  });
});
