import { mkdir, mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { Config } from '../../src/types/index.js';
import { BranchDetector } from '../../src/services/branchDetector.js';
import { ErrorRecoveryService } from '../../src/services/errorRecoveryService.js';
import { RepositoryStateService } from '../../src/services/repositoryStateService.js';
import { CommandExecutor } from '../../src/utils/commandExecutor.js';
import { FakeGitRunner } from './fakeGitRunner.js';

export const REMOTE_URL = 'https://example.com/team/memories.git';

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(tmpdir(), 'memory-sync-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function makeConfig(repoDir: string, overrides: Partial<Config> = {}): Config {
  return {
    repoDir,
    enableSync: true,
    remoteUrl: undefined,
    retryAttempts: 1,
    retryDelayMs: 10,
    maxSearchResults: 25,
    logLevel: 'error',
    ...overrides,
  };
}

export interface ServiceSet {
  config: Config;
  runner: FakeGitRunner;
  sleeps: number[];
  executor: CommandExecutor;
  stateService: RepositoryStateService;
  recovery: ErrorRecoveryService;
}

export function makeServices(config: Config, runner: FakeGitRunner = new FakeGitRunner()): ServiceSet {
  const sleeps: number[] = [];
  const sleep = async (ms: number) => {
    sleeps.push(ms);
  };
  const executor = new CommandExecutor(
    runner,
    { cwd: config.repoDir, maxAttempts: config.retryAttempts, baseDelayMs: config.retryDelayMs },
    sleep
  );
  const stateService = new RepositoryStateService(config, executor, new BranchDetector(executor));
  const recovery = new ErrorRecoveryService(executor, stateService, sleep);
  return { config, runner, sleeps, executor, stateService, recovery };
}

/** Response for `git init` that creates the .git directory like the real command */
export function initCreatesGitDir(): (args: string[], options: { cwd: string }) => Promise<string> {
  return async (_args, options) => {
    await mkdir(path.join(options.cwd, '.git'), { recursive: true });
    return `Initialized empty Git repository in ${options.cwd}/.git/\n`;
  };
}
