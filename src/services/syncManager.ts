/**
 * Sync Manager - composes the git sync services for one memory store
 */

import * as fs from 'fs/promises';
import {
  Config,
  ErrorCategory,
  RepositoryInfo,
  RepositoryState,
  RepositoryStatus,
  SyncResult,
} from '../types/index.js';
import { BackgroundSupervisor, BackgroundTask } from '../utils/backgroundSupervisor.js';
import { CommandExecutor, Sleep, sleep } from '../utils/commandExecutor.js';
import { GitRunner, SimpleGitRunner } from '../utils/gitRunner.js';
import { SerialTaskQueue } from '../utils/taskQueue.js';
import { noopTelemetry, SyncTelemetry } from '../utils/telemetry.js';
import { errorMessage, succeeded } from '../utils/syncResult.js';
import { logger } from '../utils/logger.js';
import { BranchDetector } from './branchDetector.js';
import { ErrorRecoveryService, RecoveryFn } from './errorRecoveryService.js';
import { RepositoryStateService } from './repositoryStateService.js';
import { SyncOrchestrator } from './syncOrchestrator.js';

export interface SyncManagerDeps {
  runner?: GitRunner;
  telemetry?: SyncTelemetry;
  sleep?: Sleep;
}

export class SyncManager {
  private config: Config;
  private telemetry: SyncTelemetry;
  private stateService: RepositoryStateService;
  private recovery: ErrorRecoveryService;
  private orchestrator: SyncOrchestrator;
  private queue = new SerialTaskQueue();
  private supervisor = new BackgroundSupervisor();
  private initialized = false;
  private lastError: string | null = null;
  private pendingInitialization: Promise<SyncResult> | null = null;

  constructor(config: Config, deps: SyncManagerDeps = {}) {
    this.config = config;
    this.telemetry = deps.telemetry ?? noopTelemetry;
    const sleepFn = deps.sleep ?? sleep;

    const executor = new CommandExecutor(
      deps.runner ?? new SimpleGitRunner(),
      { cwd: config.repoDir, maxAttempts: config.retryAttempts, baseDelayMs: config.retryDelayMs },
      sleepFn
    );
    this.stateService = new RepositoryStateService(config, executor, new BranchDetector(executor));
    this.recovery = new ErrorRecoveryService(executor, this.stateService, sleepFn);
    this.orchestrator = new SyncOrchestrator(config, {
      executor,
      stateService: this.stateService,
      recovery: this.recovery,
      queue: this.queue,
      supervisor: this.supervisor,
      telemetry: this.telemetry,
      readiness: this,
    });
  }

  /**
   * Construct and, when sync is enabled, bring the repository into a usable state.
   * Sync problems are recorded in the status, never thrown.
   */
  static async create(config: Config, deps: SyncManagerDeps = {}): Promise<SyncManager> {
    const manager = new SyncManager(config, deps);
    if (config.enableSync) {
      const result = await manager.initialize();
      if (!result.success) {
        logger.warn('SyncManager', `Git sync initialization failed: ${result.message}`);
      }
    } else {
      logger.info('SyncManager', 'Git sync disabled');
    }
    return manager;
  }

  get repositoryState(): RepositoryStateService {
    return this.stateService;
  }

  get errorRecovery(): ErrorRecoveryService {
    return this.recovery;
  }

  /**
   * Concurrent callers share one in-flight run of the state machine.
   */
  initialize(): Promise<SyncResult> {
    if (!this.pendingInitialization) {
      this.pendingInitialization = this.initializeOnce().finally(() => {
        this.pendingInitialization = null;
      });
    }
    return this.pendingInitialization;
  }

  private async initializeOnce(): Promise<SyncResult> {
    try {
      const result = await this.telemetry.time('initialize', () => this.runInitialization());
      this.initialized = result.success && this.stateService.localRepositoryExists();
      this.lastError = result.success ? null : result.message;
      return result;
    } catch (error) {
      this.initialized = false;
      const result = this.recovery.handleError(errorMessage(error), 'initialize', 'GIT_INIT_UNEXPECTED_ERROR');
      this.lastError = result.message;
      return result;
    }
  }

  isInitialized(): boolean {
    return this.initialized && this.stateService.localRepositoryExists();
  }

  async getRepositoryStatus(): Promise<RepositoryStatus> {
    const actualRemoteUrl = this.config.enableSync ? await this.stateService.getOriginUrl() : null;
    return {
      initialized: this.isInitialized(),
      syncEnabled: this.config.enableSync,
      repositoryExists: this.stateService.localRepositoryExists(),
      remoteConfigured: Boolean(this.config.remoteUrl),
      remoteUrl: this.config.remoteUrl,
      actualRemoteUrl: actualRemoteUrl ?? undefined,
      lastError: this.lastError,
      pendingSyncs: this.orchestrator.pendingSyncs,
    };
  }

  syncMemoryWithRetry(memoryId: string, filename: string): Promise<SyncResult> {
    return this.orchestrator.syncMemoryWithRetry(memoryId, filename);
  }

  syncMemoryBackground(memoryId: string, filename: string): BackgroundTask | null {
    return this.orchestrator.syncMemoryBackground(memoryId, filename);
  }

  /**
   * Pick a recovery for a failed result and run it under the category's retry policy
   */
  async recoverFromError(result: SyncResult): Promise<SyncResult> {
    if (result.success) {
      return result;
    }

    const category = this.recovery.categorize(result.message, result.errorCode);
    logger.info('SyncManager', `Recovering from ${category} error in ${result.operation}`);

    let recoveryFn: RecoveryFn;
    switch (category) {
      case ErrorCategory.REPOSITORY_CORRUPTION:
        recoveryFn = () => this.repairAndReinitialize();
        break;
      case ErrorCategory.BRANCH_DETECTION:
        recoveryFn = () => {
          this.stateService.clearCache();
          return this.initialize();
        };
        break;
      default:
        recoveryFn = () => this.initialize();
    }

    return this.recovery.attemptRecovery(category, recoveryFn, {
      operation: result.operation,
      errorCode: result.errorCode,
    });
  }

  async validateAndRecover(): Promise<SyncResult> {
    const integrity = await this.recovery.validateRepositoryIntegrity();
    if (integrity.success) {
      return integrity;
    }

    if (integrity.errorCode === 'NO_REPOSITORY') {
      logger.info('SyncManager', 'No repository found, initializing');
      return this.initialize();
    }

    logger.warn('SyncManager', `Integrity check failed: ${integrity.message}`);
    return this.recovery.attemptRecovery(ErrorCategory.REPOSITORY_CORRUPTION, () => this.repairAndReinitialize());
  }

  /**
   * Resolves when background syncs and queued syncs have all settled
   */
  async whenIdle(): Promise<void> {
    await this.supervisor.drain();
    await this.queue.idle();
  }

  private async repairAndReinitialize(): Promise<SyncResult> {
    const repair = await this.recovery.recoverCorruptedRepository();
    if (!repair.success || !this.config.enableSync) {
      return repair;
    }

    const init = await this.initialize();
    if (!init.success) {
      return init;
    }
    return succeeded('repair_repository', `${repair.message}. ${init.message}`, {
      branchUsed: init.branchUsed,
      repositoryInfo: init.repositoryInfo,
    });
  }

  private async runInitialization(): Promise<SyncResult> {
    await fs.mkdir(this.config.repoDir, { recursive: true });

    this.stateService.clearCache();
    const info = await this.stateService.getRepositoryInfo();
    logger.info('SyncManager', `Repository state: ${info.state} (branch: ${info.defaultBranch})`);

    switch (info.state) {
      case RepositoryState.NEW_LOCAL:
        return this.initializeNewRepository(info);
      case RepositoryState.EXISTING_REMOTE:
        return this.cloneRemoteRepository(info);
      case RepositoryState.EXISTING_LOCAL:
        return this.reconcileLocalRepository(info);
      case RepositoryState.SYNCHRONIZED:
        return this.validateSynchronizedRepository(info);
    }
  }

  private async initializeNewRepository(info: RepositoryInfo): Promise<SyncResult> {
    const init = await this.stateService.initializeRepository(info.defaultBranch);
    if (!init.success) {
      return init;
    }

    if (this.config.remoteUrl) {
      const remote = await this.stateService.configureRemote();
      if (!remote.success) {
        logger.warn('SyncManager', `Failed to configure remote, continuing: ${remote.message}`);
      }
    }

    return succeeded('initialize', `Initialized new memory repository in ${this.config.repoDir}`, {
      branchUsed: info.defaultBranch,
      repositoryInfo: await this.stateService.getRepositoryInfo(),
    });
  }

  private async cloneRemoteRepository(info: RepositoryInfo): Promise<SyncResult> {
    const clone = await this.stateService.cloneExistingRepository();
    if (!clone.success) {
      return clone;
    }

    await this.stateService.ensureIdentity();

    const tracking = await this.stateService.setupUpstreamTracking(info.defaultBranch);
    if (!tracking.success) {
      logger.warn('SyncManager', `Upstream tracking setup failed, continuing: ${tracking.message}`);
    }

    return succeeded('initialize', clone.message, {
      branchUsed: info.defaultBranch,
      repositoryInfo: await this.stateService.getRepositoryInfo(),
    });
  }

  private async reconcileLocalRepository(info: RepositoryInfo): Promise<SyncResult> {
    const notes: string[] = [];
    await this.stateService.ensureIdentity();

    if (this.config.remoteUrl && (await this.stateService.getOriginUrl()) !== this.config.remoteUrl) {
      const remote = await this.stateService.configureRemote();
      if (!remote.success) {
        logger.warn('SyncManager', `Failed to configure remote, continuing: ${remote.message}`);
      }
      notes.push(remote.message);
    }

    if (this.config.remoteUrl && info.remoteExists && info.needsSync) {
      const sync = await this.stateService.synchronizeWithRemote();
      if (!sync.success) {
        logger.warn('SyncManager', `Synchronization with remote failed, continuing: ${sync.message}`);
      }
      notes.push(sync.message);
    }

    this.stateService.clearCache();
    const current = await this.stateService.getRepositoryInfo();
    if (this.config.remoteUrl && current.remoteExists && !current.trackingConfigured) {
      const tracking = await this.stateService.setupUpstreamTracking(current.defaultBranch);
      if (!tracking.success) {
        logger.warn('SyncManager', `Upstream tracking setup failed, continuing: ${tracking.message}`);
      }
      notes.push(tracking.message);
    }

    const suffix = notes.length > 0 ? `: ${notes.join('; ')}` : '';
    return succeeded('initialize', `Existing memory repository ready${suffix}`, {
      branchUsed: current.defaultBranch,
      repositoryInfo: await this.stateService.getRepositoryInfo(),
    });
  }

  private async validateSynchronizedRepository(info: RepositoryInfo): Promise<SyncResult> {
    const validation = await this.stateService.validateConfiguration();
    if (!validation.success) {
      logger.warn('SyncManager', validation.message);
    }

    const note = validation.success ? '' : ` (${validation.message})`;
    return succeeded('initialize', `Repository already synchronized with remote${note}`, {
      branchUsed: info.defaultBranch,
      repositoryInfo: info,
    });
  }
}
