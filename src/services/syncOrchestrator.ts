/**
 * add -> commit -> push for a single memory file, run one at a time
 */

import { Config, MEMORY_FILES_SUBDIR, SyncResult } from '../types/index.js';
import { BackgroundSupervisor, BackgroundTask } from '../utils/backgroundSupervisor.js';
import { CommandExecutor, LONG_TIMEOUT_MS } from '../utils/commandExecutor.js';
import { SerialTaskQueue } from '../utils/taskQueue.js';
import { SyncTelemetry } from '../utils/telemetry.js';
import { errorMessage, failed, succeeded } from '../utils/syncResult.js';
import { logger } from '../utils/logger.js';
import { ErrorRecoveryService } from './errorRecoveryService.js';
import { RepositoryStateService } from './repositoryStateService.js';

/** Implemented by the owner of the initialization state machine */
export interface SyncReadiness {
  isInitialized(): boolean;
  initialize(): Promise<SyncResult>;
}

export interface SyncOrchestratorDeps {
  executor: CommandExecutor;
  stateService: RepositoryStateService;
  recovery: ErrorRecoveryService;
  queue: SerialTaskQueue;
  supervisor: BackgroundSupervisor;
  telemetry: SyncTelemetry;
  readiness: SyncReadiness;
}

export class SyncOrchestrator {
  private config: Config;
  private deps: SyncOrchestratorDeps;

  constructor(config: Config, deps: SyncOrchestratorDeps) {
    this.config = config;
    this.deps = deps;
  }

  get pendingSyncs(): number {
    return this.deps.queue.size;
  }

  async syncMemoryWithRetry(memoryId: string, filename: string): Promise<SyncResult> {
    if (!this.config.enableSync) {
      return failed('sync_memory', 'Git synchronization is disabled', 'GIT_SYNC_DISABLED');
    }

    try {
      if (!this.deps.readiness.isInitialized()) {
        logger.info('SyncOrchestrator', 'Repository not initialized, initializing before sync');
        const init = await this.deps.readiness.initialize();
        if (!init.success) {
          return init;
        }
      }

      return await this.deps.queue.enqueue(() =>
        this.deps.telemetry.time('sync_memory', () => this.commitAndPush(memoryId, filename), { memoryId })
      );
    } catch (error) {
      return this.deps.recovery.handleError(errorMessage(error), 'sync_memory', 'GIT_SYNC_UNEXPECTED_ERROR', {
        memoryId,
        filename,
      });
    }
  }

  /**
   * Returns null when sync is disabled. The handle exists for tests and
   * shutdown; the outcome is only logged.
   */
  syncMemoryBackground(memoryId: string, filename: string): BackgroundTask | null {
    if (!this.config.enableSync) {
      logger.debug('SyncOrchestrator', `Sync disabled, not syncing memory ${memoryId}`);
      return null;
    }

    return this.deps.supervisor.spawn(`sync:${memoryId}`, async () => {
      const result = await this.syncMemoryWithRetry(memoryId, filename);
      if (result.success) {
        logger.info('SyncOrchestrator', result.message);
      } else {
        logger.warn('SyncOrchestrator', `Background sync failed for memory ${memoryId} [${result.errorCode}]: ${result.message}`);
      }
    });
  }

  private async commitAndPush(memoryId: string, filename: string): Promise<SyncResult> {
    const { executor, stateService } = this.deps;
    const relativePath = `${MEMORY_FILES_SUBDIR}/${filename}`;

    const add = await executor.run(['add', '--', relativePath], 'git_add');
    if (!add.success) {
      return add;
    }

    const commit = await executor.run(['commit', '-m', `Add memory ${memoryId}`], 'git_commit');
    if (!commit.success) {
      return commit;
    }

    let attempts = Math.max(add.attempts, commit.attempts);

    if (!this.config.remoteUrl) {
      return succeeded('sync_memory', `Memory ${memoryId} committed locally`, { attempts });
    }

    const info = await stateService.getRepositoryInfo();
    const branch = info.defaultBranch;
    const push = await executor.run(['push', 'origin', `HEAD:${branch}`], 'git_push', { timeoutMs: LONG_TIMEOUT_MS });
    attempts = Math.max(attempts, push.attempts);

    if (!push.success) {
      logger.warn('SyncOrchestrator', `Memory ${memoryId} committed but push failed: ${push.message}`);
      return succeeded('sync_memory', `Memory ${memoryId} committed locally (push failed: ${push.message})`, {
        attempts,
        branchUsed: branch,
        repositoryInfo: info,
      });
    }

    return succeeded('sync_memory', `Memory ${memoryId} synced to origin/${branch}`, {
      attempts,
      branchUsed: branch,
      repositoryInfo: info,
    });
  }
}
