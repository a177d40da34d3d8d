/**
 * Error categorization, recovery strategy execution and corruption repair
 */

import { existsSync } from 'fs';
import * as fs from 'fs/promises';
import { ErrorCategory, ErrorResolution, RecoveryAction, SyncResult } from '../types/index.js';
import { CommandExecutor, DEFAULT_TIMEOUT_MS, LONG_TIMEOUT_MS, Sleep, sleep } from '../utils/commandExecutor.js';
import { errorMessage, failed, succeeded } from '../utils/syncResult.js';
import { logger } from '../utils/logger.js';
import { categorizeByCode, ERROR_RESOLUTIONS, ERROR_RULES } from './errorStrategies.js';
import { RepositoryStateService } from './repositoryStateService.js';

export type RecoveryContext = Record<string, string | number | boolean | undefined>;

export type RecoveryFn = () => Promise<SyncResult>;

export function categorize(message: string, code?: string): ErrorCategory {
  const lower = message.toLowerCase();
  if (lower) {
    const rule = ERROR_RULES.find(candidate => candidate.matches(lower));
    if (rule) {
      logger.debug('ErrorRecovery', `Categorized error as ${rule.category} (${rule.description})`);
      return rule.category;
    }
  }
  return code ? categorizeByCode(code) : ErrorCategory.UNKNOWN;
}

export function formatErrorMessage(resolution: ErrorResolution, rawError: string, context?: RecoveryContext): string {
  const lines = [resolution.userMessage, '', 'What you can do:'];
  resolution.resolutionSteps.forEach((step, index) => {
    lines.push(`  ${index + 1}. ${step}`);
  });

  if (resolution.action === RecoveryAction.RETRY && resolution.maxRetries > 0) {
    lines.push('', `This operation will be retried automatically (up to ${resolution.maxRetries} times)`);
  }

  lines.push(
    '',
    'Technical details:',
    `  - Error: ${resolution.technicalMessage}`,
    `  - Raw error: ${rawError}`,
    `  - Category: ${resolution.category}`,
    `  - Action: ${resolution.action}`
  );

  if (context) {
    const entries = Object.entries(context).filter(([, value]) => value !== undefined);
    if (entries.length > 0) {
      lines.push('  - Context:');
      for (const [key, value] of entries) {
        lines.push(`    ${key}: ${value}`);
      }
    }
  }

  return lines.join('\n');
}

export class ErrorRecoveryService {
  private executor: CommandExecutor;
  private stateService: RepositoryStateService;
  private sleep: Sleep;

  constructor(executor: CommandExecutor, stateService: RepositoryStateService, sleepFn: Sleep = sleep) {
    this.executor = executor;
    this.stateService = stateService;
    this.sleep = sleepFn;
  }

  categorize(message: string, code?: string): ErrorCategory {
    return categorize(message, code);
  }

  getResolution(category: ErrorCategory): ErrorResolution {
    return ERROR_RESOLUTIONS[category] ?? ERROR_RESOLUTIONS[ErrorCategory.UNKNOWN];
  }

  /**
   * Convert a failure into a user-displayable SyncFailure
   */
  handleError(message: string, operation: string, code?: string, context?: RecoveryContext): SyncResult {
    const category = this.categorize(message, code);
    const resolution = this.getResolution(category);

    logger.error('ErrorRecovery', `Git sync error in ${operation}: ${message} (category: ${category}, action: ${resolution.action})`);

    return failed(
      operation,
      formatErrorMessage(resolution, message, context),
      `${category.toUpperCase()}_${code ?? 'ERROR'}`
    );
  }

  async attemptRecovery(category: ErrorCategory, recoveryFn: RecoveryFn, context?: RecoveryContext): Promise<SyncResult> {
    const resolution = this.getResolution(category);

    if (resolution.action === RecoveryAction.USER_ACTION_REQUIRED) {
      logger.info('ErrorRecovery', `No automatic recovery for ${category}: user action required`);
      return failed('error_recovery', resolution.userMessage, 'USER_ACTION_REQUIRED');
    }

    if (resolution.action === RecoveryAction.ABORT) {
      return failed('error_recovery', 'Operation aborted due to unrecoverable error', 'OPERATION_ABORTED');
    }

    const totalAttempts = resolution.maxRetries + 1;
    const contextNote = context ? ` ${JSON.stringify(context)}` : '';
    let lastMessage = '';

    for (let attempt = 1; attempt <= totalAttempts; attempt++) {
      if (attempt > 1 && resolution.retryDelayMs) {
        await this.sleep(resolution.retryDelayMs);
      }

      try {
        logger.info('ErrorRecovery', `Recovery attempt ${attempt}/${totalAttempts} for ${category}${contextNote}`);
        const result = await recoveryFn();
        if (result.success) {
          logger.info('ErrorRecovery', `Recovery successful after ${attempt} attempt(s)`);
          return result;
        }
        lastMessage = result.message;
      } catch (error) {
        lastMessage = errorMessage(error);
        logger.error('ErrorRecovery', `Recovery attempt ${attempt} threw`, error);
      }
    }

    const detail = lastMessage ? `: ${lastMessage}` : '';
    return failed('error_recovery', `Recovery failed after ${totalAttempts} attempts${detail}`, 'RECOVERY_FAILED', {
      attempts: totalAttempts,
    });
  }

  async validateRepositoryIntegrity(): Promise<SyncResult> {
    if (!existsSync(this.stateService.gitDir)) {
      return failed('integrity_check', 'No Git repository found', 'NO_REPOSITORY');
    }

    const result = await this.executor.probe(['fsck', '--quiet'], { timeoutMs: DEFAULT_TIMEOUT_MS });
    if (result.ok) {
      return succeeded('integrity_check', 'Repository integrity check passed');
    }
    if (result.timedOut) {
      return failed('integrity_check', 'Repository integrity check timed out', 'INTEGRITY_TIMEOUT');
    }
    return failed('integrity_check', `Repository integrity issues detected: ${result.error}`, 'INTEGRITY_FAILED');
  }

  /**
   * Try gc first; when the repository is still damaged, delete .git and start over.
   * Working files under the repository directory are left alone.
   */
  async recoverCorruptedRepository(): Promise<SyncResult> {
    const operation = 'corruption_recovery';
    logger.warn('ErrorRecovery', 'Attempting to recover from repository corruption');

    try {
      const gc = await this.executor.run(['gc', '--prune=now'], 'repository_gc', {
        maxAttempts: 1,
        timeoutMs: LONG_TIMEOUT_MS,
      });
      if (gc.success) {
        const integrity = await this.validateRepositoryIntegrity();
        if (integrity.success) {
          this.stateService.clearCache();
          return succeeded(operation, 'Repository corruption repaired by garbage collection');
        }
      }

      logger.warn('ErrorRecovery', 'Repository repair failed, reinitializing');
      await fs.rm(this.stateService.gitDir, { recursive: true, force: true });

      const init = await this.stateService.initializeRepository();
      if (!init.success) {
        return failed(operation, `Failed to reinitialize repository after corruption: ${init.message}`, 'RECOVERY_FAILED');
      }

      return succeeded(
        operation,
        'Repository reinitialized after corruption: local Git history was removed, working files were preserved',
        { branchUsed: init.branchUsed }
      );
    } catch (error) {
      logger.error('ErrorRecovery', 'Corruption recovery failed', error);
      return failed(operation, `Failed to recover from repository corruption: ${errorMessage(error)}`, 'RECOVERY_FAILED');
    }
  }
}
