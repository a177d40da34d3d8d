/**
 * Constructors for immutable SyncResult values
 */

import type { RepositoryInfo, SyncFailure, SyncSuccess } from '../types/index.js';

interface ResultExtras {
  attempts?: number;
  repositoryInfo?: RepositoryInfo;
  branchUsed?: string;
  output?: string;
}

export function succeeded(operation: string, message: string, extras: ResultExtras = {}): SyncSuccess {
  return Object.freeze({
    success: true,
    operation,
    message,
    attempts: extras.attempts ?? 1,
    repositoryInfo: extras.repositoryInfo,
    branchUsed: extras.branchUsed,
    output: extras.output,
  });
}

export function failed(operation: string, message: string, errorCode: string, extras: ResultExtras = {}): SyncFailure {
  return Object.freeze({
    success: false,
    operation,
    message,
    errorCode,
    attempts: extras.attempts ?? 1,
    repositoryInfo: extras.repositoryInfo,
    branchUsed: extras.branchUsed,
    output: extras.output,
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
