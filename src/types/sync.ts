/**
 * Repository state, sync results and error taxonomy
 */

export enum RepositoryState {
  /** No local repository and no reachable remote */
  NEW_LOCAL = 'new_local',
  /** Local repository without tracking, or diverged from the remote */
  EXISTING_LOCAL = 'existing_local',
  /** Reachable remote that has not been cloned yet */
  EXISTING_REMOTE = 'existing_remote',
  /** Local repository tracks the remote and both tips match */
  SYNCHRONIZED = 'synchronized',
}

export interface RepositoryInfo {
  readonly state: RepositoryState;
  readonly localExists: boolean;
  readonly remoteExists: boolean;
  readonly remoteUrl?: string;
  readonly defaultBranch: string;
  readonly localBranch?: string;
  readonly trackingConfigured: boolean;
  readonly needsSync: boolean;
}

interface SyncResultBase {
  /** Name of the operation that produced this result */
  readonly operation: string;
  readonly message: string;
  readonly attempts: number;
  readonly repositoryInfo?: RepositoryInfo;
  readonly branchUsed?: string;
  /** stdout of the git command, when the result wraps one */
  readonly output?: string;
}

export interface SyncSuccess extends SyncResultBase {
  readonly success: true;
}

export interface SyncFailure extends SyncResultBase {
  readonly success: false;
  readonly errorCode: string;
}

export type SyncResult = SyncSuccess | SyncFailure;

export enum ErrorCategory {
  NETWORK = 'network',
  AUTHENTICATION = 'authentication',
  REPOSITORY_ACCESS = 'repository_access',
  BRANCH_DETECTION = 'branch_detection',
  MERGE_CONFLICT = 'merge_conflict',
  REPOSITORY_CORRUPTION = 'repository_corruption',
  CONFIGURATION = 'configuration',
  UNKNOWN = 'unknown',
}

export enum RecoveryAction {
  RETRY = 'retry',
  FALLBACK = 'fallback',
  USER_ACTION_REQUIRED = 'user_action_required',
  ABORT = 'abort',
  REINITIALIZE = 'reinitialize',
}

export interface ErrorResolution {
  readonly category: ErrorCategory;
  readonly action: RecoveryAction;
  readonly userMessage: string;
  readonly technicalMessage: string;
  readonly resolutionSteps: readonly string[];
  /** Pause between recovery attempts in ms */
  readonly retryDelayMs?: number;
  readonly maxRetries: number;
}

/**
 * Snapshot exposed to the rest of the application
 */
export interface RepositoryStatus {
  initialized: boolean;
  syncEnabled: boolean;
  repositoryExists: boolean;
  remoteConfigured: boolean;
  remoteUrl?: string;
  actualRemoteUrl?: string;
  lastError: string | null;
  pendingSyncs: number;
}
