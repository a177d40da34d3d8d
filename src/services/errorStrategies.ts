/**
 * Error classification rules and the recovery strategy for each category
 */

import { ErrorCategory, ErrorResolution, RecoveryAction } from '../types/index.js';

export interface ErrorRule {
  readonly category: ErrorCategory;
  readonly description: string;
  /** Receives the lower-cased error message */
  matches(lowerMessage: string): boolean;
}

function substringRule(category: ErrorCategory, description: string, patterns: readonly string[]): ErrorRule {
  return {
    category,
    description,
    matches: lowerMessage => patterns.some(pattern => lowerMessage.includes(pattern)),
  };
}

/**
 * Evaluated top to bottom, first match wins. A message such as
 * "connection timed out: could not read from remote repository" is a
 * network problem, so network rules come before repository access.
 */
export const ERROR_RULES: readonly ErrorRule[] = [
  substringRule(ErrorCategory.NETWORK, 'network unreachable or timed out', [
    'connection refused',
    'network is unreachable',
    'timeout',
    'timed out',
    'no route to host',
    'temporary failure in name resolution',
  ]),
  substringRule(ErrorCategory.AUTHENTICATION, 'credentials rejected', [
    'authentication failed',
    'permission denied',
    'forbidden',
    'invalid credentials',
    '401',
    '403',
  ]),
  substringRule(ErrorCategory.REPOSITORY_ACCESS, 'remote repository missing or unreadable', [
    'repository not found',
    'remote repository does not exist',
    'could not read from remote repository',
  ]),
  substringRule(ErrorCategory.BRANCH_DETECTION, 'branch or revision missing', [
    'branch does not exist',
    'no such branch',
    'unknown revision',
    'ambiguous argument',
  ]),
  substringRule(ErrorCategory.MERGE_CONFLICT, 'merge left conflicts', [
    'automatic merge failed',
    'merge conflict',
    'unmerged paths',
    'conflict',
  ]),
  substringRule(ErrorCategory.REPOSITORY_CORRUPTION, 'local metadata store damaged', [
    'not a git repository',
    'corrupt',
    'broken',
    'invalid object',
    'loose object',
  ]),
];

/** Consulted when no message rule matched */
export function categorizeByCode(code: string): ErrorCategory {
  const lower = code.toLowerCase();
  if (lower.includes('timeout')) return ErrorCategory.NETWORK;
  if (lower.includes('auth') || lower.includes('permission')) return ErrorCategory.AUTHENTICATION;
  if (lower.includes('branch')) return ErrorCategory.BRANCH_DETECTION;
  if (lower.includes('conflict')) return ErrorCategory.MERGE_CONFLICT;
  return ErrorCategory.UNKNOWN;
}

export const ERROR_RESOLUTIONS: Readonly<Record<ErrorCategory, ErrorResolution>> = {
  [ErrorCategory.NETWORK]: {
    category: ErrorCategory.NETWORK,
    action: RecoveryAction.RETRY,
    userMessage: 'Network connection issue detected',
    technicalMessage: 'Failed to connect to remote Git repository',
    resolutionSteps: [
      'Check your internet connection',
      'Verify the repository URL is accessible',
      'Try again in a few minutes',
      'Contact your network administrator if the problem persists',
    ],
    retryDelayMs: 5000,
    maxRetries: 3,
  },
  [ErrorCategory.AUTHENTICATION]: {
    category: ErrorCategory.AUTHENTICATION,
    action: RecoveryAction.USER_ACTION_REQUIRED,
    userMessage: 'Authentication failed - please check your credentials',
    technicalMessage: 'Git authentication failed for remote repository',
    resolutionSteps: [
      'Verify your Git credentials are configured correctly',
      'Check if you have access to the repository',
      'For GitHub: ensure your personal access token has proper permissions',
      "Run 'git config --global credential.helper' to check credential storage",
    ],
    maxRetries: 0,
  },
  [ErrorCategory.REPOSITORY_ACCESS]: {
    category: ErrorCategory.REPOSITORY_ACCESS,
    action: RecoveryAction.USER_ACTION_REQUIRED,
    userMessage: 'Repository not accessible - please verify the URL',
    technicalMessage: 'Cannot access the specified Git repository',
    resolutionSteps: [
      'Verify the repository URL is correct',
      'Check that the repository exists and you have access to it',
      'Ensure the URL format is correct (e.g. https://github.com/user/repo.git)',
      'Try opening the repository in your web browser',
    ],
    maxRetries: 1,
  },
  [ErrorCategory.BRANCH_DETECTION]: {
    category: ErrorCategory.BRANCH_DETECTION,
    action: RecoveryAction.FALLBACK,
    userMessage: 'Unable to detect default branch - using fallback',
    technicalMessage: 'Branch detection failed, using fallback branch name',
    resolutionSteps: [
      'Verify the repository has at least one branch',
      'Check whether the default branch name is non-standard',
      'Ensure you can read repository metadata',
    ],
    retryDelayMs: 1000,
    maxRetries: 2,
  },
  [ErrorCategory.MERGE_CONFLICT]: {
    category: ErrorCategory.MERGE_CONFLICT,
    action: RecoveryAction.FALLBACK,
    userMessage: 'Merge conflicts detected during synchronization',
    technicalMessage: 'Git merge conflicts occurred during repository sync',
    resolutionSteps: [
      'Conflicts are resolved automatically using remote content',
      'Your local changes may have been overwritten or stashed',
      'Review the synchronized files for correctness',
      'Merge changes manually if needed',
    ],
    maxRetries: 1,
  },
  [ErrorCategory.REPOSITORY_CORRUPTION]: {
    category: ErrorCategory.REPOSITORY_CORRUPTION,
    action: RecoveryAction.REINITIALIZE,
    userMessage: 'Repository corruption detected - reinitializing',
    technicalMessage: 'Local Git repository appears to be corrupted',
    resolutionSteps: [
      'The local repository will be reinitialized',
      'This removes local Git history but keeps your memory files',
      'Back up any important uncommitted changes first',
      'After reinitialization the repository syncs with the remote again',
    ],
    maxRetries: 1,
  },
  [ErrorCategory.CONFIGURATION]: {
    category: ErrorCategory.CONFIGURATION,
    action: RecoveryAction.USER_ACTION_REQUIRED,
    userMessage: 'Git configuration issue detected',
    technicalMessage: 'Git configuration is invalid or incomplete',
    resolutionSteps: [
      "Check your Git configuration with 'git config --list'",
      'Ensure user.name and user.email are configured',
      'Verify the repository remote configuration',
      "Run 'git config --global --edit' to fix the configuration",
    ],
    maxRetries: 0,
  },
  [ErrorCategory.UNKNOWN]: {
    category: ErrorCategory.UNKNOWN,
    action: RecoveryAction.USER_ACTION_REQUIRED,
    userMessage: 'An unexpected error occurred',
    technicalMessage: 'Unrecognised Git error',
    resolutionSteps: [
      'Check the error details below',
      'Ensure your Git configuration is correct',
      'Try the operation again',
      'Report the problem if it persists',
    ],
    maxRetries: 0,
  },
};
