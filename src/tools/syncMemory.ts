/**
 * sync_memory tool implementation
 */

import { MEMORY_FILENAME_PATTERN, MEMORY_ID_PATTERN } from '../services/memoryService.js';
import { SyncManager } from '../services/syncManager.js';
import { SyncResult } from '../types/index.js';
import { asArgs, requireString, ToolArgumentError } from '../utils/args.js';
import { logger } from '../utils/logger.js';

export const syncMemoryTool = {
  name: 'sync_memory',
  description: 'Commit a stored memory and push it to the configured remote, waiting for the result',
  inputSchema: {
    type: 'object' as const,
    properties: {
      memory_id: {
        type: 'string',
        description: 'Memory id',
      },
      filename: {
        type: 'string',
        description: 'Memory filename as returned by remember',
      },
    },
    required: ['memory_id', 'filename'],
  },
};

function formatResult(result: SyncResult, recovered: boolean): string {
  return JSON.stringify({
    success: result.success,
    operation: result.operation,
    message: result.message,
    attempts: result.attempts,
    branch: result.branchUsed,
    errorCode: result.success ? undefined : result.errorCode,
    recovered,
  }, null, 2);
}

export async function handleSyncMemory(rawArgs: unknown, syncManager: SyncManager): Promise<string> {
  let memoryId: string;
  let filename: string;
  try {
    const args = asArgs(rawArgs);
    memoryId = requireString(args, 'memory_id');
    filename = requireString(args, 'filename');
  } catch (error) {
    if (error instanceof ToolArgumentError) {
      return JSON.stringify({ error: error.message }, null, 2);
    }
    throw error;
  }

  if (!MEMORY_ID_PATTERN.test(memoryId) || !MEMORY_FILENAME_PATTERN.test(filename)) {
    return JSON.stringify({
      error: 'Invalid memory id or filename',
      memory_id: memoryId,
      filename,
    }, null, 2);
  }

  const result = await syncManager.syncMemoryWithRetry(memoryId, filename);
  if (result.success || result.errorCode === 'GIT_SYNC_DISABLED') {
    return formatResult(result, false);
  }

  logger.info('SyncMemoryTool', `Sync of ${memoryId} failed, attempting recovery`);
  const recovery = await syncManager.recoverFromError(result);
  if (!recovery.success) {
    return formatResult(result, false);
  }

  return formatResult(await syncManager.syncMemoryWithRetry(memoryId, filename), true);
}
