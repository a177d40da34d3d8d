/**
 * repair_repository tool implementation
 */

import { SyncManager } from '../services/syncManager.js';

export const repairRepositoryTool = {
  name: 'repair_repository',
  description: 'Check the integrity of the memory git repository and repair or reinitialize it when damaged',
  inputSchema: {
    type: 'object' as const,
    properties: {},
  },
};

export async function handleRepairRepository(syncManager: SyncManager): Promise<string> {
  const result = await syncManager.validateAndRecover();

  return JSON.stringify({
    success: result.success,
    operation: result.operation,
    message: result.message,
    errorCode: result.success ? undefined : result.errorCode,
  }, null, 2);
}
