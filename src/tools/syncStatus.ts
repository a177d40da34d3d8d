/**
 * sync_status tool implementation
 */

import { SyncManager } from '../services/syncManager.js';

export const syncStatusTool = {
  name: 'sync_status',
  description: 'Show the state of git synchronization for the memory store',
  inputSchema: {
    type: 'object' as const,
    properties: {},
  },
};

export async function handleSyncStatus(syncManager: SyncManager): Promise<string> {
  const status = await syncManager.getRepositoryStatus();
  return JSON.stringify(status, null, 2);
}
