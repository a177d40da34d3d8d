/**
 * recall tool implementation
 */

import { MemoryService, MemoryValidationError } from '../services/memoryService.js';
import { asArgs, requireStringArray, ToolArgumentError } from '../utils/args.js';

export const recallTool = {
  name: 'recall',
  description: 'Fetch the full content of memories by id',
  inputSchema: {
    type: 'object' as const,
    properties: {
      memory_ids: {
        type: 'array',
        items: { type: 'string' },
        description: '8-character memory ids returned by remember or think',
      },
    },
    required: ['memory_ids'],
  },
};

export async function handleRecall(rawArgs: unknown, memoryService: MemoryService): Promise<string> {
  try {
    const memoryIds = requireStringArray(asArgs(rawArgs), 'memory_ids');
    const memories = await memoryService.recall(memoryIds);
    return JSON.stringify({ memories }, null, 2);
  } catch (error) {
    if (error instanceof ToolArgumentError || error instanceof MemoryValidationError) {
      return JSON.stringify({ error: error.message }, null, 2);
    }
    throw error;
  }
}
