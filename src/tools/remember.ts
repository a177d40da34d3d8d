/**
 * remember tool implementation
 */

import { MemoryService, MemoryValidationError } from '../services/memoryService.js';
import { asArgs, requireString, requireStringArray, ToolArgumentError } from '../utils/args.js';

export const rememberTool = {
  name: 'remember',
  description: 'Store a new memory. The file is written immediately and committed to git in the background.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      agent: {
        type: 'string',
        description: 'Name of the agent storing the memory',
      },
      user: {
        type: 'string',
        description: 'User the memory belongs to',
      },
      topics: {
        type: 'array',
        items: { type: 'string' },
        description: 'Topics used to find the memory later',
      },
      content: {
        type: 'string',
        description: 'Memory content (markdown)',
      },
    },
    required: ['agent', 'user', 'topics', 'content'],
  },
};

export async function handleRemember(rawArgs: unknown, memoryService: MemoryService): Promise<string> {
  try {
    const args = asArgs(rawArgs);
    const result = await memoryService.remember({
      agent: requireString(args, 'agent'),
      user: requireString(args, 'user'),
      topics: requireStringArray(args, 'topics'),
      content: requireString(args, 'content'),
    });

    return JSON.stringify(result, null, 2);
  } catch (error) {
    if (error instanceof ToolArgumentError || error instanceof MemoryValidationError) {
      return JSON.stringify({ error: 'Invalid memory input', message: error.message }, null, 2);
    }
    throw error;
  }
}
