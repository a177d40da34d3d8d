/**
 * think tool implementation
 */

import { MemoryService } from '../services/memoryService.js';
import { asArgs, requireStringArray, ToolArgumentError } from '../utils/args.js';

export const thinkTool = {
  name: 'think',
  description: 'Search memories by keywords. Returns summaries ranked by relevance; use recall for full content.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      keywords: {
        type: 'array',
        items: { type: 'string' },
        description: 'Keywords matched against topics and content',
      },
    },
    required: ['keywords'],
  },
};

export async function handleThink(rawArgs: unknown, memoryService: MemoryService): Promise<string> {
  let keywords: string[];
  try {
    keywords = requireStringArray(asArgs(rawArgs), 'keywords');
  } catch (error) {
    if (error instanceof ToolArgumentError) {
      return JSON.stringify({ error: error.message }, null, 2);
    }
    throw error;
  }

  const results = await memoryService.think(keywords);

  return JSON.stringify({
    keywords,
    total: results.length,
    results,
  }, null, 2);
}
