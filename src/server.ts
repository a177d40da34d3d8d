/**
 * MCP Server implementation
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { MemoryService } from './services/memoryService.js';
import { SyncManager } from './services/syncManager.js';

// Tools
import { rememberTool, handleRemember } from './tools/remember.js';
import { thinkTool, handleThink } from './tools/think.js';
import { recallTool, handleRecall } from './tools/recall.js';
import { syncStatusTool, handleSyncStatus } from './tools/syncStatus.js';
import { syncMemoryTool, handleSyncMemory } from './tools/syncMemory.js';
import { repairRepositoryTool, handleRepairRepository } from './tools/repairRepository.js';

import { logger } from './utils/logger.js';

export const SERVER_NAME = 'memory-sync-mcp-server';
export const SERVER_VERSION = '1.0.0';

export type ToolCallResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export class MemorySyncServer {
  private server: Server;
  private memoryService: MemoryService;
  private syncManager: SyncManager;

  constructor(memoryService: MemoryService, syncManager: SyncManager) {
    this.memoryService = memoryService;
    this.syncManager = syncManager;

    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupHandlers();
  }

  static readonly tools = [
    rememberTool,
    thinkTool,
    recallTool,
    syncStatusTool,
    syncMemoryTool,
    repairRepositoryTool,
  ];

  /**
   * Dispatch a tool call; exposed separately from the transport for tests
   */
  async callTool(name: string, args: unknown): Promise<ToolCallResult> {
    try {
      let result: string;

      switch (name) {
        case 'remember':
          result = await handleRemember(args, this.memoryService);
          break;

        case 'think':
          result = await handleThink(args, this.memoryService);
          break;

        case 'recall':
          result = await handleRecall(args, this.memoryService);
          break;

        case 'sync_status':
          result = await handleSyncStatus(this.syncManager);
          break;

        case 'sync_memory':
          result = await handleSyncMemory(args, this.syncManager);
          break;

        case 'repair_repository':
          result = await handleRepairRepository(this.syncManager);
          break;

        default:
          return {
            content: [{
              type: 'text',
              text: JSON.stringify({ error: `Unknown tool: ${name}` }),
            }],
            isError: true,
          };
      }

      return {
        content: [{
          type: 'text',
          text: result,
        }],
      };
    } catch (error) {
      logger.error('Server', `Tool ${name} failed`, error);
      return {
        content: [{
          type: 'text',
          text: JSON.stringify({
            error: 'Tool execution failed',
            message: error instanceof Error ? error.message : 'Unknown error',
          }),
        }],
        isError: true,
      };
    }
  }

  private setupHandlers(): void {
    // List available tools
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: MemorySyncServer.tools,
    }));

    // Handle tool calls
    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args);
    });
  }

  getServer(): Server {
    return this.server;
  }
}
