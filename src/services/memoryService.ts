/**
 * Memory storage: one markdown file per memory under <repoDir>/files
 */

import { randomUUID } from 'crypto';
import { existsSync } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  Config,
  MEMORY_FILES_SUBDIR,
  MemoryRecord,
  MemorySummary,
  RecallEntry,
  RememberInput,
  RememberResult,
} from '../types/index.js';
import { BackgroundTask } from '../utils/backgroundSupervisor.js';
import { memoryIdFromFilename, parseMemoryFile, serializeMemory } from '../utils/frontmatter.js';
import { logger } from '../utils/logger.js';

export const MAX_CONTENT_LENGTH = 100_000;
export const MAX_NAME_LENGTH = 100;
export const MEMORY_ID_PATTERN = /^[a-f0-9]{8}$/;
export const MEMORY_FILENAME_PATTERN = /^\d{8}_\d{6}_[a-f0-9]{8}\.md$/;

const TOPIC_MATCH_SCORE = 5;
const CONTENT_MATCH_SCORE = 2;
const WORD_MATCH_SCORE = 1.5;

export class MemoryValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MemoryValidationError';
  }
}

/** The part of SyncManager that memory writes trigger */
export interface MemorySyncTrigger {
  syncMemoryBackground(memoryId: string, filename: string): BackgroundTask | null;
}

export function generateMemoryId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 8);
}

/**
 * e.g. 20240131_154502_ab12cd34.md
 */
export function createMemoryFilename(memoryId: string, date: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${stamp}_${memoryId}.md`;
}

/**
 * Returns the problems with the input; empty when it can be stored.
 */
export function validateMemoryInput(input: RememberInput): string[] {
  const errors: string[] = [];

  for (const field of ['agent', 'user'] as const) {
    const value = input[field].trim();
    if (!value) {
      errors.push(`${field} must not be empty`);
    } else if (value.length > MAX_NAME_LENGTH) {
      errors.push(`${field} must be at most ${MAX_NAME_LENGTH} characters`);
    }
  }

  if (!input.content.trim()) {
    errors.push('content must not be empty');
  } else if (input.content.length > MAX_CONTENT_LENGTH) {
    errors.push(`content must be at most ${MAX_CONTENT_LENGTH} characters`);
  }

  if (input.topics.length === 0) {
    errors.push('topics must contain at least one topic');
  } else if (input.topics.some(topic => !topic.trim())) {
    errors.push('topics must not contain empty strings');
  }

  return errors;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

/**
 * Relevance of a memory for lower-cased keywords, with the topics that matched
 */
export function scoreMemory(memory: MemoryRecord, keywords: string[]): { score: number; matchedTopics: string[] } {
  const content = memory.content.toLowerCase();
  const matchedTopics = new Set<string>();
  let score = 0;

  for (const keyword of keywords) {
    for (const topic of memory.topics) {
      if (topic.toLowerCase().includes(keyword)) {
        score += TOPIC_MATCH_SCORE;
        matchedTopics.add(topic);
      }
    }

    score += countOccurrences(content, keyword) * CONTENT_MATCH_SCORE;

    const wordPattern = new RegExp(`\\b${escapeRegExp(keyword)}\\b`, 'g');
    score += (content.match(wordPattern) ?? []).length * WORD_MATCH_SCORE;
  }

  return { score, matchedTopics: [...matchedTopics] };
}

export class MemoryService {
  private config: Config;
  private sync: MemorySyncTrigger;

  constructor(config: Config, sync: MemorySyncTrigger) {
    this.config = config;
    this.sync = sync;
  }

  get filesDir(): string {
    return path.join(this.config.repoDir, MEMORY_FILES_SUBDIR);
  }

  async remember(input: RememberInput): Promise<RememberResult> {
    const errors = validateMemoryInput(input);
    if (errors.length > 0) {
      throw new MemoryValidationError(errors.join('; '));
    }

    const memoryId = generateMemoryId();
    const now = new Date();
    const filename = createMemoryFilename(memoryId, now);
    const timestamp = now.toISOString();

    const fileContent = serializeMemory(
      {
        id: memoryId,
        timestamp,
        agent: input.agent.trim(),
        user: input.user.trim(),
        topics: input.topics.map(topic => topic.trim()),
      },
      input.content
    );

    await fs.mkdir(this.filesDir, { recursive: true });
    const target = path.join(this.filesDir, filename);
    const temp = path.join(this.filesDir, `.${filename}.${process.pid}.tmp`);
    await fs.writeFile(temp, fileContent, 'utf-8');
    await fs.rename(temp, target);

    logger.info('MemoryService', `Stored memory ${memoryId} in ${filename}`);

    const task = this.sync.syncMemoryBackground(memoryId, filename);

    return {
      memoryId,
      filename,
      timestamp,
      message: task ? 'Memory stored; git sync started in the background' : 'Memory stored',
    };
  }

  async recall(memoryIds: string[]): Promise<RecallEntry[]> {
    const invalid = memoryIds.filter(id => !MEMORY_ID_PATTERN.test(id));
    if (invalid.length > 0) {
      throw new MemoryValidationError(`Invalid memory id(s): ${invalid.join(', ')}`);
    }

    const filenames = await this.listMemoryFiles();
    const results: RecallEntry[] = [];

    for (const id of memoryIds) {
      const filename = filenames.find(name => memoryIdFromFilename(name) === id);
      const memory = filename ? await this.readMemory(filename) : null;
      results.push(memory ?? { id, error: 'Memory not found' });
    }

    return results;
  }

  async think(keywords: string[]): Promise<MemorySummary[]> {
    const normalized = keywords.map(keyword => keyword.trim().toLowerCase()).filter(Boolean);
    if (normalized.length === 0) {
      return [];
    }

    const scored: MemorySummary[] = [];
    for (const filename of await this.listMemoryFiles()) {
      const memory = await this.readMemory(filename);
      if (!memory) continue;

      const { score, matchedTopics } = scoreMemory(memory, normalized);
      if (score > 0) {
        scored.push({
          id: memory.id,
          agent: memory.agent,
          user: memory.user,
          topics: matchedTopics,
          timestamp: memory.timestamp,
          relevanceScore: Math.round(score * 100) / 100,
        });
      }
    }

    scored.sort((a, b) => b.relevanceScore - a.relevanceScore || b.timestamp.localeCompare(a.timestamp));
    logger.debug('MemoryService', `think(${normalized.join(', ')}) matched ${scored.length} memories`);
    return scored.slice(0, this.config.maxSearchResults);
  }

  async readMemory(filename: string): Promise<MemoryRecord | null> {
    try {
      const content = await fs.readFile(path.join(this.filesDir, filename), 'utf-8');
      const memory = parseMemoryFile(content, filename);
      if (!memory) {
        logger.warn('MemoryService', `Skipping ${filename}: missing id or timestamp`);
      }
      return memory;
    } catch (error) {
      logger.warn('MemoryService', `Failed to read memory file ${filename}`, error);
      return null;
    }
  }

  async listMemoryFiles(): Promise<string[]> {
    if (!existsSync(this.filesDir)) {
      return [];
    }
    const entries = await fs.readdir(this.filesDir);
    return entries.filter(name => MEMORY_FILENAME_PATTERN.test(name)).sort();
  }
}
