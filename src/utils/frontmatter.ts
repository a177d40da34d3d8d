/**
 * Memory file (de)serialization using gray-matter
 */

import matter from 'gray-matter';
import { MemoryFrontmatter, MemoryRecord } from '../types/index.js';

function asString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  // YAML turns unquoted ISO timestamps into Dates
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'number') return String(value);
  return undefined;
}

/**
 * Parse a memory file. Returns null when required frontmatter is missing.
 */
export function parseMemoryFile(fileContent: string, filename: string): MemoryRecord | null {
  const { data, content } = matter(fileContent);

  const id = asString(data.id);
  const timestamp = asString(data.timestamp);
  if (!id || !timestamp) {
    return null;
  }

  return {
    id,
    timestamp,
    agent: asString(data.agent) ?? 'unknown',
    user: asString(data.user) ?? 'unknown',
    topics: Array.isArray(data.topics) ? data.topics.map(String) : [],
    content: content.trim(),
    filename,
  };
}

export function serializeMemory(frontmatter: MemoryFrontmatter, content: string): string {
  const data: Record<string, unknown> = {
    id: frontmatter.id,
    timestamp: frontmatter.timestamp,
    agent: frontmatter.agent,
    user: frontmatter.user,
    topics: frontmatter.topics,
  };
  return matter.stringify(`${content.trim()}\n`, data);
}

/**
 * Memory id encoded in a filename such as 20240101_120000_ab12cd34.md
 */
export function memoryIdFromFilename(filename: string): string | undefined {
  const match = filename.match(/^\d{8}_\d{6}_([a-f0-9]{8})\.md$/);
  return match ? match[1] : undefined;
}
