/**
 * Memory record types
 */

export interface MemoryFrontmatter {
  id: string;
  timestamp: string; // ISO timestamp
  agent: string;
  user: string;
  topics: string[];
}

export interface MemoryRecord extends MemoryFrontmatter {
  content: string;
  filename: string;
}

export interface RememberInput {
  agent: string;
  user: string;
  topics: string[];
  content: string;
}

export interface RememberResult {
  memoryId: string;
  filename: string;
  timestamp: string;
  message: string;
}

export interface MemorySummary {
  id: string;
  agent: string;
  user: string;
  topics: string[];
  timestamp: string;
  relevanceScore: number;
}

export type RecallEntry = MemoryRecord | { id: string; error: string };
