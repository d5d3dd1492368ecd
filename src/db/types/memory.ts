import type { ArchetypeTag, FactSource, MemoryLayer, MemoryType } from './enums.js';

export type MemoryEntry = {
  id: string;
  seq: number; // insertion order, unique per store
  decayedAtSeq?: number; // set on promotion: significance already carries decay up to here
  content: string;
  type: MemoryType;
  layer: MemoryLayer;
  significance: number; // 0.0~1.0
  emotionalTags: string[];
  archetypeTags: ArchetypeTag[];
  timestamp: string;
  source?: FactSource | 'system';
};

/** What a producer hands to the store. Layer and seq are owned by the store. */
export type MemoryEntryInput = {
  content: string;
  type: MemoryType;
  significance: number;
  emotionalTags?: string[];
  archetypeTags?: ArchetypeTag[];
  source?: FactSource | 'system';
};

export type MemoryFilter = {
  type?: MemoryType;
  layer?: MemoryLayer;
  tags?: string[];
  query?: string;
};

export type MemoryStats = {
  appended: number;
  promoted: number;
  evicted: number;
};

export interface MemorySnapshot {
  version: 1;
  nextSeq: number;
  entries: MemoryEntry[];
  stats: MemoryStats;
}

export function createEmptyMemorySnapshot(): MemorySnapshot {
  return {
    version: 1,
    nextSeq: 1,
    entries: [],
    stats: { appended: 0, promoted: 0, evicted: 0 },
  };
}
