// Layered memory: short → mid → long with significance/recency consolidation

import type { MemoryConfig } from '../../content/content.types.js';
import { tokenize } from '../../common/text-utils.js';
import {
  createEmptyMemorySnapshot,
  type MemoryEntry,
  type MemoryEntryInput,
  type MemoryFilter,
  type MemoryLayer,
  type MemorySnapshot,
  type MemoryStats,
} from '../../db/types/index.js';

export type RetrievedMemory = {
  entry: MemoryEntry;
  relevance: number;
};

const round4 = (n: number) => Math.round(n * 1e4) / 1e4;
const clamp01 = (n: number) => Math.max(0, Math.min(1, n));

/**
 * Not safe to share between sessions: each campaign rebuilds its own store
 * from the persisted snapshot. Entries handed out are copies.
 */
export class MemoryStore {
  private entries: MemoryEntry[];
  private nextSeq: number;
  private readonly stats: MemoryStats;

  constructor(
    private readonly config: MemoryConfig,
    snapshot: MemorySnapshot = createEmptyMemorySnapshot(),
  ) {
    const copy = structuredClone(snapshot);
    this.entries = copy.entries;
    this.nextSeq = copy.nextSeq;
    this.stats = copy.stats;
  }

  static fromSnapshot(config: MemoryConfig, snapshot: MemorySnapshot): MemoryStore {
    return new MemoryStore(config, snapshot);
  }

  append(input: MemoryEntryInput, now: Date = new Date()): MemoryEntry {
    const seq = this.nextSeq++;
    const entry: MemoryEntry = {
      id: `mem-${seq}`,
      seq,
      content: input.content,
      type: input.type,
      layer: 'short',
      significance: clamp01(input.significance),
      emotionalTags: [...(input.emotionalTags ?? [])],
      archetypeTags: [...(input.archetypeTags ?? [])],
      timestamp: now.toISOString(),
      ...(input.source ? { source: input.source } : {}),
    };
    this.entries.push(entry);
    this.stats.appended++;

    this.consolidate('short', 'mid', this.config.shortCapacity, this.config.promoteToMidThreshold);
    this.consolidate('mid', 'long', this.config.midCapacity, this.config.promoteToLongThreshold);
    return { ...entry, emotionalTags: [...entry.emotionalTags], archetypeTags: [...entry.archetypeTags] };
  }

  /** Ranked by relevance desc, then most recent first. Never mutates the store. */
  retrieve(filter: MemoryFilter = {}, limit?: number): RetrievedMemory[] {
    const wantedTags = filter.tags?.map((t) => t.toLowerCase());
    const queryTokens = filter.query ? tokenize(filter.query) : [];

    const ranked = this.entries
      .filter((e) => {
        if (filter.type && e.type !== filter.type) return false;
        if (filter.layer && e.layer !== filter.layer) return false;
        if (wantedTags && wantedTags.length > 0) {
          const own = [...e.emotionalTags, ...e.archetypeTags].map((t) => t.toLowerCase());
          if (!wantedTags.some((t) => own.includes(t))) return false;
        }
        if (queryTokens.length > 0) {
          const content = new Set(tokenize(e.content));
          if (!queryTokens.some((t) => content.has(t))) return false;
        }
        return true;
      })
      .map((e) => ({ entry: structuredClone(e), relevance: this.relevanceOf(e) }))
      .sort((a, b) => b.relevance - a.relevance || b.entry.seq - a.entry.seq);

    return limit === undefined ? ranked : ranked.slice(0, Math.max(0, limit));
  }

  list(layer?: MemoryLayer): MemoryEntry[] {
    return this.entries
      .filter((e) => !layer || e.layer === layer)
      .map((e) => structuredClone(e));
  }

  size(layer?: MemoryLayer): number {
    return layer ? this.entries.filter((e) => e.layer === layer).length : this.entries.length;
  }

  getStats(): MemoryStats {
    return { ...this.stats };
  }

  snapshot(): MemorySnapshot {
    return structuredClone({
      version: 1 as const,
      nextSeq: this.nextSeq,
      entries: this.entries,
      stats: this.stats,
    });
  }

  /**
   * Significance decayed by the number of appends since the entry was added,
   * or since its last promotion, which already folded the earlier decay in.
   */
  private relevanceOf(entry: MemoryEntry): number {
    const age = this.nextSeq - 1 - (entry.decayedAtSeq ?? entry.seq);
    return round4(entry.significance * Math.pow(0.5, age / this.config.recencyHalfLife));
  }

  private consolidate(
    from: MemoryLayer,
    to: MemoryLayer,
    capacity: number,
    threshold: number,
  ): void {
    while (this.size(from) > capacity) {
      let victim: MemoryEntry | null = null;
      for (const e of this.entries) {
        if (e.layer !== from) continue;
        if (
          !victim ||
          e.significance < victim.significance ||
          (e.significance === victim.significance && e.seq < victim.seq)
        ) {
          victim = e;
        }
      }
      if (!victim) return;

      const decayed = this.relevanceOf(victim);
      if (decayed >= threshold) {
        victim.layer = to;
        victim.significance = decayed;
        victim.decayedAtSeq = this.nextSeq - 1;
        this.stats.promoted++;
      } else {
        const evicted = victim;
        this.entries = this.entries.filter((e) => e !== evicted);
        this.stats.evicted++;
      }
    }
  }
}
