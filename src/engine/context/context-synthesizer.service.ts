// Builds the token-budgeted bundle handed to narration

import { Injectable } from '@nestjs/common';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import { estimateTokens } from '../../common/text-utils.js';
import {
  getMissingFields,
  toDecayState,
  toTensionState,
  type CharacterState,
  type ContextBundle,
  type ContextFact,
  type ContextMemory,
  type SymbolicState,
} from '../../db/types/index.js';
import type { MemoryStore } from '../memory/memory-store.js';

@Injectable()
export class ContextSynthesizerService {
  constructor(private readonly content: ContentLoaderService) {}

  /**
   * Character facts, list items and symbolic state are always included. Memories follow in
   * relevance order while they fit; the first one that does not fit ends the
   * list. Cost is estimated from the JSON rendering.
   */
  buildContext(
    character: CharacterState,
    symbolic: SymbolicState,
    store: MemoryStore,
    budget: number,
  ): ContextBundle {
    const engine = this.content.getEngineConfig();

    const facts: Record<string, ContextFact> = {};
    for (const [field, fact] of Object.entries(character.facts)) {
      facts[field] = { value: fact.value, source: fact.source, confidence: fact.confidence };
    }
    const lists: Record<string, string[]> = {};
    for (const [field, items] of Object.entries(character.lists)) {
      lists[field] = items.map((item) => item.value);
    }
    const core = {
      character: {
        facts,
        lists,
        missingRequiredFields: getMissingFields(character, engine.requiredFields),
      },
      symbolic: {
        tension: symbolic.tension,
        tensionState: toTensionState(symbolic.tension, engine.tension.min, engine.tension.max),
        activeTags: [...symbolic.activeTags],
        decayFlags: symbolic.decayFlags.map((f) => ({ ...f })),
        decayLevel: symbolic.decayLevel,
        decayState: toDecayState(symbolic.decayLevel),
        coherence: symbolic.coherence,
        history: symbolic.history.map((h) => ({ field: h.field, value: h.value, tags: [...h.tags] })),
      },
    };

    let used = estimateTokens(JSON.stringify(core));
    const ranked = store.retrieve();
    const memories: ContextMemory[] = [];
    for (const { entry, relevance } of ranked) {
      const memory: ContextMemory = {
        content: entry.content,
        type: entry.type,
        layer: entry.layer,
        significance: entry.significance,
        relevance,
        archetypeTags: entry.archetypeTags,
        emotionalTags: entry.emotionalTags,
        timestamp: entry.timestamp,
      };
      const cost = estimateTokens(JSON.stringify(memory));
      if (used + cost > budget) break;
      memories.push(memory);
      used += cost;
    }

    return {
      ...core,
      memories,
      budget: {
        limit: budget,
        used,
        includedEntries: memories.length,
        droppedEntries: ranked.length - memories.length,
      },
    };
  }
}
