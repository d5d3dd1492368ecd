import type {
  ArchetypeTag,
  DecayState,
  FactSource,
  MemoryLayer,
  MemoryType,
  TensionState,
} from './enums.js';
import type { Contradiction } from './symbolic.js';

export type ContextFact = {
  value: string;
  source: FactSource;
  confidence: number;
};

export type ContextMemory = {
  content: string;
  type: MemoryType;
  layer: MemoryLayer;
  significance: number;
  relevance: number;
  archetypeTags: ArchetypeTag[];
  emotionalTags: string[];
  timestamp: string;
};

export type ContextArchetype = {
  field: string;
  value: string;
  tags: ArchetypeTag[];
};

// Bundle handed to the language-generation service
export interface ContextBundle {
  character: {
    facts: Record<string, ContextFact>;
    lists: Record<string, string[]>;
    missingRequiredFields: string[];
  };
  symbolic: {
    tension: number;
    tensionState: TensionState;
    activeTags: ArchetypeTag[];
    decayFlags: Contradiction[];
    decayLevel: number;
    decayState: DecayState;
    coherence: number;
    history: ContextArchetype[]; // oldest first
  };
  memories: ContextMemory[];
  budget: {
    limit: number;
    used: number; // estimated tokens
    includedEntries: number;
    droppedEntries: number;
  };
}
