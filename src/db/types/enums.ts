// Canonical enums shared by the engine, the session store and the HTTP layer

export const CANDIDATE_SOURCE = ['pattern', 'assisted'] as const;
export type CandidateSource = (typeof CANDIDATE_SOURCE)[number];

export const FACT_SOURCE = ['player', 'assisted', 'correction'] as const;
export type FactSource = (typeof FACT_SOURCE)[number];

export const MEMORY_TYPE = ['fact', 'event', 'symbolic'] as const;
export type MemoryType = (typeof MEMORY_TYPE)[number];

export const MEMORY_LAYER = ['short', 'mid', 'long'] as const;
export type MemoryLayer = (typeof MEMORY_LAYER)[number];

// Fixed archetype vocabulary. Weights and tagging rules live in archetypes.json.
export const ARCHETYPE_TAG = [
  // order / structure
  'Order',
  'Father',
  'Mentor',
  'King',
  'Tradition',
  // chaos / transformation
  'Chaos',
  'Shadow',
  'Threshold',
  'Transformation',
  'Rebirth',
  // heroic journey
  'Sacrifice',
  'Wound',
  'Journey',
  'Return',
  'Redemption',
  // anima
  'Anima',
  'Mother',
  'Wisdom',
  'Intuition',
  // adversarial
  'Enemy',
  'Betrayal',
  'Corruption',
  'Decay',
] as const;
export type ArchetypeTag = (typeof ARCHETYPE_TAG)[number];

export const TENSION_STATE = [
  'PURE_ORDER',
  'ORDER_DOMINANT',
  'BALANCED',
  'CHAOS_DOMINANT',
  'PURE_CHAOS',
] as const;
export type TensionState = (typeof TENSION_STATE)[number];

export const ASSISTED_FAILURE_REASON = [
  'DISABLED',
  'TIMEOUT',
  'PROVIDER_ERROR',
  'MALFORMED',
] as const;
export type AssistedFailureReason = (typeof ASSISTED_FAILURE_REASON)[number];

// Cumulative narrative decay, banded
export const DECAY_STATE = ['STABLE', 'STRAINED', 'DISTORTED'] as const;
export type DecayState = (typeof DECAY_STATE)[number];
