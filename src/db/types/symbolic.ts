import type { ArchetypeTag, DecayState, TensionState } from './enums.js';

export type Contradiction = {
  field: string;
  previousValue: string;
  newValue: string;
  timestamp: string;
};

/** A tagged commit, newest last. */
export type ArchetypalHistoryEntry = {
  field: string;
  value: string;
  tags: ArchetypeTag[];
  tensionDelta: number;
  timestamp: string;
};

export interface SymbolicState {
  tension: number; // < 0 order, > 0 chaos
  activeTags: ArchetypeTag[]; // sorted, unique
  decayFlags: Contradiction[];
  decayLevel: number; // 0 healthy .. 1 corrupted, only grows
  coherence: number; // 1 - conflicting pairs / all pairs of activeTags
  history: ArchetypalHistoryEntry[]; // bounded by symbolic.historyLimit
}

export function createInitialSymbolicState(tension = 0): SymbolicState {
  return {
    tension,
    activeTags: [],
    decayFlags: [],
    decayLevel: 0,
    coherence: 1,
    history: [],
  };
}

/** Maps a tension value inside [min, max] onto five bands of equal width. */
export function toTensionState(
  tension: number,
  min: number,
  max: number,
): TensionState {
  const span = max - min;
  const ratio = span > 0 ? (tension - min) / span : 0.5;
  if (ratio <= 0.1) return 'PURE_ORDER';
  if (ratio <= 0.3) return 'ORDER_DOMINANT';
  if (ratio < 0.7) return 'BALANCED';
  if (ratio < 0.9) return 'CHAOS_DOMINANT';
  return 'PURE_CHAOS';
}

export function toDecayState(decayLevel: number): DecayState {
  if (decayLevel > 0.7) return 'DISTORTED';
  if (decayLevel > 0.4) return 'STRAINED';
  return 'STABLE';
}
