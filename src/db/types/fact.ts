import type { CandidateSource, FactSource } from './enums.js';

export type FactCandidate = {
  field: string;
  value: string;
  confidence: number; // 0.0~1.0
  source: CandidateSource;
  matchedText?: string; // lexical span that produced the candidate
  ruleId?: string;
};

export type CommittedFact = {
  field: string;
  value: string;
  source: FactSource;
  timestamp: string; // ISO-8601
  confidence: number;
};

/**
 * One commit on the global undo stack.
 * 'set' replaces a single-valued field (previous === null: it was unset);
 * 'append' adds one item to a list field and never has a previous value.
 */
export type UndoRecord = {
  kind: 'set' | 'append';
  field: string;
  previous: CommittedFact | null;
  next: CommittedFact;
};

export interface CharacterState {
  facts: Record<string, CommittedFact>;
  lists: Record<string, CommittedFact[]>; // traits, motivations, ... in commit order
  undoStack: UndoRecord[];
}

export function createEmptyCharacterState(): CharacterState {
  return { facts: {}, lists: {}, undoStack: [] };
}

export function getFieldHistory(
  state: CharacterState,
  field: string,
): UndoRecord[] {
  return state.undoStack.filter((r) => r.field === field);
}

export function getMissingFields(
  state: CharacterState,
  required: readonly string[],
): string[] {
  return required.filter((field) => !state.facts[field]);
}
