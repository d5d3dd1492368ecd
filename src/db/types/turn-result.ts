import type { AssistedStatus } from './extraction.js';
import type { CommittedFact, FactCandidate, UndoRecord } from './fact.js';
import type { Contradiction } from './symbolic.js';

export interface CommitOutcome {
  committed: UndoRecord[];
  ambiguities: FactCandidate[];
  unchanged: FactCandidate[];
}

export type UndoResult =
  | {
      undone: true;
      field: string;
      previousValue: string | null; // null: field is unset again
      removedValue: string;
    }
  | { undone: false; reason: 'NOTHING_TO_UNDO' };

export interface TurnResult {
  sessionId: string;
  turnNo: number;
  committed: CommittedFact[];
  ambiguities: FactCandidate[];
  contradictions: Contradiction[];
  unchanged: string[];
  assisted: AssistedStatus | null; // null when no extraction ran (explicit confirmation)
}
