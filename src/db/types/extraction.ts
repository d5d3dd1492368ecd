import type { AssistedFailureReason } from './enums.js';
import type { FactCandidate } from './fact.js';

// Assisted extractor outcome: a tagged variant instead of exceptions
export type AssistedExtraction =
  | { ok: true; candidates: FactCandidate[]; latencyMs: number }
  | { ok: false; reason: AssistedFailureReason; detail?: string };

export type AssistedStatus =
  | { status: 'OK'; candidateCount: number }
  | { status: 'DISABLED' }
  | { status: 'FAILED'; reason: Exclude<AssistedFailureReason, 'DISABLED'> };

export interface ExtractionResult {
  candidates: FactCandidate[]; // ranked: confidence desc, then field order
  assisted: AssistedStatus;
}
