// Incremental fact commitment with a global undo stack.
// Operates on the caller's private copy of the character state.

import { Injectable, Logger } from '@nestjs/common';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import { normalizeValue } from '../../common/text-utils.js';
import type {
  CharacterState,
  CommitOutcome,
  CommittedFact,
  FactCandidate,
  FactSource,
  UndoRecord,
  UndoResult,
} from '../../db/types/index.js';

@Injectable()
export class CommitmentLedgerService {
  private readonly logger = new Logger(CommitmentLedgerService.name);

  constructor(private readonly content: ContentLoaderService) {}

  /**
   * Applies ranked candidates, at most one per field (one per item for list
   * fields). A settled field is never re-asked: the same value is reported
   * unchanged, a different value replaces it only at or above the auto-commit
   * threshold. List items are appended once and never replace anything.
   */
  commit(
    character: CharacterState,
    candidates: FactCandidate[],
    now: Date = new Date(),
  ): CommitOutcome {
    const engine = this.content.getEngineConfig();
    const outcome: CommitOutcome = { committed: [], ambiguities: [], unchanged: [] };
    const seen = new Set<string>();

    for (const candidate of candidates) {
      const isList = engine.listFields.includes(candidate.field);
      const key = isList
        ? `${candidate.field}:${normalizeValue(candidate.value)}`
        : candidate.field;
      if (seen.has(key)) continue;
      seen.add(key);

      const source: FactSource = candidate.source === 'assisted' ? 'assisted' : 'player';

      if (isList) {
        if (this.hasItem(character, candidate.field, candidate.value)) {
          outcome.unchanged.push(candidate);
          continue;
        }
        outcome.committed.push(
          this.append(character, candidate.field, candidate.value, source, candidate.confidence, now),
        );
        continue;
      }

      const current = character.facts[candidate.field];
      if (current && normalizeValue(current.value) === normalizeValue(candidate.value)) {
        outcome.unchanged.push(candidate);
        continue;
      }
      if (current && candidate.confidence < engine.autoCommitThreshold) {
        outcome.ambiguities.push(candidate);
        continue;
      }

      outcome.committed.push(
        this.write(
          character,
          candidate.field,
          candidate.value,
          current ? 'correction' : source,
          candidate.confidence,
          now,
        ),
      );
    }
    return outcome;
  }

  /** Explicit player confirmation. Returns null when the value is already committed. */
  confirm(
    character: CharacterState,
    field: string,
    value: string,
    now: Date = new Date(),
  ): UndoRecord | null {
    if (this.content.getEngineConfig().listFields.includes(field)) {
      if (this.hasItem(character, field, value)) return null;
      return this.append(character, field, value, 'player', 1, now);
    }
    const current = character.facts[field];
    if (current && normalizeValue(current.value) === normalizeValue(value)) {
      return null;
    }
    return this.write(character, field, value, 'player', 1, now);
  }

  undoLast(character: CharacterState): UndoResult {
    const record = character.undoStack.pop();
    if (!record) return { undone: false, reason: 'NOTHING_TO_UNDO' };

    if (record.kind === 'append') {
      const remaining = (character.lists[record.field] ?? []).filter(
        (item) => normalizeValue(item.value) !== normalizeValue(record.next.value),
      );
      if (remaining.length > 0) {
        character.lists[record.field] = remaining;
      } else {
        delete character.lists[record.field];
      }
    } else if (record.previous) {
      character.facts[record.field] = record.previous;
    } else {
      delete character.facts[record.field];
    }
    this.logger.log(
      `Undo ${record.field}: "${record.next.value}" → ${record.previous ? `"${record.previous.value}"` : 'unset'}`,
    );
    return {
      undone: true,
      field: record.field,
      previousValue: record.previous?.value ?? null,
      removedValue: record.next.value,
    };
  }

  private hasItem(character: CharacterState, field: string, value: string): boolean {
    const key = normalizeValue(value);
    return (character.lists[field] ?? []).some((item) => normalizeValue(item.value) === key);
  }

  private write(
    character: CharacterState,
    field: string,
    value: string,
    source: FactSource,
    confidence: number,
    now: Date,
  ): UndoRecord {
    const next = toFact(field, value, source, confidence, now);
    const record: UndoRecord = {
      kind: 'set',
      field,
      previous: character.facts[field] ?? null,
      next,
    };
    character.facts[field] = next;
    character.undoStack.push(record);
    this.logger.log(`Committed ${field}="${value}" (${source}, ${confidence.toFixed(2)})`);
    return record;
  }

  private append(
    character: CharacterState,
    field: string,
    value: string,
    source: FactSource,
    confidence: number,
    now: Date,
  ): UndoRecord {
    const next = toFact(field, value, source, confidence, now);
    character.lists[field] = [...(character.lists[field] ?? []), next];
    const record: UndoRecord = { kind: 'append', field, previous: null, next };
    character.undoStack.push(record);
    this.logger.log(`Added ${field} item "${value}" (${source}, ${confidence.toFixed(2)})`);
    return record;
  }
}

function toFact(
  field: string,
  value: string,
  source: FactSource,
  confidence: number,
  now: Date,
): CommittedFact {
  return { field, value, source, timestamp: now.toISOString(), confidence };
}
