import { ContentLoaderService } from '../../content/content-loader.service.js';
import {
  createEmptyCharacterState,
  getFieldHistory,
  type CharacterState,
  type FactCandidate,
} from '../../db/types/index.js';
import { CommitmentLedgerService } from './commitment-ledger.service.js';

const NOW = new Date('2026-01-01T00:00:00.000Z');

function candidate(
  field: string,
  value: string,
  confidence: number,
  source: FactCandidate['source'] = 'pattern',
): FactCandidate {
  return { field, value, confidence, source };
}

describe('CommitmentLedgerService', () => {
  let content: ContentLoaderService;
  let ledger: CommitmentLedgerService;
  let character: CharacterState;

  beforeAll(async () => {
    content = new ContentLoaderService();
    await content.loadAll();
  });

  beforeEach(() => {
    ledger = new CommitmentLedgerService(content);
    character = createEmptyCharacterState();
  });

  describe('commit', () => {
    it('commits unset fields with source by candidate origin', () => {
      const outcome = ledger.commit(
        character,
        [candidate('race', 'Half-Elf', 0.9), candidate('class', 'Ranger', 0.8, 'assisted')],
        NOW,
      );

      expect(outcome.committed.map((r) => r.next.source)).toEqual(['player', 'assisted']);
      expect(character.facts.race).toEqual({
        field: 'race',
        value: 'Half-Elf',
        source: 'player',
        timestamp: '2026-01-01T00:00:00.000Z',
        confidence: 0.9,
      });
      expect(character.undoStack).toHaveLength(2);
    });

    it('commits a low-confidence candidate when the field is unset', () => {
      const outcome = ledger.commit(character, [candidate('race', 'Dwarf', 0.6)], NOW);
      expect(outcome.committed).toHaveLength(1);
      expect(outcome.ambiguities).toEqual([]);
    });

    it('does not re-commit an identical value', () => {
      ledger.commit(character, [candidate('race', 'Half-Elf', 0.9)], NOW);
      const outcome = ledger.commit(character, [candidate('race', 'half-elf', 0.9)], NOW);

      expect(outcome.committed).toEqual([]);
      expect(outcome.unchanged.map((c) => c.field)).toEqual(['race']);
      expect(character.undoStack).toHaveLength(1);
    });

    it('records a confident different value as a correction', () => {
      ledger.commit(character, [candidate('class', 'Ranger', 0.9)], NOW);
      const outcome = ledger.commit(character, [candidate('class', 'Druid', 0.75)], NOW);

      expect(outcome.committed).toHaveLength(1);
      expect(outcome.committed[0]?.previous?.value).toBe('Ranger');
      expect(character.facts.class?.source).toBe('correction');
      expect(getFieldHistory(character, 'class').map((r) => r.next.value)).toEqual([
        'Ranger',
        'Druid',
      ]);
    });

    it('returns a weak different value as an ambiguity', () => {
      ledger.commit(character, [candidate('class', 'Ranger', 0.9)], NOW);
      const weak = candidate('class', 'Druid', 0.6);
      const outcome = ledger.commit(character, [weak], NOW);

      expect(outcome.ambiguities).toEqual([weak]);
      expect(character.facts.class?.value).toBe('Ranger');
    });

    it('takes only the first candidate per field', () => {
      const outcome = ledger.commit(
        character,
        [candidate('race', 'Elf', 0.9), candidate('race', 'Dwarf', 0.95)],
        NOW,
      );
      expect(outcome.committed).toHaveLength(1);
      expect(character.facts.race?.value).toBe('Elf');
    });
  });

  describe('list fields', () => {
    it('accumulates distinct items without replacing earlier ones', () => {
      ledger.commit(character, [candidate('traits', 'Brave', 0.8)], NOW);
      const outcome = ledger.commit(
        character,
        [candidate('traits', 'Curious', 0.6), candidate('traits', 'brave', 0.9)],
        NOW,
      );

      expect(outcome.committed.map((r) => [r.kind, r.next.value])).toEqual([
        ['append', 'Curious'],
      ]);
      expect(outcome.unchanged.map((c) => c.value)).toEqual(['brave']);
      expect(outcome.ambiguities).toEqual([]);
      expect(character.lists.traits?.map((f) => f.value)).toEqual(['Brave', 'Curious']);
      expect(character.facts.traits).toBeUndefined();
    });

    it('keeps list commits out of scalar corrections', () => {
      ledger.commit(character, [candidate('emotionalThemes', 'Grief', 0.8)], NOW);
      const outcome = ledger.commit(character, [candidate('emotionalThemes', 'Hope', 0.9)], NOW);

      expect(outcome.committed[0]?.next.source).toBe('player');
      expect(outcome.committed[0]?.previous).toBeNull();
    });

    it('confirm appends a new item and ignores a present one', () => {
      ledger.commit(character, [candidate('traits', 'Loyal', 0.8)], NOW);
      expect(ledger.confirm(character, 'traits', 'loyal', NOW)).toBeNull();

      const record = ledger.confirm(character, 'traits', 'Wise', NOW);
      expect(record?.kind).toBe('append');
      expect(character.lists.traits?.map((f) => f.value)).toEqual(['Loyal', 'Wise']);
    });

    it('undo removes only the last appended item', () => {
      ledger.commit(
        character,
        [candidate('traits', 'Brave', 0.8), candidate('traits', 'Kind', 0.8)],
        NOW,
      );

      expect(ledger.undoLast(character)).toEqual({
        undone: true,
        field: 'traits',
        previousValue: null,
        removedValue: 'Kind',
      });
      expect(character.lists.traits?.map((f) => f.value)).toEqual(['Brave']);

      ledger.undoLast(character);
      expect(character.lists).toEqual({});
    });
  });

  describe('confirm', () => {
    it('commits as player with full confidence', () => {
      ledger.commit(character, [candidate('class', 'Ranger', 0.9)], NOW);
      const record = ledger.confirm(character, 'class', 'Druid', NOW);

      expect(record?.next).toMatchObject({ value: 'Druid', source: 'player', confidence: 1 });
      expect(record?.previous?.value).toBe('Ranger');
    });

    it('returns null for an already committed value', () => {
      ledger.commit(character, [candidate('class', 'Ranger', 0.9)], NOW);
      expect(ledger.confirm(character, 'class', 'ranger', NOW)).toBeNull();
    });
  });

  describe('undoLast', () => {
    it('reports an empty history without throwing', () => {
      expect(ledger.undoLast(character)).toEqual({ undone: false, reason: 'NOTHING_TO_UNDO' });
    });

    it('removes a first commit entirely', () => {
      ledger.commit(character, [candidate('race', 'Elf', 0.9)], NOW);
      expect(ledger.undoLast(character)).toEqual({
        undone: true,
        field: 'race',
        previousValue: null,
        removedValue: 'Elf',
      });
      expect(character.facts.race).toBeUndefined();
    });

    it('restores the previous value of a correction', () => {
      ledger.commit(character, [candidate('class', 'Ranger', 0.9)], NOW);
      ledger.commit(character, [candidate('class', 'Druid', 0.9)], NOW);

      const result = ledger.undoLast(character);
      expect(result).toEqual({
        undone: true,
        field: 'class',
        previousValue: 'Ranger',
        removedValue: 'Druid',
      });
      expect(character.facts.class?.value).toBe('Ranger');
      expect(character.facts.class?.source).toBe('player');
    });

    it('undoes across fields in LIFO order', () => {
      ledger.commit(
        character,
        [candidate('race', 'Elf', 0.9), candidate('class', 'Bard', 0.9)],
        NOW,
      );
      const first = ledger.undoLast(character);
      const second = ledger.undoLast(character);
      expect(first.undone && first.field).toBe('class');
      expect(second.undone && second.field).toBe('race');
      expect(character.facts).toEqual({});
    });
  });
});
