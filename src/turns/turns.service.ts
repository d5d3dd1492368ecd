// Turn orchestration:
// extraction → commitment → symbolic tagging → memory append → save.
// Works on a private copy of the session; nothing is visible until the save resolves.

import { Injectable, Logger } from '@nestjs/common';
import { InvalidInputError } from '../common/errors/game-errors.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import type {
  CampaignSession,
  Contradiction,
  TurnResult,
  UndoRecord,
  UndoResult,
} from '../db/types/index.js';
import { CommitmentLedgerService } from '../engine/commitment/commitment-ledger.service.js';
import { ExtractionCoordinatorService } from '../engine/extraction/extraction-coordinator.service.js';
import { PatternExtractorService } from '../engine/extraction/pattern-extractor.service.js';
import { MemoryStoreService } from '../engine/memory/memory-store.service.js';
import { SymbolicTaggerService } from '../engine/symbolic/symbolic-tagger.service.js';
import { CampaignSessionService } from '../sessions/campaign-session.service.js';
import type { ConfirmFactBody, SubmitTurnBody, UndoBody } from './dto/submit-turn.dto.js';

export type UndoResponse = UndoResult & { sessionId: string; turnNo: number };

// emotionalThemes → "Emotional themes"
const fieldLabel = (field: string) => {
  const words = field.replace(/([a-z])([A-Z])/g, '$1 $2').toLowerCase();
  return words.charAt(0).toUpperCase() + words.slice(1);
};
const signed = (n: number) => (n >= 0 ? `+${n.toFixed(2)}` : n.toFixed(2));

@Injectable()
export class TurnsService {
  private readonly logger = new Logger(TurnsService.name);

  constructor(
    private readonly sessions: CampaignSessionService,
    private readonly coordinator: ExtractionCoordinatorService,
    private readonly patterns: PatternExtractorService,
    private readonly ledger: CommitmentLedgerService,
    private readonly tagger: SymbolicTaggerService,
    private readonly memory: MemoryStoreService,
    private readonly content: ContentLoaderService,
  ) {}

  async processTurn(
    sessionId: string,
    body: SubmitTurnBody,
    now: Date = new Date(),
  ): Promise<TurnResult> {
    const session = await this.sessions.require(sessionId);
    this.sessions.assertTurnNo(session, body.expectedTurnNo);

    const working = structuredClone(session);
    const knownFields: Record<string, string> = {};
    for (const [field, fact] of Object.entries(working.character.facts)) {
      knownFields[field] = fact.value;
    }
    for (const [field, items] of Object.entries(working.character.lists)) {
      knownFields[field] = items.map((item) => item.value).join(', ');
    }

    const extraction = await this.coordinator.extract(body.text, knownFields);
    const outcome = this.ledger.commit(working.character, extraction.candidates, now);
    const contradictions = this.applyCommits(working, outcome.committed, now);

    await this.finish(working, session.turnNo, now);
    this.logger.log(
      `Turn ${working.turnNo} on ${sessionId}: committed=${outcome.committed.length} ambiguous=${outcome.ambiguities.length} contradictions=${contradictions.length}`,
    );

    return {
      sessionId,
      turnNo: working.turnNo,
      committed: outcome.committed.map((r) => r.next),
      ambiguities: outcome.ambiguities,
      contradictions,
      unchanged: outcome.unchanged.map((c) => c.field),
      assisted: extraction.assisted,
    };
  }

  async confirm(
    sessionId: string,
    body: ConfirmFactBody,
    now: Date = new Date(),
  ): Promise<TurnResult> {
    if (!this.patterns.getFieldNames().includes(body.field)) {
      throw new InvalidInputError(`Unknown field: ${body.field}`, {
        fields: this.patterns.getFieldNames(),
      });
    }
    const value = this.patterns.canonicalize(body.field, body.value);
    if (value === null) {
      throw new InvalidInputError(`Unrecognised value for ${body.field}: ${body.value}`);
    }

    const session = await this.sessions.require(sessionId);
    this.sessions.assertTurnNo(session, body.expectedTurnNo);

    const working = structuredClone(session);
    const record = this.ledger.confirm(working.character, body.field, value, now);
    if (!record) {
      return {
        sessionId,
        turnNo: session.turnNo,
        committed: [],
        ambiguities: [],
        contradictions: [],
        unchanged: [body.field],
        assisted: null,
      };
    }

    const contradictions = this.applyCommits(working, [record], now);
    await this.finish(working, session.turnNo, now);
    return {
      sessionId,
      turnNo: working.turnNo,
      committed: [record.next],
      ambiguities: [],
      contradictions,
      unchanged: [],
      assisted: null,
    };
  }

  async undo(
    sessionId: string,
    body: UndoBody = {},
    now: Date = new Date(),
  ): Promise<UndoResponse> {
    const session = await this.sessions.require(sessionId);
    this.sessions.assertTurnNo(session, body.expectedTurnNo);

    const working = structuredClone(session);
    const result = this.ledger.undoLast(working.character);
    if (!result.undone) {
      return { ...result, sessionId, turnNo: session.turnNo };
    }

    const significance = this.content.getEngineConfig().significance;
    const store = this.memory.create(working.memory);
    const restored = result.previousValue === null ? 'unset' : `"${result.previousValue}"`;
    store.append(
      {
        content: `Undid ${result.field}: removed "${result.removedValue}", now ${restored}`,
        type: 'event',
        significance: significance.undo,
        source: 'system',
      },
      now,
    );
    working.memory = store.snapshot();

    await this.finish(working, session.turnNo, now);
    return { ...result, sessionId, turnNo: working.turnNo };
  }

  /** Tags each commit, folds it into the symbolic state and records memories. */
  private applyCommits(
    working: CampaignSession,
    records: UndoRecord[],
    now: Date,
  ): Contradiction[] {
    if (records.length === 0) return [];

    const engine = this.content.getEngineConfig();
    const sig = engine.significance;
    const contradictionTags = this.content.getArchetypeTable().contradiction;
    const store = this.memory.create(working.memory);
    const contradictions: Contradiction[] = [];

    for (const record of records) {
      const fact = record.next;
      const result = this.tagger.tag(fact, working.symbolic, record.previous);
      working.symbolic = this.tagger.apply(working.symbolic, result);

      const required = engine.requiredFields.includes(fact.field);
      store.append(
        {
          content: `${fieldLabel(fact.field)}: ${fact.value}`,
          type: 'fact',
          significance: sig.fact + (required ? sig.requiredFactBonus : 0),
          archetypeTags: result.tags,
          emotionalTags: result.emotionalTags,
          source: fact.source,
        },
        now,
      );

      if (result.tags.length > 0) {
        store.append(
          {
            content: `${fieldLabel(fact.field)} "${fact.value}" evokes ${result.tags.join(', ')} (tension ${signed(result.tensionDelta)} → ${result.tensionAfter.toFixed(2)})`,
            type: 'symbolic',
            significance: Math.min(1, sig.symbolic + Math.abs(result.tensionDelta) * sig.tensionScale),
            archetypeTags: result.tags,
            emotionalTags: result.emotionalTags,
            source: 'system',
          },
          now,
        );
      }

      if (result.contradiction) {
        contradictions.push(result.contradiction);
        store.append(
          {
            content: `Contradiction: ${fact.field} changed from "${result.contradiction.previousValue}" to "${result.contradiction.newValue}"`,
            type: 'event',
            significance: sig.contradiction,
            archetypeTags: contradictionTags.tags,
            emotionalTags: contradictionTags.emotions,
            source: 'system',
          },
          now,
        );
      }
    }

    working.memory = store.snapshot();
    return contradictions;
  }

  private async finish(working: CampaignSession, loadedTurnNo: number, now: Date): Promise<void> {
    working.turnNo = loadedTurnNo + 1;
    working.updatedAt = now.toISOString();
    await this.sessions.persist(working, loadedTurnNo);
  }
}
