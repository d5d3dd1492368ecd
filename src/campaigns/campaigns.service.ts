import { Injectable, Logger } from '@nestjs/common';
import { ContentLoaderService } from '../content/content-loader.service.js';
import {
  getMissingFields,
  toDecayState,
  toTensionState,
  type CharacterState,
  type ContextBundle,
  type DecayState,
  type MemoryLayer,
  type MemoryStats,
  type SymbolicState,
  type TensionState,
} from '../db/types/index.js';
import { ContextSynthesizerService } from '../engine/context/context-synthesizer.service.js';
import { MemoryStoreService } from '../engine/memory/memory-store.service.js';
import { NarrativeService, type NarrationResult } from '../llm/narrative.service.js';
import { CampaignSessionService } from '../sessions/campaign-session.service.js';

export type CampaignSummary = {
  sessionId: string;
  name: string;
  turnNo: number;
  configVersion: string;
  createdAt: string;
};

export type CampaignState = {
  sessionId: string;
  name: string;
  turnNo: number;
  characterState: CharacterState;
  symbolicState: SymbolicState & { tensionState: TensionState; decayState: DecayState };
  missingRequiredFields: string[];
  memory: { sizes: Record<MemoryLayer, number>; stats: MemoryStats };
};

export type NarrationResponse = NarrationResult & {
  sessionId: string;
  turnNo: number;
  context: ContextBundle['budget'];
};

@Injectable()
export class CampaignsService {
  private readonly logger = new Logger(CampaignsService.name);

  constructor(
    private readonly sessions: CampaignSessionService,
    private readonly memory: MemoryStoreService,
    private readonly synthesizer: ContextSynthesizerService,
    private readonly narrative: NarrativeService,
    private readonly content: ContentLoaderService,
  ) {}

  async createCampaign(name: string, now: Date = new Date()): Promise<CampaignSummary> {
    const session = await this.sessions.create(name, now);
    return {
      sessionId: session.id,
      name: session.name,
      turnNo: session.turnNo,
      configVersion: session.configVersion,
      createdAt: session.createdAt,
    };
  }

  async getState(sessionId: string): Promise<CampaignState> {
    const session = await this.sessions.require(sessionId);
    const engine = this.content.getEngineConfig();
    const store = this.memory.create(session.memory);

    return {
      sessionId,
      name: session.name,
      turnNo: session.turnNo,
      characterState: session.character,
      symbolicState: {
        ...session.symbolic,
        tensionState: toTensionState(
          session.symbolic.tension,
          engine.tension.min,
          engine.tension.max,
        ),
        decayState: toDecayState(session.symbolic.decayLevel),
      },
      missingRequiredFields: getMissingFields(session.character, engine.requiredFields),
      memory: {
        sizes: { short: store.size('short'), mid: store.size('mid'), long: store.size('long') },
        stats: store.getStats(),
      },
    };
  }

  async getContext(sessionId: string, budget: number): Promise<ContextBundle> {
    const session = await this.sessions.require(sessionId);
    return this.synthesizer.buildContext(
      session.character,
      session.symbolic,
      this.memory.create(session.memory),
      budget,
    );
  }

  /** Narration failure is part of the response; only session errors throw. */
  async narrate(sessionId: string, budget: number): Promise<NarrationResponse> {
    const session = await this.sessions.require(sessionId);
    const bundle = this.synthesizer.buildContext(
      session.character,
      session.symbolic,
      this.memory.create(session.memory),
      budget,
    );
    const result = await this.narrative.generate(bundle);
    if (result.status === 'DONE') {
      this.logger.log(`Narration for ${sessionId} via ${result.providerUsed}/${result.model}`);
    }
    return { ...result, sessionId, turnNo: session.turnNo, context: bundle.budget };
  }
}
