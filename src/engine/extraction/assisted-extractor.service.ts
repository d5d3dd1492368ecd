// LLM-assisted fact extraction
// - dedicated lightweight model, separate from the narration model
// - never throws: failures come back as a tagged result

import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { z } from 'zod';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import { LlmConfigService } from '../../llm/llm-config.service.js';
import { LlmProviderRegistryService } from '../../llm/providers/llm-provider-registry.service.js';
import { buildExtractionMessages } from '../../llm/prompts/extraction-prompt.js';
import type { LlmProvider } from '../../llm/types/index.js';
import { parseJsonResponse } from '../../common/json-response.js';
import { withTimeout } from '../../common/with-timeout.js';
import { clip, normalizeValue } from '../../common/text-utils.js';
import type { AssistedExtraction, FactCandidate } from '../../db/types/index.js';
import { PatternExtractorService } from './pattern-extractor.service.js';

const AssistedResponseSchema = z.object({
  facts: z.array(
    z.object({
      field: z.string(),
      value: z.union([z.string(), z.number()]).transform(String),
      confidence: z.number().min(0).max(1).optional(),
    }),
  ),
});

@Injectable()
export class AssistedExtractorService implements OnModuleInit {
  private readonly logger = new Logger(AssistedExtractorService.name);

  constructor(
    private readonly configService: LlmConfigService,
    private readonly providerRegistry: LlmProviderRegistryService,
    private readonly patterns: PatternExtractorService,
    private readonly content: ContentLoaderService,
  ) {}

  onModuleInit(): void {
    const config = this.configService.get();
    this.logger.log(
      `Extraction LLM: provider=${config.extractionProvider}, model=${config.extractionModel}, enabled=${this.isEnabled()}`,
    );
  }

  isEnabled(): boolean {
    return this.resolveProvider() !== null;
  }

  async extract(
    utterance: string,
    knownFields: Record<string, string>,
    targetFields: readonly string[],
  ): Promise<AssistedExtraction> {
    const provider = this.resolveProvider();
    if (!provider) return { ok: false, reason: 'DISABLED' };

    const config = this.configService.get();
    const start = Date.now();
    const outcome = await withTimeout(
      provider.generate({
        messages: buildExtractionMessages(utterance, knownFields, targetFields),
        maxTokens: 256,
        temperature: 0,
        model: config.extractionModel,
        reasoningEffort: 'low',
      }),
      config.extractionTimeoutMs,
    );

    if (outcome.status === 'timeout') {
      return {
        ok: false,
        reason: 'TIMEOUT',
        detail: `no answer within ${config.extractionTimeoutMs}ms`,
      };
    }
    if (outcome.status === 'rejected') {
      return { ok: false, reason: 'PROVIDER_ERROR', detail: String(outcome.error) };
    }

    const text = outcome.value.text;
    const parsed = AssistedResponseSchema.safeParse(parseJsonResponse(text));
    if (!parsed.success) {
      return { ok: false, reason: 'MALFORMED', detail: clip(text, 200) };
    }

    return {
      ok: true,
      candidates: this.toCandidates(parsed.data.facts, targetFields),
      latencyMs: Date.now() - start,
    };
  }

  private toCandidates(
    facts: z.infer<typeof AssistedResponseSchema>['facts'],
    targetFields: readonly string[],
  ): FactCandidate[] {
    const defaultConfidence = this.content.getExtractionRules().assistedDefaultConfidence;
    const byKey = new Map<string, FactCandidate>();

    for (const fact of facts) {
      if (!targetFields.includes(fact.field)) {
        this.logger.debug(`Dropping assisted fact for unknown field "${fact.field}"`);
        continue;
      }
      const value = this.patterns.canonicalize(fact.field, fact.value);
      if (value === null) {
        this.logger.debug(`Dropping assisted value "${fact.value}" for ${fact.field}`);
        continue;
      }
      const candidate: FactCandidate = {
        field: fact.field,
        value,
        confidence: fact.confidence ?? defaultConfidence,
        source: 'assisted',
      };
      const key = this.patterns.isListField(fact.field)
        ? `${fact.field}\u0000${normalizeValue(value)}`
        : fact.field;
      const existing = byKey.get(key);
      if (!existing || candidate.confidence > existing.confidence) {
        byKey.set(key, candidate);
      }
    }
    return [...byKey.values()];
  }

  private resolveProvider(): LlmProvider | null {
    const config = this.configService.get();
    if (!config.extractionEnabled) return null;
    const provider = this.providerRegistry.getByName(config.extractionProvider);
    if (!provider || !provider.isAvailable()) return null;
    return provider;
  }
}
