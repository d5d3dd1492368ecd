// Narration from a context bundle. Failures come back as a result, not an exception.

import { Injectable, Logger } from '@nestjs/common';
import type { ContextBundle } from '../db/types/index.js';
import { LlmCallerService } from './llm-caller.service.js';
import { LlmConfigService } from './llm-config.service.js';
import { buildNarrativeMessages } from './prompts/narrative-prompt.js';

export type NarrationResult =
  | { status: 'DONE'; text: string; providerUsed: string; model: string }
  | { status: 'FAILED'; error: string };

@Injectable()
export class NarrativeService {
  private readonly logger = new Logger(NarrativeService.name);

  constructor(
    private readonly caller: LlmCallerService,
    private readonly configService: LlmConfigService,
  ) {}

  async generate(bundle: ContextBundle): Promise<NarrationResult> {
    const config = this.configService.get();
    const result = await this.caller.call({
      messages: buildNarrativeMessages(bundle),
      maxTokens: config.maxTokens,
      temperature: config.temperature,
    });

    if (!result.success) {
      this.logger.warn(`Narration failed: ${result.error}`);
      return { status: 'FAILED', error: result.error };
    }
    const text = result.response.text.trim();
    if (!text) {
      return { status: 'FAILED', error: `Empty narration from ${result.providerUsed}` };
    }
    return {
      status: 'DONE',
      text,
      providerUsed: result.providerUsed,
      model: result.response.model,
    };
  }
}
