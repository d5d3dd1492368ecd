import { Module, type OnModuleInit } from '@nestjs/common';
import { LlmConfigService } from './llm-config.service.js';
import { LlmCallerService } from './llm-caller.service.js';
import { NarrativeService } from './narrative.service.js';
import { LlmProviderRegistryService } from './providers/llm-provider-registry.service.js';
import { MockProvider } from './providers/mock.provider.js';
import { OpenAIProvider } from './providers/openai.provider.js';
import { GeminiProvider } from './providers/gemini.provider.js';

@Module({
  providers: [
    LlmConfigService,
    LlmProviderRegistryService,
    LlmCallerService,
    NarrativeService,
  ],
  exports: [
    LlmConfigService,
    LlmProviderRegistryService,
    LlmCallerService,
    NarrativeService,
  ],
})
export class LlmModule implements OnModuleInit {
  constructor(
    private readonly registry: LlmProviderRegistryService,
    private readonly configService: LlmConfigService,
  ) {}

  onModuleInit(): void {
    const config = this.configService.get();

    this.registry.register(new MockProvider());
    this.registry.register(new OpenAIProvider(config));
    this.registry.register(new GeminiProvider(config));
  }
}
