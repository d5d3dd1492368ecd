// Provider registry (strategy lookup by name)

import { Injectable, Logger } from '@nestjs/common';
import type { LlmProvider } from '../types/index.js';
import { LlmConfigService } from '../llm-config.service.js';
import { InternalError } from '../../common/errors/game-errors.js';

@Injectable()
export class LlmProviderRegistryService {
  private readonly logger = new Logger(LlmProviderRegistryService.name);
  private readonly providers = new Map<string, LlmProvider>();

  constructor(private readonly configService: LlmConfigService) {}

  register(provider: LlmProvider): void {
    this.providers.set(provider.name, provider);
    this.logger.log(
      `Registered LLM provider: ${provider.name} (available: ${provider.isAvailable()})`,
    );
  }

  getPrimary(): LlmProvider {
    return this.require(this.configService.get().provider);
  }

  getFallback(): LlmProvider {
    return this.require(this.configService.get().fallbackProvider);
  }

  getByName(name: string): LlmProvider | undefined {
    return this.providers.get(name);
  }

  private require(name: string): LlmProvider {
    const provider = this.providers.get(name);
    if (!provider) {
      throw new InternalError(`LLM provider "${name}" not registered`);
    }
    return provider;
  }
}
