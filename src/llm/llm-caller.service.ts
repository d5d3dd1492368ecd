// LLM call with retry, per-attempt timeout and a fallback provider

import { Injectable, Logger } from '@nestjs/common';
import { LlmProviderRegistryService } from './providers/llm-provider-registry.service.js';
import { LlmConfigService } from './llm-config.service.js';
import { withTimeout } from '../common/with-timeout.js';
import type {
  ErrorCategory,
  LlmCallResult,
  LlmProvider,
  LlmProviderRequest,
  LlmProviderResponse,
} from './types/index.js';

type AttemptResult =
  | { ok: true; response: LlmProviderResponse }
  | { ok: false; category: ErrorCategory; error: string };

@Injectable()
export class LlmCallerService {
  private readonly logger = new Logger(LlmCallerService.name);

  constructor(
    private readonly registry: LlmProviderRegistryService,
    private readonly configService: LlmConfigService,
  ) {}

  async call(request: LlmProviderRequest): Promise<LlmCallResult> {
    const config = this.configService.get();
    const primary = this.registry.getPrimary();
    const maxAttempts = Math.max(1, config.maxRetries);
    let attempts = 0;

    while (attempts < maxAttempts) {
      attempts++;
      const result = await this.attempt(primary, request, config.timeoutMs);
      if (result.ok) {
        return { success: true, response: result.response, providerUsed: primary.name, attempts };
      }
      this.logger.warn(
        `Primary "${primary.name}" attempt ${attempts} failed (${result.category}): ${result.error}`,
      );
      if (result.category === 'PERMANENT') break;
    }

    const fallback = this.registry.getFallback();
    if (fallback.name === primary.name) {
      return {
        success: false,
        error: `Primary "${primary.name}" failed after ${attempts} attempts, no distinct fallback`,
        providerUsed: primary.name,
        attempts,
      };
    }

    attempts++;
    const result = await this.attempt(fallback, request, config.timeoutMs);
    if (result.ok) {
      this.logger.log(`Fallback "${fallback.name}" succeeded`);
      return { success: true, response: result.response, providerUsed: fallback.name, attempts };
    }
    this.logger.error(`Fallback "${fallback.name}" also failed: ${result.error}`);
    return {
      success: false,
      error: `All providers failed after ${attempts} attempts`,
      providerUsed: fallback.name,
      attempts,
    };
  }

  private async attempt(
    provider: LlmProvider,
    request: LlmProviderRequest,
    timeoutMs: number,
  ): Promise<AttemptResult> {
    const outcome = await withTimeout(provider.generate(request), timeoutMs);
    switch (outcome.status) {
      case 'fulfilled':
        return { ok: true, response: outcome.value };
      case 'timeout':
        return { ok: false, category: 'RETRYABLE', error: `timed out after ${timeoutMs}ms` };
      case 'rejected':
        return {
          ok: false,
          category: classifyError(outcome.error),
          error: String(outcome.error),
        };
    }
  }
}

export function classifyError(err: unknown): ErrorCategory {
  const message = String(err).toLowerCase();
  const status =
    err && typeof err === 'object' && 'status' in err && typeof err.status === 'number'
      ? err.status
      : 0;

  // auth, invalid model, content policy
  if (status === 401 || status === 403) return 'PERMANENT';
  if (message.includes('invalid_model') || message.includes('model_not_found'))
    return 'PERMANENT';
  if (message.includes('content_policy') || message.includes('content_filter'))
    return 'PERMANENT';

  // timeout, rate limit, server error, overloaded
  return 'RETRYABLE';
}
