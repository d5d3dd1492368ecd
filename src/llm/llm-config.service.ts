// LLM settings from the environment, with defaults

import { Injectable, Logger } from '@nestjs/common';
import type { LlmConfig } from './types/index.js';

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function floatFromEnv(name: string, fallback: number): number {
  const parsed = parseFloat(process.env[name] ?? '');
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function loadLlmConfigFromEnv(): LlmConfig {
  return {
    provider: process.env.LLM_PROVIDER ?? 'mock',
    fallbackProvider: process.env.LLM_FALLBACK_PROVIDER ?? 'mock',
    openaiApiKey: process.env.OPENAI_API_KEY ?? '',
    openaiModel: process.env.OPENAI_MODEL ?? 'gpt-4o',
    geminiApiKey: process.env.GEMINI_API_KEY ?? '',
    geminiModel: process.env.GEMINI_MODEL ?? 'gemini-2.0-flash',
    maxRetries: intFromEnv('LLM_MAX_RETRIES', 2),
    timeoutMs: intFromEnv('LLM_TIMEOUT_MS', 8000),
    maxTokens: intFromEnv('LLM_MAX_TOKENS', 1024),
    temperature: floatFromEnv('LLM_TEMPERATURE', 0.8),
    extractionEnabled: process.env.EXTRACTION_LLM_ENABLED !== 'false',
    extractionProvider: process.env.EXTRACTION_LLM_PROVIDER ?? 'openai',
    extractionModel: process.env.EXTRACTION_LLM_MODEL ?? 'gpt-4o-mini',
    extractionTimeoutMs: intFromEnv('EXTRACTION_LLM_TIMEOUT_MS', 5000),
  };
}

@Injectable()
export class LlmConfigService {
  private readonly logger = new Logger(LlmConfigService.name);
  private readonly config: LlmConfig = loadLlmConfigFromEnv();

  get(): LlmConfig {
    return this.config;
  }

  /** Mutates in place so providers holding the config see the change. */
  update(patch: Partial<LlmConfig>): LlmConfig {
    Object.assign(this.config, patch);
    const keys = Object.keys(patch).join(', ');
    this.logger.log(`LLM config updated: ${keys}`);
    return this.config;
  }
}
