// Gemini provider (@google/genai)
// assistant → model role; system messages become systemInstruction.

import { Logger } from '@nestjs/common';
import { GoogleGenAI } from '@google/genai';
import type {
  LlmConfig,
  LlmMessage,
  LlmProvider,
  LlmProviderRequest,
  LlmProviderResponse,
} from '../types/index.js';

// 2.5 models think before answering and the thinking counts against the output limit
export const GEMINI_MIN_OUTPUT_TOKENS = 8192;

export function geminiOutputBudget(maxTokens: number): number {
  return Math.max(maxTokens, GEMINI_MIN_OUTPUT_TOKENS);
}

export class GeminiProvider implements LlmProvider {
  readonly name = 'gemini';
  private readonly logger = new Logger(GeminiProvider.name);
  private client: GoogleGenAI | null = null;

  constructor(private readonly config: LlmConfig) {}

  private getClient(): GoogleGenAI {
    if (!this.client) {
      this.client = new GoogleGenAI({ apiKey: this.config.geminiApiKey });
    }
    return this.client;
  }

  async generate(request: LlmProviderRequest): Promise<LlmProviderResponse> {
    const start = Date.now();
    const model = request.model ?? this.config.geminiModel;

    const systemMessages = request.messages.filter((m) => m.role === 'system');
    const nonSystemMessages = request.messages.filter((m) => m.role !== 'system');

    const contents = nonSystemMessages.map((m: LlmMessage) => ({
      role: m.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: m.content }],
    }));

    const systemInstruction = systemMessages.length > 0
      ? systemMessages.map((m) => m.content).join('\n\n')
      : undefined;

    const response = await this.getClient().models.generateContent({
      model,
      contents,
      config: {
        maxOutputTokens: geminiOutputBudget(request.maxTokens),
        temperature: request.temperature,
        ...(systemInstruction ? { systemInstruction } : {}),
      },
    });

    const text = response.text ?? '';
    const finishReason = response.candidates?.[0]?.finishReason;
    if (finishReason && finishReason !== 'STOP') {
      this.logger.warn(`finishReason=${finishReason} model=${model} textLength=${text.length}`);
    }

    const usage = response.usageMetadata;
    return {
      text,
      model,
      promptTokens: usage?.promptTokenCount ?? 0,
      completionTokens: usage?.candidatesTokenCount ?? 0,
      latencyMs: Date.now() - start,
    };
  }

  isAvailable(): boolean {
    return !!this.config.geminiApiKey;
  }
}
