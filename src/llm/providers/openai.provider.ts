// OpenAI provider
// Reasoning models (gpt-5, o-series) go through the Responses API,
// everything else through Chat Completions.

import OpenAI from 'openai';
import type {
  LlmConfig,
  LlmProvider,
  LlmProviderRequest,
  LlmProviderResponse,
} from '../types/index.js';

const isReasoningModel = (model: string) => /^(gpt-5|o[1-9])/.test(model);

export class OpenAIProvider implements LlmProvider {
  readonly name = 'openai';
  private client: OpenAI | null = null;

  constructor(private readonly config: LlmConfig) {}

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({
        apiKey: this.config.openaiApiKey,
        timeout: this.config.timeoutMs,
      });
    }
    return this.client;
  }

  async generate(request: LlmProviderRequest): Promise<LlmProviderResponse> {
    const model = request.model ?? this.config.openaiModel;

    if (isReasoningModel(model)) {
      return this.generateWithResponses(request, model);
    }
    return this.generateWithChatCompletions(request, model);
  }

  private async generateWithResponses(
    request: LlmProviderRequest,
    model: string,
  ): Promise<LlmProviderResponse> {
    const start = Date.now();
    const client = this.getClient();

    // max_output_tokens includes reasoning tokens, so scale by effort
    const effort = request.reasoningEffort ?? 'medium';
    const budgetMultiplier = effort === 'low' ? 3 : effort === 'medium' ? 5 : 8;
    const reasoningBudget = Math.max(request.maxTokens * budgetMultiplier, 4096);

    const response = await client.responses.create({
      model,
      input: request.messages.map((m) => ({ role: m.role, content: m.content })),
      max_output_tokens: reasoningBudget,
      reasoning: { effort },
    });

    return {
      text: response.output_text,
      model: response.model,
      promptTokens: response.usage?.input_tokens ?? 0,
      completionTokens: response.usage?.output_tokens ?? 0,
      latencyMs: Date.now() - start,
    };
  }

  private async generateWithChatCompletions(
    request: LlmProviderRequest,
    model: string,
  ): Promise<LlmProviderResponse> {
    const start = Date.now();
    const client = this.getClient();

    const completion = await client.chat.completions.create({
      model,
      messages: request.messages.map((m) => ({
        role: m.role,
        content: m.content,
      })),
      max_tokens: request.maxTokens,
      temperature: request.temperature,
    });

    const text = completion.choices[0]?.message?.content ?? '';

    return {
      text,
      model: completion.model,
      promptTokens: completion.usage?.prompt_tokens ?? 0,
      completionTokens: completion.usage?.completion_tokens ?? 0,
      latencyMs: Date.now() - start,
    };
  }

  isAvailable(): boolean {
    return !!this.config.openaiApiKey;
  }
}
