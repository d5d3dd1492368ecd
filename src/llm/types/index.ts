// Provider-neutral LLM contracts. OpenAI's message shape is the lingua franca;
// each provider converts inside generate().

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmProviderRequest {
  messages: LlmMessage[];
  maxTokens: number;
  temperature: number;
  model?: string;
  reasoningEffort?: 'low' | 'medium' | 'high'; // reasoning-model effort hint
}

export interface LlmProviderResponse {
  text: string;
  model: string;
  promptTokens: number;
  completionTokens: number;
  latencyMs: number;
}

export interface LlmProvider {
  readonly name: string;
  generate(request: LlmProviderRequest): Promise<LlmProviderResponse>;
  isAvailable(): boolean;
}

export type ErrorCategory = 'RETRYABLE' | 'PERMANENT';

export type LlmCallResult =
  | {
      success: true;
      response: LlmProviderResponse;
      providerUsed: string;
      attempts: number;
    }
  | {
      success: false;
      error: string;
      providerUsed: string;
      attempts: number;
    };

export interface LlmConfig {
  provider: string;
  fallbackProvider: string;
  openaiApiKey: string;
  openaiModel: string;
  geminiApiKey: string;
  geminiModel: string;
  maxRetries: number;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
  // dedicated lightweight model for assisted fact extraction
  extractionEnabled: boolean;
  extractionProvider: string;
  extractionModel: string;
  extractionTimeoutMs: number;
}
