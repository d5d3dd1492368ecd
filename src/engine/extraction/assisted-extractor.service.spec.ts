import { ContentLoaderService } from '../../content/content-loader.service.js';
import { LlmConfigService } from '../../llm/llm-config.service.js';
import { LlmProviderRegistryService } from '../../llm/providers/llm-provider-registry.service.js';
import type {
  LlmProvider,
  LlmProviderRequest,
  LlmProviderResponse,
} from '../../llm/types/index.js';
import { AssistedExtractorService } from './assisted-extractor.service.js';
import { PatternExtractorService } from './pattern-extractor.service.js';

class FakeExtractionProvider implements LlmProvider {
  readonly name = 'fake';
  lastRequest: LlmProviderRequest | null = null;
  reply: string | Error | null = '{"facts":[]}';
  available = true;

  async generate(request: LlmProviderRequest): Promise<LlmProviderResponse> {
    this.lastRequest = request;
    if (this.reply instanceof Error) throw this.reply;
    if (this.reply === null) return new Promise<LlmProviderResponse>(() => undefined);
    return {
      text: this.reply,
      model: 'fake-extract',
      promptTokens: 0,
      completionTokens: 0,
      latencyMs: 0,
    };
  }

  isAvailable(): boolean {
    return this.available;
  }
}

const FIELDS = ['name', 'gender', 'race', 'class', 'background', 'alignment', 'age', 'trauma', 'motivations', 'traits'];

describe('AssistedExtractorService', () => {
  let content: ContentLoaderService;
  let config: LlmConfigService;
  let provider: FakeExtractionProvider;
  let service: AssistedExtractorService;

  beforeAll(async () => {
    content = new ContentLoaderService();
    await content.loadAll();
  });

  beforeEach(() => {
    config = new LlmConfigService();
    config.update({
      extractionEnabled: true,
      extractionProvider: 'fake',
      extractionModel: 'fake-extract',
      extractionTimeoutMs: 20,
    });
    const registry = new LlmProviderRegistryService(config);
    provider = new FakeExtractionProvider();
    registry.register(provider);
    service = new AssistedExtractorService(
      config,
      registry,
      new PatternExtractorService(content),
      content,
    );
  });

  it('canonicalises lexicon values and applies the default confidence', async () => {
    provider.reply = JSON.stringify({
      facts: [
        { field: 'race', value: 'half elf', confidence: 0.85 },
        { field: 'class', value: 'ranger' },
        { field: 'eyeColour', value: 'green', confidence: 0.9 },
        { field: 'background', value: 'space pirate', confidence: 0.9 },
        { field: 'age', value: 27, confidence: 0.7 },
      ],
    });

    const result = await service.extract('a half elf ranger', { name: 'Aria' }, FIELDS);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.candidates).toEqual([
      { field: 'race', value: 'Half-Elf', confidence: 0.85, source: 'assisted' },
      { field: 'class', value: 'Ranger', confidence: 0.8, source: 'assisted' },
      { field: 'age', value: '27', confidence: 0.7, source: 'assisted' },
    ]);
  });

  it('sends known fields and uses the extraction model', async () => {
    await service.extract('hello', { name: 'Aria' }, ['race']);
    expect(provider.lastRequest?.model).toBe('fake-extract');
    expect(provider.lastRequest?.temperature).toBe(0);
    expect(provider.lastRequest?.messages[1]?.content).toBe(
      'Target fields: race\nKnown fields: name=Aria\n\nPlayer message:\nhello',
    );
  });

  it('keeps the highest-confidence entry when a field repeats', async () => {
    provider.reply = '```json\n{"facts":[{"field":"class","value":"mage","confidence":0.6},{"field":"class","value":"bard","confidence":0.9}]}\n```';
    const result = await service.extract('x', {}, FIELDS);
    expect(result).toMatchObject({
      ok: true,
      candidates: [{ field: 'class', value: 'Bard', confidence: 0.9 }],
    });
  });

  it('keeps one entry per item for list fields', async () => {
    provider.reply = JSON.stringify({
      facts: [
        { field: 'traits', value: 'bold', confidence: 0.7 },
        { field: 'traits', value: 'wary', confidence: 0.8 },
        { field: 'traits', value: 'courageous', confidence: 0.9 },
      ],
    });
    const result = await service.extract('x', {}, FIELDS);
    expect(result).toMatchObject({
      ok: true,
      candidates: [
        { field: 'traits', value: 'Brave', confidence: 0.9 },
        { field: 'traits', value: 'Cautious', confidence: 0.8 },
      ],
    });
  });

  it('is disabled by configuration', async () => {
    config.update({ extractionEnabled: false });
    expect(service.isEnabled()).toBe(false);
    await expect(service.extract('x', {}, FIELDS)).resolves.toEqual({
      ok: false,
      reason: 'DISABLED',
    });
    expect(provider.lastRequest).toBeNull();
  });

  it('is disabled when the provider is unavailable', async () => {
    provider.available = false;
    await expect(service.extract('x', {}, FIELDS)).resolves.toEqual({
      ok: false,
      reason: 'DISABLED',
    });
  });

  it('reports a timeout', async () => {
    provider.reply = null;
    await expect(service.extract('x', {}, FIELDS)).resolves.toEqual({
      ok: false,
      reason: 'TIMEOUT',
      detail: 'no answer within 20ms',
    });
  });

  it('reports a provider error', async () => {
    provider.reply = new Error('rate limited');
    await expect(service.extract('x', {}, FIELDS)).resolves.toEqual({
      ok: false,
      reason: 'PROVIDER_ERROR',
      detail: 'Error: rate limited',
    });
  });

  it('reports prose as malformed', async () => {
    provider.reply = 'The character seems to be an elf.';
    await expect(service.extract('x', {}, FIELDS)).resolves.toMatchObject({
      ok: false,
      reason: 'MALFORMED',
    });
  });

  it('reports out-of-range confidence as malformed', async () => {
    provider.reply = '{"facts":[{"field":"race","value":"elf","confidence":1.5}]}';
    await expect(service.extract('x', {}, FIELDS)).resolves.toMatchObject({
      ok: false,
      reason: 'MALFORMED',
    });
  });
});
