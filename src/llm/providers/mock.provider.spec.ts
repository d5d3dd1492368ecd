import { ContentLoaderService } from '../../content/content-loader.service.js';
import { AssistedExtractorService } from '../../engine/extraction/assisted-extractor.service.js';
import { PatternExtractorService } from '../../engine/extraction/pattern-extractor.service.js';
import { LlmConfigService } from '../llm-config.service.js';
import { buildExtractionMessages } from '../prompts/extraction-prompt.js';
import { LlmProviderRegistryService } from './llm-provider-registry.service.js';
import { MockProvider } from './mock.provider.js';

describe('MockProvider', () => {
  const provider = new MockProvider();

  it('answers the extraction prompt with facts for the target fields', async () => {
    const response = await provider.generate({
      messages: buildExtractionMessages(
        'I am an elf ranger, brave to a fault, and no sailor',
        { name: 'Aria' },
        ['race', 'class', 'traits'],
      ),
      maxTokens: 256,
      temperature: 0,
    });

    expect(JSON.parse(response.text)).toEqual({
      facts: [
        { field: 'race', value: 'Elf', confidence: 0.85 },
        { field: 'class', value: 'Ranger', confidence: 0.85 },
        { field: 'traits', value: 'Brave', confidence: 0.7 },
      ],
    });
    expect(response.model).toBe('mock-v1');
  });

  it('returns an empty fact list when nothing matches', async () => {
    const response = await provider.generate({
      messages: buildExtractionMessages('I open the door', {}, ['race']),
      maxTokens: 256,
      temperature: 0,
    });
    expect(response.text).toBe('{"facts":[]}');
  });

  it('does not read the known-fields line as player speech', async () => {
    const response = await provider.generate({
      messages: buildExtractionMessages('hello there', { class: 'Wizard' }, ['class']),
      maxTokens: 256,
      temperature: 0,
    });
    expect(response.text).toBe('{"facts":[]}');
  });

  it('narrates from a scene sheet', async () => {
    const sheet = [
      '[Character]',
      '- name: Aria',
      '- race: Elf',
      '',
      '[Symbolic state]',
      'Tension: 0.80 (PURE_CHAOS)',
      'Decay: 0.50 (STRAINED)',
    ].join('\n');
    const response = await provider.generate({
      messages: [
        { role: 'system', content: 'narrate' },
        { role: 'user', content: sheet },
      ],
      maxTokens: 800,
      temperature: 0.8,
    });

    expect(response.text).toBe(
      'You are Aria, an Elf. The world around you is coming apart. ' +
        'Parts of your own story no longer fit together.',
    );
    expect(response.completionTokens).toBe(Math.ceil(response.text.length / 4));
  });

  it('drives assisted extraction offline', async () => {
    const content = new ContentLoaderService();
    await content.loadAll();
    const config = new LlmConfigService();
    config.update({ extractionEnabled: true, extractionProvider: 'mock' });
    const registry = new LlmProviderRegistryService(config);
    registry.register(new MockProvider());
    const assisted = new AssistedExtractorService(
      config,
      registry,
      new PatternExtractorService(content),
      content,
    );

    const result = await assisted.extract('A dwarf who loves archery', {}, ['race', 'combatStyle']);
    expect(result).toMatchObject({
      ok: true,
      candidates: [
        { field: 'race', value: 'Dwarf', confidence: 0.85, source: 'assisted' },
        { field: 'combatStyle', value: 'Ranged', confidence: 0.7, source: 'assisted' },
      ],
    });
  });
});
