import { ExtractionRulesSchema } from './content.types.js';

const base = {
  version: 'test',
  lexiconConfidence: 0.9,
  fallbackConfidence: 0.6,
  assistedDefaultConfidence: 0.8,
  confirmationPrefixes: ['a '],
};

const lexicon = {
  kind: 'lexicon',
  id: 'race.lexicon',
  entries: [{ value: 'Dwarf', aliases: ['dwarf', 'dwarven'] }],
};

describe('ExtractionRulesSchema', () => {
  it('accepts a fallback after a lexicon rule and defaults its alias length', () => {
    const parsed = ExtractionRulesSchema.parse({
      ...base,
      fields: [{ field: 'race', rules: [lexicon, { kind: 'fallback', id: 'race.fallback' }] }],
    });
    expect(parsed.fields[0]?.rules[1]).toEqual({
      kind: 'fallback',
      id: 'race.fallback',
      minAliasLength: 5,
    });
  });

  it('rejects a fallback with no lexicon before it', () => {
    const result = ExtractionRulesSchema.safeParse({
      ...base,
      fields: [{ field: 'race', rules: [{ kind: 'fallback', id: 'race.fallback' }, lexicon] }],
    });
    expect(result.success).toBe(false);
  });
});
