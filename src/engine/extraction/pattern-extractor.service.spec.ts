import { ContentLoaderService } from '../../content/content-loader.service.js';
import { PatternExtractorService } from './pattern-extractor.service.js';

describe('PatternExtractorService', () => {
  let content: ContentLoaderService;
  let extractor: PatternExtractorService;

  beforeAll(async () => {
    content = new ContentLoaderService();
    await content.loadAll();
  });

  beforeEach(() => {
    extractor = new PatternExtractorService(content);
  });

  it('extracts gender, race, class and trauma from one sentence', () => {
    const result = extractor.extract(
      "She's a female half-elf ranger who lost her family to raiders",
    );
    expect(result.map((c) => [c.field, c.value])).toEqual([
      ['gender', 'Female'],
      ['race', 'Half-Elf'],
      ['class', 'Ranger'],
      ['trauma', 'Lost her family to raiders'],
    ]);
    const race = result.find((c) => c.field === 'race');
    expect(race?.matchedText).toBe('half-elf');
    expect(race?.confidence).toBe(0.9);
    expect(result.find((c) => c.field === 'trauma')?.confidence).toBe(0.8);
    expect(result.every((c) => c.source === 'pattern')).toBe(true);
  });

  it('prefers the longest lexicon phrase', () => {
    const result = extractor.extract('A High Elf wizard');
    expect(result.find((c) => c.field === 'race')).toMatchObject({
      value: 'High Elf',
      matchedText: 'high elf',
    });
    expect(result.find((c) => c.field === 'class')?.value).toBe('Wizard');
  });

  it('extracts name and age with capture patterns', () => {
    const result = extractor.extract("My name is aria and I'm 27 years old");
    expect(result).toEqual([
      {
        field: 'name',
        value: 'Aria',
        confidence: 0.9,
        source: 'pattern',
        matchedText: 'My name is aria',
        ruleId: 'name.explicit',
      },
      {
        field: 'age',
        value: '27',
        confidence: 0.95,
        source: 'pattern',
        matchedText: '27 years old',
        ruleId: 'age.years-old',
      },
    ]);
  });

  describe('substring fallback', () => {
    it('accepts a partial term after a confirmation phrase', () => {
      const race = extractor
        .extract('I am a dwarvenkin smith')
        .find((c) => c.field === 'race');
      expect(race).toMatchObject({
        value: 'Dwarf',
        confidence: 0.6,
        matchedText: 'dwarven',
        ruleId: 'race.fallback',
      });
    });

    it('rejects a term buried inside another word', () => {
      const result = extractor.extract('He met a stranger on the road');
      expect(result.find((c) => c.field === 'class')).toBeUndefined();
    });

    it('ignores short aliases that begin ordinary words', () => {
      expect(extractor.extract('I wear a magenta cloak')).toEqual([]);
    });

    it('never guesses gender from a word prefix', () => {
      expect(extractor.extract('She reads the manuscript')).toEqual([
        {
          field: 'gender',
          value: 'Female',
          confidence: 0.8,
          source: 'pattern',
          matchedText: 'she',
          ruleId: 'gender.pronoun',
        },
      ]);
      expect(extractor.extract('She picks up the mantle').map((c) => c.value)).toEqual([
        'Female',
      ]);
      expect(extractor.extract('We fight the many raiders at the gate')).toEqual([]);
    });
  });

  describe('list fields', () => {
    it('returns every distinct item in utterance order', () => {
      const result = extractor.extract(
        'A brave and curious ranger, bold in archery, haunted by grief',
      );
      expect(result.map((c) => [c.field, c.value])).toEqual([
        ['class', 'Ranger'],
        ['traits', 'Brave'],
        ['traits', 'Curious'],
        ['emotionalThemes', 'Grief'],
        ['combatStyle', 'Ranged'],
      ]);
      expect(result.find((c) => c.value === 'Brave')?.matchedText).toBe('brave');
    });

    it('takes each matching pattern once for free-text lists', () => {
      const result = extractor.extract('I seek justice. I dream of a free city');
      expect(result).toEqual([
        {
          field: 'motivations',
          value: 'Seek justice',
          confidence: 0.75,
          source: 'pattern',
          matchedText: 'seek justice',
          ruleId: 'motivations.drive',
        },
        {
          field: 'motivations',
          value: 'Dream of a free city',
          confidence: 0.7,
          source: 'pattern',
          matchedText: 'dream of a free city',
          ruleId: 'motivations.drive',
        },
      ]);
    });

    it('flags list fields', () => {
      expect(extractor.isListField('traits')).toBe(true);
      expect(extractor.isListField('combatStyle')).toBe(false);
    });
  });

  describe('pronouns', () => {
    it('infers gender from a pronoun when no explicit term exists', () => {
      const gender = extractor
        .extract('She carries a bow')
        .find((c) => c.field === 'gender');
      expect(gender).toMatchObject({
        value: 'Female',
        confidence: 0.8,
        matchedText: 'she',
        ruleId: 'gender.pronoun',
      });
    });

    it('explicit gender terms outrank pronouns', () => {
      const gender = extractor
        .extract('a woman of few words, he says')
        .find((c) => c.field === 'gender');
      expect(gender?.value).toBe('Female');
      expect(gender?.confidence).toBe(0.9);
    });

    it('male pronoun', () => {
      const gender = extractor
        .extract('He met a stranger on the road')
        .find((c) => c.field === 'gender');
      expect(gender?.value).toBe('Male');
    });
  });

  it('returns nothing for text without facts', () => {
    expect(extractor.extract('I open the door.')).toEqual([]);
  });

  describe('canonicalize', () => {
    it('maps lexicon aliases to canonical values', () => {
      expect(extractor.canonicalize('race', 'half elf')).toBe('Half-Elf');
      expect(extractor.canonicalize('class', 'MAGE')).toBe('Wizard');
    });

    it('rejects unknown lexicon terms and unknown fields', () => {
      expect(extractor.canonicalize('race', 'Orc')).toBeNull();
      expect(extractor.canonicalize('favouriteColour', 'red')).toBeNull();
    });

    it('trims free-text values', () => {
      expect(extractor.canonicalize('trauma', '  lost  it ')).toBe('lost it');
    });
  });

  it('lists fields in rule-table order', () => {
    expect(extractor.getFieldNames()).toEqual([
      'name',
      'gender',
      'race',
      'class',
      'background',
      'alignment',
      'age',
      'trauma',
      'motivations',
      'traits',
      'emotionalThemes',
      'combatStyle',
    ]);
  });
});
