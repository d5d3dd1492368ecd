// Versioned engine configuration and rule tables (content/taleweave_v1/*.json)

import { z } from 'zod';
import { ARCHETYPE_TAG } from '../db/types/index.js';

const unit = z.number().min(0).max(1);

export const EngineConfigSchema = z.object({
  version: z.string().min(1),
  autoCommitThreshold: unit,
  requiredFields: z.array(z.string().min(1)),
  optionalFields: z.array(z.string().min(1)),
  freeTextFields: z.array(z.string().min(1)),
  // fields that accumulate items instead of holding one value
  listFields: z.array(z.string().min(1)).default([]),
  tension: z
    .object({
      min: z.number(),
      max: z.number(),
      initial: z.number(),
      maxDelta: z.number().positive(),
    })
    .refine((t) => t.min < t.max && t.initial >= t.min && t.initial <= t.max, {
      message: 'tension.initial must lie inside [min, max]',
    }),
  symbolic: z.object({
    historyLimit: z.number().int().positive(),
  }),
  memory: z.object({
    shortCapacity: z.number().int().positive(),
    midCapacity: z.number().int().positive(),
    promoteToMidThreshold: unit,
    promoteToLongThreshold: unit,
    recencyHalfLife: z.number().positive(),
  }),
  significance: z.object({
    fact: unit,
    requiredFactBonus: unit,
    symbolic: unit,
    tensionScale: z.number().min(0),
    contradiction: unit,
    undo: unit,
  }),
});
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type MemoryConfig = EngineConfig['memory'];

const LexiconRuleSchema = z.object({
  kind: z.literal('lexicon'),
  id: z.string().min(1),
  entries: z
    .array(
      z.object({
        value: z.string().min(1),
        aliases: z.array(z.string().min(1)),
      }),
    )
    .min(1),
});

const PatternRuleSchema = z.object({
  kind: z.literal('pattern'),
  id: z.string().min(1),
  patterns: z
    .array(
      z.object({
        regex: z.string().min(1),
        group: z.number().int().min(0).default(0),
        format: z.enum(['title', 'sentence', 'raw']),
        confidence: unit,
      }),
    )
    .min(1),
});

const PronounRuleSchema = z.object({
  kind: z.literal('pronoun'),
  id: z.string().min(1),
  confidence: unit,
  pronouns: z
    .array(
      z.object({
        value: z.string().min(1),
        words: z.array(z.string().min(1)).min(1),
      }),
    )
    .min(1),
});

// Substring match on the field's lexicon aliases, only at a word start right
// after a confirmation phrase. Aliases shorter than minAliasLength are skipped.
const FallbackRuleSchema = z.object({
  kind: z.literal('fallback'),
  id: z.string().min(1),
  minAliasLength: z.number().int().min(1).default(5),
});

export const ExtractionRuleSchema = z.discriminatedUnion('kind', [
  LexiconRuleSchema,
  PatternRuleSchema,
  PronounRuleSchema,
  FallbackRuleSchema,
]);
export type ExtractionRule = z.infer<typeof ExtractionRuleSchema>;
export type LexiconRule = z.infer<typeof LexiconRuleSchema>;
export type PatternRule = z.infer<typeof PatternRuleSchema>;
export type PronounRule = z.infer<typeof PronounRuleSchema>;
export type FallbackRule = z.infer<typeof FallbackRuleSchema>;

export const ExtractionRulesSchema = z.object({
  version: z.string().min(1),
  lexiconConfidence: unit,
  fallbackConfidence: unit,
  assistedDefaultConfidence: unit,
  confirmationPrefixes: z.array(z.string()),
  fields: z
    .array(
      z
        .object({
          field: z.string().min(1),
          rules: z.array(ExtractionRuleSchema).min(1),
        })
        .refine(
          (f) => {
            const lexicon = f.rules.findIndex((r) => r.kind === 'lexicon');
            const fallback = f.rules.findIndex((r) => r.kind === 'fallback');
            return fallback === -1 || (lexicon !== -1 && lexicon < fallback);
          },
          { message: 'a fallback rule must follow a lexicon rule of the same field' },
        ),
    )
    .min(1),
});
export type ExtractionRules = z.infer<typeof ExtractionRulesSchema>;

const ArchetypeTagSchema = z.enum(ARCHETYPE_TAG);

export const ArchetypeTableSchema = z.object({
  version: z.string().min(1),
  weights: z.record(ArchetypeTagSchema, z.number()),
  rules: z
    .array(
      z
        .object({
          field: z.string().min(1).optional(),
          keywords: z.array(z.string().min(1)).default([]),
          values: z.array(z.string().min(1)).default([]),
          tags: z.array(ArchetypeTagSchema).min(1),
          emotions: z.array(z.string().min(1)).default([]),
        })
        .refine((r) => r.keywords.length > 0 || r.values.length > 0, {
          message: 'an archetype rule needs keywords or values',
        }),
    ),
  contradiction: z.object({
    tags: z.array(ArchetypeTagSchema),
    emotions: z.array(z.string().min(1)),
  }),
  // pairs that lower symbolic coherence when both are active
  conflicts: z.array(z.tuple([ArchetypeTagSchema, ArchetypeTagSchema])).default([]),
  decay: z.object({
    contradiction: unit,
    shadowRepeat: unit,
    shadowRepeatAfter: z.number().int().min(0),
  }),
});
export type ArchetypeTable = z.infer<typeof ArchetypeTableSchema>;
export type ArchetypeRule = ArchetypeTable['rules'][number];

export const EquivalenceTableSchema = z.object({
  version: z.string().min(1),
  // field → groups of [parent, ...refinements]
  refinements: z.record(z.string(), z.array(z.array(z.string().min(1)).min(2))),
});
export type EquivalenceTable = z.infer<typeof EquivalenceTableSchema>;

export interface LoadedContent {
  engine: EngineConfig;
  extraction: ExtractionRules;
  archetypes: ArchetypeTable;
  equivalences: EquivalenceTable;
}
