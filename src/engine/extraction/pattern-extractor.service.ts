// Rule-table driven fact extraction (no network, deterministic)

import { Injectable, Logger } from '@nestjs/common';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import type {
  ExtractionRule,
  ExtractionRules,
  FallbackRule,
  LexiconRule,
  PatternRule,
  PronounRule,
} from '../../content/content.types.js';
import {
  escapeRegExp,
  normalizeValue,
  toSentenceCase,
  toTitleCase,
} from '../../common/text-utils.js';
import type { FactCandidate } from '../../db/types/index.js';

type LexiconMatch = {
  value: string;
  start: number;
  text: string;
};

type CompiledAlias = {
  value: string;
  alias: string;
  boundary: RegExp;
};

type CompiledPattern = {
  regex: RegExp;
  group: number;
  format: 'title' | 'sentence' | 'raw';
  confidence: number;
};

type CompiledRule =
  | { kind: 'lexicon'; id: string; aliases: CompiledAlias[] }
  | { kind: 'pattern'; id: string; patterns: CompiledPattern[] }
  | { kind: 'pronoun'; id: string; confidence: number; words: Map<string, string> }
  | { kind: 'fallback'; id: string; aliases: CompiledAlias[] };

type CompiledField = {
  field: string;
  rules: CompiledRule[];
  lexicon: Map<string, string> | null; // normalized alias/value → canonical value
};

@Injectable()
export class PatternExtractorService {
  private readonly logger = new Logger(PatternExtractorService.name);
  private compiledFor: ExtractionRules | null = null;
  private compiled: CompiledField[] = [];

  constructor(private readonly content: ContentLoaderService) {}

  /**
   * In rule-table field order. Single-valued fields yield the first matching
   * rule's candidate; list fields yield every distinct item any rule finds.
   */
  extract(utterance: string): FactCandidate[] {
    const rules = this.content.getExtractionRules();
    const lower = utterance.toLowerCase();
    const candidates: FactCandidate[] = [];

    for (const field of this.getCompiled()) {
      if (this.isListField(field.field)) {
        candidates.push(...this.extractItems(field, utterance, lower, rules));
        continue;
      }
      for (const rule of field.rules) {
        const candidate = this.applyRule(field.field, rule, utterance, lower, rules);
        if (candidate) {
          this.logger.debug(
            `${rule.id} matched "${candidate.matchedText ?? ''}" → ${field.field}=${candidate.value}`,
          );
          candidates.push(candidate);
          break;
        }
      }
    }
    return candidates;
  }

  getFieldNames(): string[] {
    return this.getCompiled().map((f) => f.field);
  }

  isListField(field: string): boolean {
    return this.content.getEngineConfig().listFields.includes(field);
  }

  isLexiconField(field: string): boolean {
    return this.findField(field)?.lexicon != null;
  }

  /**
   * Canonical form of a value for a field. Lexicon fields map aliases to their
   * canonical value and return null for unknown terms; other fields are trimmed.
   * Unknown fields return null.
   */
  canonicalize(field: string, value: string): string | null {
    const compiled = this.findField(field);
    if (!compiled) return null;
    const trimmed = value.trim().replace(/\s+/g, ' ');
    if (!trimmed) return null;
    if (!compiled.lexicon) return trimmed;
    return compiled.lexicon.get(normalizeValue(trimmed)) ?? null;
  }

  private findField(field: string): CompiledField | undefined {
    return this.getCompiled().find((f) => f.field === field);
  }

  private extractItems(
    field: CompiledField,
    utterance: string,
    lower: string,
    rules: ExtractionRules,
  ): FactCandidate[] {
    const items: FactCandidate[] = [];
    const seen = new Set<string>();
    for (const rule of field.rules) {
      let found: FactCandidate[];
      if (rule.kind === 'lexicon') {
        found = pickDisjoint(collectMatches(rule.aliases, lower)).map((m) => ({
          field: field.field,
          value: m.value,
          confidence: rules.lexiconConfidence,
          source: 'pattern' as const,
          matchedText: m.text,
          ruleId: rule.id,
        }));
      } else if (rule.kind === 'pattern') {
        found = rule.patterns.flatMap((p) => {
          const c = this.matchPattern(field.field, rule.id, [p], utterance);
          return c ? [c] : [];
        });
      } else {
        const c = this.applyRule(field.field, rule, utterance, lower, rules);
        found = c ? [c] : [];
      }
      for (const c of found) {
        const key = normalizeValue(c.value);
        if (seen.has(key)) continue;
        seen.add(key);
        items.push(c);
      }
    }
    return items;
  }

  private applyRule(
    field: string,
    rule: CompiledRule,
    utterance: string,
    lower: string,
    rules: ExtractionRules,
  ): FactCandidate | null {
    switch (rule.kind) {
      case 'lexicon':
        return this.matchLexicon(field, rule.id, rule.aliases, lower, rules);
      case 'pattern':
        return this.matchPattern(field, rule.id, rule.patterns, utterance);
      case 'pronoun':
        return this.matchPronoun(field, rule, lower);
      case 'fallback':
        return this.matchFallback(field, rule.id, rule.aliases, lower, rules);
    }
  }

  private matchLexicon(
    field: string,
    ruleId: string,
    aliases: CompiledAlias[],
    lower: string,
    rules: ExtractionRules,
  ): FactCandidate | null {
    const best = pickLongest(collectMatches(aliases, lower));
    if (!best) return null;
    return {
      field,
      value: best.value,
      confidence: rules.lexiconConfidence,
      source: 'pattern',
      matchedText: best.text,
      ruleId,
    };
  }

  /**
   * Alias as the start of a longer word ("druidic", "dwarvenkin"), accepted
   * only directly after a confirmation phrase that itself starts a word.
   */
  private matchFallback(
    field: string,
    ruleId: string,
    aliases: CompiledAlias[],
    lower: string,
    rules: ExtractionRules,
  ): FactCandidate | null {
    const matches: LexiconMatch[] = [];
    for (const a of aliases) {
      let idx = lower.indexOf(a.alias);
      while (idx !== -1) {
        if (isWordStart(lower, idx) && followsPrefix(lower, idx, rules.confirmationPrefixes)) {
          matches.push({ value: a.value, start: idx, text: a.alias });
        }
        idx = lower.indexOf(a.alias, idx + 1);
      }
    }
    const chosen = pickLongest(matches);
    if (!chosen) return null;
    return {
      field,
      value: chosen.value,
      confidence: rules.fallbackConfidence,
      source: 'pattern',
      matchedText: chosen.text,
      ruleId,
    };
  }

  private matchPattern(
    field: string,
    ruleId: string,
    patterns: CompiledPattern[],
    utterance: string,
  ): FactCandidate | null {
    for (const p of patterns) {
      const m = p.regex.exec(utterance);
      if (!m) continue;
      const captured = m[p.group];
      if (captured === undefined || !captured.trim()) continue;
      return {
        field,
        value: formatValue(captured, p.format),
        confidence: p.confidence,
        source: 'pattern',
        matchedText: m[0],
        ruleId,
      };
    }
    return null;
  }

  private matchPronoun(
    field: string,
    rule: Extract<CompiledRule, { kind: 'pronoun' }>,
    lower: string,
  ): FactCandidate | null {
    for (const word of lower.split(/[^a-z]+/)) {
      const value = rule.words.get(word);
      if (value) {
        return {
          field,
          value,
          confidence: rule.confidence,
          source: 'pattern',
          matchedText: word,
          ruleId: rule.id,
        };
      }
    }
    return null;
  }

  private getCompiled(): CompiledField[] {
    const rules = this.content.getExtractionRules();
    if (this.compiledFor !== rules) {
      this.compiled = rules.fields.map((f) => compileField(f.field, f.rules));
      this.compiledFor = rules;
    }
    return this.compiled;
  }
}

function compileField(field: string, rules: ExtractionRule[]): CompiledField {
  let lexicon: Map<string, string> | null = null;
  const known: CompiledAlias[] = [];
  const compiled: CompiledRule[] = [];
  for (const rule of rules) {
    switch (rule.kind) {
      case 'lexicon': {
        lexicon ??= new Map<string, string>();
        const lexiconRule = compileLexicon(rule, lexicon);
        known.push(...lexiconRule.aliases);
        compiled.push(lexiconRule);
        break;
      }
      case 'pattern':
        compiled.push(compilePattern(rule));
        break;
      case 'pronoun':
        compiled.push(compilePronoun(rule));
        break;
      case 'fallback':
        compiled.push(compileFallback(rule, known));
        break;
    }
  }
  return { field, rules: compiled, lexicon };
}

function compileLexicon(
  rule: LexiconRule,
  lexicon: Map<string, string>,
): Extract<CompiledRule, { kind: 'lexicon' }> {
  const aliases: CompiledAlias[] = [];
  for (const entry of rule.entries) {
    lexicon.set(normalizeValue(entry.value), entry.value);
    for (const alias of entry.aliases) {
      const key = normalizeValue(alias);
      lexicon.set(key, entry.value);
      aliases.push({
        value: entry.value,
        alias: key,
        boundary: new RegExp(`\\b${escapeRegExp(key)}\\b`, 'g'),
      });
    }
  }
  return { kind: 'lexicon', id: rule.id, aliases };
}

function compilePattern(rule: PatternRule): CompiledRule {
  return {
    kind: 'pattern',
    id: rule.id,
    patterns: rule.patterns.map((p) => ({
      regex: new RegExp(p.regex, 'i'),
      group: p.group,
      format: p.format,
      confidence: p.confidence,
    })),
  };
}

function compilePronoun(rule: PronounRule): CompiledRule {
  const words = new Map<string, string>();
  for (const p of rule.pronouns) {
    for (const w of p.words) words.set(w.toLowerCase(), p.value);
  }
  return { kind: 'pronoun', id: rule.id, confidence: rule.confidence, words };
}

function compileFallback(rule: FallbackRule, known: CompiledAlias[]): CompiledRule {
  return {
    kind: 'fallback',
    id: rule.id,
    aliases: known.filter((a) => a.alias.length >= rule.minAliasLength),
  };
}

function collectMatches(aliases: CompiledAlias[], lower: string): LexiconMatch[] {
  const matches: LexiconMatch[] = [];
  for (const a of aliases) {
    a.boundary.lastIndex = 0;
    let m: RegExpExecArray | null;
    while ((m = a.boundary.exec(lower)) !== null) {
      matches.push({ value: a.value, start: m.index, text: m[0] });
    }
  }
  return matches;
}

function isWordStart(text: string, index: number): boolean {
  return index === 0 || !/[a-z]/.test(text.charAt(index - 1));
}

function followsPrefix(lower: string, index: number, prefixes: readonly string[]): boolean {
  const before = lower.slice(0, index);
  return prefixes.some(
    (p) => before.endsWith(p) && isWordStart(lower, index - p.length),
  );
}

/**
 * Non-overlapping matches, longer phrases claiming their span first.
 * One match per canonical value, returned in utterance order.
 */
function pickDisjoint(matches: LexiconMatch[]): LexiconMatch[] {
  const ranked = [...matches].sort(
    (a, b) => b.text.length - a.text.length || a.start - b.start,
  );
  const taken: LexiconMatch[] = [];
  for (const m of ranked) {
    const end = m.start + m.text.length;
    const overlaps = taken.some((t) => m.start < t.start + t.text.length && t.start < end);
    if (overlaps || taken.some((t) => t.value === m.value)) continue;
    taken.push(m);
  }
  return taken.sort((a, b) => a.start - b.start);
}

/** Longest matched phrase wins; ties go to the earliest position. */
function pickLongest(matches: LexiconMatch[]): LexiconMatch | null {
  let best: LexiconMatch | null = null;
  for (const m of matches) {
    if (
      !best ||
      m.text.length > best.text.length ||
      (m.text.length === best.text.length && m.start < best.start)
    ) {
      best = m;
    }
  }
  return best;
}

function formatValue(text: string, format: CompiledPattern['format']): string {
  switch (format) {
    case 'title':
      return toTitleCase(text.trim());
    case 'sentence':
      return toSentenceCase(text);
    case 'raw':
      return text.trim();
  }
}
