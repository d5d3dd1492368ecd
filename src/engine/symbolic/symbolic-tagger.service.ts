// Archetypal tagging and chaos/order tension tracking for committed facts

import { Injectable, Logger } from '@nestjs/common';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import type { ArchetypeRule } from '../../content/content.types.js';
import { escapeRegExp, normalizeValue, tokenize } from '../../common/text-utils.js';
import type {
  ArchetypalHistoryEntry,
  ArchetypeTag,
  CommittedFact,
  Contradiction,
  SymbolicState,
} from '../../db/types/index.js';

export interface TagResult {
  tags: ArchetypeTag[]; // sorted, unique
  emotionalTags: string[]; // sorted, unique
  tensionDelta: number;
  tensionAfter: number;
  contradiction: Contradiction | null;
  decayIncrease: number;
  decayAfter: number;
  history: ArchetypalHistoryEntry | null; // null when nothing was tagged
}

const round4 = (n: number) => Math.round(n * 1e4) / 1e4;

@Injectable()
export class SymbolicTaggerService {
  private readonly logger = new Logger(SymbolicTaggerService.name);
  private readonly keywordCache = new Map<string, RegExp>();

  constructor(private readonly content: ContentLoaderService) {}

  /**
   * Pure with respect to its inputs: the same fact against the same prior
   * state always yields the same result.
   */
  tag(
    fact: CommittedFact,
    prior: SymbolicState,
    previous: CommittedFact | null,
  ): TagResult {
    const table = this.content.getArchetypeTable();
    const engine = this.content.getEngineConfig();

    const tags = new Set<ArchetypeTag>();
    const emotions = new Set<string>();
    for (const rule of table.rules) {
      if (!this.matches(rule, fact)) continue;
      rule.tags.forEach((t) => tags.add(t));
      rule.emotions.forEach((e) => emotions.add(e));
    }

    let contradiction: Contradiction | null = null;
    if (previous && !this.isCompatible(fact.field, previous.value, fact.value)) {
      contradiction = {
        field: fact.field,
        previousValue: previous.value,
        newValue: fact.value,
        timestamp: fact.timestamp,
      };
      table.contradiction.tags.forEach((t) => tags.add(t));
      table.contradiction.emotions.forEach((e) => emotions.add(e));
      this.logger.log(
        `Contradiction on ${fact.field}: "${previous.value}" → "${fact.value}"`,
      );
    }

    const sortedTags = [...tags].sort();
    const rawDelta = sortedTags.reduce((sum, t) => sum + (table.weights[t] ?? 0), 0);
    const { min, max, maxDelta } = engine.tension;
    const tensionDelta = round4(Math.max(-maxDelta, Math.min(maxDelta, rawDelta)));
    const tensionAfter = round4(Math.max(min, Math.min(max, prior.tension + tensionDelta)));

    // decay grows with contradictions and with Shadow piling up across commits
    let decayIncrease = contradiction ? table.decay.contradiction : 0;
    const priorShadows = prior.history.filter((h) => h.tags.includes('Shadow')).length;
    if (tags.has('Shadow') && priorShadows >= table.decay.shadowRepeatAfter) {
      decayIncrease += table.decay.shadowRepeat;
    }
    decayIncrease = round4(decayIncrease);
    const decayAfter = round4(Math.min(1, prior.decayLevel + decayIncrease));

    return {
      tags: sortedTags,
      emotionalTags: [...emotions].sort(),
      tensionDelta,
      tensionAfter,
      contradiction,
      decayIncrease,
      decayAfter,
      history:
        sortedTags.length > 0
          ? {
              field: fact.field,
              value: fact.value,
              tags: sortedTags,
              tensionDelta,
              timestamp: fact.timestamp,
            }
          : null,
    };
  }

  /** Folds a tag result into a new symbolic state. */
  apply(state: SymbolicState, result: TagResult): SymbolicState {
    const limit = this.content.getEngineConfig().symbolic.historyLimit;
    const activeTags = [...new Set([...state.activeTags, ...result.tags])].sort();
    const history = result.history ? [...state.history, result.history] : [...state.history];
    return {
      tension: result.tensionAfter,
      activeTags,
      decayFlags: result.contradiction
        ? [...state.decayFlags, result.contradiction]
        : [...state.decayFlags],
      decayLevel: result.decayAfter,
      coherence: this.coherence(activeTags),
      history: history.slice(-limit),
    };
  }

  /** 1 minus the share of tag pairs listed as conflicting; 1 for fewer than two tags. */
  coherence(tags: readonly ArchetypeTag[]): number {
    const unique = [...new Set(tags)];
    if (unique.length < 2) return 1;
    const conflicts = this.content.getArchetypeTable().conflicts;
    let pairs = 0;
    let conflicting = 0;
    for (let i = 0; i < unique.length; i++) {
      for (let j = i + 1; j < unique.length; j++) {
        pairs++;
        const a = unique[i];
        const b = unique[j];
        if (conflicts.some(([x, y]) => (x === a && y === b) || (x === b && y === a))) {
          conflicting++;
        }
      }
    }
    return round4(1 - conflicting / pairs);
  }

  /**
   * Equal after normalisation, a parent/refinement pair from the equivalence
   * table, or (free-text fields) one value's tokens contained in the other's.
   */
  isCompatible(field: string, a: string, b: string): boolean {
    const na = normalizeValue(a);
    const nb = normalizeValue(b);
    if (na === nb) return true;

    const groups = this.content.getEquivalences().refinements[field] ?? [];
    for (const group of groups) {
      const [parent, ...children] = group.map(normalizeValue);
      if (parent === undefined) continue;
      if (
        (na === parent && children.includes(nb)) ||
        (nb === parent && children.includes(na))
      ) {
        return true;
      }
    }

    if (this.content.getEngineConfig().freeTextFields.includes(field)) {
      const ta = new Set(tokenize(a));
      const tb = new Set(tokenize(b));
      if (ta.size === 0 || tb.size === 0) return false;
      return isSubset(ta, tb) || isSubset(tb, ta);
    }
    return false;
  }

  private matches(rule: ArchetypeRule, fact: CommittedFact): boolean {
    if (rule.field && rule.field !== fact.field) return false;
    const value = normalizeValue(fact.value);
    if (rule.values.some((v) => normalizeValue(v) === value)) return true;
    return rule.keywords.some((k) => this.keywordRegex(k).test(value));
  }

  private keywordRegex(keyword: string): RegExp {
    let regex = this.keywordCache.get(keyword);
    if (!regex) {
      regex = new RegExp(`\\b${escapeRegExp(keyword.toLowerCase())}\\b`);
      this.keywordCache.set(keyword, regex);
    }
    return regex;
  }
}

function isSubset<T>(small: Set<T>, big: Set<T>): boolean {
  for (const item of small) {
    if (!big.has(item)) return false;
  }
  return true;
}
