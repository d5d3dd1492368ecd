// Offline provider. Answers the extraction prompt from a canned keyword table
// and turns a narration scene sheet into a few lines of prose.

import { escapeRegExp, estimateTokens } from '../../common/text-utils.js';
import type { TensionState } from '../../db/types/index.js';
import { EXTRACTION_SYSTEM_PROMPT } from '../prompts/extraction-prompt.js';
import type {
  LlmProvider,
  LlmProviderRequest,
  LlmProviderResponse,
} from '../types/index.js';
import cannedFacts from './mock-extraction.json';

const PLAYER_MESSAGE = 'Player message:\n';

type CannedFact = {
  field: string;
  keyword: string;
  value: string;
  confidence: number;
};

const MOODS: Record<TensionState, string> = {
  PURE_ORDER: 'Everything around you holds to a strict, quiet order.',
  ORDER_DOMINANT: 'The world keeps its shape, for now.',
  BALANCED: 'The road ahead could bend either way.',
  CHAOS_DOMINANT: 'Something restless stirs beneath the calm.',
  PURE_CHAOS: 'The world around you is coming apart.',
};

export class MockProvider implements LlmProvider {
  readonly name = 'mock';
  private readonly table: CannedFact[] = cannedFacts;

  async generate(request: LlmProviderRequest): Promise<LlmProviderResponse> {
    const start = Date.now();

    const system = request.messages.find((m) => m.role === 'system')?.content ?? '';
    const user = [...request.messages].reverse().find((m) => m.role === 'user')?.content ?? '';
    const text =
      system === EXTRACTION_SYSTEM_PROMPT ? this.answerExtraction(user) : narrateSceneSheet(user);

    return {
      text,
      model: 'mock-v1',
      promptTokens: estimateTokens(request.messages.map((m) => m.content).join('\n')),
      completionTokens: estimateTokens(text),
      latencyMs: Date.now() - start,
    };
  }

  isAvailable(): boolean {
    return true;
  }

  /** `{"facts":[...]}` for every canned keyword of a target field found in the player message. */
  private answerExtraction(userMessage: string): string {
    const targets = (/^Target fields: (.*)$/m.exec(userMessage)?.[1] ?? '')
      .split(',')
      .map((f) => f.trim())
      .filter((f) => f.length > 0);
    const marker = userMessage.indexOf(PLAYER_MESSAGE);
    const said = (
      marker === -1 ? userMessage : userMessage.slice(marker + PLAYER_MESSAGE.length)
    ).toLowerCase();

    const facts = this.table
      .filter((c) => targets.includes(c.field))
      .filter((c) => new RegExp(`\\b${escapeRegExp(c.keyword)}\\b`).test(said))
      .map((c) => ({ field: c.field, value: c.value, confidence: c.confidence }));
    return JSON.stringify({ facts });
  }
}

function narrateSceneSheet(sheet: string): string {
  const fact = (field: string) =>
    new RegExp(`^- ${field}: (.+)$`, 'm').exec(sheet)?.[1]?.trim() ?? null;
  const line = (label: string) => new RegExp(`^${label}: (.+)$`, 'm').exec(sheet)?.[1] ?? null;

  const sentences: string[] = [];

  const name = fact('name');
  const kind = [fact('race'), fact('class')].filter((v): v is string => v !== null).join(' ');
  if (name && kind) {
    sentences.push(`You are ${name}, ${withArticle(kind)}.`);
  } else if (name || kind) {
    sentences.push(`You are ${name ?? withArticle(kind)}.`);
  } else {
    sentences.push('Your story has barely begun.');
  }

  const tensionState = /\((\w+)\)$/.exec(line('Tension') ?? '')?.[1];
  const mood = Object.entries(MOODS).find(([state]) => state === tensionState)?.[1];
  if (mood) sentences.push(mood);

  const archetypes = line('Archetypes');
  if (archetypes) sentences.push(`Echoes of ${archetypes} follow you.`);

  const decay = /\((\w+)\)$/.exec(line('Decay') ?? '')?.[1];
  if (decay && decay !== 'STABLE') {
    sentences.push('Parts of your own story no longer fit together.');
  }

  const memory = /^- \(\w+\/\w+\) (.+)$/m.exec(sheet)?.[1];
  if (memory) sentences.push(`You remember: ${memory.replace(/[.!?]$/, '')}.`);

  const missing = line('Missing')?.split(',')[0]?.trim();
  if (missing) sentences.push(`A stranger asks about your ${missing}.`);

  return sentences.join(' ');
}

function withArticle(phrase: string): string {
  return /^[aeiou]/i.test(phrase) ? `an ${phrase}` : `a ${phrase}`;
}
