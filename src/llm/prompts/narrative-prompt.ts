// Narration prompt built from a context bundle

import type { ContextBundle } from '../../db/types/index.js';
import type { LlmMessage } from '../types/index.js';

export const NARRATIVE_SYSTEM_PROMPT = `You are the narrator of a solo fantasy role-playing campaign.
Write the next short passage (two or three paragraphs) in second person, present tense.

Treat the character facts as settled; never contradict them and never ask about them again.
If required fields are missing, weave one natural question about a missing field into the scene.
Let the tension label colour the mood: order leans toward duty and structure, chaos toward upheaval and loss.
Low coherence or a strained decay state means the character's story pulls against itself; let that show as doubt.
Draw on the memories for continuity, most relevant first. Respond with prose only.`;

export function renderContextForPrompt(bundle: ContextBundle): string {
  const facts = Object.entries(bundle.character.facts);
  const lines: string[] = ['[Character]'];
  if (facts.length === 0) {
    lines.push('- (nothing established yet)');
  }
  for (const [field, fact] of facts) {
    lines.push(`- ${field}: ${fact.value}`);
  }
  for (const [field, items] of Object.entries(bundle.character.lists)) {
    lines.push(`- ${field}: ${items.join(', ')}`);
  }
  if (bundle.character.missingRequiredFields.length > 0) {
    lines.push(`Missing: ${bundle.character.missingRequiredFields.join(', ')}`);
  }

  lines.push('', '[Symbolic state]');
  lines.push(`Tension: ${bundle.symbolic.tension.toFixed(2)} (${bundle.symbolic.tensionState})`);
  if (bundle.symbolic.activeTags.length > 0) {
    lines.push(`Archetypes: ${bundle.symbolic.activeTags.join(', ')}`);
  }
  if (bundle.symbolic.history.length > 0) {
    const arc = bundle.symbolic.history.map((h) => `${h.value} (${h.tags.join('/')})`);
    lines.push(`Arc: ${arc.join(' → ')}`);
  }
  if (bundle.symbolic.coherence < 1) {
    lines.push(`Coherence: ${bundle.symbolic.coherence.toFixed(2)}`);
  }
  if (bundle.symbolic.decayLevel > 0) {
    lines.push(`Decay: ${bundle.symbolic.decayLevel.toFixed(2)} (${bundle.symbolic.decayState})`);
  }
  for (const flag of bundle.symbolic.decayFlags) {
    lines.push(`Contradiction: ${flag.field} was "${flag.previousValue}", now "${flag.newValue}"`);
  }

  if (bundle.memories.length > 0) {
    lines.push('', '[Memories]');
    for (const m of bundle.memories) {
      lines.push(`- (${m.type}/${m.layer}) ${m.content}`);
    }
  }
  return lines.join('\n');
}

export function buildNarrativeMessages(bundle: ContextBundle): LlmMessage[] {
  return [
    { role: 'system', content: NARRATIVE_SYSTEM_PROMPT },
    { role: 'user', content: renderContextForPrompt(bundle) },
  ];
}
