// Assisted fact extraction prompt (JSON-only output)

import type { LlmMessage } from '../types/index.js';

export const EXTRACTION_SYSTEM_PROMPT = `You extract character facts for a tabletop role-playing game.
Read the player's message and report only facts the player states about their own character.

Respond with JSON only, no prose, in exactly this shape:
{"facts":[{"field":"<field>","value":"<value>","confidence":<0.0-1.0>}]}

Rules:
- Use only the target fields listed by the user message.
- Do not repeat a known field unless the player clearly changes it.
- motivations, traits and emotionalThemes are lists: report one entry per item.
- Values are short: a name, a single term, or one short clause for free-text fields.
- Confidence reflects how explicit the statement is (explicit statement ≈ 0.9, implication ≈ 0.6).
- If nothing applies, respond {"facts":[]}.`;

export function buildExtractionUserMessage(
  utterance: string,
  knownFields: Record<string, string>,
  targetFields: readonly string[],
): string {
  const known = Object.entries(knownFields);
  const lines = [
    `Target fields: ${targetFields.join(', ')}`,
    known.length > 0
      ? `Known fields: ${known.map(([k, v]) => `${k}=${v}`).join('; ')}`
      : 'Known fields: none',
    '',
    'Player message:',
    utterance,
  ];
  return lines.join('\n');
}

export function buildExtractionMessages(
  utterance: string,
  knownFields: Record<string, string>,
  targetFields: readonly string[],
): LlmMessage[] {
  return [
    { role: 'system', content: EXTRACTION_SYSTEM_PROMPT },
    {
      role: 'user',
      content: buildExtractionUserMessage(utterance, knownFields, targetFields),
    },
  ];
}
