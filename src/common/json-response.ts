/**
 * Parses a model's JSON answer in three steps: the raw text, the first
 * fenced code block, then the outermost `{…}` span. Returns undefined when
 * none of them is valid JSON.
 */
export function parseJsonResponse(text: string): unknown {
  const candidates = [
    text.trim(),
    extractFromCodeBlock(text),
    extractJsonBraces(text),
  ];

  for (const candidate of candidates) {
    if (!candidate) continue;
    try {
      return JSON.parse(candidate) as unknown;
    } catch {
      continue;
    }
  }
  return undefined;
}

function extractFromCodeBlock(text: string): string | null {
  const match = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  return match?.[1]?.trim() ?? null;
}

function extractJsonBraces(text: string): string | null {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end === -1 || end <= start) return null;
  return text.slice(start, end + 1);
}
