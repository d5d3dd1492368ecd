// Runs assisted + pattern extraction and merges them per field

import { Injectable, Logger } from '@nestjs/common';
import type {
  AssistedExtraction,
  AssistedStatus,
  ExtractionResult,
  FactCandidate,
} from '../../db/types/index.js';
import { normalizeValue } from '../../common/text-utils.js';
import { AssistedExtractorService } from './assisted-extractor.service.js';
import { PatternExtractorService } from './pattern-extractor.service.js';

@Injectable()
export class ExtractionCoordinatorService {
  private readonly logger = new Logger(ExtractionCoordinatorService.name);

  constructor(
    private readonly patterns: PatternExtractorService,
    private readonly assisted: AssistedExtractorService,
  ) {}

  async extract(
    utterance: string,
    knownFields: Record<string, string>,
  ): Promise<ExtractionResult> {
    const fields = this.patterns.getFieldNames();
    const assistedResult = await this.assisted.extract(utterance, knownFields, fields);
    const patternCandidates = this.patterns.extract(utterance);

    const status = toAssistedStatus(assistedResult);
    if (!assistedResult.ok && status.status === 'FAILED') {
      this.logger.warn(
        `Assisted extraction failed (${assistedResult.reason}), using patterns only: ${assistedResult.detail ?? ''}`,
      );
    }

    const candidates = mergeCandidates(
      patternCandidates,
      assistedResult.ok ? assistedResult.candidates : [],
      utterance,
      fields,
      fields.filter((f) => this.patterns.isListField(f)),
    );
    return { candidates, assisted: status };
  }
}

export function toAssistedStatus(result: AssistedExtraction): AssistedStatus {
  if (result.ok) {
    return { status: 'OK', candidateCount: result.candidates.length };
  }
  const reason = result.reason;
  if (reason === 'DISABLED') return { status: 'DISABLED' };
  return { status: 'FAILED', reason };
}

/**
 * One candidate per field (per normalized item for list fields). Higher confidence wins; on a tie the assisted
 * candidate wins unless the pattern's matched span is longer than the span of
 * the assisted value in the utterance (0 when the value does not occur there).
 * Output is ranked by confidence desc, then field order.
 */
export function mergeCandidates(
  pattern: FactCandidate[],
  assisted: FactCandidate[],
  utterance: string,
  fieldOrder: readonly string[],
  listFields: readonly string[] = [],
): FactCandidate[] {
  const lower = utterance.toLowerCase();
  const byKey = new Map<string, FactCandidate>();
  const keyOf = (c: FactCandidate) =>
    listFields.includes(c.field) ? `${c.field}\u0000${normalizeValue(c.value)}` : c.field;

  for (const c of pattern) byKey.set(keyOf(c), c);
  for (const a of assisted) {
    const key = keyOf(a);
    const p = byKey.get(key);
    if (!p || a.confidence > p.confidence) {
      byKey.set(key, a);
      continue;
    }
    if (a.confidence < p.confidence) continue;

    const assistedSpan = lower.includes(a.value.toLowerCase()) ? a.value.length : 0;
    const patternSpan = p.matchedText?.length ?? 0;
    if (patternSpan <= assistedSpan) byKey.set(key, a);
  }

  const rank = (field: string) => {
    const idx = fieldOrder.indexOf(field);
    return idx === -1 ? fieldOrder.length : idx;
  };
  return [...byKey.values()].sort(
    (x, y) => y.confidence - x.confidence || rank(x.field) - rank(y.field),
  );
}
