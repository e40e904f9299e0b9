// engine/formatRegistry.ts
// Ordered Format Registry with auto-detection.
//
// Policy:
//   - score every processor's detect()
//   - pick the highest score strictly above the threshold
//   - ties go to the processor registered first
//   - nothing above threshold → "unknown"; no default processor is applied

import type { RawSheet } from './types';
import type { FormatProcessor } from './formats/formatProcessor';
import { EngineError, ErrorCodes } from './errorCodes';
import { logEngineInfo, logEngineWarn } from './logger';

export interface DetectionScore {
  format: string;
  confidence: number;
}

export type DetectionResult =
  | { kind: 'matched'; processor: FormatProcessor; confidence: number; scores: DetectionScore[] }
  | { kind: 'unknown'; scores: DetectionScore[] };

export interface FormatRegistry {
  /** Registration order is part of the contract. */
  readonly names: readonly string[];
  readonly threshold: number;
  get(name: string): FormatProcessor | undefined;
  list(): readonly FormatProcessor[];
  detect(sheet: RawSheet): DetectionResult;
}

export function createFormatRegistry(processors: readonly FormatProcessor[], threshold: number): FormatRegistry {
  const byName = new Map<string, FormatProcessor>();
  for (const processor of processors) {
    if (byName.has(processor.name)) {
      throw new EngineError(ErrorCodes.REGISTRY_MISCONFIGURED, `Format "${processor.name}" is registered twice.`, {
        format: processor.name
      });
    }
    byName.set(processor.name, processor);
  }

  const ordered = Object.freeze([...processors]);
  const names = Object.freeze(ordered.map((p) => p.name));

  return Object.freeze({
    names,
    threshold,

    get(name: string): FormatProcessor | undefined {
      return byName.get(name);
    },

    list(): readonly FormatProcessor[] {
      return ordered;
    },

    detect(sheet: RawSheet): DetectionResult {
      const scores: DetectionScore[] = [];
      let best: { processor: FormatProcessor; confidence: number } | null = null;

      for (const processor of ordered) {
        const raw = processor.detect(sheet);
        const confidence = Number.isFinite(raw) ? Math.min(1, Math.max(0, raw)) : 0;
        scores.push({ format: processor.name, confidence });

        if (confidence > threshold && (best === null || confidence > best.confidence)) {
          best = { processor, confidence };
        }
      }

      if (best === null) {
        logEngineWarn('format_unknown', { sheet: sheet.name, threshold, scores });
        return { kind: 'unknown', scores };
      }

      logEngineInfo('format_detected', {
        sheet: sheet.name,
        format: best.processor.name,
        confidence: best.confidence,
        scores
      });
      return { kind: 'matched', processor: best.processor, confidence: best.confidence, scores };
    }
  });
}
