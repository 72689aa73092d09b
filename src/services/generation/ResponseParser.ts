import { logger } from '../../utils/logger.js';
import { GenerationError } from '../../utils/errors.js';
import type { ParsedBatch, SoftError } from '../../types/generation.types.js';
import type { IncidentDraft } from '../../domain/entities/IncidentRecord.js';
import { RecordValidator, type ValidationRules } from './RecordValidator.js';

type JsonAttempt = { ok: true; value: unknown } | { ok: false; message: string };

const tryParseJson = (text: string): JsonAttempt => {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }
};

const FENCED_BLOCK = /```[a-zA-Z]*\s*([\s\S]*?)```/;
const OPEN_FENCE = /^\s*```[a-zA-Z]*\s*/;

export const stripCodeFences = (text: string): string => {
  const fenced = FENCED_BLOCK.exec(text);
  if (fenced) return fenced[1];
  // a truncated reply can open a fence and never close it
  return text.replace(OPEN_FENCE, '');
};

/** `[...]` as is; `{"incidents": [...]}` unwrapped; a lone record object wrapped. */
const elementsOf = (value: unknown): unknown[] | null => {
  if (Array.isArray(value)) return value;
  if (typeof value === 'object' && value !== null) {
    const nested = Object.values(value).find((entry): entry is unknown[] => Array.isArray(entry));
    return nested ?? [value];
  }
  return null;
};

export interface ScannedArray {
  chunks: string[];
  /** false when the text ended before the array's closing bracket */
  complete: boolean;
  tail: string;
}

/**
 * Splits the first JSON array in `text` into the source text of its top-level
 * elements without parsing them, so one broken element does not take the
 * rest of the array down with it.
 */
export function scanJsonArray(text: string): ScannedArray | null {
  const objectArray = /\[\s*\{/.exec(text);
  const start = objectArray ? objectArray.index : text.indexOf('[');
  if (start < 0) return null;

  const chunks: string[] = [];
  let depth = 0;
  let inString = false;
  let escaped = false;
  let elementStart = -1;

  for (let i = start + 1; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
      if (elementStart < 0) elementStart = i;
    } else if (ch === '{' || ch === '[') {
      if (depth === 0 && elementStart < 0) elementStart = i;
      depth++;
    } else if (ch === '}' || ch === ']') {
      if (depth === 0) {
        if (elementStart >= 0) chunks.push(text.slice(elementStart, i).trim());
        return { chunks, complete: true, tail: '' };
      }
      depth--;
    } else if (ch === ',' && depth === 0) {
      if (elementStart >= 0) chunks.push(text.slice(elementStart, i).trim());
      elementStart = -1;
    } else if (depth === 0 && elementStart < 0 && !/\s/.test(ch)) {
      elementStart = i;
    }
  }

  return { chunks, complete: false, tail: elementStart >= 0 ? text.slice(elementStart).trim() : '' };
}

export class ResponseParser {
  private validator: RecordValidator;

  constructor(rules: ValidationRules = {}) {
    this.validator = new RecordValidator(rules);
  }

  /**
   * Best-effort extraction: every element is parsed and validated on its own,
   * rejected elements come back as soft errors. Throws `MALFORMED` only when
   * no array can be found or not a single record survives.
   */
  parse(rawText: string): ParsedBatch {
    const text = stripCodeFences(rawText).trim();
    const softErrors: SoftError[] = [];
    let candidates: Array<{ index: number; value: unknown }> = [];

    const whole = tryParseJson(text);
    const wholeElements = whole.ok ? elementsOf(whole.value) : null;

    if (wholeElements) {
      candidates = wholeElements.map((value, index) => ({ index, value }));
    } else {
      const scanned = scanJsonArray(text);
      if (!scanned) {
        throw new GenerationError('MALFORMED', 'No JSON array found in model response', {
          preview: rawText.slice(0, 500),
        });
      }

      scanned.chunks.forEach((chunk, index) => {
        const parsed = tryParseJson(chunk);
        if (parsed.ok) {
          candidates.push({ index, value: parsed.value });
        } else {
          softErrors.push({ index, reason: 'unparseable', issues: [parsed.message] });
        }
      });

      if (!scanned.complete && scanned.tail) {
        softErrors.push({ index: scanned.chunks.length, reason: 'truncated', issues: ['response ended mid-element'] });
      }
    }

    const drafts: IncidentDraft[] = [];
    for (const candidate of candidates) {
      const result = this.validator.validate(candidate.value, candidate.index);
      if (result.ok) {
        drafts.push(result.draft);
      } else {
        softErrors.push(result.error);
      }
    }

    if (softErrors.length > 0) {
      logger.debug({ softErrors }, 'Dropped records from model response');
    }

    if (drafts.length === 0) {
      throw new GenerationError('MALFORMED', 'Model response contained no valid incident records', {
        softErrors,
        preview: rawText.slice(0, 500),
      });
    }

    return { drafts, softErrors };
  }
}
