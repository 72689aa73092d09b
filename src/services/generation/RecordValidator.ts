import { z } from 'zod';
import {
  IMPACTS,
  INCIDENT_STATES,
  PRIORITIES,
  URGENCIES,
  isTerminalState,
  type IncidentDraft,
} from '../../domain/entities/IncidentRecord.js';
import { checkCategories, type CategoryTaxonomy } from '../../domain/entities/CategoryTaxonomy.js';
import { DEFAULT_BUSINESS_HOURS, deriveDurations, type BusinessHours } from '../../domain/durations.js';
import { normalizeTimestamp, timestampToMillis } from '../../domain/timestamps.js';
import type { SoftError } from '../../types/generation.types.js';

const requiredText = z.string().trim().min(1);

const optionalText = z
  .string()
  .nullish()
  .transform(value => (value ?? '').trim());

const timestamp = z.string().transform((value, ctx) => {
  const normalized = normalizeTimestamp(value);
  if (normalized === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp "${value}"` });
    return z.NEVER;
  }
  return normalized;
});

const closedTimestamp = z
  .union([z.null(), z.literal(''), timestamp])
  .optional()
  .transform(value => (value ? value : null));

// models sometimes quote numbers
const effort = z.preprocess(
  value => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
  z.number().finite().nonnegative()
);

const minutes = z.number().int().nonnegative();

export const incidentFieldsSchema = z.object({
  'Top-Category': requiredText,
  'Sub-Category': requiredText,
  Category: requiredText,
  Effort: effort,
  State: z.enum(INCIDENT_STATES),
  'Correlation ID': requiredText,
  'Short Description': requiredText,
  'Long Description': requiredText,
  Created: timestamp,
  Opened: timestamp,
  Closed: closedTimestamp,
  Priority: z.enum(PRIORITIES),
  Urgency: z.enum(URGENCIES),
  Impact: z.enum(IMPACTS),
  'Assignment group': requiredText,
  'Resolution code': optionalText,
  'Resolution notes': optionalText,
});

type LifecycleFields = Pick<
  z.infer<typeof incidentFieldsSchema>,
  'State' | 'Created' | 'Opened' | 'Closed' | 'Resolution code' | 'Resolution notes'
>;

// zod still runs refinements when a timestamp failed its own check
const millisOf = (value: unknown): number | null =>
  typeof value === 'string' && normalizeTimestamp(value) !== null ? timestampToMillis(value) : null;

const checkLifecycle = (record: LifecycleFields, ctx: z.RefinementCtx): void => {
  const terminal = isTerminalState(record.State);
  const created = millisOf(record.Created);
  const opened = millisOf(record.Opened);
  const closed = millisOf(record.Closed);

  if (terminal && record.Closed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['Closed'], message: `State "${record.State}" requires a Closed timestamp` });
  }
  if (!terminal && record.Closed !== null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['Closed'], message: `State "${record.State}" must not have a Closed timestamp` });
  }
  if (created !== null && opened !== null && created > opened) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['Opened'], message: 'Opened is before Created' });
  }
  if (opened !== null && closed !== null && opened > closed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['Closed'], message: 'Closed is before Opened' });
  }
  if (terminal && (!record['Resolution code'] || !record['Resolution notes'])) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['Resolution code'],
      message: `State "${record.State}" requires Resolution code and Resolution notes`,
    });
  }
};

export const incidentDraftSchema = incidentFieldsSchema.superRefine(checkLifecycle);

/** Shape of a numbered record as it sits in the cache file. */
export const incidentRecordSchema = incidentFieldsSchema
  .extend({
    Number: z.string().regex(/^INC\d+$/),
    'Resolve time': minutes,
    'Business duration': minutes,
    'Business resolve time': minutes,
  })
  .superRefine(checkLifecycle);

export interface ValidationRules {
  taxonomy?: CategoryTaxonomy;
  businessHours?: BusinessHours;
  /** Reject incidents still in a non-terminal state. */
  closedOnly?: boolean;
}

export type DraftValidation = { ok: true; draft: IncidentDraft } | { ok: false; error: SoftError };

export class RecordValidator {
  private businessHours: BusinessHours;

  constructor(private readonly rules: ValidationRules = {}) {
    this.businessHours = rules.businessHours ?? DEFAULT_BUSINESS_HOURS;
  }

  validate(candidate: unknown, index: number): DraftValidation {
    const result = incidentDraftSchema.safeParse(candidate);
    if (!result.success) {
      return {
        ok: false,
        error: {
          index,
          reason: 'invalid',
          issues: result.error.issues.map(issue => `${issue.path.join('.') || '(record)'}: ${issue.message}`),
        },
      };
    }

    const fields = result.data;

    if (this.rules.closedOnly && !isTerminalState(fields.State)) {
      return {
        ok: false,
        error: { index, reason: 'invalid', issues: [`State: "${fields.State}" is not a closed state`] },
      };
    }

    if (this.rules.taxonomy) {
      const problems = checkCategories(this.rules.taxonomy, {
        top: fields['Top-Category'],
        sub: fields['Sub-Category'],
        specific: fields.Category,
      });
      if (problems.length > 0) {
        return { ok: false, error: { index, reason: 'taxonomy', issues: problems } };
      }
    }

    // durations are never taken from the model
    const draft: IncidentDraft = {
      'Top-Category': fields['Top-Category'],
      'Sub-Category': fields['Sub-Category'],
      Category: fields.Category,
      Effort: fields.Effort,
      State: fields.State,
      'Correlation ID': fields['Correlation ID'],
      'Short Description': fields['Short Description'],
      'Long Description': fields['Long Description'],
      Created: fields.Created,
      Opened: fields.Opened,
      Closed: fields.Closed,
      Priority: fields.Priority,
      Urgency: fields.Urgency,
      Impact: fields.Impact,
      'Assignment group': fields['Assignment group'],
      'Resolution code': fields['Resolution code'],
      'Resolution notes': fields['Resolution notes'],
      ...deriveDurations(fields, this.businessHours),
    };

    return { ok: true, draft };
  }
}
