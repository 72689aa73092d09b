import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { CorruptStateError, StatePersistenceError } from '../../utils/errors.js';
import { parseIncidentNumber } from '../../domain/entities/IncidentRecord.js';
import { incidentRecordSchema } from '../generation/RecordValidator.js';
import { createGenerationState } from '../generation/state.js';
import { GENERATION_STATE_VERSION, type GenerationState } from '../../types/generation.types.js';
import type { GenerationStore } from './GenerationStore.interface.js';

// numbers are handed out in generation order, so a resumable cache never repeats or reorders them
const recordsSchema = z.array(incidentRecordSchema).superRefine((records, ctx) => {
  let previous: { number: string; sequence: number } | null = null;
  records.forEach((record, index) => {
    const sequence = parseIncidentNumber(record.Number);
    if (sequence === null) return;
    if (previous && sequence <= previous.sequence) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'Number'],
        message: `${record.Number} does not follow ${previous.number}`,
      });
    }
    if (!previous || sequence > previous.sequence) {
      previous = { number: record.Number, sequence };
    }
  });
});

const storedStateSchema = z.object({
  version: z.literal(GENERATION_STATE_VERSION),
  runId: z.string().min(1),
  target: z.number().int().positive(),
  records: recordsSchema,
  softErrorCount: z.number().int().nonnegative().default(0),
  createdAt: z.string(),
  updatedAt: z.string(),
});

// caches written by the first version of the tool were a bare record array
const legacyStateSchema = recordsSchema;

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const describeIssues = (error: z.ZodError): string[] =>
  error.issues.slice(0, 10).map(issue => `${issue.path.join('.')}: ${issue.message}`);

export class FileSystemGenerationStore implements GenerationStore {
  constructor(private readonly path: string) {}

  get location(): string {
    return this.path;
  }

  async load(): Promise<GenerationState | null> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      logger.error({ error, path: this.path }, 'Failed to read generation cache');
      throw new StatePersistenceError(`Cannot read ${this.path}`, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new CorruptStateError(`${this.path} is not valid JSON; inspect or remove it before resuming`, this.path, error);
    }

    if (Array.isArray(parsed)) {
      const legacy = legacyStateSchema.safeParse(parsed);
      if (!legacy.success) {
        throw new CorruptStateError(`${this.path} holds invalid records`, this.path, describeIssues(legacy.error));
      }
      logger.info({ path: this.path, records: legacy.data.length }, 'Loaded legacy generation cache');
      const state = createGenerationState(Math.max(legacy.data.length, 1));
      return { ...state, records: legacy.data };
    }

    const result = storedStateSchema.safeParse(parsed);
    if (!result.success) {
      throw new CorruptStateError(`${this.path} does not match the generation state format`, this.path, describeIssues(result.error));
    }

    logger.info({ path: this.path, records: result.data.records.length, target: result.data.target }, 'Loaded generation cache');
    return result.data;
  }

  async save(state: GenerationState): Promise<void> {
    const tmpPath = `${this.path}.tmp`;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tmpPath, JSON.stringify(state, null, 2), 'utf-8');
      await rename(tmpPath, this.path);
      logger.debug({ path: this.path, records: state.records.length }, 'Checkpoint written');
    } catch (error) {
      logger.error({ error, path: this.path }, 'Failed to write checkpoint');
      throw new StatePersistenceError(`Cannot write checkpoint ${this.path}`, error);
    }
  }

  async clear(): Promise<void> {
    await rm(this.path, { force: true });
    logger.info({ path: this.path }, 'Generation cache removed');
  }
}
