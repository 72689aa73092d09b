export type GenerationErrorKind = 'UNAUTHORIZED' | 'RATE_LIMITED' | 'UNREACHABLE' | 'MALFORMED' | 'TIMEOUT';

const RETRYABLE_KINDS: ReadonlySet<GenerationErrorKind> = new Set(['RATE_LIMITED', 'UNREACHABLE', 'MALFORMED', 'TIMEOUT']);

export class GenerationError extends Error {
  code = 'GENERATION_ERROR';
  constructor(public kind: GenerationErrorKind, message: string, public details?: unknown) {
    super(message);
    this.name = 'GenerationError';
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

export class BatchFailedError extends Error {
  code = 'BATCH_FAILED';
  constructor(message: string, public lastError: GenerationError, public details?: unknown) {
    super(message);
    this.name = 'BatchFailedError';
  }
}

export class CorruptStateError extends Error {
  code = 'CORRUPT_STATE';
  constructor(message: string, public path: string, public details?: unknown) {
    super(message);
    this.name = 'CorruptStateError';
  }
}

export class StatePersistenceError extends Error {
  code = 'STATE_PERSISTENCE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'StatePersistenceError';
  }
}

export class ExportError extends Error {
  code = 'EXPORT_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ExportError';
  }
}

export class ConfigurationError extends Error {
  code = 'CONFIGURATION_ERROR';
  constructor(message: string, public issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
