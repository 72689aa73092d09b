import type { BatchReport, GenerationListener, RetryNotice, RunPhase } from '../../../types/generation.types.js';

const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
};

const fmt = (color: keyof typeof COLORS, text: string): string =>
  `${COLORS[color]}${text}${COLORS.reset}`;

const PHASE_LABELS: Record<RunPhase, string> = {
  idle: 'Waiting',
  requesting: 'Requesting batch',
  validating: 'Validating records',
  checkpointing: 'Saving checkpoint',
  done: 'Done',
  failed: 'Stopped',
};

export class ProgressReporter implements GenerationListener {
  private enabled: boolean;
  private lastLineLength: number = 0;

  constructor(enabled: boolean = true, private out: NodeJS.WriteStream = process.stdout) {
    this.enabled = enabled && Boolean(out.isTTY);
  }

  onPhase(phase: RunPhase, detail: { count: number; target: number }): void {
    if (!this.enabled) return;

    this.clearLine();
    const counter = fmt('cyan', `[${detail.count}/${detail.target}]`);
    const line = `${counter} ${PHASE_LABELS[phase]}`;
    this.out.write(line);
    this.lastLineLength = line.length;
  }

  onBatchComplete(report: BatchReport): void {
    const rejected = report.softErrors > 0 ? fmt('dim', ` (${report.softErrors} rejected)`) : '';
    this.complete(`Batch ${report.batchNumber}: +${report.appended} → ${report.total}/${report.target}${rejected}`);
  }

  onRetry(notice: RetryNotice): void {
    const next = notice.retriesLeft > 0 ? `retrying (${notice.retriesLeft} left)` : 'giving up';
    this.warn(`Batch ${notice.batchNumber} attempt ${notice.attempt} failed [${notice.error.kind}]: ${notice.error.message}; ${next}`);
  }

  complete(message: string): void {
    if (!this.enabled) return;
    this.clearLine();
    this.out.write(fmt('green', '✓') + ` ${message}\n`);
  }

  warn(message: string): void {
    if (!this.enabled) return;
    this.clearLine();
    this.out.write(fmt('yellow', '⚠') + ` ${message}\n`);
  }

  error(message: string): void {
    this.clearLine();
    this.out.write(fmt('red', '✗') + ` ${message}\n`);
  }

  private clearLine(): void {
    if (this.lastLineLength > 0) {
      this.out.write('\r' + ' '.repeat(this.lastLineLength) + '\r');
      this.lastLineLength = 0;
    }
  }
}
