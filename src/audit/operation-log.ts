import { appendFileSync } from 'node:fs';
import { logger } from '../shared/logger.js';
import { redact } from '../shared/redact.js';
import { formatTimestamp, systemClock, type Clock } from '../shared/time.js';

export type Severity = 'error' | 'warning' | 'success';

const SEVERITY_TAG: Record<Severity, string> = {
  error: 'ERROR',
  warning: 'WARNING',
  success: 'SUCCESS',
};

/**
 * Append-only record of attempted actions and their outcomes. Never read back.
 */
export interface OperationLog {
  record(message: string): void;
  outcome(severity: Severity, message: string): void;
}

export function formatOperationLine(date: Date, message: string): string {
  return `[${formatTimestamp(date)}] ${redact(message)}`;
}

export function tagMessage(severity: Severity, message: string): string {
  return `${SEVERITY_TAG[severity]}: ${message}`;
}

export class FileOperationLog implements OperationLog {
  private warned = false;

  constructor(
    readonly path: string,
    private readonly clock: Clock = systemClock,
  ) {}

  record(message: string): void {
    try {
      appendFileSync(this.path, formatOperationLine(this.clock(), message) + '\n', 'utf8');
    } catch (err) {
      // warn once, keep going
      if (!this.warned) {
        this.warned = true;
        logger.warn('Operation log is not writable', {
          path: this.path,
          error: (err as Error).message,
        });
      }
    }
  }

  outcome(severity: Severity, message: string): void {
    this.record(tagMessage(severity, message));
  }
}
