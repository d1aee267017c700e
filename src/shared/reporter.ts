import type { OperationLog, Severity } from '../audit/operation-log.js';
import { tagMessage } from '../audit/operation-log.js';

/**
 * Operator-facing messages. Severity-tagged messages also go to the
 * operation log; `info` is terminal-only.
 */
export interface Reporter {
  info(message: string): void;
  success(message: string): void;
  warning(message: string): void;
  error(message: string): void;
}

const COLOR: Record<Severity, string> = {
  error: '\x1b[31m',
  warning: '\x1b[33m',
  success: '\x1b[32m',
};
const RESET = '\x1b[0m';

export class ConsoleReporter implements Reporter {
  constructor(private readonly log: OperationLog) {}

  private emit(severity: Severity, message: string): void {
    console.log(`${COLOR[severity]}${tagMessage(severity, message)}${RESET}`);
    this.log.outcome(severity, message);
  }

  info(message: string): void {
    console.log(message);
  }

  success(message: string): void {
    this.emit('success', message);
  }

  warning(message: string): void {
    this.emit('warning', message);
  }

  error(message: string): void {
    this.emit('error', message);
  }
}
