import type { RunOptions, ToolRunner } from '../runtime/tool-runner.js';

export const VALIDATOR_TOOL = 'pmcheck';

export type ValidationMode = 'sudo';

/**
 * Syntax validator for sudo rule files. `check` is a pure read; zero exit
 * status means the file is valid.
 */
export interface PolicyValidator {
  check(filePath: string, opts?: { quiet?: boolean }): boolean;
}

export class PmCheckValidator implements PolicyValidator {
  constructor(
    private readonly runner: ToolRunner,
    private readonly mode: ValidationMode = 'sudo',
  ) {}

  check(filePath: string, opts: { quiet?: boolean } = {}): boolean {
    const runOpts: RunOptions = opts.quiet ? { output: 'quiet', unlogged: true } : {};
    return this.runner.run(VALIDATOR_TOOL, ['-f', filePath, '-o', this.mode], runOpts).status === 0;
  }
}

export type AuthorizationVerdict =
  | 'accepted'
  | 'authentication_required'
  | 'rejected'
  | 'syntax_error'
  | 'unknown';

export interface AuthorizationQuery {
  user: string;
  group: string;
  host: string;
  command: string[];
}

export function authorizationArgs(query: AuthorizationQuery): string[] {
  return ['-u', query.user, '-g', query.group, '-h', query.host, ...query.command];
}

export function verdictForExitCode(code: number): AuthorizationVerdict {
  switch (code) {
    case 0:
      return 'accepted';
    case 11:
      return 'authentication_required';
    case 12:
      return 'rejected';
    case 13:
      return 'syntax_error';
    default:
      return 'unknown';
  }
}
