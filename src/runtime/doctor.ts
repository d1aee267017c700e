import { accessSync, constants } from 'node:fs';
import { dirname } from 'node:path';
import { isDirectory, isFile } from '../shared/fs-utils.js';
import type { MenuConfig } from '../shared/schemas.js';
import { getWorkspacePaths } from '../workspace/paths.js';
import type { ToolRunner } from './tool-runner.js';

export type CheckStatus = 'pass' | 'fail' | 'warn';

export interface DoctorCheck {
  name: string;
  status: CheckStatus;
  message: string;
  fix?: string;
}

export interface DoctorReport {
  overall: CheckStatus;
  checks: DoctorCheck[];
  summary: string;
}

/** Product commands every server installation ships. */
export const REQUIRED_TOOLS = ['pmsrvinfo', 'pmpolicy', 'pmlicense'] as const;

export interface DoctorOptions {
  getuid?: () => number;
  isWritable?: (path: string) => boolean;
}

function check(
  name: string,
  fn: () => { status: CheckStatus; message: string; fix?: string },
): DoctorCheck {
  try {
    return { name, ...fn() };
  } catch (err) {
    return {
      name,
      status: 'fail',
      message: `Check threw: ${(err as Error).message}`,
    };
  }
}

function defaultGetuid(): number {
  return typeof process.getuid === 'function' ? process.getuid() : -1;
}

function defaultIsWritable(path: string): boolean {
  try {
    accessSync(path, constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

export function runDoctorChecks(
  config: MenuConfig,
  runner: Pick<ToolRunner, 'hasTool'>,
  opts: DoctorOptions = {},
): DoctorReport {
  const getuid = opts.getuid ?? defaultGetuid;
  const isWritable = opts.isWritable ?? defaultIsWritable;
  const checks: DoctorCheck[] = [];

  // ── Privileges ───────────────────────────────────────────────────────────
  checks.push(
    check('Running as root', () => {
      const uid = getuid();
      if (uid === 0) return { status: 'pass', message: 'Effective user is root' };
      return {
        status: 'fail',
        message: 'This menu must be run as root',
        fix: 'Run: sudo sudo-menu',
      };
    }),
  );

  // ── Product installation ─────────────────────────────────────────────────
  const installed = isDirectory(config.binDir);
  checks.push(
    check('Safeguard for Sudo installed', () => {
      if (installed) return { status: 'pass', message: `Found ${config.binDir}` };
      return {
        status: 'fail',
        message: `Safeguard for Sudo not found at ${config.binDir}`,
        fix: 'Install Safeguard for Sudo, or set binDir in the menu configuration',
      };
    }),
  );

  checks.push(
    check('Server commands present', () => {
      if (!installed) {
        return { status: 'warn', message: 'Product not installed – skipping command check' };
      }
      const missing = REQUIRED_TOOLS.filter((tool) => !runner.hasTool(tool));
      if (missing.length === 0) {
        return { status: 'pass', message: `${REQUIRED_TOOLS.join(', ')} found` };
      }
      return {
        status: 'warn',
        message: `Some Safeguard commands not found: ${missing.join(' ')}. This may be a plugin-only installation.`,
      };
    }),
  );

  // ── Local state ──────────────────────────────────────────────────────────
  checks.push(
    check('Operation log writable', () => {
      const target = isFile(config.operationLog) ? config.operationLog : dirname(config.operationLog);
      if (isWritable(target)) {
        return { status: 'pass', message: `Logging to ${config.operationLog}` };
      }
      return {
        status: 'warn',
        message: `Cannot write ${config.operationLog}; operations will not be logged`,
        fix: 'Set operationLog in the menu configuration to a writable path',
      };
    }),
  );

  checks.push(
    check('Policy workspace', () => {
      const paths = getWorkspacePaths(config.workspaceDir);
      if (isDirectory(paths.policyBase)) {
        return { status: 'pass', message: `Policy checked out at ${paths.root}` };
      }
      if (isDirectory(paths.root)) {
        return {
          status: 'warn',
          message: `${paths.root} exists but holds no checked-out policy`,
          fix: 'Run: sudo-menu policy clean, then sudo-menu policy checkout',
        };
      }
      return { status: 'pass', message: 'No policy checked out' };
    }),
  );

  const hasFailure = checks.some((c) => c.status === 'fail');
  const hasWarning = checks.some((c) => c.status === 'warn');
  const overall: CheckStatus = hasFailure ? 'fail' : hasWarning ? 'warn' : 'pass';

  const passCount = checks.filter((c) => c.status === 'pass').length;
  const summary =
    `${passCount}/${checks.length} checks passed` +
    (hasFailure ? ' – FAILURES detected' : '') +
    (hasWarning && !hasFailure ? ' – warnings present' : '');

  return { overall, checks, summary };
}
