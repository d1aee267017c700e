import {
  spawnSync as nodeSpawnSync,
  type SpawnSyncOptionsWithStringEncoding,
  type SpawnSyncReturns,
  type StdioOptions,
} from 'node:child_process';
import { accessSync, constants } from 'node:fs';
import { join } from 'node:path';
import type { OperationLog } from '../audit/operation-log.js';
import { logger } from '../shared/logger.js';

export type SpawnSyncFn = (
  command: string,
  args: readonly string[],
  options: SpawnSyncOptionsWithStringEncoding,
) => SpawnSyncReturns<string>;

/** Exit status reported when a binary could not be started at all. */
export const SPAWN_FAILURE_STATUS = 127;

export type OutputMode =
  /** Share the operator's terminal. */
  | 'inherit'
  /** Discard stdout and stderr, like `> /dev/null 2>&1`. */
  | 'quiet'
  /** Capture stdout for the caller, stderr stays on the terminal. */
  | 'capture';

export interface RunOptions {
  output?: OutputMode;
  cwd?: string;
  /** Skip the operation-log lines, for internal pre-checks. */
  unlogged?: boolean;
}

export interface ToolResult {
  status: number;
  stdout: string;
}

/**
 * Executes external binaries synchronously with an argument vector. Product
 * tools are resolved inside the configured bin directory; system commands
 * (tar, cp, du, sh) are looked up on PATH.
 */
export interface ToolRunner {
  readonly binDir: string;
  toolPath(tool: string): string;
  hasTool(tool: string): boolean;
  run(tool: string, args: string[], opts?: RunOptions): ToolResult;
  runSystem(command: string, args: string[], opts?: RunOptions): ToolResult;
}

/** Render an argument vector for display and logging. */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map((part) => (part === '' || /[\s"'\\$`]/.test(part) ? JSON.stringify(part) : part))
    .join(' ');
}

export interface SpawnToolRunnerOptions {
  binDir: string;
  log: OperationLog;
  spawnSync?: SpawnSyncFn;
  isExecutable?: (path: string) => boolean;
}

function defaultIsExecutable(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export class SpawnToolRunner implements ToolRunner {
  readonly binDir: string;
  private readonly log: OperationLog;
  private readonly spawn: SpawnSyncFn;
  private readonly isExecutable: (path: string) => boolean;

  constructor(opts: SpawnToolRunnerOptions) {
    this.binDir = opts.binDir;
    this.log = opts.log;
    this.spawn = opts.spawnSync ?? nodeSpawnSync;
    this.isExecutable = opts.isExecutable ?? defaultIsExecutable;
  }

  toolPath(tool: string): string {
    return join(this.binDir, tool);
  }

  hasTool(tool: string): boolean {
    return this.isExecutable(this.toolPath(tool));
  }

  run(tool: string, args: string[], opts: RunOptions = {}): ToolResult {
    return this.exec(this.toolPath(tool), args, opts);
  }

  runSystem(command: string, args: string[], opts: RunOptions = {}): ToolResult {
    return this.exec(command, args, opts);
  }

  private exec(command: string, args: string[], opts: RunOptions): ToolResult {
    const output = opts.output ?? 'inherit';
    const display = formatCommand(command, args);
    if (!opts.unlogged) this.log.record(`Executing: ${display}`);

    const stdio: StdioOptions =
      output === 'quiet'
        ? ['inherit', 'ignore', 'ignore']
        : output === 'capture'
          ? ['inherit', 'pipe', 'inherit']
          : 'inherit';

    const result = this.spawn(command, args, {
      stdio,
      cwd: opts.cwd,
      encoding: 'utf8',
    });

    let status: number;
    if (result.error) {
      logger.error('Failed to start command', { command: display, error: result.error.message });
      status = SPAWN_FAILURE_STATUS;
    } else {
      // null when the child was killed by a signal
      status = result.status ?? SPAWN_FAILURE_STATUS;
    }

    if (!opts.unlogged) {
      if (status === 0) {
        this.log.record('Command completed successfully');
      } else {
        this.log.record(`Command failed with exit code: ${status}`);
      }
    }

    return { status, stdout: result.stdout ?? '' };
  }
}
