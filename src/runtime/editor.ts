import { spawnSync } from 'node:child_process';
import { logger } from '../shared/logger.js';

/**
 * Opens a file for interactive editing and blocks until the operator closes it.
 */
export interface Editor {
  edit(filePath: string): void;
}

function onPath(command: string): boolean {
  const result = spawnSync('which', [command], { stdio: 'ignore' });
  return !result.error && result.status === 0;
}

/**
 * Editor precedence: configured command, `VISUAL`, `EDITOR`, then vim when
 * installed, else vi.
 */
export function resolveEditorCommand(
  configured: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  hasCommand: (command: string) => boolean = onPath,
): string {
  if (configured) return configured;
  const fromEnv = env['VISUAL'] || env['EDITOR'];
  if (fromEnv) return fromEnv;
  return hasCommand('vim') ? 'vim' : 'vi';
}

export class TerminalEditor implements Editor {
  constructor(private readonly command: string) {}

  edit(filePath: string): void {
    // Allow "code --wait" style values without involving a shell.
    const [cmd = 'vi', ...flags] = this.command.split(/\s+/).filter(Boolean);
    const result = spawnSync(cmd, [...flags, filePath], { stdio: 'inherit' });
    if (result.error) {
      logger.error('Failed to start editor', { editor: cmd, error: result.error.message });
      throw new Error(`Failed to start editor ${cmd}: ${result.error.message}`);
    }
  }
}
