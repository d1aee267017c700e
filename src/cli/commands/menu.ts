import type { Command } from 'commander';
import { hostname, userInfo } from 'node:os';
import { runDoctorChecks, type DoctorOptions } from '../../runtime/doctor.js';
import { createCliContext, type CliContext, type ContextFactory } from '../cli-shared.js';
import { MENU_TITLE } from '../menus/info.js';
import { buildMainMenu } from '../menus/main.js';
import { runMenu } from '../menus/menu.js';
import { readPackageInfo } from '../package-info.js';

function currentUser(): string {
  try {
    return userInfo().username;
  } catch {
    return String(process.getuid?.() ?? 'unknown');
  }
}

/**
 * Refuse to start unless the environment checks pass; warnings are shown
 * and the menu still opens. Resolves to false when start-up was refused.
 */
export function checkStartup(ctx: CliContext, opts: DoctorOptions = {}): boolean {
  const report = runDoctorChecks(ctx.config, ctx.runner, opts);
  for (const check of report.checks) {
    if (check.status === 'fail') {
      ctx.reporter.error(check.message);
      if (check.fix) ctx.reporter.info(check.fix);
    } else if (check.status === 'warn') {
      ctx.reporter.warning(check.message);
    }
  }
  return report.overall !== 'fail';
}

export async function runInteractiveMenu(ctx: CliContext, version: string): Promise<void> {
  ctx.log.record(`=== ${MENU_TITLE} Started ===`);
  ctx.log.record(`User: ${currentUser()}`);
  ctx.log.record(`Hostname: ${hostname()}`);

  await runMenu(ctx, buildMainMenu(version));

  console.log('');
  console.log(`Exiting ${MENU_TITLE}...`);
  ctx.log.record('Script exited by user');
}

export function registerMenuCommand(program: Command, factory: ContextFactory = createCliContext): void {
  program
    .command('menu', { isDefault: true })
    .description('Open the interactive administration menu')
    .action(async (_opts: unknown, cmd: Command) => {
      const ctx = factory({ configPath: cmd.optsWithGlobals<{ config?: string }>().config });
      if (!checkStartup(ctx)) {
        process.exitCode = 1;
        return;
      }
      await runInteractiveMenu(ctx, readPackageInfo().version);
    });
}
